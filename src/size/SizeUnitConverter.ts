import { InvalidSizeUnitError } from '../contracts'

/**
 * Decimal powers of ten for each unit a report may print. Units are
 * case-sensitive: the lower-case `b` is bytes, the rest are SI prefixes.
 */
export const SIZE_UNIT_EXPONENTS = {
  b: 0,
  KB: 3,
  MB: 6,
  GB: 9,
  TB: 12,
} as const

export type SizeUnit = keyof typeof SIZE_UNIT_EXPONENTS

const SIZE_PATTERN = /^(\d+)(?:\.(\d+))?([A-Za-z]+)$/

const isSizeUnit = (unit: string): unit is SizeUnit =>
  Object.prototype.hasOwnProperty.call(SIZE_UNIT_EXPONENTS, unit)

export class SizeUnitConverter {
  /**
   * Convert a formatted size such as "3.2MB", "67TB" or "4b" to whole bytes.
   *
   * The value is scaled in decimal by shifting the fraction digits, so
   * "4.35MB" is exactly 4350000 and digits below one byte are truncated.
   */
  convert(formatted: string): bigint {
    const match = SIZE_PATTERN.exec(formatted)
    if (!match) {
      throw new InvalidSizeUnitError(formatted)
    }

    const [, integerPart, fractionPart = '', unit] = match
    if (!isSizeUnit(unit)) {
      throw new InvalidSizeUnitError(formatted)
    }

    const exponent = SIZE_UNIT_EXPONENTS[unit]
    const scaledFraction = fractionPart.padEnd(exponent, '0').slice(0, exponent)

    return BigInt(integerPart + scaledFraction)
  }
}
