export type ReportErrorKind = 'InvalidSizeUnit' | 'DuplicatePath' | 'FileReadError'

/**
 * Base class for every failure that aborts loading a report.
 * Callers switch on `kind` rather than on the concrete class.
 */
export abstract class ReportError extends Error {
  abstract readonly kind: ReportErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class InvalidSizeUnitError extends ReportError {
  readonly kind = 'InvalidSizeUnit'

  constructor(
    readonly formattedSize: string,
    readonly lineNumber?: number
  ) {
    super(
      lineNumber === undefined
        ? `Invalid size "${formattedSize}"`
        : `Invalid size "${formattedSize}" on line ${lineNumber}`
    )
  }
}

export class DuplicatePathError extends ReportError {
  readonly kind = 'DuplicatePath'

  constructor(
    readonly path: string,
    readonly lineNumber?: number
  ) {
    super(
      lineNumber === undefined
        ? `Path defined twice: ${path}`
        : `Path defined twice: ${path} (line ${lineNumber})`
    )
  }
}

export class FileReadError extends ReportError {
  readonly kind = 'FileReadError'

  constructor(
    readonly filePath: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Could not read report ${filePath}: ${reason}`, { cause })
  }
}

export const isReportError = (error: unknown): error is ReportError =>
  error instanceof ReportError
