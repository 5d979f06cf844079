import { describe, it, expect } from 'vitest'
import { FormatterFactory } from './FormatterFactory'
import { JsonFormatter } from './formatters/JsonFormatter'
import { TextFormatter } from './formatters/TextFormatter'
import { ComparisonResult } from '../contracts'

const result = (entries: ComparisonResult['entries']): ComparisonResult => ({
  older: { id: 'older-id', source: 'older.txt', directoryCount: 3, totalBytes: 100n },
  newer: { id: 'newer-id', source: 'newer.txt', directoryCount: 4, totalBytes: 180n },
  entries,
  totalGrowthBytes: entries.reduce((sum, entry) => sum + entry.deltaBytes, 0n),
})

describe('FormatterFactory', () => {
  it('should create a formatter for each output format', () => {
    expect(FormatterFactory.createFormatter('text')).toBeInstanceOf(TextFormatter)
    expect(FormatterFactory.createFormatter('json')).toBeInstanceOf(JsonFormatter)
    expect(FormatterFactory.createFormatter().format).toBe('text')
  })
})

describe('TextFormatter', () => {
  const formatter = new TextFormatter()

  it('should print one line per grown directory', () => {
    const output = formatter.render(result([
      { path: 'C:\\a', deltaBytes: 3_000_000n },
      { path: 'C:\\b', deltaBytes: 1_000n },
    ]))

    expect(output).toBe([
      'Older report loaded (3 directories)',
      'Newer report loaded (4 directories)',
      '',
      'C:\\a - increased ~3000000 bytes',
      'C:\\b - increased ~1000 bytes',
    ].join('\n'))
  })

  it('should say so when nothing grew', () => {
    const output = formatter.render(result([]))

    expect(output.split('\n').pop()).toBe('No directories grew.')
  })

  it('should print growth beyond 2^53 in full', () => {
    const output = formatter.render(result([{ path: 'C:\\a', deltaBytes: 10_000_000_000_000_001n }]))

    expect(output.split('\n').pop()).toBe('C:\\a - increased ~10000000000000001 bytes')
  })

  it('should cut the list at the limit and count the rest', () => {
    const output = formatter.render(result([
      { path: 'C:\\a', deltaBytes: 30n },
      { path: 'C:\\b', deltaBytes: 20n },
      { path: 'C:\\c', deltaBytes: 10n },
    ]), { limit: 1 })

    expect(output.split('\n').slice(3)).toEqual([
      'C:\\a - increased ~30 bytes',
      '... and 2 more',
    ])
  })
})

describe('JsonFormatter', () => {
  const formatter = new JsonFormatter()

  it('should render the result as JSON', () => {
    const output = formatter.render(result([{ path: 'C:\\a', deltaBytes: 80n }]))

    expect(JSON.parse(output)).toEqual({
      older: { id: 'older-id', source: 'older.txt', directoryCount: 3, totalBytes: '100' },
      newer: { id: 'newer-id', source: 'newer.txt', directoryCount: 4, totalBytes: '180' },
      totalGrowthBytes: '80',
      entries: [{ path: 'C:\\a', deltaBytes: '80' }],
      omittedEntries: 0,
    })
  })

  it('should write byte counts as decimal strings', () => {
    const output = formatter.render(result([{ path: 'C:\\a', deltaBytes: 18_446_744_073_709_551_615n }]))

    const parsed = JSON.parse(output)
    expect(parsed.entries).toEqual([{ path: 'C:\\a', deltaBytes: '18446744073709551615' }])
    expect(parsed.totalGrowthBytes).toBe('18446744073709551615')
  })

  it('should apply the limit to entries but keep the full total', () => {
    const output = formatter.render(result([
      { path: 'C:\\a', deltaBytes: 50n },
      { path: 'C:\\b', deltaBytes: 30n },
    ]), { limit: 1 })

    const parsed = JSON.parse(output)
    expect(parsed.entries).toEqual([{ path: 'C:\\a', deltaBytes: '50' }])
    expect(parsed.omittedEntries).toBe(1)
    expect(parsed.totalGrowthBytes).toBe('80')
  })
})
