import { describe, it, expect } from 'vitest'
import { ReportParser } from './ReportParser'
import { DuplicatePathError, InvalidSizeUnitError } from '../contracts'

async function* streamOf(lines: string[]): AsyncGenerator<string> {
  for (const line of lines) {
    yield line
  }
}

describe('ReportParser', () => {
  const parser = new ReportParser()

  it('should build a snapshot from folder lines', async () => {
    const snapshot = await parser.parse([
      'C:\\a [5MB]',
      'C:\\b [1KB]',
      'C:\\a\\nested [3.2MB]',
    ])

    expect(snapshot.size).toBe(3)
    expect(snapshot.get('C:\\a')).toBe(5_000_000n)
    expect(snapshot.get('C:\\b')).toBe(1_000n)
    expect(snapshot.get('C:\\a\\nested')).toBe(3_200_000n)
  })

  it('should skip headers, totals, blank lines and file lines', async () => {
    const snapshot = await parser.parse([
      'Disk usage report',
      'Grouped by folder',
      '',
      'C:\\Users [12GB]',
      '    photo.jpg [4MB]',
      '-----------',
      'Total size 12GB',
    ])

    expect(Array.from(snapshot.entries())).toEqual([['C:\\Users', 12_000_000_000n]])
  })

  it('should read async line streams', async () => {
    const snapshot = await parser.parse(streamOf(['C:\\x [4b]', 'noise', 'D:\\y [2TB]']))

    expect(snapshot.get('C:\\x')).toBe(4n)
    expect(snapshot.get('D:\\y')).toBe(2_000_000_000_000n)
  })

  it('should strip carriage returns left by CRLF reports', async () => {
    const snapshot = await parser.parse(['C:\\win [7KB]\r'])

    expect(snapshot.get('C:\\win')).toBe(7_000n)
  })

  it('should keep sizes too large for a double exact', async () => {
    const snapshot = await parser.parse([
      'C:\\big [10000TB]',
      'C:\\max [18446744073709551615b]',
    ])

    expect(snapshot.get('C:\\big')).toBe(10_000_000_000_000_000n)
    expect(snapshot.get('C:\\max')).toBe(18_446_744_073_709_551_615n)
  })

  it('should drop a byte order mark before the first line', async () => {
    const snapshot = await parser.parse(['\uFEFFC:\\a [1MB]', 'C:\\b [2MB]'])

    expect(Array.from(snapshot.paths())).toEqual(['C:\\a', 'C:\\b'])
    expect(snapshot.get('C:\\a')).toBe(1_000_000n)
  })

  it('should leave a byte order mark after the first line in place', async () => {
    const snapshot = await parser.parse(['header', '\uFEFFC:\\a [1MB]'])

    expect(Array.from(snapshot.paths())).toEqual(['\uFEFFC:\\a'])
  })

  it('should record the source on the snapshot', async () => {
    const snapshot = await parser.parse([], { source: 'reports/monday.txt' })

    expect(snapshot.size).toBe(0)
    expect(snapshot.source).toBe('reports/monday.txt')
  })

  it('should reject a path defined twice with the line number', async () => {
    const parse = parser.parse(['header', 'C:\\a [1MB]', 'C:\\a [2MB]'])

    await expect(parse).rejects.toThrow(DuplicatePathError)
    await expect(parse).rejects.toMatchObject({
      kind: 'DuplicatePath',
      path: 'C:\\a',
      lineNumber: 3,
    })
  })

  it('should reject an unknown unit on a folder line', async () => {
    const parse = parser.parse(['C:\\a [1MB]', 'C:\\b [12XB]'])

    await expect(parse).rejects.toThrow(InvalidSizeUnitError)
    await expect(parse).rejects.toMatchObject({
      kind: 'InvalidSizeUnit',
      formattedSize: '12XB',
      lineNumber: 2,
      message: 'Invalid size "12XB" on line 2',
    })
  })

  it('should stop reading at the first invalid line', async () => {
    const seen: string[] = []
    function* lines(): Generator<string> {
      for (const line of ['C:\\a [1MB]', 'C:\\b [MB]', 'C:\\c [1MB]']) {
        seen.push(line)
        yield line
      }
    }

    await expect(parser.parse(lines())).rejects.toThrow(InvalidSizeUnitError)
    expect(seen).toEqual(['C:\\a [1MB]', 'C:\\b [MB]'])
  })
})
