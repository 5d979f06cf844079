import { DuplicatePathError, InvalidSizeUnitError } from '../contracts'
import { debugLog } from '../logging/debugLog'
import { SizeUnitConverter } from '../size/SizeUnitConverter'
import { Snapshot } from '../snapshot/Snapshot'
import { SnapshotOptions } from '../snapshot/types'
import { matchReportLine } from './ReportLineMatcher'

export type ReportLines = Iterable<string> | AsyncIterable<string>

const BYTE_ORDER_MARK = '\uFEFF'

export class ReportParser {
  private converter: SizeUnitConverter

  constructor(converter: SizeUnitConverter = new SizeUnitConverter()) {
    this.converter = converter
  }

  /**
   * Build a snapshot from report lines, reading each line once in order.
   *
   * Lines that are not folder lines are skipped. An unreadable size or a
   * path listed twice rejects the whole parse.
   */
  async parse(lines: ReportLines, options: SnapshotOptions = {}): Promise<Snapshot> {
    debugLog({
      event: 'parse_start',
      source: options.source,
    })

    const builder = Snapshot.newBuilder(options)
    let lineNumber = 0
    let skipped = 0

    for await (const rawLine of lines) {
      lineNumber++
      let line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine
      if (lineNumber === 1 && line.startsWith(BYTE_ORDER_MARK)) {
        line = line.slice(BYTE_ORDER_MARK.length)
      }

      const match = matchReportLine(line)
      if (!match) {
        skipped++
        continue
      }

      const bytes = this.convertSize(match.formattedSize, lineNumber)
      const added = builder.add(match.path, bytes)
      if (!added.ok) {
        debugLog({
          event: 'parse_duplicate_path',
          source: options.source,
          path: match.path,
          lineNumber,
        })
        throw new DuplicatePathError(added.error.path, lineNumber)
      }
    }

    const snapshot = builder.finish()

    debugLog({
      event: 'parse_complete',
      source: options.source,
      snapshotId: snapshot.id,
      lineCount: lineNumber,
      directoryCount: snapshot.size,
      skippedLines: skipped,
    })

    return snapshot
  }

  private convertSize(formattedSize: string, lineNumber: number): bigint {
    try {
      return this.converter.convert(formattedSize)
    } catch (error) {
      if (error instanceof InvalidSizeUnitError) {
        debugLog({
          event: 'parse_invalid_size',
          formattedSize,
          lineNumber,
        })
        throw new InvalidSizeUnitError(formattedSize, lineNumber)
      }
      throw error
    }
  }
}
