import { ComparisonResult, DiffEntry } from '../../contracts'
import { BaseFormatter } from './BaseFormatter'

export class TextFormatter extends BaseFormatter {
  readonly format = 'text'

  protected renderEntries(result: ComparisonResult, shown: DiffEntry[], hiddenCount: number): string {
    const lines = [
      `Older report loaded (${result.older.directoryCount} directories)`,
      `Newer report loaded (${result.newer.directoryCount} directories)`,
      '',
    ]

    if (result.entries.length === 0) {
      lines.push('No directories grew.')
      return lines.join('\n')
    }

    for (const entry of shown) {
      lines.push(`${entry.path} - increased ~${entry.deltaBytes} bytes`)
    }
    if (hiddenCount > 0) {
      lines.push(`... and ${hiddenCount} more`)
    }

    return lines.join('\n')
  }
}
