import { ComparisonResult, DiffEntry, OutputFormat } from '../../contracts'
import { DiffFormatter, FormatOptions } from '../Formatter'

/**
 * Base implementation of the DiffFormatter interface
 */
export abstract class BaseFormatter implements DiffFormatter {
  abstract readonly format: OutputFormat

  render(result: ComparisonResult, options: FormatOptions = {}): string {
    const shown = this.limitEntries(result.entries, options.limit)
    return this.renderEntries(result, shown, result.entries.length - shown.length)
  }

  /**
   * Keep the first `limit` entries, which are the largest growths
   */
  protected limitEntries(entries: DiffEntry[], limit?: number): DiffEntry[] {
    if (limit === undefined || entries.length <= limit) {
      return entries
    }
    return entries.slice(0, limit)
  }

  /**
   * Must be implemented by subclasses
   */
  protected abstract renderEntries(
    result: ComparisonResult,
    shown: DiffEntry[],
    hiddenCount: number
  ): string
}
