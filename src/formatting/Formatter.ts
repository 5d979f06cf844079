import { ComparisonResult, OutputFormat } from '../contracts'

/**
 * Renders a comparison result for the terminal or another program
 */
export interface DiffFormatter {
  readonly format: OutputFormat

  /**
   * Render the result
   * @param result The comparison to render
   * @param options Rendering options such as the entry limit
   */
  render(result: ComparisonResult, options?: FormatOptions): string
}

export interface FormatOptions {
  /**
   * Maximum number of entries to render; the rest are summarised
   */
  limit?: number
}
