import { ComparisonResult, DiffEntry } from '../../contracts'
import { BaseFormatter } from './BaseFormatter'
import { toJson } from '../json'

export class JsonFormatter extends BaseFormatter {
  readonly format = 'json'

  protected renderEntries(result: ComparisonResult, shown: DiffEntry[], hiddenCount: number): string {
    return toJson({
      older: result.older,
      newer: result.newer,
      totalGrowthBytes: result.totalGrowthBytes,
      entries: shown,
      omittedEntries: hiddenCount,
    })
  }
}
