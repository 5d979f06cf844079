import type { DiffEntry, SpaceDiffConfig } from './contracts'
import { ConfigLoader } from './config/ConfigLoader'
import { Snapshot } from './snapshot/Snapshot'
import { SnapshotDiffer } from './snapshot/SnapshotDiffer'
import type { DiffOptions } from './snapshot/types'
import { ReportComparer } from './spacediff/ReportComparer'

export * from './contracts'
export { ConfigLoader } from './config/ConfigLoader'
export type { ConfigOverrides } from './config/ConfigLoader'
export { debugLog } from './logging/debugLog'
export { matchReportLine } from './report/ReportLineMatcher'
export type { ReportLineMatch } from './report/ReportLineMatcher'
export { ReportParser } from './report/ReportParser'
export type { ReportLines } from './report/ReportParser'
export { SizeUnitConverter, SIZE_UNIT_EXPONENTS } from './size/SizeUnitConverter'
export type { SizeUnit } from './size/SizeUnitConverter'
export { Snapshot, SnapshotBuilder } from './snapshot/Snapshot'
export { SnapshotDiffer, compareDiffEntries } from './snapshot/SnapshotDiffer'
export type { AddResult, DiffOptions, SnapshotOptions } from './snapshot/types'
export { ReportComparer } from './spacediff/ReportComparer'
export { FormatterFactory, TextFormatter, JsonFormatter } from './formatting'
export type { DiffFormatter, FormatOptions } from './formatting'

/**
 * Read a report file into a snapshot.
 *
 * Rejects with InvalidSizeUnitError, DuplicatePathError or FileReadError;
 * no snapshot is produced from a file that fails.
 */
export async function loadSnapshot(
  filePath: string,
  config: SpaceDiffConfig | ConfigLoader = new ConfigLoader()
): Promise<Snapshot> {
  return new ReportComparer(config).loadSnapshot(filePath)
}

/**
 * Directories of `newer` that grew since `older`, largest growth first
 */
export function compareSnapshots(
  newer: Snapshot,
  older: Snapshot,
  options: DiffOptions = {}
): DiffEntry[] {
  return new SnapshotDiffer(options).diff(newer, older)
}
