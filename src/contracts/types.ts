export interface DiffEntry {
  path: string
  deltaBytes: bigint
}

export interface SnapshotSummary {
  id: string
  source?: string
  directoryCount: number
  totalBytes: bigint
}

export interface ComparisonResult {
  older: SnapshotSummary
  newer: SnapshotSummary
  entries: DiffEntry[]
  totalGrowthBytes: bigint
}

export type ReportEncoding = 'utf-8' | 'utf8' | 'utf16le' | 'latin1'

export type OutputFormat = 'text' | 'json'

export interface SpaceDiffConfig {
  report: {
    encoding: ReportEncoding
  }
  diff: {
    partitions: number
  }
  output: {
    format: OutputFormat
    limit?: number
  }
}
