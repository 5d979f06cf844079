import { DuplicatePathError } from '../contracts'

export type AddResult =
  | { ok: true }
  | { ok: false; error: DuplicatePathError }

export interface SnapshotOptions {
  /** Report file the snapshot was read from, if any */
  source?: string
}

export interface DiffOptions {
  /** Number of independent slices the per-entry deltas are computed in */
  partitions?: number
}
