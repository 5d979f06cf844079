import { DiffEntry } from '../contracts'
import { debugLog } from '../logging/debugLog'
import { Snapshot } from './Snapshot'
import { DiffOptions } from './types'

/**
 * Orders entries by growth, largest first, then by path so that equal
 * deltas always come out in the same order.
 */
export const compareDiffEntries = (a: DiffEntry, b: DiffEntry): number => {
  if (a.deltaBytes !== b.deltaBytes) {
    return a.deltaBytes > b.deltaBytes ? -1 : 1
  }
  if (a.path === b.path) return 0
  return a.path < b.path ? -1 : 1
}

export class SnapshotDiffer {
  private partitions: number

  constructor(options: DiffOptions = {}) {
    const partitions = options.partitions ?? 1
    if (!Number.isInteger(partitions) || partitions < 1) {
      throw new RangeError(`partitions must be a positive integer, got ${partitions}`)
    }
    this.partitions = partitions
  }

  /**
   * List the directories of `newer` that grew relative to `older`.
   *
   * A path missing from `older` counts as having grown from zero. Paths that
   * shrank, stayed the same, or exist only in `older` are left out.
   */
  diff(newer: Snapshot, older: Snapshot): DiffEntry[] {
    debugLog({
      event: 'diff_start',
      newerSnapshotId: newer.id,
      olderSnapshotId: older.id,
      newerCount: newer.size,
      olderCount: older.size,
      partitions: this.partitions,
    })

    const paths = Array.from(newer.paths())
    const sliceLength = Math.ceil(paths.length / this.partitions)

    // Each slice fills its own array; nothing is shared until the merge below
    const slices: DiffEntry[][] = []
    for (let start = 0; start < paths.length; start += sliceLength) {
      slices.push(this.growthOf(paths.slice(start, start + sliceLength), newer, older))
    }

    const entries = slices.flat().sort(compareDiffEntries)

    debugLog({
      event: 'diff_complete',
      newerSnapshotId: newer.id,
      olderSnapshotId: older.id,
      grownCount: entries.length,
      slices: slices.length,
    })

    return entries
  }

  private growthOf(paths: string[], newer: Snapshot, older: Snapshot): DiffEntry[] {
    const grown: DiffEntry[] = []

    for (const path of paths) {
      const after = newer.get(path) ?? 0n
      const before = older.get(path) ?? 0n
      const deltaBytes = after - before

      if (deltaBytes > 0n) {
        grown.push({ path, deltaBytes })
      }
    }

    return grown
  }
}
