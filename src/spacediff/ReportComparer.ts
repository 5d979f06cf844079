import fs from 'fs'
import readline from 'readline'
import {
  ComparisonResult,
  DiffEntry,
  FileReadError,
  SpaceDiffConfig,
} from '../contracts'
import { ConfigLoader } from '../config/ConfigLoader'
import { debugLog } from '../logging/debugLog'
import { ReportParser } from '../report/ReportParser'
import { Snapshot } from '../snapshot/Snapshot'
import { SnapshotDiffer } from '../snapshot/SnapshotDiffer'

// I/O failures from fs carry an errno-style code such as ENOENT or EISDIR
const isSystemError = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'

export class ReportComparer {
  private config: SpaceDiffConfig
  private parser: ReportParser
  private differ: SnapshotDiffer

  constructor(config: SpaceDiffConfig | ConfigLoader = new ConfigLoader()) {
    this.config = config instanceof ConfigLoader ? config.getConfig() : config
    this.parser = new ReportParser()
    this.differ = new SnapshotDiffer({ partitions: this.config.diff.partitions })
  }

  /**
   * Stream a report file into a snapshot. Rejects with FileReadError when the
   * file cannot be opened or read, or with the parser's error for bad content.
   */
  async loadSnapshot(filePath: string): Promise<Snapshot> {
    debugLog({
      event: 'load_snapshot_start',
      filePath,
      encoding: this.config.report.encoding,
    })

    const input = fs.createReadStream(filePath, { encoding: this.config.report.encoding })
    const lines = readline.createInterface({ input, crlfDelay: Infinity })

    try {
      const snapshot = await this.parser.parse(lines, { source: filePath })
      debugLog({
        event: 'load_snapshot_complete',
        filePath,
        snapshotId: snapshot.id,
        directoryCount: snapshot.size,
      })
      return snapshot
    } catch (error) {
      debugLog({
        event: 'load_snapshot_failed',
        filePath,
        error: error instanceof Error ? error.message : String(error),
      })
      if (isSystemError(error)) {
        throw new FileReadError(filePath, error)
      }
      throw error
    } finally {
      input.destroy()
    }
  }

  compareSnapshots(newer: Snapshot, older: Snapshot): DiffEntry[] {
    return this.differ.diff(newer, older)
  }

  /**
   * Load the older report, then the newer one, and list what grew
   */
  async compareReports(olderPath: string, newerPath: string): Promise<ComparisonResult> {
    const older = await this.loadSnapshot(olderPath)
    const newer = await this.loadSnapshot(newerPath)
    const entries = this.compareSnapshots(newer, older)

    return {
      older: older.summary(),
      newer: newer.summary(),
      entries,
      totalGrowthBytes: entries.reduce((sum, entry) => sum + entry.deltaBytes, 0n),
    }
  }
}
