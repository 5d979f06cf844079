import { v4 as uuidv4 } from 'uuid'
import { DuplicatePathError, SnapshotSummary } from '../contracts'
import { AddResult, SnapshotOptions } from './types'

/**
 * Directory sizes from one report, keyed by path. Read-only once built;
 * obtain one through Snapshot.newBuilder().
 */
export class Snapshot {
  readonly id: string = uuidv4()
  readonly createdAt: string = new Date().toISOString()
  readonly source?: string
  private readonly sizes: ReadonlyMap<string, bigint>

  private constructor(sizes: Map<string, bigint>, options: SnapshotOptions) {
    this.sizes = sizes
    this.source = options.source
  }

  static newBuilder(options: SnapshotOptions = {}): SnapshotBuilder {
    return new SnapshotBuilder((sizes) => new Snapshot(sizes, options))
  }

  get size(): number {
    return this.sizes.size
  }

  get(path: string): bigint | undefined {
    return this.sizes.get(path)
  }

  has(path: string): boolean {
    return this.sizes.has(path)
  }

  paths(): IterableIterator<string> {
    return this.sizes.keys()
  }

  entries(): IterableIterator<[string, bigint]> {
    return this.sizes.entries()
  }

  totalBytes(): bigint {
    let total = 0n
    for (const bytes of this.sizes.values()) {
      total += bytes
    }
    return total
  }

  summary(): SnapshotSummary {
    return {
      id: this.id,
      source: this.source,
      directoryCount: this.size,
      totalBytes: this.totalBytes(),
    }
  }
}

export class SnapshotBuilder {
  private sizes: Map<string, bigint> = new Map()
  private finished = false

  constructor(private readonly create: (sizes: Map<string, bigint>) => Snapshot) {}

  /**
   * Record one directory. A path that is already present is reported
   * through the result and leaves the builder unchanged.
   */
  add(path: string, bytes: bigint): AddResult {
    this.assertOpen()

    if (bytes < 0n) {
      throw new RangeError(`Size of ${path} must not be negative, got ${bytes}`)
    }

    if (this.sizes.has(path)) {
      return { ok: false, error: new DuplicatePathError(path) }
    }

    this.sizes.set(path, bytes)
    return { ok: true }
  }

  get size(): number {
    return this.sizes.size
  }

  finish(): Snapshot {
    this.assertOpen()
    this.finished = true
    return this.create(this.sizes)
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error('Snapshot builder has already been finished')
    }
  }
}
