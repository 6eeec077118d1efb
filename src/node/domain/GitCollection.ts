/**
 * GitCollection - the immutable, ordered container every decoded listing
 * is returned in (status report, commit log, branch/tag/stash lists,
 * diff report, remotes).
 *
 * Record-specific predicates live in the *Queries classes and take a
 * collection as their first argument; there are no subclasses.
 */

export type CollectionOptions<T> = {
  /** Exact-match key used by find(). */
  key: (record: T) => string
  /** Text searched by findContaining(); defaults to the key. */
  text?: (record: T) => string
  /** Re-sort by key on construction (ref listings) instead of keeping source order. */
  sortByKey?: boolean
}

function compareKeys(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

/**
 * Returns an iterable that re-runs the filter on every iteration, so it can
 * be consumed any number of times.
 */
function lazyFilter<T>(source: readonly T[], predicate: (record: T) => boolean): Iterable<T> {
  return {
    *[Symbol.iterator]() {
      for (const record of source) {
        if (predicate(record)) yield record
      }
    }
  }
}

export class GitCollection<T> implements Iterable<T> {
  private readonly records: readonly T[]
  private readonly keyOf: (record: T) => string
  private readonly textOf: (record: T) => string

  constructor(records: Iterable<T>, options: CollectionOptions<T>) {
    const copy = Array.from(records)
    copy.forEach((record) => Object.freeze(record))
    if (options.sortByKey) {
      copy.sort((a, b) => compareKeys(options.key(a), options.key(b)))
    }

    this.records = Object.freeze(copy)
    this.keyOf = options.key
    this.textOf = options.text ?? options.key
  }

  get length(): number {
    return this.records.length
  }

  isEmpty(): boolean {
    return this.records.length === 0
  }

  [Symbol.iterator](): Iterator<T> {
    return this.records[Symbol.iterator]()
  }

  /**
   * Copy of the records in collection order.
   */
  toArray(): T[] {
    return [...this.records]
  }

  at(index: number): T | undefined {
    return this.records[index]
  }

  first(): T | undefined {
    return this.records[0]
  }

  last(): T | undefined {
    return this.records[this.records.length - 1]
  }

  /**
   * First record whose key equals `key` exactly.
   */
  find(key: string): T | undefined {
    return this.records.find((record) => this.keyOf(record) === key)
  }

  findWhere(predicate: (record: T) => boolean): T | undefined {
    return this.records.find(predicate)
  }

  /**
   * All records whose search text contains `substring`.
   */
  findContaining(substring: string): Iterable<T> {
    return lazyFilter(this.records, (record) => this.textOf(record).includes(substring))
  }

  filter(predicate: (record: T) => boolean): Iterable<T> {
    return lazyFilter(this.records, predicate)
  }

  count(predicate?: (record: T) => boolean): number {
    if (!predicate) return this.records.length
    let total = 0
    for (const record of this.records) {
      if (predicate(record)) total++
    }
    return total
  }
}
