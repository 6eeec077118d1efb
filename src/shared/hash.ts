/**
 * Hash - an opaque git object id (commit, tree, tag object...).
 *
 * No normalisation is applied: two hashes are equal only when their raw
 * strings are identical, so an abbreviated id never equals its full form.
 */

const SHORT_LENGTH = 7

export class Hash {
  /** Placeholder id used when a listing line carries no id column. */
  static readonly ZERO = new Hash('0'.repeat(40))

  constructor(readonly value: string) {
    Object.freeze(this)
  }

  static from(value: string | Hash): Hash {
    return value instanceof Hash ? value : new Hash(value)
  }

  /**
   * First seven characters, or the whole id when it is shorter.
   */
  get short(): string {
    return this.value.slice(0, SHORT_LENGTH)
  }

  equals(other: Hash | string): boolean {
    return this.value === (other instanceof Hash ? other.value : other)
  }

  compare(other: Hash): number {
    if (this.value === other.value) return 0
    return this.value < other.value ? -1 : 1
  }

  toString(): string {
    return this.value
  }

  toJSON(): string {
    return this.value
  }
}
