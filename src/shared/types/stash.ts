import type { Hash } from '../hash'

export type Stash = {
  /**
   * Position in `git stash list` (0 = newest). Not a stable identity:
   * dropping an entry shifts every later index down on the next listing.
   */
  readonly index: number
  readonly message: string
  readonly hash: Hash
  /** Branch the stash was taken on, or 'unknown'. */
  readonly branch: string
  readonly timestamp: Date
}
