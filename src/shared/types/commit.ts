import type { Hash } from '../hash'

export type Author = {
  readonly name: string
  readonly email: string
  readonly timestamp: Date
}

export type CommitMessage = {
  readonly subject: string
  /** null when the commit has no body */
  readonly body: string | null
}

export type Commit = {
  readonly hash: Hash
  readonly author: Author
  readonly committer: Author
  readonly message: CommitMessage
  /** Author timestamp, not committer timestamp. */
  readonly timestamp: Date
  /** Empty for a root commit, two or more for a merge. */
  readonly parents: readonly Hash[]
}

/**
 * A commit plus the change summary printed by `git show --stat`.
 * insertions/deletions are approximated from the stat glyphs when the
 * summary line is missing.
 */
export type CommitDetails = {
  readonly commit: Commit
  readonly filesChanged: readonly string[]
  readonly insertions: number
  readonly deletions: number
}
