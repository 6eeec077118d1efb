export type DiffStatus = 'added' | 'modified' | 'deleted' | 'renamed' | 'copied'

export type DiffLineType = 'context' | 'added' | 'removed'

export type DiffLine = {
  readonly type: DiffLineType
  readonly content: string
}

export type DiffChunk = {
  readonly oldStart: number
  readonly oldCount: number
  readonly newStart: number
  readonly newCount: number
  readonly lines: readonly DiffLine[]
}

/**
 * One file in a diff report.
 *
 * Summary-only records (name-only, stat, numstat) have no chunks.
 * A record with neither chunks nor counts may be a binary change.
 */
export type FileDiff = {
  readonly path: string
  /** Source path of a rename or copy. */
  readonly oldPath: string | null
  readonly status: DiffStatus
  readonly chunks: readonly DiffChunk[]
  readonly additions: number
  readonly deletions: number
}

export type DiffStats = {
  readonly filesChanged: number
  readonly insertions: number
  readonly deletions: number
}

/** Which `git diff` output format a report was decoded from. */
export type DiffMode = 'patch' | 'name-only' | 'stat' | 'numstat'
