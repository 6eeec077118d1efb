/**
 * Index-side state of a path, relative to the last commit.
 */
export type IndexStatus = 'clean' | 'modified' | 'added' | 'deleted' | 'renamed' | 'copied'

/**
 * Worktree-side state of a path, relative to the index.
 */
export type WorktreeStatus = 'clean' | 'modified' | 'deleted' | 'untracked' | 'ignored'

/**
 * One path reported by `git status --porcelain`.
 * At least one of the two axes is not 'clean'.
 */
export type FileEntry = {
  readonly path: string
  readonly indexStatus: IndexStatus
  readonly worktreeStatus: WorktreeStatus
}
