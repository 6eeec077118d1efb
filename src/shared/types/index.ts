export type { Author, Commit, CommitDetails, CommitMessage } from './commit'
export type { Configuration } from './config'
export type {
  DiffChunk,
  DiffLine,
  DiffLineType,
  DiffMode,
  DiffStats,
  DiffStatus,
  FileDiff
} from './diff'
export type { AnnotatedTag, Branch, BranchType, LightweightTag, Tag, TagType } from './refs'
export type { MergeStatus, Remote } from './remote'
export type { Stash } from './stash'
export type { FileEntry, IndexStatus, WorktreeStatus } from './status'
