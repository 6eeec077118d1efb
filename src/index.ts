/**
 * porcelain-kit public API
 */

export { Hash } from './shared/hash'
export { getLogLevel, log, setLogLevel } from './shared/logger'
export type { LogLevel } from './shared/logger'
export type {
  AnnotatedTag,
  Author,
  Branch,
  BranchType,
  Commit,
  CommitDetails,
  CommitMessage,
  Configuration,
  DiffChunk,
  DiffLine,
  DiffLineType,
  DiffMode,
  DiffStats,
  DiffStatus,
  FileDiff,
  FileEntry,
  IndexStatus,
  LightweightTag,
  MergeStatus,
  Remote,
  Stash,
  Tag,
  TagType,
  WorktreeStatus
} from './shared/types'

export * from './node/domain'
export * from './node/operations'
export {
  createGitRunner,
  getGitRunner,
  resetGitRunner,
  setGitRunner,
  SimpleGitRunner
} from './node/adapters/git'
export type { GitRawResult, GitRunner, GitRunnerConfig } from './node/adapters/git'
export { loadConfiguration } from './node/core/config'
export {
  AppError,
  GitError,
  getErrorMessage,
  NotFoundError,
  ParseError,
  ValidationError
} from './node/shared/errors'
