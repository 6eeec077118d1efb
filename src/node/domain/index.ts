/**
 * Domain Layer - Pure decoding and querying with no I/O dependencies.
 *
 * Parsers turn git's text output into frozen collections; Queries classes
 * answer questions about those collections. For anything that runs git,
 * use the operations layer.
 */

export { GitCollection } from './GitCollection'
export type { CollectionOptions } from './GitCollection'
export {
  createBranchList,
  createCommitLog,
  createDiffReport,
  createRemoteList,
  createStashList,
  createStatusReport,
  createTagList,
  stashRef
} from './collections'
export type {
  BranchList,
  CommitLog,
  DiffReport,
  RemoteList,
  StashList,
  StatusReport,
  TagList
} from './collections'

export { BranchParser } from './BranchParser'
export { DiffParser } from './DiffParser'
export type { CommitStat, DiffOutput } from './DiffParser'
export { LogParser } from './LogParser'
export { MergeOutputParser } from './MergeOutputParser'
export type { MergeOutcome } from './MergeOutputParser'
export { RemoteParser } from './RemoteParser'
export { StashParser } from './StashParser'
export { StatusParser } from './StatusParser'
export { TagParser } from './TagParser'
export { Timestamp } from './Timestamp'

export { BranchQueries } from './BranchQueries'
export { DiffQueries } from './DiffQueries'
export { LogQueries } from './LogQueries'
export { RemoteQueries } from './RemoteQueries'
export { StashQueries } from './StashQueries'
export { StatusQueries } from './StatusQueries'
export { TagQueries } from './TagQueries'
