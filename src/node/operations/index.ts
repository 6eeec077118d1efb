export { BranchOperation } from './BranchOperation'
export { CommitOperation } from './CommitOperation'
export { ConfigOperation } from './ConfigOperation'
export { DiffOperation } from './DiffOperation'
export { LogOperation } from './LogOperation'
export { MergeOperation } from './MergeOperation'
export { RemoteOperation } from './RemoteOperation'
export { RepositoryOperation } from './RepositoryOperation'
export type { InitOptions } from './RepositoryOperation'
export { ResetOperation } from './ResetOperation'
export { StashOperation } from './StashOperation'
export { StatusOperation } from './StatusOperation'
export { TagOperation } from './TagOperation'
export type {
  DiffOptions,
  FastForwardMode,
  FetchOptions,
  LogOptions,
  MergeOptions,
  MergeStrategy,
  PushOptions,
  ResetMode,
  StashApplyOptions,
  StashPushOptions,
  TagOptions,
  UserIdentity
} from './types'
