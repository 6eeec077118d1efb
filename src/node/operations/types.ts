/**
 * Option bags accepted by the operations. Every field is optional; an empty
 * bag reproduces git's own defaults unless noted.
 */

import type { Hash } from '@shared/hash'
import type { DiffMode } from '@shared/types'

export type LogOptions = {
  /** `-n`. LogOperation.log() applies the configured default when omitted. */
  maxCount?: number
  since?: Date
  until?: Date
  /** `--author`, matched by git against name and email */
  author?: string
  committer?: string
  /** `--grep` on the commit message */
  grep?: string
  paths?: readonly string[]
  followRenames?: boolean
  mergesOnly?: boolean
  noMerges?: boolean
}

export type TagOptions = {
  annotated?: boolean
  force?: boolean
  sign?: boolean
  /** Implies an annotated tag. */
  message?: string
}

export type StashPushOptions = {
  /** `--all`; wins over includeUntracked */
  includeAll?: boolean
  includeUntracked?: boolean
  keepIndex?: boolean
  patch?: boolean
  staged?: boolean
  paths?: readonly string[]
}

export type StashApplyOptions = {
  /** `--index`: also restore what was staged */
  restoreIndex?: boolean
  quiet?: boolean
}

export type DiffOptions = {
  /** Output format; defaults to the full patch. */
  mode?: DiffMode
  contextLines?: number
  ignoreAllSpace?: boolean
  ignoreSpaceChange?: boolean
  ignoreBlankLines?: boolean
  cached?: boolean
  noIndex?: boolean
  from?: Hash | string
  to?: Hash | string
  paths?: readonly string[]
}

export type FetchOptions = {
  prune?: boolean
  tags?: boolean
  /** `--all`; the remote name is then left out */
  all?: boolean
}

export type PushOptions = {
  force?: boolean
  tags?: boolean
  setUpstream?: boolean
}

export type FastForwardMode = 'auto' | 'only' | 'never'

export type MergeStrategy = 'ort' | 'recursive' | 'resolve' | 'octopus' | 'ours' | 'subtree'

export type MergeOptions = {
  fastForward?: FastForwardMode
  strategy?: MergeStrategy
  noCommit?: boolean
  message?: string
}

export type ResetMode = 'soft' | 'mixed' | 'hard'

export type UserIdentity = {
  name: string
  email: string
}
