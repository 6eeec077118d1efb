import type { Hash } from '../hash'
import type { Author } from './commit'

export type BranchType = 'local' | 'remote-tracking'

export type Branch = {
  /** Remote-tracking names keep the remote segment, e.g. origin/main. */
  readonly name: string
  readonly type: BranchType
  readonly isCurrent: boolean
  readonly hash: Hash
  /** Upstream name without ahead/behind counts, or null when untracked. */
  readonly upstream: string | null
}

export type TagType = 'lightweight' | 'annotated'

export type LightweightTag = {
  readonly name: string
  readonly type: 'lightweight'
  /** The commit the ref points at. */
  readonly hash: Hash
  readonly message: null
  readonly tagger: null
  readonly timestamp: null
}

export type AnnotatedTag = {
  readonly name: string
  readonly type: 'annotated'
  /** The dereferenced commit, not the tag object's own id. */
  readonly hash: Hash
  readonly message: string | null
  readonly tagger: Author | null
  readonly timestamp: Date | null
}

export type Tag = LightweightTag | AnnotatedTag
