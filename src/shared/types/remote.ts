import type { Hash } from '../hash'

export type Remote = {
  readonly name: string
  readonly fetchUrl: string
  /** Only set when it differs from fetchUrl. */
  readonly pushUrl: string | null
}

export type MergeStatus =
  | { readonly kind: 'success'; readonly hash: Hash }
  | { readonly kind: 'fast-forward'; readonly hash: Hash }
  | { readonly kind: 'up-to-date' }
  | { readonly kind: 'conflicts'; readonly files: readonly string[] }
