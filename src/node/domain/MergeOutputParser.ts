/**
 * MergeOutputParser - classifies what `git merge` printed.
 *
 * Outcomes that need more information from git (the new HEAD, the list of
 * conflicted paths) are resolved by MergeOperation.
 */

import { Hash } from '@shared/hash'

export type MergeOutcome =
  | { readonly kind: 'up-to-date' }
  /** hash is null when the `old..new` line is missing */
  | { readonly kind: 'fast-forward'; readonly hash: Hash | null }
  | { readonly kind: 'merged' }
  | { readonly kind: 'conflicts' }
  | { readonly kind: 'failed' }

const UP_TO_DATE = ['Already up to date', 'Already up-to-date']
const CONFLICT_MARKERS = ['CONFLICT', 'Automatic merge failed']

export class MergeOutputParser {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static classify(stdout: string, stderr: string, succeeded: boolean): MergeOutcome {
    if (succeeded) {
      if (UP_TO_DATE.some((marker) => stdout.includes(marker))) {
        return { kind: 'up-to-date' }
      }
      if (stdout.includes('Fast-forward')) {
        return { kind: 'fast-forward', hash: MergeOutputParser.parseUpdatedHash(stdout) }
      }
      return { kind: 'merged' }
    }

    const text = `${stdout}\n${stderr}`
    if (CONFLICT_MARKERS.some((marker) => text.includes(marker))) {
      return { kind: 'conflicts' }
    }
    return { kind: 'failed' }
  }

  /**
   * New id from the `Updating 1a2b3c4..5d6e7f8` line (abbreviated as git prints it).
   */
  public static parseUpdatedHash(stdout: string): Hash | null {
    const line = stdout.split(/\r?\n/).find((candidate) => candidate.includes('..'))
    if (!line) return null
    const id = line.split('..')[1]?.trim().split(/\s+/)[0]
    return id ? new Hash(id) : null
  }
}
