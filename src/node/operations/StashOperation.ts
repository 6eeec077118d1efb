/**
 * StashOperation - Stash listing and lifecycle
 *
 * Stash entries are addressed by their position (stash@{N}). Positions
 * shift after a pop or drop, so callers list again instead of reusing a
 * previous StashList.
 */

import type { Stash } from '@shared/types'
import { stashRef, type StashList } from '../domain/collections'
import { StashParser } from '../domain/StashParser'
import { StashQueries } from '../domain/StashQueries'
import { STASH_FORMAT } from '../shared/constants'
import { GitError } from '../shared/errors'
import { runGit } from './run'
import type { StashApplyOptions, StashPushOptions } from './types'

export class StashOperation {
  /**
   * @throws ParseError when any line of the listing is malformed
   */
  static async list(repoPath: string): Promise<StashList> {
    const output = await runGit(repoPath, ['stash', 'list', STASH_FORMAT])
    return StashParser.parse(output)
  }

  static save(repoPath: string, message: string): Promise<Stash> {
    return this.push(repoPath, message)
  }

  static buildPushArgs(message: string, options: StashPushOptions): string[] {
    const args = ['stash', 'push']
    if (options.includeAll) args.push('--all')
    else if (options.includeUntracked) args.push('--include-untracked')
    if (options.keepIndex) args.push('--keep-index')
    if (options.patch) args.push('--patch')
    if (options.staged) args.push('--staged')
    args.push('-m', message)
    if (options.paths && options.paths.length > 0) args.push('--', ...options.paths)
    return args
  }

  /**
   * Stashes local changes and returns stash@{0} as listed afterwards. When
   * there was nothing to save, git leaves the list alone, so this is the
   * previous newest stash.
   *
   * @throws GitError when the stash list is empty after the push
   */
  static async push(repoPath: string, message: string, options: StashPushOptions = {}): Promise<Stash> {
    const args = this.buildPushArgs(message, options)
    await runGit(repoPath, args)

    const latest = StashQueries.latest(await this.list(repoPath))
    if (!latest) {
      throw new GitError('No local changes to stash', 'stash', args)
    }
    return latest
  }

  static async apply(repoPath: string, index: number, options: StashApplyOptions = {}): Promise<void> {
    await runGit(repoPath, this.buildRestoreArgs('apply', index, options))
  }

  static async pop(repoPath: string, index: number, options: StashApplyOptions = {}): Promise<void> {
    await runGit(repoPath, this.buildRestoreArgs('pop', index, options))
  }

  static buildRestoreArgs(command: 'apply' | 'pop', index: number, options: StashApplyOptions): string[] {
    const args = ['stash', command]
    if (options.restoreIndex) args.push('--index')
    if (options.quiet) args.push('--quiet')
    args.push(stashRef(index))
    return args
  }

  /**
   * The diffstat git prints for one stash, unparsed.
   */
  static show(repoPath: string, index: number): Promise<string> {
    return runGit(repoPath, ['stash', 'show', stashRef(index)])
  }

  static async drop(repoPath: string, index: number): Promise<void> {
    await runGit(repoPath, ['stash', 'drop', stashRef(index)])
  }

  static async clear(repoPath: string): Promise<void> {
    await runGit(repoPath, ['stash', 'clear'])
  }
}
