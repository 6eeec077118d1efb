/**
 * MergeOperation - Merging a branch into the current one
 *
 * `git merge` exits non-zero on conflicts, so it runs through runGitRaw and
 * the printed text decides the outcome.
 */

import { log } from '@shared/logger'
import { Hash } from '@shared/hash'
import type { MergeStatus } from '@shared/types'
import { splitLines } from '../domain/fields'
import { MergeOutputParser } from '../domain/MergeOutputParser'
import { GitError } from '../shared/errors'
import { runGit, runGitRaw } from './run'
import type { FastForwardMode, MergeOptions } from './types'

const FAST_FORWARD_FLAGS: Record<FastForwardMode, string | null> = {
  auto: null,
  only: '--ff-only',
  never: '--no-ff'
}

export class MergeOperation {
  static buildArgs(branch: string, options: MergeOptions): string[] {
    const args = ['merge']
    const ffFlag = FAST_FORWARD_FLAGS[options.fastForward ?? 'auto']
    if (ffFlag) args.push(ffFlag)
    if (options.strategy) args.push('-s', options.strategy)
    if (options.noCommit) args.push('--no-commit')
    if (options.message !== undefined) args.push('-m', options.message)
    args.push(branch)
    return args
  }

  /**
   * @throws GitError when git fails for a reason other than conflicts
   */
  static async merge(repoPath: string, branch: string, options: MergeOptions = {}): Promise<MergeStatus> {
    const args = this.buildArgs(branch, options)
    const result = await runGitRaw(repoPath, args)
    const outcome = MergeOutputParser.classify(result.stdout, result.stderr, result.exitCode === 0)

    switch (outcome.kind) {
      case 'up-to-date':
        return { kind: 'up-to-date' }
      case 'fast-forward':
        return { kind: 'fast-forward', hash: outcome.hash ?? (await this.head(repoPath)) }
      case 'merged':
        return { kind: 'success', hash: await this.head(repoPath) }
      case 'conflicts': {
        const files = await this.conflictedFiles(repoPath)
        log.warn(`[MergeOperation] Merge of ${branch} stopped with ${files.length} conflicted file(s)`)
        return { kind: 'conflicts', files }
      }
      case 'failed':
        throw new GitError(
          `Merge failed: ${(result.stderr || result.stdout).trim()}`,
          'merge',
          args
        )
    }
  }

  /**
   * Paths with unmerged entries in the index.
   */
  static async conflictedFiles(repoPath: string): Promise<string[]> {
    const output = await runGit(repoPath, ['diff', '--name-only', '--diff-filter=U'])
    return splitLines(output)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
  }

  /**
   * True while MERGE_HEAD exists.
   */
  static async inProgress(repoPath: string): Promise<boolean> {
    const result = await runGitRaw(repoPath, ['rev-parse', '-q', '--verify', 'MERGE_HEAD'])
    return result.exitCode === 0
  }

  static async abort(repoPath: string): Promise<void> {
    await runGit(repoPath, ['merge', '--abort'])
  }

  private static async head(repoPath: string): Promise<Hash> {
    return new Hash((await runGit(repoPath, ['rev-parse', 'HEAD'])).trim())
  }
}
