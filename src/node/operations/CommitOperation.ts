/**
 * CommitOperation - Staging and committing
 */

import { log } from '@shared/logger'
import { Hash } from '@shared/hash'
import { StatusQueries } from '../domain/StatusQueries'
import { GitError, ValidationError, getErrorMessage } from '../shared/errors'
import { runGit } from './run'
import { StatusOperation } from './StatusOperation'

export class CommitOperation {
  static async add(repoPath: string, paths: readonly string[]): Promise<void> {
    if (paths.length === 0) {
      throw new ValidationError('No paths to add', 'paths')
    }
    await runGit(repoPath, ['add', ...paths])
  }

  /** `git add .` */
  static async addAll(repoPath: string): Promise<void> {
    await runGit(repoPath, ['add', '.'])
  }

  /** `git add -u`: tracked files only. */
  static async addUpdate(repoPath: string): Promise<void> {
    await runGit(repoPath, ['add', '-u'])
  }

  /**
   * Commits the index and returns the new HEAD.
   *
   * @throws ValidationError for an empty message
   * @throws GitError when nothing is staged
   */
  static commit(repoPath: string, message: string): Promise<Hash> {
    return this.createCommit(repoPath, message, [])
  }

  /**
   * Like commit(), with `author` in `Name <email>` form.
   */
  static commitWithAuthor(repoPath: string, message: string, author: string): Promise<Hash> {
    if (!author.trim()) {
      return Promise.reject(new ValidationError('Author cannot be empty', 'author'))
    }
    return this.createCommit(repoPath, message, ['--author', author])
  }

  private static async createCommit(repoPath: string, message: string, extraArgs: string[]): Promise<Hash> {
    if (!message.trim()) {
      throw new ValidationError('Commit message cannot be empty', 'message')
    }

    const status = await StatusOperation.status(repoPath)
    if ([...StatusQueries.staged(status)].length === 0) {
      throw new GitError('No changes staged for commit', 'commit')
    }

    const args = ['commit', '-m', message, ...extraArgs]
    try {
      await runGit(repoPath, args)
    } catch (error) {
      throw new GitError(
        `Commit failed: ${getErrorMessage(error)}. Ensure git user.name and user.email are configured.`,
        'commit',
        args,
        error
      )
    }

    const hash = new Hash((await runGit(repoPath, ['rev-parse', 'HEAD'])).trim())
    log.info(`[CommitOperation] Created commit ${hash.short}`)
    return hash
  }
}
