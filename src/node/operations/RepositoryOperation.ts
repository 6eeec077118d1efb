/**
 * RepositoryOperation - Repository lifecycle
 *
 * This module handles:
 * - Checking that git can be started
 * - Creating a repository
 * - Opening (validating) an existing repository
 */

import { log } from '@shared/logger'
import { GitError, NotFoundError } from '../shared/errors'
import { ensureGit, resetGitCheck, runGit } from './run'

export type InitOptions = {
  bare?: boolean
}

export class RepositoryOperation {
  /**
   * Resolves once `git --version` has run successfully in this process.
   */
  static ensureGit(): Promise<void> {
    return ensureGit()
  }

  /**
   * Drops the memoised git check so the next operation runs it again.
   */
  static resetGitCheck(): void {
    resetGitCheck()
  }

  /**
   * Runs `git init [--bare] <path>` and returns the path.
   */
  static async init(repoPath: string, options: InitOptions = {}): Promise<string> {
    const args = ['init']
    if (options.bare) args.push('--bare')
    args.push(repoPath)

    await runGit(process.cwd(), args)
    log.info(`[RepositoryOperation] Initialized ${options.bare ? 'bare ' : ''}repository at ${repoPath}`)
    return repoPath
  }

  /**
   * Checks that `repoPath` is inside a git repository and returns it.
   *
   * @throws NotFoundError when git does not recognise the directory
   */
  static async open(repoPath: string): Promise<string> {
    try {
      await runGit(repoPath, ['rev-parse', '--git-dir'])
      return repoPath
    } catch (error) {
      if (!(error instanceof GitError) || error.operation === '--version') throw error
      throw new NotFoundError(`Not a git repository: ${repoPath}`, 'repo')
    }
  }
}
