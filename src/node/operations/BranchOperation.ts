/**
 * BranchOperation - Branch listing and lifecycle
 *
 * Listings come from `git branch -vv --all`, which includes remote-tracking
 * branches. Every mutating call is followed by a fresh listing when it
 * returns a Branch; no collection is edited in place.
 */

import { log } from '@shared/logger'
import type { Branch } from '@shared/types'
import { BranchParser } from '../domain/BranchParser'
import { BranchQueries } from '../domain/BranchQueries'
import type { BranchList } from '../domain/collections'
import { GitError, ValidationError } from '../shared/errors'
import { runGit } from './run'

export class BranchOperation {
  static async list(repoPath: string): Promise<BranchList> {
    const output = await runGit(repoPath, ['branch', '-vv', '--all'])
    return BranchParser.parse(output)
  }

  /**
   * The checked-out branch, or null on a detached HEAD.
   */
  static async current(repoPath: string): Promise<Branch | null> {
    const name = (await runGit(repoPath, ['branch', '--show-current'])).trim()
    if (!name) return null

    const branches = await this.list(repoPath)
    return BranchQueries.current(branches) ?? null
  }

  static async create(repoPath: string, name: string, startPoint?: string): Promise<Branch> {
    const args = ['branch', name]
    if (startPoint) args.push(startPoint)
    await runGit(repoPath, args)

    const created = (await this.list(repoPath)).find(name)
    if (!created) {
      throw new GitError(`Failed to create branch: ${name}`, 'branch', args)
    }
    return created
  }

  /**
   * Deletes a local branch (`-d`, or `-D` when forced).
   *
   * @throws ValidationError for the checked-out branch
   */
  static async delete(repoPath: string, branch: Branch, force = false): Promise<void> {
    if (branch.isCurrent) {
      throw new ValidationError('Cannot delete the current branch', 'branch')
    }

    await runGit(repoPath, ['branch', force ? '-D' : '-d', branch.name])
    log.info(`[BranchOperation] Deleted branch ${branch.name}`)
  }

  /**
   * Remote-tracking branches are checked out by their short name, which
   * lets git create the matching local branch.
   */
  static async checkout(repoPath: string, branch: Branch): Promise<void> {
    const target = BranchQueries.isRemote(branch) ? BranchQueries.shortName(branch) : branch.name
    await runGit(repoPath, ['checkout', target])
  }

  /**
   * `git checkout -b`, returning the new current branch.
   */
  static async checkoutNew(repoPath: string, name: string, startPoint?: string): Promise<Branch> {
    const args = ['checkout', '-b', name]
    if (startPoint) args.push(startPoint)
    await runGit(repoPath, args)

    const current = await this.current(repoPath)
    if (!current) {
      throw new GitError(`Failed to create and checkout branch: ${name}`, 'checkout', args)
    }
    return current
  }
}
