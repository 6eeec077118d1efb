/**
 * LogOperation - Commit history queries
 *
 * All listings use LOG_FORMAT and --no-show-signature so signature
 * verification output never lands between records.
 */

import type { Hash } from '@shared/hash'
import type { CommitDetails } from '@shared/types'
import { loadConfiguration } from '../core/config'
import type { CommitLog } from '../domain/collections'
import { DiffParser } from '../domain/DiffParser'
import { LogParser } from '../domain/LogParser'
import { Timestamp } from '../domain/Timestamp'
import { LOG_FORMAT } from '../shared/constants'
import { GitError } from '../shared/errors'
import { runGit } from './run'
import type { LogOptions } from './types'

const BASE_ARGS = ['log', LOG_FORMAT, '--no-show-signature']

export class LogOperation {
  static buildArgs(options: LogOptions): string[] {
    const args = [...BASE_ARGS]

    if (options.maxCount !== undefined) args.push('-n', String(options.maxCount))
    if (options.since) args.push(`--since=${Timestamp.toGitDate(options.since)}`)
    if (options.until) args.push(`--until=${Timestamp.toGitDate(options.until)}`)
    if (options.author) args.push(`--author=${options.author}`)
    if (options.committer) args.push(`--committer=${options.committer}`)
    if (options.grep) args.push(`--grep=${options.grep}`)
    if (options.followRenames) args.push('--follow')
    if (options.mergesOnly) args.push('--merges')
    if (options.noMerges) args.push('--no-merges')

    if (options.paths && options.paths.length > 0) {
      args.push('--', ...options.paths)
    }
    return args
  }

  /**
   * History from HEAD. Without maxCount, the configured LOG_MAX_COUNT applies.
   */
  static async log(repoPath: string, options: LogOptions = {}): Promise<CommitLog> {
    const maxCount = options.maxCount ?? loadConfiguration().logMaxCount
    const output = await runGit(repoPath, this.buildArgs({ ...options, maxCount }))
    return LogParser.parse(output)
  }

  static recentCommits(repoPath: string, count: number): Promise<CommitLog> {
    return this.log(repoPath, { maxCount: count })
  }

  /**
   * Commits reachable from `to` but not from `from` (`from..to`), unlimited.
   */
  static async logRange(repoPath: string, from: Hash | string, to: Hash | string): Promise<CommitLog> {
    const output = await runGit(repoPath, [...BASE_ARGS, `${from.toString()}..${to.toString()}`])
    return LogParser.parse(output)
  }

  static logForPaths(repoPath: string, paths: readonly string[]): Promise<CommitLog> {
    return this.log(repoPath, { paths })
  }

  /**
   * One commit plus its `--stat` summary. Per-file counts are estimated
   * from the stat bars unless git prints a summary line.
   *
   * @throws GitError when the commit cannot be found
   */
  static async showCommit(repoPath: string, hash: Hash | string): Promise<CommitDetails> {
    const id = hash.toString()
    const output = await runGit(repoPath, [...BASE_ARGS, '-n', '1', id])
    const commit = LogParser.parse(output).first()
    if (!commit) {
      throw new GitError(`Commit not found: ${id}`, 'log', ['log', id])
    }

    const stat = DiffParser.parseShowStat(await runGit(repoPath, ['show', '--stat', '--format=', id]))
    return {
      commit,
      filesChanged: stat.files,
      insertions: stat.insertions,
      deletions: stat.deletions
    }
  }
}
