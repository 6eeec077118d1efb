/**
 * DiffOperation - `git diff` in any of its four output formats
 */

import type { Hash } from '@shared/hash'
import { DiffParser, type DiffOutput } from '../domain/DiffParser'
import { runGit } from './run'
import type { DiffOptions } from './types'

const MODE_FLAGS = {
  patch: null,
  'name-only': '--name-only',
  stat: '--stat',
  numstat: '--numstat'
} as const

export class DiffOperation {
  static buildArgs(options: DiffOptions): string[] {
    const args = ['diff']

    if (options.contextLines !== undefined) args.push(`-U${options.contextLines}`)
    if (options.ignoreAllSpace) args.push('--ignore-all-space')
    if (options.ignoreSpaceChange) args.push('--ignore-space-change')
    if (options.ignoreBlankLines) args.push('--ignore-blank-lines')

    const modeFlag = MODE_FLAGS[options.mode ?? 'patch']
    if (modeFlag) args.push(modeFlag)

    if (options.cached) args.push('--cached')
    if (options.noIndex) args.push('--no-index')

    const from = options.from?.toString()
    const to = options.to?.toString()
    if (from && to) args.push(`${from}..${to}`)
    else if (to) args.push(to)
    else if (from) args.push(`${from}..HEAD`)

    if (options.paths && options.paths.length > 0) args.push('--', ...options.paths)
    return args
  }

  /**
   * Worktree against index unless options say otherwise.
   */
  static async diff(repoPath: string, options: DiffOptions = {}): Promise<DiffOutput> {
    const output = await runGit(repoPath, this.buildArgs(options))
    return DiffParser.parse(output, options.mode ?? 'patch')
  }

  static diffStaged(repoPath: string, options: DiffOptions = {}): Promise<DiffOutput> {
    return this.diff(repoPath, { ...options, cached: true })
  }

  /**
   * Worktree against HEAD (staged and unstaged together).
   */
  static diffHead(repoPath: string, options: DiffOptions = {}): Promise<DiffOutput> {
    return this.diff(repoPath, { ...options, from: undefined, to: 'HEAD' })
  }

  static diffCommits(
    repoPath: string,
    from: Hash | string,
    to: Hash | string,
    options: DiffOptions = {}
  ): Promise<DiffOutput> {
    return this.diff(repoPath, { ...options, from, to })
  }
}
