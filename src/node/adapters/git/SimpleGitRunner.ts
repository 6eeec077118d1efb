/**
 * Simple-Git Runner
 *
 * GitRunner implementation on top of simple-git. Only `raw` is used: every
 * command's text output is decoded by this library, not by simple-git.
 */

import { log } from '@shared/logger'
import simpleGit, { type SimpleGit, type SimpleGitOptions } from 'simple-git'
import { GitError, getErrorMessage } from '../../shared/errors'
import type { GitRawResult, GitRunner } from './interface'

export type SimpleGitRunnerOptions = {
  binary: string
  timeoutMs: number
}

export class SimpleGitRunner implements GitRunner {
  readonly name = 'simple-git'

  constructor(private readonly options: SimpleGitRunnerOptions) {}

  private baseOptions(dir: string): Partial<SimpleGitOptions> {
    return {
      baseDir: dir,
      binary: this.options.binary,
      timeout: { block: this.options.timeoutMs }
    }
  }

  private createGit(dir: string, overrides: Partial<SimpleGitOptions> = {}): SimpleGit {
    return simpleGit({ ...this.baseOptions(dir), ...overrides })
  }

  async run(dir: string, args: readonly string[]): Promise<string> {
    log.debug(`[SimpleGitRunner] git ${args.join(' ')}`, { dir })
    try {
      const git = this.createGit(dir)
      return await git.raw([...args])
    } catch (error) {
      throw this.createError(args, error)
    }
  }

  async runRaw(dir: string, args: readonly string[]): Promise<GitRawResult> {
    log.debug(`[SimpleGitRunner] git ${args.join(' ')} (raw)`, { dir })
    let exitCode = 0
    let stderr = ''

    try {
      const git = this.createGit(dir, {
        // Report every exit as success and keep what git printed; only a
        // failure to spawn is passed through.
        errors: (error, result) => {
          if (error instanceof Error) return error
          exitCode = result.exitCode
          stderr = Buffer.concat(result.stdErr).toString('utf-8')
          return undefined
        }
      })
      const stdout = await git.raw([...args])
      return { stdout, stderr, exitCode }
    } catch (error) {
      throw this.createError(args, error)
    }
  }

  private createError(args: readonly string[], originalError: unknown): GitError {
    const operation = args[0] ?? 'git'
    return new GitError(
      `[SimpleGitRunner] git ${operation} failed: ${getErrorMessage(originalError).trim()}`,
      operation,
      args,
      originalError
    )
  }
}
