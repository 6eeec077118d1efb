/**
 * Shared entry point for every operation: checks once per process that git
 * can be started, then hands the arguments to the configured runner.
 */

import { log } from '@shared/logger'
import { getGitRunner, type GitRawResult } from '../adapters/git'
import { GitError, getErrorMessage } from '../shared/errors'

let gitCheck: Promise<void> | null = null

async function checkGit(): Promise<void> {
  try {
    const version = await getGitRunner().run(process.cwd(), ['--version'])
    log.debug(`[ensureGit] ${version.trim()}`)
  } catch (error) {
    throw new GitError(`Git not found in PATH: ${getErrorMessage(error)}`, '--version', ['--version'], error)
  }
}

/**
 * Resolves once `git --version` has succeeded. A failed check is not
 * cached, so the next call tries again.
 */
export function ensureGit(): Promise<void> {
  if (!gitCheck) {
    gitCheck = checkGit().catch((error: unknown) => {
      gitCheck = null
      throw error
    })
  }
  return gitCheck
}

/**
 * Forget the result of the last check (tests swap runners).
 */
export function resetGitCheck(): void {
  gitCheck = null
}

export async function runGit(repoPath: string, args: readonly string[]): Promise<string> {
  await ensureGit()
  return getGitRunner().run(repoPath, args)
}

export async function runGitRaw(repoPath: string, args: readonly string[]): Promise<GitRawResult> {
  await ensureGit()
  return getGitRunner().runRaw(repoPath, args)
}
