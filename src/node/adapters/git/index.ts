/**
 * Git Runner Module
 *
 * Usage:
 * ```typescript
 * import { getGitRunner } from './adapters/git'
 *
 * const git = getGitRunner()
 * const output = await git.run(repoPath, ['status', '--porcelain'])
 * ```
 */

export { createGitRunner, getGitRunner, resetGitRunner, setGitRunner } from './factory'
export type { GitRunnerConfig } from './factory'

export type { GitRawResult, GitRunner } from './interface'

// Runner implementations (for testing)
export { SimpleGitRunner } from './SimpleGitRunner'
export type { SimpleGitRunnerOptions } from './SimpleGitRunner'
