/**
 * Git Runner Factory
 *
 * Provides a centralized way to create and access the git runner.
 */

import { log } from '@shared/logger'
import { loadConfiguration } from '../../core/config'
import type { GitRunner } from './interface'
import { SimpleGitRunner } from './SimpleGitRunner'

/**
 * Configuration for runner creation
 */
export interface GitRunnerConfig {
  /** git executable; defaults to GIT_BINARY */
  binary?: string

  /** per-invocation timeout; defaults to GIT_TIMEOUT_MS */
  timeoutMs?: number

  /**
   * Whether to log runner creation
   */
  verbose?: boolean
}

/**
 * Singleton runner instance
 * Cached to avoid recreating runners on every operation
 */
let cachedRunner: GitRunner | null = null

export function createGitRunner(config: GitRunnerConfig = {}): GitRunner {
  const defaults = loadConfiguration()
  const binary = config.binary ?? defaults.gitBinary
  const timeoutMs = config.timeoutMs ?? defaults.gitTimeoutMs

  if (config.verbose) {
    log.info(`[GitRunner] Creating runner: simple-git (${binary}, timeout ${timeoutMs}ms)`)
  }

  return new SimpleGitRunner({ binary, timeoutMs })
}

/**
 * Get the shared runner, creating it on first use.
 *
 * @param config - Optional configuration (only used on first call)
 */
export function getGitRunner(config: GitRunnerConfig = {}): GitRunner {
  if (cachedRunner) {
    return cachedRunner
  }

  cachedRunner = createGitRunner(config)
  return cachedRunner
}

/**
 * Replace the shared runner, e.g. with an in-process fake in tests.
 */
export function setGitRunner(runner: GitRunner): void {
  cachedRunner = runner
}

/**
 * Reset the cached runner instance
 *
 * The next getGitRunner() call creates a fresh one from configuration.
 */
export function resetGitRunner(): void {
  cachedRunner = null
}
