import { isLogLevel } from '@shared/logger'
import type { Configuration } from '@shared/types'
import dotenv from 'dotenv'
import { DEFAULT_GIT_TIMEOUT_MS, DEFAULT_LOG_MAX_COUNT } from '../shared/constants'
import { ValidationError } from '../shared/errors'

dotenv.config()

function positiveInteger(value: string | undefined, fallback: number): number {
  if (!value || !/^\d+$/.test(value.trim())) return fallback
  const parsed = Number(value.trim())
  return parsed > 0 ? parsed : fallback
}

/**
 * Reads settings from the environment (and `.env`, loaded on import).
 * Malformed numbers fall back to their defaults; an unknown LOG_LEVEL throws.
 */
export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): Configuration {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info'
  if (!isLogLevel(logLevel)) {
    throw new ValidationError(`Invalid LOG_LEVEL: ${logLevel}`, 'LOG_LEVEL')
  }

  return {
    repoPath: env.REPO_PATH?.trim() || process.cwd(),
    gitBinary: env.GIT_BINARY?.trim() || 'git',
    gitTimeoutMs: positiveInteger(env.GIT_TIMEOUT_MS, DEFAULT_GIT_TIMEOUT_MS),
    logLevel,
    logMaxCount: positiveInteger(env.LOG_MAX_COUNT, DEFAULT_LOG_MAX_COUNT)
  }
}
