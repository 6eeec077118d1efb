import type { LogLevel } from '../logger'

export type Configuration = {
  /** Repository the CLI operates on. */
  readonly repoPath: string
  /** git executable handed to simple-git. */
  readonly gitBinary: string
  /** Per-invocation timeout; a git process silent for this long is killed. */
  readonly gitTimeoutMs: number
  readonly logLevel: LogLevel
  /** Default commit limit for log queries. */
  readonly logMaxCount: number
}
