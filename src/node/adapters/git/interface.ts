/**
 * Git Runner Interface
 *
 * The only seam between the query layer and the git executable. Operations
 * build argument vectors and hand the text back to the decoders; nothing
 * else in the library spawns git.
 */

/**
 * Everything a finished git process reported.
 */
export type GitRawResult = {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

export interface GitRunner {
  /**
   * Runner name for logging/debugging
   */
  readonly name: string

  /**
   * Run git in `dir` and return its stdout.
   *
   * @throws GitError when git cannot be started or exits non-zero
   */
  run(dir: string, args: readonly string[]): Promise<string>

  /**
   * Run git in `dir` and return the result whatever the exit code.
   * Used where a failing exit still carries meaning (merge conflicts,
   * `rev-parse --verify` probes).
   *
   * @throws GitError only when git cannot be started
   */
  runRaw(dir: string, args: readonly string[]): Promise<GitRawResult>
}
