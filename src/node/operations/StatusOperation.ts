import type { StatusReport } from '../domain/collections'
import { StatusParser } from '../domain/StatusParser'
import { runGit } from './run'

export class StatusOperation {
  /**
   * Changed, untracked and ignored paths from `git status --porcelain`.
   */
  static async status(repoPath: string): Promise<StatusReport> {
    const output = await runGit(repoPath, ['status', '--porcelain'])
    return StatusParser.parse(output)
  }
}
