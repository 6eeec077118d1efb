import type { Hash } from '@shared/hash'
import { runGit } from './run'
import type { ResetMode } from './types'

export class ResetOperation {
  /**
   * `git reset --<mode> <commit>`.
   */
  static async reset(repoPath: string, commit: Hash | string, mode: ResetMode = 'mixed'): Promise<void> {
    await runGit(repoPath, ['reset', `--${mode}`, commit.toString()])
  }
}
