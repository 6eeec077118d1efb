/**
 * ConfigOperation - Repository-local git configuration
 */

import { runGit } from './run'
import type { UserIdentity } from './types'

export class ConfigOperation {
  /**
   * @throws GitError when the key is not set (git exits 1)
   */
  static async get(repoPath: string, key: string): Promise<string> {
    return (await runGit(repoPath, ['config', key])).trim()
  }

  static async set(repoPath: string, key: string, value: string): Promise<void> {
    await runGit(repoPath, ['config', key, value])
  }

  static async unset(repoPath: string, key: string): Promise<void> {
    await runGit(repoPath, ['config', '--unset', key])
  }

  static async setUser(repoPath: string, user: UserIdentity): Promise<void> {
    await this.set(repoPath, 'user.name', user.name)
    await this.set(repoPath, 'user.email', user.email)
  }

  static async getUser(repoPath: string): Promise<UserIdentity> {
    return {
      name: await this.get(repoPath, 'user.name'),
      email: await this.get(repoPath, 'user.email')
    }
  }
}
