/**
 * RemoteOperation - Remote configuration, fetch and push
 */

import { log } from '@shared/logger'
import type { RemoteList } from '../domain/collections'
import { RemoteParser } from '../domain/RemoteParser'
import { ValidationError } from '../shared/errors'
import { runGit } from './run'
import type { FetchOptions, PushOptions } from './types'

export class RemoteOperation {
  static async list(repoPath: string): Promise<RemoteList> {
    const output = await runGit(repoPath, ['remote', '-v'])
    return RemoteParser.parse(output)
  }

  static async add(repoPath: string, name: string, url: string): Promise<void> {
    if (!name.trim() || !url.trim()) {
      throw new ValidationError('Remote name and URL are required', 'remote')
    }
    await runGit(repoPath, ['remote', 'add', name, url])
  }

  static async remove(repoPath: string, name: string): Promise<void> {
    await runGit(repoPath, ['remote', 'remove', name])
  }

  static async rename(repoPath: string, oldName: string, newName: string): Promise<void> {
    await runGit(repoPath, ['remote', 'rename', oldName, newName])
  }

  static async getUrl(repoPath: string, name: string): Promise<string> {
    return (await runGit(repoPath, ['remote', 'get-url', name])).trim()
  }

  static buildFetchArgs(remote: string, options: FetchOptions): string[] {
    const args = ['fetch']
    if (options.prune) args.push('--prune')
    if (options.tags) args.push('--tags')
    if (options.all) args.push('--all')
    else args.push(remote)
    return args
  }

  static async fetch(repoPath: string, remote: string, options: FetchOptions = {}): Promise<void> {
    await runGit(repoPath, this.buildFetchArgs(remote, options))
    log.info(`[RemoteOperation] Fetched ${options.all ? 'all remotes' : remote}`)
  }

  static buildPushArgs(remote: string, branch: string, options: PushOptions): string[] {
    const args = ['push']
    if (options.force) args.push('--force')
    if (options.setUpstream) args.push('--set-upstream')
    args.push(remote, branch)
    if (options.tags) args.push('--tags')
    return args
  }

  static async push(
    repoPath: string,
    remote: string,
    branch: string,
    options: PushOptions = {}
  ): Promise<void> {
    await runGit(repoPath, this.buildPushArgs(remote, branch, options))
    log.info(`[RemoteOperation] Pushed ${branch} to ${remote}`)
  }
}
