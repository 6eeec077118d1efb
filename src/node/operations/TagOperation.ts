/**
 * TagOperation - Tag listing and lifecycle
 */

import type { Hash } from '@shared/hash'
import type { Tag } from '@shared/types'
import type { TagList } from '../domain/collections'
import { TagParser } from '../domain/TagParser'
import { TAG_FORMAT } from '../shared/constants'
import { runGit } from './run'
import type { TagOptions } from './types'

export class TagOperation {
  /**
   * All tags, sorted by name. Lines git prints in an unexpected shape are
   * logged and skipped.
   */
  static async list(repoPath: string): Promise<TagList> {
    const output = await runGit(repoPath, ['for-each-ref', TAG_FORMAT, 'refs/tags/'])
    return TagParser.parse(output)
  }

  static buildCreateArgs(name: string, target: Hash | string | undefined, options: TagOptions): string[] {
    const args = ['tag']
    if (options.annotated || options.message !== undefined) args.push('-a')
    if (options.force) args.push('-f')
    if (options.sign) args.push('-s')
    if (options.message !== undefined) args.push('-m', options.message)
    args.push(name)
    if (target !== undefined) args.push(target.toString())
    return args
  }

  /**
   * Creates a tag on `target` (HEAD when omitted) and reads it back.
   * A message makes the tag annotated.
   */
  static async create(
    repoPath: string,
    name: string,
    target?: Hash | string,
    options: TagOptions = {}
  ): Promise<Tag> {
    await runGit(repoPath, this.buildCreateArgs(name, target, options))
    return this.show(repoPath, name)
  }

  static async delete(repoPath: string, name: string): Promise<void> {
    await runGit(repoPath, ['tag', '-d', name])
  }

  /**
   * A single tag read from `git show`. The tagger date is not recoverable
   * from that output and reads as the epoch.
   */
  static async show(repoPath: string, name: string): Promise<Tag> {
    const output = await runGit(repoPath, ['show', '--format=fuller', name])
    return TagParser.parseShow(name, output)
  }
}
