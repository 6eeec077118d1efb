/**
 * BranchParser - decodes `git branch -vv --all` output.
 *
 *   * main                 1a2b3c4 [origin/main: ahead 1] Subject
 *     remotes/origin/main  1a2b3c4 Subject
 *     remotes/origin/HEAD  -> origin/main
 */

import { Hash } from '@shared/hash'
import type { Branch } from '@shared/types'
import { REMOTE_BRANCH_PREFIX } from '../shared/constants'
import { createBranchList, type BranchList } from './collections'
import { splitLines } from './fields'

export class BranchParser {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * Returns null for blank lines and symbolic pointers (`->`).
   */
  public static parseLine(line: string): Branch | null {
    let text = line.trim()
    if (!text || text.includes('->')) return null

    const isCurrent = text.startsWith('*')
    if (isCurrent) text = text.slice(1).trim()

    const tokens = text.split(/\s+/).filter((token) => token.length > 0)
    if (tokens.length === 0) return null

    const [rawName, rawHash] = tokens
    const isRemote = rawName.startsWith(REMOTE_BRANCH_PREFIX)

    return {
      name: isRemote ? rawName.slice(REMOTE_BRANCH_PREFIX.length) : rawName,
      type: isRemote ? 'remote-tracking' : 'local',
      isCurrent,
      hash: tokens.length > 1 ? new Hash(rawHash) : Hash.ZERO,
      upstream: BranchParser.parseUpstream(text)
    }
  }

  /**
   * Upstream name from the first `[...]` group, without the ahead/behind part.
   */
  public static parseUpstream(text: string): string | null {
    const open = text.indexOf('[')
    if (open === -1) return null
    const close = text.indexOf(']', open + 1)
    if (close === -1) return null

    const upstream = text.slice(open + 1, close).split(':')[0].trim()
    return upstream || null
  }

  public static parse(output: string): BranchList {
    const branches: Branch[] = []
    for (const line of splitLines(output)) {
      const branch = BranchParser.parseLine(line)
      if (branch) branches.push(branch)
    }
    return createBranchList(branches)
  }
}
