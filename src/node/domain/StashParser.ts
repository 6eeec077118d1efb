/**
 * StashParser - decodes `git stash list` output printed with STASH_FORMAT:
 *
 *   stash@{0} 1a2b3c... 1700000000 On main: work in progress
 *
 * Any malformed line fails the whole listing.
 */

import { Hash } from '@shared/hash'
import type { Stash } from '@shared/types'
import { STASH_FIELD_COUNT, UNKNOWN_BRANCH } from '../shared/constants'
import { ParseError } from '../shared/errors'
import { createStashList, type StashList } from './collections'
import { splitFields, splitLines } from './fields'
import { Timestamp } from './Timestamp'

const BRANCH_PREFIXES = ['On ', 'WIP on ']

export class StashParser {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * Splits the reflog subject into the branch it was taken on and the message.
   * Subjects without a colon keep the whole text as the message.
   */
  public static parseSubject(subject: string): { branch: string; message: string } {
    const colon = subject.indexOf(':')
    if (colon === -1) {
      return { branch: UNKNOWN_BRANCH, message: subject }
    }

    const head = subject.slice(0, colon)
    const prefix = BRANCH_PREFIXES.find((candidate) => head.startsWith(candidate))
    return {
      branch: prefix ? head.slice(prefix.length) : UNKNOWN_BRANCH,
      message: subject.slice(colon + 1).trim()
    }
  }

  /**
   * Decodes one line. `index` is the line's position in the listing.
   * An unparsable commit time reads as the current time.
   */
  public static parseLine(index: number, line: string): Stash {
    const parts = splitFields(line, ' ', STASH_FIELD_COUNT)
    if (parts.length < STASH_FIELD_COUNT) {
      throw new ParseError(
        `Invalid stash list format: expected ${STASH_FIELD_COUNT} parts, got ${parts.length}`,
        'stash',
        line
      )
    }

    const [, hash, time, subject] = parts
    if (!subject) {
      throw new ParseError(
        'Invalid stash format: missing branch and message information',
        'stash',
        line
      )
    }

    const { branch, message } = StashParser.parseSubject(subject)
    return {
      index,
      message,
      hash: new Hash(hash),
      branch,
      timestamp: Timestamp.fromEpochSeconds(time) ?? new Date()
    }
  }

  public static parse(output: string): StashList {
    const stashes: Stash[] = []
    splitLines(output).forEach((line, index) => {
      const trimmed = line.trim()
      if (trimmed) stashes.push(StashParser.parseLine(index, trimmed))
    })
    return createStashList(stashes)
  }
}
