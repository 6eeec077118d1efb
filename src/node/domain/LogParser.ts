/**
 * LogParser - decodes `git log` output printed with LOG_FORMAT.
 *
 * One commit per line. A body spanning several lines produces continuation
 * lines with too few fields; those are discarded, so multi-line bodies are
 * only partly recovered. Timestamps must be integers or the decode fails.
 */

import { log } from '@shared/logger'
import { Hash } from '@shared/hash'
import type { Commit } from '@shared/types'
import { FIELD_DELIMITER, LOG_FIELD_COUNT, LOG_MIN_FIELDS } from '../shared/constants'
import { createCommitLog, type CommitLog } from './collections'
import { splitFields, splitLines } from './fields'
import { Timestamp } from './Timestamp'

export class LogParser {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * Returns null for blank lines and lines with fewer than nine fields.
   * Throws ParseError on a non-integer timestamp.
   */
  public static parseLine(line: string): Commit | null {
    const trimmed = line.trim()
    if (!trimmed) return null

    const parts = splitFields(trimmed, FIELD_DELIMITER, LOG_FIELD_COUNT)
    if (parts.length < LOG_MIN_FIELDS) return null

    const [hash, authorName, authorEmail, authorTime, committerName, committerEmail, committerTime, parents, subject] =
      parts
    const body = parts.length > LOG_MIN_FIELDS && parts[LOG_MIN_FIELDS] !== '' ? parts[LOG_MIN_FIELDS] : null

    const authorTimestamp = Timestamp.requireEpochSeconds(authorTime, 'log', line)
    const committerTimestamp = Timestamp.requireEpochSeconds(committerTime, 'log', line)

    return {
      hash: new Hash(hash),
      author: { name: authorName, email: authorEmail, timestamp: authorTimestamp },
      committer: { name: committerName, email: committerEmail, timestamp: committerTimestamp },
      message: { subject, body },
      timestamp: authorTimestamp,
      parents: parents
        .split(/\s+/)
        .filter((parent) => parent.length > 0)
        .map((parent) => new Hash(parent))
    }
  }

  public static parse(output: string): CommitLog {
    const commits: Commit[] = []
    let dropped = 0
    for (const line of splitLines(output)) {
      const commit = LogParser.parseLine(line)
      if (commit) {
        commits.push(commit)
      } else if (line.trim()) {
        dropped++
      }
    }
    if (dropped > 0) {
      log.debug(`[LogParser] Discarded ${dropped} line(s) with too few fields`)
    }
    return createCommitLog(commits)
  }
}
