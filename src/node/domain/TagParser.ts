/**
 * TagParser - decodes tag listings.
 *
 * `parse` reads `git for-each-ref` output printed with TAG_FORMAT.
 * `parseShow` reads `git show --format=fuller <tag>`, used right after a tag
 * is created and when a single tag is shown.
 */

import { log } from '@shared/logger'
import { Hash } from '@shared/hash'
import type { Author, Tag } from '@shared/types'
import { FIELD_DELIMITER, TAG_FIELD_COUNT } from '../shared/constants'
import { ParseError } from '../shared/errors'
import { createTagList, type TagList } from './collections'
import { splitFields, splitLines } from './fields'
import { Timestamp } from './Timestamp'

const COMMIT_PREFIX = 'commit '
const TAGGER_PREFIX = 'Tagger:'

export class TagParser {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * Decodes one for-each-ref line.
   * Throws ParseError when the line has fewer than nine columns.
   */
  public static parseLine(line: string): Tag {
    const parts = splitFields(line, FIELD_DELIMITER, TAG_FIELD_COUNT)
    if (parts.length < TAG_FIELD_COUNT) {
      throw new ParseError(
        `Invalid for-each-ref format: expected ${TAG_FIELD_COUNT} parts, got ${parts.length}`,
        'tag',
        line
      )
    }

    const [name, objectType, objectName, dereferenced, taggerName, taggerEmail, taggerDate, subject, body] =
      parts

    if (objectType !== 'tag') {
      return {
        name,
        type: 'lightweight',
        hash: new Hash(objectName),
        message: null,
        tagger: null,
        timestamp: null
      }
    }

    // A corrupt tagger date reads as the epoch so it is obvious downstream
    const tagger: Author | null =
      taggerName && taggerEmail
        ? {
            name: taggerName,
            email: taggerEmail,
            timestamp: Timestamp.fromEpochSeconds(taggerDate) ?? Timestamp.epoch()
          }
        : null

    let message: string | null = null
    if (subject || body) {
      message = (body ? `${subject}\n\n${body}` : subject).trim()
    }

    return {
      name,
      type: 'annotated',
      hash: new Hash(dereferenced),
      message,
      tagger,
      timestamp: tagger?.timestamp ?? null
    }
  }

  /**
   * Decodes every non-blank line; lines that fail are logged at debug and
   * left out. Those include the continuation lines of a multi-line body.
   */
  public static parse(output: string): TagList {
    const tags: Tag[] = []
    for (const line of splitLines(output)) {
      const trimmed = line.trim()
      if (!trimmed) continue
      try {
        tags.push(TagParser.parseLine(trimmed))
      } catch (error) {
        if (!(error instanceof ParseError)) throw error
        log.debug(`[TagParser] Skipping tag line: ${error.message}`)
      }
    }
    return createTagList(tags)
  }

  /**
   * Parses a `Name <email>` tagger value. The fuller format prints the date
   * on its own line in human form, so the timestamp is the epoch sentinel.
   */
  public static parseTagger(value: string): Author | null {
    const open = value.indexOf('<')
    const close = value.indexOf('>', open + 1)
    if (open === -1 || close === -1) return null
    return {
      name: value.slice(0, open).trim(),
      email: value.slice(open + 1, close),
      timestamp: Timestamp.epoch()
    }
  }

  /**
   * Decodes `git show --format=fuller <name>` for a single tag.
   * Throws ParseError when no `commit <id>` line is present.
   */
  public static parseShow(name: string, output: string): Tag {
    const lines = splitLines(output)
    const commitLine = lines.find((line) => line.startsWith(COMMIT_PREFIX))
    const commitId = commitLine?.split(/\s+/)[1]
    if (!commitId) {
      throw new ParseError('Could not parse tag commit hash', 'tag')
    }
    const hash = new Hash(commitId)

    const annotated = output.includes('tag ') && output.includes(TAGGER_PREFIX)
    if (!annotated) {
      return { name, type: 'lightweight', hash, message: null, tagger: null, timestamp: null }
    }

    let tagger: Author | null = null
    let collecting = false
    const messageLines: string[] = []
    for (const line of lines) {
      if (line.startsWith(COMMIT_PREFIX)) break
      if (line.startsWith(TAGGER_PREFIX)) {
        tagger = TagParser.parseTagger(line.slice(TAGGER_PREFIX.length))
      } else if (!collecting) {
        collecting = line.trim() === ''
      } else if (line.trim()) {
        messageLines.push(line.trim())
      }
    }

    return {
      name,
      type: 'annotated',
      hash,
      message: messageLines.length > 0 ? messageLines.join('\n') : null,
      tagger,
      timestamp: tagger?.timestamp ?? null
    }
  }
}
