/**
 * Timestamp - epoch-seconds fields as printed by %at, %ct and %(taggerdate:unix).
 */

import { ParseError } from '../shared/errors'

const INTEGER = /^[+-]?\d+$/

export class Timestamp {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * Returns a new Date at 1970-01-01T00:00:00Z. Used where metadata is
   * corrupt so the bad value is obvious to callers.
   */
  public static epoch(): Date {
    return new Date(0)
  }

  /**
   * Parses signed integer seconds since the epoch.
   * Returns null for anything else, including values outside the Date range.
   */
  public static fromEpochSeconds(text: string): Date | null {
    if (!INTEGER.test(text)) return null
    const date = new Date(Number(text) * 1000)
    return Number.isNaN(date.getTime()) ? null : date
  }

  /**
   * Like fromEpochSeconds but fails the decode step instead of returning null.
   */
  public static requireEpochSeconds(
    text: string,
    parser: ParseError['parser'],
    line?: string
  ): Date {
    const date = Timestamp.fromEpochSeconds(text)
    if (!date) {
      throw new ParseError(`Invalid timestamp: ${text}`, parser, line)
    }
    return date
  }

  /**
   * Formats a Date for --since/--until as `YYYY-MM-DD HH:MM:SS +0000` (UTC).
   */
  public static toGitDate(date: Date): string {
    const pad = (value: number) => String(value).padStart(2, '0')
    const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`
    const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
    return `${day} ${time} +0000`
  }
}
