import type { Hash } from '@shared/hash'
import type { Commit } from '@shared/types'
import type { CommitLog } from './collections'

export class LogQueries {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static isMerge(commit: Commit): boolean {
    return commit.parents.length > 1
  }

  public static isRoot(commit: Commit): boolean {
    return commit.parents.length === 0
  }

  /**
   * First parent, or null for a root commit.
   */
  public static mainParent(commit: Commit): Hash | null {
    return commit.parents[0] ?? null
  }

  /**
   * Substring match against the author's name or email (case-sensitive).
   */
  public static isAuthoredBy(commit: Commit, author: string): boolean {
    return commit.author.name.includes(author) || commit.author.email.includes(author)
  }

  /**
   * Case-insensitive match against subject and body.
   */
  public static messageContains(commit: Commit, text: string): boolean {
    const needle = text.toLowerCase()
    const { subject, body } = commit.message
    return subject.toLowerCase().includes(needle) || (body?.toLowerCase().includes(needle) ?? false)
  }

  public static fullMessage(commit: Commit): string {
    const { subject, body } = commit.message
    return body === null ? subject : `${subject}\n\n${body}`
  }

  public static byAuthor(commits: CommitLog, author: string): Iterable<Commit> {
    return commits.filter((commit) => LogQueries.isAuthoredBy(commit, author))
  }

  /** Commits whose author timestamp is at or after `date`. */
  public static since(commits: CommitLog, date: Date): Iterable<Commit> {
    return commits.filter((commit) => commit.timestamp.getTime() >= date.getTime())
  }

  /** Commits whose author timestamp is at or before `date`. */
  public static until(commits: CommitLog, date: Date): Iterable<Commit> {
    return commits.filter((commit) => commit.timestamp.getTime() <= date.getTime())
  }

  public static withMessageContaining(commits: CommitLog, text: string): Iterable<Commit> {
    return commits.filter((commit) => LogQueries.messageContains(commit, text))
  }

  public static mergesOnly(commits: CommitLog): Iterable<Commit> {
    return commits.filter(LogQueries.isMerge)
  }

  public static noMerges(commits: CommitLog): Iterable<Commit> {
    return commits.filter((commit) => !LogQueries.isMerge(commit))
  }

  public static findByHash(commits: CommitLog, hash: Hash | string): Commit | undefined {
    return commits.find(hash.toString())
  }

  /**
   * Matches the seven-character short form exactly.
   */
  public static findByShortHash(commits: CommitLog, short: string): Commit | undefined {
    return commits.findWhere((commit) => commit.hash.short === short)
  }
}
