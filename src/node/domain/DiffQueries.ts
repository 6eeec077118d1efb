import type { DiffStats, DiffStatus, FileDiff } from '@shared/types'
import type { DiffReport } from './collections'

export class DiffQueries {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static withStatus(files: DiffReport, status: DiffStatus): Iterable<FileDiff> {
    return files.filter((file) => file.status === status)
  }

  /**
   * No chunks and no counts. Name-only records also match, since that
   * format carries neither.
   */
  public static isBinary(file: FileDiff): boolean {
    return file.chunks.length === 0 && file.additions === 0 && file.deletions === 0
  }

  /** Counts without chunks (numstat). */
  public static isSummaryOnly(file: FileDiff): boolean {
    return file.chunks.length === 0 && (file.additions > 0 || file.deletions > 0)
  }

  public static totalChanges(file: FileDiff): number {
    return file.additions + file.deletions
  }

  /**
   * Totals summed over the records.
   */
  public static stats(files: DiffReport): DiffStats {
    let insertions = 0
    let deletions = 0
    for (const file of files) {
      insertions += file.additions
      deletions += file.deletions
    }
    return { filesChanged: files.length, insertions, deletions }
  }
}
