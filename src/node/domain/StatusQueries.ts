import type { FileEntry, IndexStatus, WorktreeStatus } from '@shared/types'
import type { StatusReport } from './collections'

export class StatusQueries {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static isClean(report: StatusReport): boolean {
    return report.isEmpty()
  }

  public static hasChanges(report: StatusReport): boolean {
    return !report.isEmpty()
  }

  /**
   * Entries with something recorded in the index.
   */
  public static staged(report: StatusReport): Iterable<FileEntry> {
    return report.filter((entry) => entry.indexStatus !== 'clean')
  }

  /**
   * Entries with anything on the worktree side, untracked and ignored
   * paths included.
   */
  public static unstaged(report: StatusReport): Iterable<FileEntry> {
    return report.filter((entry) => entry.worktreeStatus !== 'clean')
  }

  public static untracked(report: StatusReport): Iterable<FileEntry> {
    return StatusQueries.withWorktreeStatus(report, 'untracked')
  }

  public static ignored(report: StatusReport): Iterable<FileEntry> {
    return StatusQueries.withWorktreeStatus(report, 'ignored')
  }

  public static withIndexStatus(report: StatusReport, status: IndexStatus): Iterable<FileEntry> {
    return report.filter((entry) => entry.indexStatus === status)
  }

  public static withWorktreeStatus(
    report: StatusReport,
    status: WorktreeStatus
  ): Iterable<FileEntry> {
    return report.filter((entry) => entry.worktreeStatus === status)
  }
}
