/**
 * StatusParser - decodes `git status --porcelain` (v1) output.
 *
 * Each line is `XY path`: X is the index status, Y the worktree status.
 * Unknown codes read as clean rather than failing, and lines too short to
 * hold both codes are dropped.
 */

import type { FileEntry, IndexStatus, WorktreeStatus } from '@shared/types'
import { STATUS_PATH_OFFSET } from '../shared/constants'
import { createStatusReport, type StatusReport } from './collections'

const INDEX_CODES = new Map<string, IndexStatus>([
  ['M', 'modified'],
  ['A', 'added'],
  ['D', 'deleted'],
  ['R', 'renamed'],
  ['C', 'copied']
])

const WORKTREE_CODES = new Map<string, WorktreeStatus>([
  ['M', 'modified'],
  ['D', 'deleted'],
  ['?', 'untracked'],
  ['!', 'ignored']
])

const INDEX_CHARS: Record<IndexStatus, string> = {
  clean: ' ',
  modified: 'M',
  added: 'A',
  deleted: 'D',
  renamed: 'R',
  copied: 'C'
}

const WORKTREE_CHARS: Record<WorktreeStatus, string> = {
  clean: ' ',
  modified: 'M',
  deleted: 'D',
  untracked: '?',
  ignored: '!'
}

export class StatusParser {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static indexStatusFromChar(char: string): IndexStatus {
    return INDEX_CODES.get(char) ?? 'clean'
  }

  public static indexStatusToChar(status: IndexStatus): string {
    return INDEX_CHARS[status]
  }

  public static worktreeStatusFromChar(char: string): WorktreeStatus {
    return WORKTREE_CODES.get(char) ?? 'clean'
  }

  public static worktreeStatusToChar(status: WorktreeStatus): string {
    return WORKTREE_CHARS[status]
  }

  /**
   * Decodes one porcelain line. Returns null for short lines and for
   * entries that are clean on both axes.
   */
  public static parseLine(line: string): FileEntry | null {
    if (line.length < STATUS_PATH_OFFSET) return null

    const indexStatus = StatusParser.indexStatusFromChar(line.charAt(0))
    const worktreeStatus = StatusParser.worktreeStatusFromChar(line.charAt(1))
    if (indexStatus === 'clean' && worktreeStatus === 'clean') return null

    return {
      path: line.slice(STATUS_PATH_OFFSET),
      indexStatus,
      worktreeStatus
    }
  }

  public static parse(output: string): StatusReport {
    const entries: FileEntry[] = []
    for (const line of output.split(/\r?\n/)) {
      const entry = StatusParser.parseLine(line)
      if (entry) entries.push(entry)
    }
    return createStatusReport(entries)
  }
}
