/**
 * DiffParser - decodes the four `git diff` output formats into a DiffReport.
 *
 * name-only, stat and numstat give one summary record per path. The full
 * patch is split per `diff --git` section; extended headers decide the
 * status and the `diff` package parses the hunks.
 */

import * as Diff from 'diff'
import type { DiffChunk, DiffLine, DiffMode, DiffStats, DiffStatus, FileDiff } from '@shared/types'
import { createDiffReport, type DiffReport } from './collections'
import { splitLines } from './fields'

export type DiffOutput = {
  readonly mode: DiffMode
  readonly files: DiffReport
  readonly stats: DiffStats
}

/** Files and totals read from `git show --stat --format=`. */
export type CommitStat = {
  readonly files: readonly string[]
  readonly insertions: number
  readonly deletions: number
}

const STAT_SEPARATOR = ' | '
const SECTION_HEADER = 'diff --git '
const SUMMARY_LINE = /(\d+) files? changed(?:, (\d+) insertions?\(\+\))?(?:, (\d+) deletions?\(-\))?/
const INSERTIONS = /(\d+) insertions?\(\+\)/
const DELETIONS = /(\d+) deletions?\(-\)/

const STATUS_CODES = new Map<string, DiffStatus>([
  ['A', 'added'],
  ['M', 'modified'],
  ['D', 'deleted'],
  ['R', 'renamed'],
  ['C', 'copied']
])

const STATUS_CHARS: Record<DiffStatus, string> = {
  added: 'A',
  modified: 'M',
  deleted: 'D',
  renamed: 'R',
  copied: 'C'
}

const LINE_TYPES = new Map<string, DiffLine['type']>([
  [' ', 'context'],
  ['+', 'added'],
  ['-', 'removed']
])

function summaryRecord(path: string, additions = 0, deletions = 0, status: DiffStatus = 'modified'): FileDiff {
  return { path, oldPath: null, status, chunks: [], additions, deletions }
}

function parseCount(text: string | undefined): number {
  if (text === undefined || !/^\d+$/.test(text)) return 0
  return Number(text)
}

function sumStats(files: readonly FileDiff[]): DiffStats {
  return {
    filesChanged: files.length,
    insertions: files.reduce((total, file) => total + file.additions, 0),
    deletions: files.reduce((total, file) => total + file.deletions, 0)
  }
}

function output(mode: DiffMode, files: FileDiff[], stats: DiffStats = sumStats(files)): DiffOutput {
  return { mode, files: createDiffReport(files), stats }
}

/**
 * Mutable view of one patch section while its headers are read.
 */
export type SectionHeader = {
  path: string
  oldPath: string | null
  status: DiffStatus
  binary: boolean
}

export class DiffParser {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static statusFromChar(char: string): DiffStatus | null {
    return STATUS_CODES.get(char) ?? null
  }

  public static statusToChar(status: DiffStatus): string {
    return STATUS_CHARS[status]
  }

  public static lineTypeFromChar(char: string): DiffLine['type'] | null {
    return LINE_TYPES.get(char) ?? null
  }

  public static parse(text: string, mode: DiffMode): DiffOutput {
    switch (mode) {
      case 'name-only':
        return DiffParser.parseNameOnly(text)
      case 'numstat':
        return DiffParser.parseNumstat(text)
      case 'stat':
        return DiffParser.parseStat(text)
      case 'patch':
        return DiffParser.parsePatch(text)
    }
  }

  public static parseNameOnly(text: string): DiffOutput {
    const files = splitLines(text)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map((path) => summaryRecord(path))
    return output('name-only', files)
  }

  /**
   * `adds\tdels\tpath` per line. Binary files print `-` for both counts,
   * which reads as 0.
   */
  public static parseNumstat(text: string): DiffOutput {
    const files: FileDiff[] = []
    for (const line of splitLines(text)) {
      const fields = line.trim().split('\t')
      if (fields.length < 3) continue

      const additions = parseCount(fields[0])
      const deletions = parseCount(fields[1])
      let status: DiffStatus = 'modified'
      if (additions > 0 && deletions === 0) status = 'added'
      else if (additions === 0 && deletions > 0) status = 'deleted'

      files.push(summaryRecord(fields.slice(2).join('\t'), additions, deletions, status))
    }
    return output('numstat', files)
  }

  /**
   * Per-file lines only name the path; totals come from the summary line.
   */
  public static parseStat(text: string): DiffOutput {
    const files: FileDiff[] = []
    let stats: DiffStats | null = null

    for (const line of splitLines(text)) {
      const trimmed = line.trim()
      if (!trimmed) continue

      const separator = trimmed.indexOf(STAT_SEPARATOR)
      if (separator !== -1) {
        files.push(summaryRecord(trimmed.slice(0, separator).trim()))
        continue
      }

      const summary = SUMMARY_LINE.exec(trimmed)
      if (summary) {
        stats = {
          filesChanged: parseCount(summary[1]),
          insertions: parseCount(summary[2]),
          deletions: parseCount(summary[3])
        }
      }
    }

    return output('stat', files, stats ?? { filesChanged: files.length, insertions: 0, deletions: 0 })
  }

  public static parsePatch(text: string): DiffOutput {
    const files = DiffParser.splitSections(text).map((section) => DiffParser.parseSection(section))
    return output('patch', files)
  }

  /**
   * Groups patch lines into one array per `diff --git` section. Anything
   * before the first header is ignored.
   */
  public static splitSections(text: string): string[][] {
    const sections: string[][] = []
    let current: string[] | null = null
    for (const line of splitLines(text)) {
      if (line.startsWith(SECTION_HEADER)) {
        current = [line]
        sections.push(current)
      } else if (current) {
        current.push(line)
      }
    }
    return sections
  }

  /**
   * Reads the extended headers that precede the hunks.
   */
  public static parseSectionHeader(lines: readonly string[]): SectionHeader {
    const header: SectionHeader = {
      path: DiffParser.pathFromHeader(lines[0] ?? ''),
      oldPath: null,
      status: 'modified',
      binary: false
    }

    for (const line of lines.slice(1)) {
      if (line.startsWith('@@')) break
      if (line.startsWith('new file mode')) {
        header.status = 'added'
      } else if (line.startsWith('deleted file mode')) {
        header.status = 'deleted'
      } else if (line.startsWith('rename from ')) {
        header.status = 'renamed'
        header.oldPath = line.slice('rename from '.length)
      } else if (line.startsWith('rename to ')) {
        header.path = line.slice('rename to '.length)
      } else if (line.startsWith('copy from ')) {
        header.status = 'copied'
        header.oldPath = line.slice('copy from '.length)
      } else if (line.startsWith('copy to ')) {
        header.path = line.slice('copy to '.length)
      } else if (line.startsWith('Binary files ') || line === 'GIT binary patch') {
        header.binary = true
      }
    }
    return header
  }

  /**
   * Path on the new side of `diff --git a/<old> b/<new>`.
   */
  public static pathFromHeader(line: string): string {
    const rest = line.slice(SECTION_HEADER.length)
    const marker = rest.lastIndexOf(' b/')
    if (marker !== -1) return rest.slice(marker + 3)
    return rest.startsWith('a/') ? rest.slice(2) : rest
  }

  public static parseSection(lines: readonly string[]): FileDiff {
    const header = DiffParser.parseSectionHeader(lines)
    if (header.binary) {
      return { path: header.path, oldPath: header.oldPath, status: header.status, chunks: [], additions: 0, deletions: 0 }
    }

    const chunks: DiffChunk[] = []
    let additions = 0
    let deletions = 0

    for (const patch of Diff.parsePatch(lines.join('\n'))) {
      for (const hunk of patch.hunks) {
        const chunkLines: DiffLine[] = []
        for (const raw of hunk.lines) {
          const type = DiffParser.lineTypeFromChar(raw.charAt(0))
          // "\ No newline at end of file" has no line type
          if (!type) continue
          if (type === 'added') additions++
          if (type === 'removed') deletions++
          chunkLines.push({ type, content: raw.slice(1) })
        }
        chunks.push({
          oldStart: hunk.oldStart,
          oldCount: hunk.oldLines,
          newStart: hunk.newStart,
          newCount: hunk.newLines,
          lines: chunkLines
        })
      }
    }

    return { path: header.path, oldPath: header.oldPath, status: header.status, chunks, additions, deletions }
  }

  /**
   * Splits a combined change count between insertions and deletions in
   * proportion to the `+`/`-` glyphs of a stat bar. The glyph bar is scaled,
   * so the result is an estimate. Returns null when the bar has no glyphs.
   */
  public static approximateStatCounts(
    changes: number,
    glyphs: string
  ): { insertions: number; deletions: number } | null {
    let plus = 0
    let minus = 0
    for (const glyph of glyphs) {
      if (glyph === '+') plus++
      else if (glyph === '-') minus++
    }
    if (plus + minus === 0) return null

    const insertions = Math.floor((changes * plus) / (plus + minus))
    return { insertions, deletions: changes - insertions }
  }

  /**
   * Decodes `git show --stat --format=<empty>` for a single commit.
   * Per-file counts are approximated from the glyph bars; the summary
   * line, when present, overrides each total it names.
   */
  public static parseShowStat(text: string): CommitStat {
    const files: string[] = []
    let insertions = 0
    let deletions = 0

    for (const line of splitLines(text)) {
      const trimmed = line.trim()
      if (!trimmed) continue

      const separator = trimmed.indexOf(STAT_SEPARATOR)
      if (separator !== -1) {
        files.push(trimmed.slice(0, separator).trim())
        const stat = trimmed.slice(separator + STAT_SEPARATOR.length).trim()
        const space = stat.indexOf(' ')
        if (space === -1) continue

        const changes = stat.slice(0, space)
        if (!/^\d+$/.test(changes)) continue
        const counts = DiffParser.approximateStatCounts(Number(changes), stat.slice(space + 1))
        if (counts) {
          insertions += counts.insertions
          deletions += counts.deletions
        }
      } else if (trimmed.includes('file changed') || trimmed.includes('files changed')) {
        const inserted = INSERTIONS.exec(trimmed)
        if (inserted) insertions = parseCount(inserted[1])
        const deleted = DELETIONS.exec(trimmed)
        if (deleted) deletions = parseCount(deleted[1])
      }
    }

    return { files, insertions, deletions }
  }
}
