import { describe, expect, it } from 'vitest'
import { StatusParser } from '../StatusParser'
import { StatusQueries } from '../StatusQueries'

const paths = (entries: Iterable<{ path: string }>) => Array.from(entries, (entry) => entry.path)

describe('StatusParser.parseLine', () => {
  it('reads index and worktree codes', () => {
    expect(StatusParser.parseLine('MM both.txt')).toEqual({
      path: 'both.txt',
      indexStatus: 'modified',
      worktreeStatus: 'modified'
    })
    expect(StatusParser.parseLine('?? new.txt')).toEqual({
      path: 'new.txt',
      indexStatus: 'clean',
      worktreeStatus: 'untracked'
    })
  })

  it('keeps the path verbatim after offset 3', () => {
    expect(StatusParser.parseLine('R  old.txt -> new.txt')?.path).toBe('old.txt -> new.txt')
    expect(StatusParser.parseLine(' M dir/with space.txt')?.path).toBe('dir/with space.txt')
  })

  it('skips lines shorter than three characters', () => {
    expect(StatusParser.parseLine('XX')).toBeNull()
    expect(StatusParser.parseLine('M')).toBeNull()
  })

  it('treats unknown codes as clean and drops fully clean entries', () => {
    expect(StatusParser.parseLine('ZZ strange.txt')).toBeNull()
    expect(StatusParser.parseLine('Z? odd.txt')).toEqual({
      path: 'odd.txt',
      indexStatus: 'clean',
      worktreeStatus: 'untracked'
    })
  })
})

describe('StatusParser.parse', () => {
  it('ignores blank, short and whitespace-only lines', () => {
    const report = StatusParser.parse('\n\nM  valid.txt\nXX\n  \nA  another.txt\n')
    expect(paths(report)).toEqual(['valid.txt', 'another.txt'])
  })

  it('accepts CRLF line endings', () => {
    expect(paths(StatusParser.parse('M  a.txt\r\n?? b.txt\r\n'))).toEqual(['a.txt', 'b.txt'])
  })
})

describe('status code tables', () => {
  it('maps status back to porcelain characters', () => {
    expect(StatusParser.indexStatusToChar('renamed')).toBe('R')
    expect(StatusParser.indexStatusToChar('clean')).toBe(' ')
    expect(StatusParser.worktreeStatusToChar('ignored')).toBe('!')
    expect(StatusParser.worktreeStatusToChar('clean')).toBe(' ')
  })

  it('round-trips every recognised index character', () => {
    for (const char of ['M', 'A', 'D', 'R', 'C', ' ']) {
      expect(StatusParser.indexStatusToChar(StatusParser.indexStatusFromChar(char))).toBe(char)
    }
  })

  it('round-trips every recognised worktree character', () => {
    for (const char of ['M', 'D', '?', '!', ' ']) {
      expect(StatusParser.worktreeStatusToChar(StatusParser.worktreeStatusFromChar(char))).toBe(char)
    }
  })

  it('maps characters to status', () => {
    expect(StatusParser.indexStatusFromChar('C')).toBe('copied')
    expect(StatusParser.indexStatusFromChar('?')).toBe('clean')
    expect(StatusParser.worktreeStatusFromChar('D')).toBe('deleted')
    expect(StatusParser.worktreeStatusFromChar('A')).toBe('clean')
  })
})

describe('StatusQueries', () => {
  const report = StatusParser.parse(
    [
      'M  staged.txt',
      ' M modified.txt',
      'MM both.txt',
      '?? new.txt',
      '!! ignored.log',
      ' D gone.txt',
      'A  added.txt'
    ].join('\n')
  )

  it('reports clean and dirty trees', () => {
    expect(StatusQueries.isClean(report)).toBe(false)
    expect(StatusQueries.hasChanges(report)).toBe(true)
    expect(StatusQueries.isClean(StatusParser.parse(''))).toBe(true)
  })

  it('lists staged entries', () => {
    expect(paths(StatusQueries.staged(report))).toEqual(['staged.txt', 'both.txt', 'added.txt'])
  })

  it('lists every entry with a worktree-side change as unstaged', () => {
    expect(paths(StatusQueries.unstaged(report))).toEqual([
      'modified.txt',
      'both.txt',
      'new.txt',
      'ignored.log',
      'gone.txt'
    ])
  })

  it('counts untracked and ignored paths as unstaged', () => {
    const mixed = StatusParser.parse('?? new.txt\n!! ig.log\n M mod.txt\n')
    expect(paths(StatusQueries.unstaged(mixed))).toEqual(['new.txt', 'ig.log', 'mod.txt'])
  })

  it('lists untracked and ignored entries', () => {
    expect(paths(StatusQueries.untracked(report))).toEqual(['new.txt'])
    expect(paths(StatusQueries.ignored(report))).toEqual(['ignored.log'])
  })

  it('filters by either axis', () => {
    expect(paths(StatusQueries.withIndexStatus(report, 'added'))).toEqual(['added.txt'])
    expect(paths(StatusQueries.withWorktreeStatus(report, 'deleted'))).toEqual(['gone.txt'])
  })

  it('finds an entry by path', () => {
    expect(report.find('both.txt')?.indexStatus).toBe('modified')
  })
})
