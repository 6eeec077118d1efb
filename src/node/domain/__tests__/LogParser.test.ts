import { describe, expect, it } from 'vitest'
import { ParseError } from '../../shared/errors'
import { LogParser } from '../LogParser'
import { LogQueries } from '../LogQueries'

const MERGE =
  'ccc3333ccc3333|Jane Doe|jane@example.com|1700000200|Sam Roe|sam@example.com|1700000300|bbb2222 aaa1111|Merge branch feature|Brings in the feature'
const FEATURE = 'bbb2222bbb2222|Sam Roe|sam@example.com|1700000100|Sam Roe|sam@example.com|1700000100|aaa1111|Add parser|'
const ROOT = 'aaa1111aaa1111|Jane Doe|jane@example.com|1700000000|Jane Doe|jane@example.com|1700000000||Initial commit'

const ids = (commits: Iterable<{ hash: { value: string } }>) => Array.from(commits, (commit) => commit.hash.value)

describe('LogParser.parseLine', () => {
  it('decodes every field', () => {
    const commit = LogParser.parseLine(MERGE)

    expect(commit?.hash.value).toBe('ccc3333ccc3333')
    expect(commit?.author).toEqual({
      name: 'Jane Doe',
      email: 'jane@example.com',
      timestamp: new Date(1_700_000_200_000)
    })
    expect(commit?.committer).toEqual({
      name: 'Sam Roe',
      email: 'sam@example.com',
      timestamp: new Date(1_700_000_300_000)
    })
    expect(commit?.message).toEqual({ subject: 'Merge branch feature', body: 'Brings in the feature' })
    expect(commit?.parents.map((parent) => parent.value)).toEqual(['bbb2222', 'aaa1111'])
  })

  it('uses the author time as the commit timestamp', () => {
    expect(LogParser.parseLine(MERGE)?.timestamp.getTime()).toBe(1_700_000_200_000)
  })

  it('has no body when the last field is empty or missing', () => {
    expect(LogParser.parseLine(FEATURE)?.message.body).toBeNull()
    expect(LogParser.parseLine(ROOT)?.message.body).toBeNull()
  })

  it('keeps delimiters inside the body', () => {
    const commit = LogParser.parseLine('h1|a|a@x|1|c|c@x|2||subject|left|right')
    expect(commit?.message).toEqual({ subject: 'subject', body: 'left|right' })
  })

  it('reads an empty parent list as a root commit', () => {
    expect(LogParser.parseLine(ROOT)?.parents).toEqual([])
  })

  it('discards lines with fewer than nine fields', () => {
    expect(LogParser.parseLine('second paragraph of a body')).toBeNull()
    expect(LogParser.parseLine('h|a|e|1|c|e|2|p')).toBeNull()
  })

  it('ignores blank lines and surrounding whitespace', () => {
    expect(LogParser.parseLine('   ')).toBeNull()
    expect(LogParser.parseLine(`  ${ROOT}  `)?.message.subject).toBe('Initial commit')
  })

  it('fails on a non-integer timestamp', () => {
    const line = 'h|a|a@x|yesterday|c|c@x|2||subject'
    expect(() => LogParser.parseLine(line)).toThrow(ParseError)
    expect(() => LogParser.parseLine(line)).toThrow('Invalid timestamp: yesterday')
  })
})

describe('LogParser.parse', () => {
  it('keeps git order and drops continuation lines', () => {
    const log = LogParser.parse([MERGE, 'stray continuation line', '', FEATURE, ROOT].join('\n'))
    expect(ids(log)).toEqual(['ccc3333ccc3333', 'bbb2222bbb2222', 'aaa1111aaa1111'])
  })

  it('fails the whole decode on one bad timestamp', () => {
    expect(() => LogParser.parse(`${ROOT}\nh|a|a@x|1|c|c@x|later||subject`)).toThrow(ParseError)
  })
})

describe('LogQueries', () => {
  const log = LogParser.parse([MERGE, FEATURE, ROOT].join('\n'))
  const [merge, feature, root] = log.toArray()

  it('classifies merges and roots', () => {
    expect(LogQueries.isMerge(merge)).toBe(true)
    expect(LogQueries.isMerge(feature)).toBe(false)
    expect(LogQueries.isRoot(root)).toBe(true)
    expect(LogQueries.mainParent(merge)?.value).toBe('bbb2222')
    expect(LogQueries.mainParent(root)).toBeNull()
  })

  it('matches authors by name or email substring', () => {
    expect(LogQueries.isAuthoredBy(feature, 'Sam')).toBe(true)
    expect(LogQueries.isAuthoredBy(feature, 'sam@example')).toBe(true)
    expect(LogQueries.isAuthoredBy(feature, 'Jane')).toBe(false)
    expect(ids(LogQueries.byAuthor(log, 'jane@'))).toEqual(['ccc3333ccc3333', 'aaa1111aaa1111'])
  })

  it('matches messages case-insensitively across subject and body', () => {
    expect(LogQueries.messageContains(merge, 'BRINGS IN')).toBe(true)
    expect(LogQueries.messageContains(feature, 'parser')).toBe(true)
    expect(ids(LogQueries.withMessageContaining(log, 'INITIAL'))).toEqual(['aaa1111aaa1111'])
  })

  it('joins subject and body into the full message', () => {
    expect(LogQueries.fullMessage(merge)).toBe('Merge branch feature\n\nBrings in the feature')
    expect(LogQueries.fullMessage(root)).toBe('Initial commit')
  })

  it('filters by timestamp bounds, inclusive', () => {
    const boundary = new Date(1_700_000_100_000)
    expect(ids(LogQueries.since(log, boundary))).toEqual(['ccc3333ccc3333', 'bbb2222bbb2222'])
    expect(ids(LogQueries.until(log, boundary))).toEqual(['bbb2222bbb2222', 'aaa1111aaa1111'])
  })

  it('separates merges from other commits', () => {
    expect(ids(LogQueries.mergesOnly(log))).toEqual(['ccc3333ccc3333'])
    expect(ids(LogQueries.noMerges(log))).toEqual(['bbb2222bbb2222', 'aaa1111aaa1111'])
  })

  it('finds commits by full and short id', () => {
    expect(LogQueries.findByHash(log, 'bbb2222bbb2222')?.message.subject).toBe('Add parser')
    expect(LogQueries.findByHash(log, 'bbb2222')).toBeUndefined()
    expect(LogQueries.findByShortHash(log, 'aaa1111')?.message.subject).toBe('Initial commit')
  })
})
