import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { resetGitRunner, setGitRunner } from '../../adapters/git'
import { TAG_FORMAT } from '../../shared/constants'
import { resetGitCheck } from '../run'
import { TagOperation } from '../TagOperation'
import { FakeGitRunner } from './fakeRunner'

const SHOW_ANNOTATED = [
  'tag v1.0',
  'Tagger: Ada Lovelace <ada@example.com>',
  'TaggerDate: Tue Nov 14 22:13:20 2023 +0000',
  '',
  'Release one',
  '',
  'commit 1a2b3c4d5e6f',
  'Author: Ada Lovelace <ada@example.com>',
  ''
].join('\n')

describe('TagOperation.buildCreateArgs', () => {
  it('makes a tag with a message annotated', () => {
    expect(TagOperation.buildCreateArgs('v1', 'abc1234', { message: 'Release', force: true })).toEqual([
      'tag',
      '-a',
      '-f',
      '-m',
      'Release',
      'v1',
      'abc1234'
    ])
  })

  it('leaves the target out for HEAD', () => {
    expect(TagOperation.buildCreateArgs('v1', undefined, {})).toEqual(['tag', 'v1'])
  })
})

describe('TagOperation', () => {
  let git: FakeGitRunner

  beforeEach(() => {
    git = new FakeGitRunner()
    setGitRunner(git)
    resetGitCheck()
  })

  afterEach(() => {
    resetGitRunner()
    resetGitCheck()
  })

  it('lists tags from for-each-ref', async () => {
    git.reply(
      `for-each-ref ${TAG_FORMAT} refs/tags/`,
      'v2|commit|bbb2222||||||\nv1|commit|aaa1111||||||\n'
    )

    const tags = await TagOperation.list('/repo')
    expect(tags.toArray().map((tag) => tag.name)).toEqual(['v1', 'v2'])
  })

  it('creates an annotated tag and reads it back', async () => {
    git.reply('show --format=fuller v1.0', SHOW_ANNOTATED)

    const tag = await TagOperation.create('/repo', 'v1.0', undefined, { message: 'Release one' })

    expect(git.commands()).toEqual(['tag -a -m Release one v1.0', 'show --format=fuller v1.0'])
    expect(tag).toMatchObject({
      name: 'v1.0',
      type: 'annotated',
      message: 'Release one',
      tagger: { name: 'Ada Lovelace', email: 'ada@example.com', timestamp: new Date(0) }
    })
    expect(tag.hash.value).toBe('1a2b3c4d5e6f')
  })

  it('deletes a tag', async () => {
    await TagOperation.delete('/repo', 'v1.0')
    expect(git.commands()).toEqual(['tag -d v1.0'])
  })
})
