import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { resetGitRunner, setGitRunner } from '../../adapters/git'
import { GitError } from '../../shared/errors'
import { MergeOperation } from '../MergeOperation'
import { resetGitCheck } from '../run'
import { FakeGitRunner } from './fakeRunner'

describe('MergeOperation.buildArgs', () => {
  it('maps options to flags before the branch', () => {
    expect(
      MergeOperation.buildArgs('feature', {
        fastForward: 'never',
        strategy: 'ort',
        noCommit: true,
        message: 'Merge feature'
      })
    ).toEqual(['merge', '--no-ff', '-s', 'ort', '--no-commit', '-m', 'Merge feature', 'feature'])
  })

  it('uses --ff-only for fast-forward only merges', () => {
    expect(MergeOperation.buildArgs('feature', { fastForward: 'only' })).toEqual([
      'merge',
      '--ff-only',
      'feature'
    ])
  })
})

describe('MergeOperation', () => {
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

  it('reports an up-to-date merge', async () => {
    git.reply('merge feature', 'Already up to date.\n')
    await expect(MergeOperation.merge('/repo', 'feature')).resolves.toEqual({ kind: 'up-to-date' })
  })

  it('reads the fast-forward target from the output', async () => {
    git.reply('merge feature', 'Updating 1a2b3c4..5d6e7f8\nFast-forward\n')

    const status = await MergeOperation.merge('/repo', 'feature')

    expect(status.kind === 'fast-forward' && status.hash.value).toBe('5d6e7f8')
    expect(git.commands()).toEqual(['merge feature'])
  })

  it('returns the new HEAD after a merge commit', async () => {
    git.reply('merge feature', "Merge made by the 'ort' strategy.\n").reply('rev-parse HEAD', 'abcdef0\n')

    const status = await MergeOperation.merge('/repo', 'feature')

    expect(status.kind === 'success' && status.hash.value).toBe('abcdef0')
  })

  it('lists conflicted paths', async () => {
    git
      .reply('merge feature', {
        stdout: 'Auto-merging a.ts\nCONFLICT (content): Merge conflict in a.ts\n',
        stderr: '',
        exitCode: 1
      })
      .reply('diff --name-only --diff-filter=U', 'a.ts\nb.ts\n')

    await expect(MergeOperation.merge('/repo', 'feature')).resolves.toEqual({
      kind: 'conflicts',
      files: ['a.ts', 'b.ts']
    })
  })

  it('throws for other failures', async () => {
    git.reply('merge nowhere', {
      stdout: '',
      stderr: 'merge: nowhere - not something we can merge\n',
      exitCode: 1
    })

    await expect(MergeOperation.merge('/repo', 'nowhere')).rejects.toThrow(
      new GitError('Merge failed: merge: nowhere - not something we can merge', 'merge')
    )
  })

  it('detects an unfinished merge from MERGE_HEAD', async () => {
    await expect(MergeOperation.inProgress('/repo')).resolves.toBe(true)

    git.reply('rev-parse -q --verify MERGE_HEAD', { stdout: '', stderr: '', exitCode: 1 })
    await expect(MergeOperation.inProgress('/repo')).resolves.toBe(false)
  })

  it('aborts a merge', async () => {
    await MergeOperation.abort('/repo')
    expect(git.commands()).toEqual(['merge --abort'])
  })
})
