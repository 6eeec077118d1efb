import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { resetGitRunner, setGitRunner } from '../../adapters/git'
import { ValidationError } from '../../shared/errors'
import { ConfigOperation } from '../ConfigOperation'
import { RemoteOperation } from '../RemoteOperation'
import { ResetOperation } from '../ResetOperation'
import { resetGitCheck } from '../run'
import { StatusOperation } from '../StatusOperation'
import { FakeGitRunner } from './fakeRunner'

describe('RemoteOperation argument building', () => {
  it('fetches every remote with --all', () => {
    expect(RemoteOperation.buildFetchArgs('origin', { prune: true, all: true })).toEqual([
      'fetch',
      '--prune',
      '--all'
    ])
    expect(RemoteOperation.buildFetchArgs('origin', { tags: true })).toEqual(['fetch', '--tags', 'origin'])
  })

  it('puts --tags after the refspec when pushing', () => {
    expect(
      RemoteOperation.buildPushArgs('origin', 'main', { force: true, setUpstream: true, tags: true })
    ).toEqual(['push', '--force', '--set-upstream', 'origin', 'main', '--tags'])
  })
})

describe('repository configuration operations', () => {
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

  it('lists remotes', async () => {
    git.reply('remote -v', 'origin\t/srv/repo.git (fetch)\norigin\t/srv/repo.git (push)\n')
    const remotes = await RemoteOperation.list('/repo')
    expect(remotes.toArray()).toEqual([{ name: 'origin', fetchUrl: '/srv/repo.git', pushUrl: null }])
  })

  it('manages remotes', async () => {
    git.reply('remote get-url origin', '/srv/repo.git\n')

    await RemoteOperation.add('/repo', 'origin', '/srv/repo.git')
    await RemoteOperation.rename('/repo', 'origin', 'upstream')
    await RemoteOperation.remove('/repo', 'upstream')
    await expect(RemoteOperation.getUrl('/repo', 'origin')).resolves.toBe('/srv/repo.git')

    expect(git.commands()).toEqual([
      'remote add origin /srv/repo.git',
      'remote rename origin upstream',
      'remote remove upstream',
      'remote get-url origin'
    ])
  })

  it('rejects a remote without a URL', async () => {
    await expect(RemoteOperation.add('/repo', 'origin', ' ')).rejects.toBeInstanceOf(ValidationError)
  })

  it('fetches and pushes', async () => {
    await RemoteOperation.fetch('/repo', 'origin', { prune: true })
    await RemoteOperation.push('/repo', 'origin', 'main')
    expect(git.commands()).toEqual(['fetch --prune origin', 'push origin main'])
  })

  it('reads and writes the user identity', async () => {
    git.reply('config user.name', 'Ada\n').reply('config user.email', 'ada@example.com\n')

    await ConfigOperation.setUser('/repo', { name: 'Grace', email: 'grace@example.com' })
    await expect(ConfigOperation.getUser('/repo')).resolves.toEqual({ name: 'Ada', email: 'ada@example.com' })
    await ConfigOperation.unset('/repo', 'core.editor')

    expect(git.commands()).toEqual([
      'config user.name Grace',
      'config user.email grace@example.com',
      'config user.name',
      'config user.email',
      'config --unset core.editor'
    ])
  })

  it('resets with the requested mode', async () => {
    await ResetOperation.reset('/repo', 'HEAD~1', 'hard')
    await ResetOperation.reset('/repo', 'abc1234')
    expect(git.commands()).toEqual(['reset --hard HEAD~1', 'reset --mixed abc1234'])
  })

  it('decodes status', async () => {
    git.reply('status --porcelain', 'M  a.ts\n?? b.ts\n')
    const report = await StatusOperation.status('/repo')
    expect(report.toArray()).toEqual([
      { path: 'a.ts', indexStatus: 'modified', worktreeStatus: 'clean' },
      { path: 'b.ts', indexStatus: 'clean', worktreeStatus: 'untracked' }
    ])
  })
})
