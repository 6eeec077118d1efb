import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest'
import { setLogLevel } from '@shared/logger'
import { resetGitRunner, setGitRunner } from '../../node/adapters/git'
import { resetGitCheck } from '../../node/operations/run'
import { FakeGitRunner } from '../../node/operations/__tests__/fakeRunner'
import { main, USAGE } from '../main'

describe('main', () => {
  let git: FakeGitRunner
  let info: MockInstance<typeof console.info>
  let error: MockInstance<typeof console.error>

  const printed = (spy: MockInstance<typeof console.info>) => spy.mock.calls.map((call) => call[1])

  beforeEach(() => {
    vi.stubEnv('REPO_PATH', '/work/repo')
    vi.stubEnv('LOG_LEVEL', 'info')
    git = new FakeGitRunner()
    setGitRunner(git)
    resetGitCheck()
    info = vi.spyOn(console, 'info').mockImplementation(() => undefined)
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    vi.unstubAllEnvs()
    resetGitRunner()
    resetGitCheck()
    setLogLevel('info')
  })

  it('prints the status of the configured repository', async () => {
    git.reply('status --porcelain', 'M  a.ts\n?? b.ts\n')

    await expect(main(['status'])).resolves.toBe(0)

    expect(git.calls.at(-1)?.dir).toBe('/work/repo')
    expect(printed(info)).toEqual(['Changes (2):', '  M  a.ts', '   ? b.ts'])
  })

  it('reports a clean worktree', async () => {
    await expect(main(['status'])).resolves.toBe(0)
    expect(printed(info)).toEqual(['Working tree clean'])
  })

  it('prints a diff summary in the requested mode', async () => {
    git.reply('diff --numstat --cached', '2\t1\ta.ts\n')

    await expect(main(['diff', '--numstat', '--cached'])).resolves.toBe(0)

    expect(printed(info)).toEqual([
      'Files (1):',
      '  M a.ts +2 -1',
      '1 file(s) changed, 2 insertion(s), 1 deletion(s)'
    ])
  })

  it('prints usage for an unknown command without running git', async () => {
    await expect(main(['frobnicate'])).resolves.toBe(2)
    expect(printed(error)).toEqual([USAGE])
    expect(git.calls).toEqual([])
  })

  it('prints usage for an unknown command outside a repository', async () => {
    git.reply('rev-parse --git-dir', { stdout: '', stderr: 'fatal: not a git repository', exitCode: 128 })

    await expect(main(['bogus'])).resolves.toBe(2)
    expect(printed(error)).toEqual([USAGE])
  })

  it('prints usage when no command is given', async () => {
    await expect(main([])).resolves.toBe(2)
    expect(printed(error)).toEqual([USAGE])
  })

  it('rejects a count that is not a number', async () => {
    await expect(main(['log', 'ten'])).resolves.toBe(1)
    expect(printed(error)).toEqual(['Error: Expected a commit count, got "ten"'])
  })

  it('fails outside a repository', async () => {
    git.reply('rev-parse --git-dir', { stdout: '', stderr: 'fatal: not a git repository', exitCode: 128 })

    await expect(main(['status'])).resolves.toBe(1)
    expect(printed(error)).toEqual(['Error: Not a git repository: /work/repo'])
  })
})
