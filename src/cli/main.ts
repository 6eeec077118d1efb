/**
 * Command-line front end: prints one listing for the repository named by
 * REPO_PATH (default: the current directory).
 *
 *   status | log [n] | branches | tags | stashes | remotes
 *   diff [--stat | --numstat | --name-only] [--cached]
 */

import { log, setLogLevel } from '@shared/logger'
import type { DiffMode } from '@shared/types'
import { loadConfiguration } from '../node/core/config'
import {
  BranchOperation,
  DiffOperation,
  LogOperation,
  RemoteOperation,
  RepositoryOperation,
  StashOperation,
  StatusOperation,
  TagOperation
} from '../node/operations'
import { getErrorMessage, ValidationError } from '../node/shared/errors'
import {
  formatBranch,
  formatCommit,
  formatDiffSummary,
  formatFileDiff,
  formatRemote,
  formatStash,
  formatStatusEntry,
  formatTag
} from './print'

export const USAGE =
  'Usage: porcelain-kit <status|log [n]|branches|tags|stashes|remotes|diff [--stat|--numstat|--name-only] [--cached]>'

const COMMANDS = ['status', 'log', 'branches', 'tags', 'stashes', 'remotes', 'diff'] as const

type Command = (typeof COMMANDS)[number]

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value)
}

const DIFF_MODES = new Map<string, DiffMode>([
  ['--stat', 'stat'],
  ['--numstat', 'numstat'],
  ['--name-only', 'name-only']
])

function printAll<T>(title: string, records: Iterable<T>, format: (record: T) => string): void {
  const lines = Array.from(records, format)
  log.info(`${title} (${lines.length}):`)
  lines.forEach((line) => log.info(`  ${line}`))
}

function parseCount(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`Expected a commit count, got "${value}"`, 'count')
  }
  return Number(value)
}

/**
 * Runs one command. Returns the process exit code.
 */
export async function main(argv: readonly string[]): Promise<number> {
  const [command, ...rest] = argv
  if (!isCommand(command)) {
    log.error(USAGE)
    return 2
  }

  try {
    const config = loadConfiguration()
    setLogLevel(config.logLevel)
    const repoPath = await RepositoryOperation.open(config.repoPath)

    switch (command) {
      case 'status': {
        const report = await StatusOperation.status(repoPath)
        if (report.isEmpty()) log.info('Working tree clean')
        else printAll('Changes', report, formatStatusEntry)
        return 0
      }
      case 'log': {
        const maxCount = parseCount(rest[0]) ?? config.logMaxCount
        printAll('Commits', await LogOperation.log(repoPath, { maxCount }), formatCommit)
        return 0
      }
      case 'branches':
        printAll('Branches', await BranchOperation.list(repoPath), formatBranch)
        return 0
      case 'tags':
        printAll('Tags', await TagOperation.list(repoPath), formatTag)
        return 0
      case 'stashes':
        printAll('Stashes', await StashOperation.list(repoPath), formatStash)
        return 0
      case 'remotes':
        printAll('Remotes', await RemoteOperation.list(repoPath), formatRemote)
        return 0
      case 'diff': {
        const mode = rest.map((arg) => DIFF_MODES.get(arg)).find((candidate) => candidate !== undefined)
        const output = await DiffOperation.diff(repoPath, {
          mode: mode ?? 'patch',
          cached: rest.includes('--cached')
        })
        printAll('Files', output.files, formatFileDiff)
        log.info(formatDiffSummary(output))
        return 0
      }
    }
  } catch (error) {
    log.error(`Error: ${getErrorMessage(error)}`)
    return 1
  }
}
