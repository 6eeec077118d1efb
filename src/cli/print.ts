import type { Branch, Commit, FileDiff, FileEntry, Remote, Stash, Tag } from '@shared/types'
import { DiffParser, type DiffOutput } from '../node/domain/DiffParser'
import { StatusParser } from '../node/domain/StatusParser'

export function formatStatusEntry(entry: FileEntry): string {
  const codes =
    StatusParser.indexStatusToChar(entry.indexStatus) +
    StatusParser.worktreeStatusToChar(entry.worktreeStatus)
  return `${codes} ${entry.path}`
}

export function formatCommit(commit: Commit): string {
  const date = commit.timestamp.toISOString().slice(0, 10)
  const merge = commit.parents.length > 1 ? ' (merge)' : ''
  return `${commit.hash.short} ${date} ${commit.author.name}: ${commit.message.subject}${merge}`
}

export function formatBranch(branch: Branch): string {
  const marker = branch.isCurrent ? '*' : ' '
  const kind = branch.type === 'local' ? '[local]' : '[remote]'
  const upstream = branch.upstream ? ` -> ${branch.upstream}` : ''
  return `${marker} ${branch.name} ${kind} ${branch.hash.short}${upstream}`
}

export function formatTag(tag: Tag): string {
  const message = tag.message ? `: ${tag.message.split('\n')[0]}` : ''
  return `${tag.name} (${tag.type}) ${tag.hash.short}${message}`
}

export function formatStash(stash: Stash): string {
  return `stash@{${stash.index}} [${stash.branch}] ${stash.message}`
}

export function formatRemote(remote: Remote): string {
  const push = remote.pushUrl ? ` (push: ${remote.pushUrl})` : ''
  return `${remote.name}\t${remote.fetchUrl}${push}`
}

export function formatFileDiff(file: FileDiff): string {
  const status = DiffParser.statusToChar(file.status)
  const renamed = file.oldPath ? `${file.oldPath} -> ` : ''
  return `${status} ${renamed}${file.path} +${file.additions} -${file.deletions}`
}

export function formatDiffSummary(output: DiffOutput): string {
  const { filesChanged, insertions, deletions } = output.stats
  return `${filesChanged} file(s) changed, ${insertions} insertion(s), ${deletions} deletion(s)`
}
