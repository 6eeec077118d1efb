/**
 * The concrete collections returned by each query, and the key each one
 * is searched by. Branch and tag lists are re-sorted by name; everything
 * else keeps git's output order.
 */

import type {
  Branch,
  Commit,
  FileDiff,
  FileEntry,
  Remote,
  Stash,
  Tag
} from '@shared/types'
import { GitCollection } from './GitCollection'

export type StatusReport = GitCollection<FileEntry>
export type CommitLog = GitCollection<Commit>
export type BranchList = GitCollection<Branch>
export type TagList = GitCollection<Tag>
export type StashList = GitCollection<Stash>
export type DiffReport = GitCollection<FileDiff>
export type RemoteList = GitCollection<Remote>

export function stashRef(index: number): string {
  return `stash@{${index}}`
}

export function createStatusReport(entries: Iterable<FileEntry>): StatusReport {
  return new GitCollection(entries, { key: (entry) => entry.path })
}

export function createCommitLog(commits: Iterable<Commit>): CommitLog {
  return new GitCollection(commits, {
    key: (commit) => commit.hash.value,
    text: (commit) => commit.message.subject
  })
}

export function createBranchList(branches: Iterable<Branch>): BranchList {
  return new GitCollection(branches, { key: (branch) => branch.name, sortByKey: true })
}

export function createTagList(tags: Iterable<Tag>): TagList {
  return new GitCollection(tags, { key: (tag) => tag.name, sortByKey: true })
}

/**
 * Stashes are found by ref slot (stash@{N}) and searched by message.
 */
export function createStashList(stashes: Iterable<Stash>): StashList {
  return new GitCollection(stashes, {
    key: (stash) => stashRef(stash.index),
    text: (stash) => stash.message
  })
}

export function createDiffReport(files: Iterable<FileDiff>): DiffReport {
  return new GitCollection(files, { key: (file) => file.path })
}

export function createRemoteList(remotes: Iterable<Remote>): RemoteList {
  return new GitCollection(remotes, { key: (remote) => remote.name })
}
