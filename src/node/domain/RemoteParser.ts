/**
 * RemoteParser - decodes `git remote -v`:
 *
 *   origin  git@example.com:team/repo.git (fetch)
 *   origin  git@example.com:team/repo.git (push)
 */

import type { Remote } from '@shared/types'
import { createRemoteList, type RemoteList } from './collections'
import { splitLines } from './fields'

type RemoteUrls = { fetchUrl: string | null; pushUrl: string | null }

export class RemoteParser {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static parse(output: string): RemoteList {
    // Map keeps first-seen order
    const byName = new Map<string, RemoteUrls>()

    for (const line of splitLines(output)) {
      const [name, url, kind] = line.trim().split(/\s+/)
      if (!name || !url) continue

      const urls = byName.get(name) ?? { fetchUrl: null, pushUrl: null }
      if (kind === '(push)') {
        urls.pushUrl = url
      } else {
        urls.fetchUrl = url
      }
      byName.set(name, urls)
    }

    const remotes: Remote[] = []
    for (const [name, { fetchUrl, pushUrl }] of byName) {
      const fetch = fetchUrl ?? pushUrl ?? ''
      remotes.push({
        name,
        fetchUrl: fetch,
        pushUrl: pushUrl !== null && pushUrl !== fetch ? pushUrl : null
      })
    }
    return createRemoteList(remotes)
  }
}
