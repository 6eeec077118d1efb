import type { Stash } from '@shared/types'
import type { StashList } from './collections'

export class StashQueries {
  // Prevent instantiation - use static methods
  private constructor() {}

  /** Most recent stash (stash@{0}), if any. */
  public static latest(stashes: StashList): Stash | undefined {
    return stashes.first()
  }

  public static get(stashes: StashList, index: number): Stash | undefined {
    return stashes.findWhere((stash) => stash.index === index)
  }

  public static forBranch(stashes: StashList, branch: string): Iterable<Stash> {
    return stashes.filter((stash) => stash.branch === branch)
  }
}
