import type { Branch } from '@shared/types'
import type { BranchList } from './collections'

export class BranchQueries {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static isLocal(branch: Branch): boolean {
    return branch.type === 'local'
  }

  public static isRemote(branch: Branch): boolean {
    return branch.type === 'remote-tracking'
  }

  /**
   * Name without the remote segment: `origin/feature/x` becomes `feature/x`.
   * Local names are returned unchanged.
   */
  public static shortName(branch: Branch): string {
    if (!BranchQueries.isRemote(branch)) return branch.name
    const slash = branch.name.indexOf('/')
    return slash === -1 ? branch.name : branch.name.slice(slash + 1)
  }

  public static local(branches: BranchList): Iterable<Branch> {
    return branches.filter(BranchQueries.isLocal)
  }

  public static remote(branches: BranchList): Iterable<Branch> {
    return branches.filter(BranchQueries.isRemote)
  }

  public static current(branches: BranchList): Branch | undefined {
    return branches.findWhere((branch) => branch.isCurrent)
  }

  public static findByShortName(branches: BranchList, shortName: string): Branch | undefined {
    return branches.findWhere((branch) => BranchQueries.shortName(branch) === shortName)
  }

  public static localCount(branches: BranchList): number {
    return branches.count(BranchQueries.isLocal)
  }

  public static remoteCount(branches: BranchList): number {
    return branches.count(BranchQueries.isRemote)
  }
}
