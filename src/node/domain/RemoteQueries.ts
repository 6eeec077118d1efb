import type { Remote } from '@shared/types'

export class RemoteQueries {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * URL git pushes to: the push URL when one is set, else the fetch URL.
   */
  public static effectivePushUrl(remote: Remote): string {
    return remote.pushUrl ?? remote.fetchUrl
  }
}
