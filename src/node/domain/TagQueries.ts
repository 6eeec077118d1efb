import type { Hash } from '@shared/hash'
import type { AnnotatedTag, LightweightTag, Tag } from '@shared/types'
import type { TagList } from './collections'

function isLightweight(tag: Tag): tag is LightweightTag {
  return tag.type === 'lightweight'
}

function isAnnotated(tag: Tag): tag is AnnotatedTag {
  return tag.type === 'annotated'
}

export class TagQueries {
  // Prevent instantiation - use static methods
  private constructor() {}

  public static isLightweight = isLightweight
  public static isAnnotated = isAnnotated

  public static lightweight(tags: TagList): Iterable<LightweightTag> {
    return {
      *[Symbol.iterator]() {
        for (const tag of tags) {
          if (isLightweight(tag)) yield tag
        }
      }
    }
  }

  public static annotated(tags: TagList): Iterable<AnnotatedTag> {
    return {
      *[Symbol.iterator]() {
        for (const tag of tags) {
          if (isAnnotated(tag)) yield tag
        }
      }
    }
  }

  /**
   * Tags whose target commit is `hash`.
   */
  public static forCommit(tags: TagList, hash: Hash | string): Iterable<Tag> {
    return tags.filter((tag) => tag.hash.equals(hash))
  }

  public static lightweightCount(tags: TagList): number {
    return tags.count(isLightweight)
  }

  public static annotatedCount(tags: TagList): number {
    return tags.count(isAnnotated)
  }
}
