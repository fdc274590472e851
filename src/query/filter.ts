/**
 * Query Filter - Substring filters for listing posts
 *
 * Reads the `title_like` and `body_like` query parameters into a
 * PostFilter. Storage drivers apply the filter either in memory
 * (matchesPostFilter) or as SQL LIKE patterns (toLikePattern). Either
 * way the result is ordered by id ascending.
 *
 * @module query/filter
 * @category Query
 */

import type { Post } from '../schema/post';

/**
 * Substring constraints on a post listing. An absent key does not
 * constrain its field.
 */
export interface PostFilter {
  /** `title` must contain this substring (case-sensitive) */
  titleLike?: string;
  /** `body` must contain this substring (case-sensitive) */
  bodyLike?: string;
}

/**
 * Query parameter names mapped to filter keys.
 */
export const FILTER_PARAMS = {
  title_like: 'titleLike',
  body_like: 'bodyLike',
} as const satisfies Record<string, keyof PostFilter>;

/**
 * Filter keys mapped to the post field they constrain.
 */
const FILTER_FIELDS = {
  titleLike: 'title',
  bodyLike: 'body',
} as const satisfies Record<keyof PostFilter, keyof Post>;

const FILTER_KEYS = ['titleLike', 'bodyLike'] as const satisfies readonly (keyof PostFilter)[];

/**
 * Build a filter from request query parameters. Other parameters are
 * ignored. A repeated parameter uses its first value.
 *
 * @example
 * ```typescript
 * parsePostFilter(new URLSearchParams('title_like=whistles&body_like=bells'));
 * // { titleLike: 'whistles', bodyLike: 'bells' }
 * ```
 */
export function parsePostFilter(params: URLSearchParams): PostFilter {
  const filter: PostFilter = {};

  for (const [param, key] of Object.entries(FILTER_PARAMS)) {
    const value = params.get(param);
    if (value !== null) {
      filter[key] = value;
    }
  }

  return filter;
}

/**
 * Check whether a post satisfies every constraint of a filter.
 */
export function matchesPostFilter(post: Post, filter: PostFilter): boolean {
  for (const key of FILTER_KEYS) {
    const fragment = filter[key];
    if (fragment !== undefined && !post[FILTER_FIELDS[key]].includes(fragment)) {
      return false;
    }
  }
  return true;
}

/**
 * Filter and order posts in memory.
 *
 * @returns A new array of the matching posts, id ascending
 */
export function applyPostFilter(posts: Iterable<Post>, filter: PostFilter = {}): Post[] {
  return Array.from(posts)
    .filter((post) => matchesPostFilter(post, filter))
    .sort((a, b) => a.id - b.id);
}

/**
 * Wrap a substring as a `%like%` pattern, escaping the LIKE
 * metacharacters so the fragment matches literally. Uses backslash,
 * the PostgreSQL default escape character.
 *
 * @example
 * ```typescript
 * toLikePattern('100%'); // '%100\\%%'
 * ```
 */
export function toLikePattern(fragment: string): string {
  return `%${fragment.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

/**
 * Describe the active constraints as `[field, pattern]` pairs, in
 * declaration order. Used to build SQL conditions.
 */
export function filterConditions(filter: PostFilter): Array<[keyof Post, string]> {
  const conditions: Array<[keyof Post, string]> = [];

  for (const key of FILTER_KEYS) {
    const fragment = filter[key];
    if (fragment !== undefined) {
      conditions.push([FILTER_FIELDS[key], toLikePattern(fragment)]);
    }
  }

  return conditions;
}
