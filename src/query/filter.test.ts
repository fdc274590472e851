/**
 * Tests for post listing filters
 */
import { describe, it, expect } from 'vitest';
import type { Post } from '../schema/post';
import {
  applyPostFilter,
  filterConditions,
  matchesPostFilter,
  parsePostFilter,
  toLikePattern,
} from './filter';

const posts: Post[] = [
  { id: 3, title: 'Bells and whistles', body: 'Ring the bells' },
  { id: 1, title: 'Example Post', body: 'Hello world' },
  { id: 2, title: 'Whistles only', body: 'Quiet' },
];

describe('parsePostFilter', () => {
  it('reads title_like and body_like', () => {
    const filter = parsePostFilter(new URLSearchParams('title_like=whistles&body_like=bells'));
    expect(filter).toEqual({ titleLike: 'whistles', bodyLike: 'bells' });
  });

  it('ignores other parameters', () => {
    expect(parsePostFilter(new URLSearchParams('limit=5&title=x'))).toEqual({});
  });

  it('uses the first of repeated values', () => {
    expect(parsePostFilter(new URLSearchParams('title_like=a&title_like=b'))).toEqual({
      titleLike: 'a',
    });
  });

  it('keeps an empty value', () => {
    expect(parsePostFilter(new URLSearchParams('body_like='))).toEqual({ bodyLike: '' });
  });
});

describe('matchesPostFilter', () => {
  it('matches substrings case-sensitively', () => {
    expect(matchesPostFilter(posts[0], { titleLike: 'whistles' })).toBe(true);
    expect(matchesPostFilter(posts[2], { titleLike: 'whistles' })).toBe(false);
  });

  it('requires every constraint', () => {
    expect(matchesPostFilter(posts[0], { titleLike: 'Bells', bodyLike: 'bells' })).toBe(true);
    expect(matchesPostFilter(posts[0], { titleLike: 'Bells', bodyLike: 'world' })).toBe(false);
  });

  it('matches everything with an empty filter or empty fragment', () => {
    expect(matchesPostFilter(posts[1], {})).toBe(true);
    expect(matchesPostFilter(posts[1], { bodyLike: '' })).toBe(true);
  });
});

describe('applyPostFilter', () => {
  it('orders by id ascending', () => {
    expect(applyPostFilter(posts).map((post) => post.id)).toEqual([1, 2, 3]);
  });

  it('filters and orders', () => {
    expect(applyPostFilter(posts, { titleLike: 'histles' }).map((post) => post.id)).toEqual([2, 3]);
  });

  it('does not reorder its input', () => {
    applyPostFilter(posts);
    expect(posts.map((post) => post.id)).toEqual([3, 1, 2]);
  });
});

describe('toLikePattern', () => {
  it('wraps the fragment in wildcards', () => {
    expect(toLikePattern('bells')).toBe('%bells%');
  });

  it('escapes LIKE metacharacters', () => {
    expect(toLikePattern('100%')).toBe('%100\\%%');
    expect(toLikePattern('a_b')).toBe('%a\\_b%');
    expect(toLikePattern('c:\\tmp')).toBe('%c:\\\\tmp%');
  });
});

describe('filterConditions', () => {
  it('lists title before body', () => {
    expect(filterConditions({ bodyLike: 'b', titleLike: 't' })).toEqual([
      ['title', '%t%'],
      ['body', '%b%'],
    ]);
  });

  it('is empty without constraints', () => {
    expect(filterConditions({})).toEqual([]);
  });
});
