/**
 * MemoryStorageDriver - In-memory post storage
 *
 * Keeps posts in a Map keyed by id with a monotonically increasing id
 * sequence. Data lives as long as the process. Ideal for unit tests
 * and local development.
 *
 * @module storage/drivers/memory
 * @category Storage
 */

import type { Post, PostInput } from '../../schema/post';
import { applyPostFilter, type PostFilter } from '../../query/filter';
import type { StorageDriver, StorageDriverConfig } from '../types';

/**
 * In-memory storage driver using a JavaScript Map.
 *
 * Ids start at 1 and are never reused, even after a delete, until
 * reset() is called.
 *
 * @example
 * ```typescript
 * const driver = new MemoryStorageDriver();
 * await driver.initialize();
 *
 * const post = await driver.insert({ title: 'Hello', body: 'World' });
 * // post.id === 1
 * ```
 */
export class MemoryStorageDriver implements StorageDriver {
  readonly name = 'memory';

  /** Stored posts by id */
  private posts: Map<number, Post> = new Map();

  /** Next id to assign */
  private nextId = 1;

  /** Configuration options */
  private config: StorageDriverConfig;

  constructor(config?: StorageDriverConfig) {
    this.config = config || {};
  }

  async initialize(): Promise<void> {
    if (this.config.debug) {
      console.log('[MemoryStorageDriver] Initialized');
    }
  }

  async insert(input: PostInput): Promise<Post> {
    const post: Post = { id: this.nextId++, title: input.title, body: input.body };
    this.posts.set(post.id, post);

    if (this.config.debug) {
      console.log('[MemoryStorageDriver] Inserted post:', post.id);
    }

    return { ...post };
  }

  async get(id: number): Promise<Post | null> {
    const post = this.posts.get(id);
    return post ? { ...post } : null;
  }

  async list(filter?: PostFilter): Promise<Post[]> {
    return applyPostFilter(this.posts.values(), filter).map((post) => ({ ...post }));
  }

  async delete(id: number): Promise<boolean> {
    const deleted = this.posts.delete(id);

    if (this.config.debug && deleted) {
      console.log('[MemoryStorageDriver] Deleted post:', id);
    }

    return deleted;
  }

  async count(): Promise<number> {
    return this.posts.size;
  }

  async reset(): Promise<void> {
    this.posts.clear();
    this.nextId = 1;

    if (this.config.debug) {
      console.log('[MemoryStorageDriver] Reset all data');
    }
  }

  async close(): Promise<void> {
    this.posts.clear();
  }
}
