/**
 * Storage Driver Types - Persistence interface for posts
 *
 * @module storage/types
 * @category Storage
 */

import type { Post, PostInput } from '../schema/post';
import type { PostFilter } from '../query/filter';

/**
 * Storage Driver Interface
 *
 * The request handlers reach persistence only through this interface.
 * A driver instance is created once per process and passed to the
 * handlers; it is the only state shared between requests.
 *
 * @example
 * ```typescript
 * const driver = new MemoryStorageDriver();
 * await driver.initialize();
 *
 * const post = await driver.insert({ title: 'Hello', body: 'World' });
 * const found = await driver.get(post.id);
 * const matching = await driver.list({ titleLike: 'Hell' });
 * await driver.delete(post.id);
 * ```
 */
export interface StorageDriver {
  /** Driver name for identification */
  readonly name: string;

  /**
   * Prepare the backing store (create tables, open files).
   * Must be awaited before any other call.
   */
  initialize(): Promise<void>;

  /**
   * Persist a new post.
   *
   * @returns The stored post with its freshly assigned id
   */
  insert(input: PostInput): Promise<Post>;

  /**
   * Find a post by id.
   *
   * @returns The post, or null when no post has that id
   */
  get(id: number): Promise<Post | null>;

  /**
   * List posts matching a filter, ordered by id ascending.
   */
  list(filter?: PostFilter): Promise<Post[]>;

  /**
   * Hard-delete a post.
   *
   * @returns True if a post was deleted, false if none had that id
   */
  delete(id: number): Promise<boolean>;

  /**
   * Count all stored posts.
   */
  count(): Promise<number>;

  /**
   * Remove every post and restart id assignment at 1.
   */
  reset(): Promise<void>;

  /**
   * Release the backing store.
   */
  close(): Promise<void>;
}

/**
 * Options shared by all storage drivers.
 */
export interface StorageDriverConfig {
  /** Log every write through console.log */
  debug?: boolean;
}
