/**
 * Seed Function - Populate storage with fake posts
 *
 * @module runtime/seed
 * @category Runtime
 */

import { faker } from '@faker-js/faker';
import type { Post, PostInput } from '../schema/post';
import type { StorageDriver } from '../storage/types';

/**
 * Options for seeding.
 */
export interface SeedOptions {
  /** Faker seed for reproducible content */
  fakerSeed?: number;
}

/**
 * Generate the title and body of one fake post.
 */
export function fakePost(): PostInput {
  return {
    title: faker.lorem.sentence({ min: 3, max: 8 }),
    body: faker.lorem.paragraphs({ min: 1, max: 3 }),
  };
}

/**
 * Insert fake posts, one at a time so ids follow insertion order.
 *
 * @param store - The storage driver to fill
 * @param count - Number of posts to create
 * @returns The stored posts
 *
 * @example
 * ```typescript
 * await seedPosts(store, 20, { fakerSeed: 42 });
 * ```
 */
export async function seedPosts(
  store: StorageDriver,
  count: number,
  options?: SeedOptions
): Promise<Post[]> {
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`Seed count must be a non-negative integer, got ${count}`);
  }

  if (options?.fakerSeed !== undefined) {
    faker.seed(options.fakerSeed);
  }

  const posts: Post[] = [];
  for (let i = 0; i < count; i++) {
    posts.push(await store.insert(fakePost()));
  }

  return posts;
}
