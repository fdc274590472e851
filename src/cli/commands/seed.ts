/**
 * Seed command - Fill an on-disk PGlite database with fake posts
 *
 * @module cli/commands/seed
 * @category CLI
 */

import { seedPosts } from '../../runtime/seed';
import { PGliteStorageDriver } from '../../storage/drivers/pglite';
import type { CLIOptions } from '../args';

/** Posts created when --count is not given */
export const DEFAULT_SEED_COUNT = 10;

/**
 * Insert fake posts into the database at --data-dir.
 *
 * @returns Number of posts inserted
 * @throws Error when --data-dir is missing or a number flag is invalid
 */
export async function seed(options: CLIOptions): Promise<number> {
  if (!options.dataDir) {
    throw new Error('seed requires --data-dir <dir>');
  }

  const count = options.count === undefined ? DEFAULT_SEED_COUNT : parseInteger('--count', options.count);
  const fakerSeed =
    options.fakerSeed === undefined ? undefined : parseInteger('--faker-seed', options.fakerSeed);

  const store = new PGliteStorageDriver({ dataDir: options.dataDir });
  await store.initialize();

  try {
    const posts = await seedPosts(store, count, { fakerSeed });
    const total = await store.count();
    console.log(`✓ Seeded ${posts.length} posts into ${options.dataDir} (${total} total)`);
    return posts.length;
  } finally {
    await store.close();
  }
}

function parseInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new Error(`${flag} must be a non-negative integer, got '${value}'`);
  }
  return parsed;
}
