/**
 * Storage Module - Post persistence behind one interface
 *
 * The handlers depend only on StorageDriver; which backend sits behind
 * it is chosen at startup:
 *   - MemoryStorageDriver: JS Map, lost on exit
 *   - PGliteStorageDriver: PostgreSQL table via PGlite, optionally on disk
 *
 * @module storage
 * @category Storage
 *
 * @example
 * ```typescript
 * import { createStorageDriver } from 'posts-api';
 *
 * const store = createStorageDriver('pglite', { dataDir: './data' });
 * await store.initialize();
 * ```
 */

import { MemoryStorageDriver, PGliteStorageDriver } from './drivers';
import type { PGliteStorageDriverConfig } from './drivers';
import type { StorageDriver } from './types';

// Types
export type { StorageDriver, StorageDriverConfig } from './types';

// Drivers
export { MemoryStorageDriver, PGliteStorageDriver, POSTS_TABLE_SQL } from './drivers';
export type { PGliteStorageDriverConfig } from './drivers';

/**
 * Names of the bundled storage drivers.
 */
export type StorageDriverKind = 'memory' | 'pglite';

/**
 * Create a storage driver by name. The driver still needs initialize().
 */
export function createStorageDriver(
  kind: StorageDriverKind,
  config?: PGliteStorageDriverConfig
): StorageDriver {
  switch (kind) {
    case 'memory':
      return new MemoryStorageDriver({ debug: config?.debug });
    case 'pglite':
      return new PGliteStorageDriver(config);
  }
}
