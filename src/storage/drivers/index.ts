/**
 * Storage Drivers - Available post storage implementations
 *
 * @module storage/drivers
 * @category Storage
 */

export { MemoryStorageDriver } from './memory';
export { PGliteStorageDriver, POSTS_TABLE_SQL } from './pglite';
export type { PGliteStorageDriverConfig } from './pglite';
