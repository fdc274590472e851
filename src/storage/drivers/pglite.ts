/**
 * PGliteStorageDriver - Relational post storage on PGlite
 *
 * Stores posts in a PostgreSQL `posts` table running in-process through
 * PGlite (WASM). Without a data directory the database is in-memory;
 * with one it persists to disk between runs.
 *
 * @module storage/drivers/pglite
 * @category Storage
 */

import { PGlite } from '@electric-sql/pglite';
import type { Post, PostInput } from '../../schema/post';
import { filterConditions, type PostFilter } from '../../query/filter';
import type { StorageDriver, StorageDriverConfig } from '../types';

/**
 * Configuration for the PGlite driver.
 */
export interface PGliteStorageDriverConfig extends StorageDriverConfig {
  /** Directory for on-disk persistence (default: in-memory) */
  dataDir?: string;
}

/**
 * Table definition. SERIAL gives each row an id from a sequence that
 * only moves forward.
 */
export const POSTS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS posts (
  id SERIAL PRIMARY KEY,
  title TEXT NOT NULL,
  body TEXT NOT NULL
);
`;

const POST_COLUMNS = 'id, title, body';

/**
 * Relational storage driver backed by PGlite.
 *
 * @example
 * ```typescript
 * const driver = new PGliteStorageDriver({ dataDir: './data/posts' });
 * await driver.initialize();
 *
 * const post = await driver.insert({ title: 'Hello', body: 'World' });
 * const posts = await driver.list({ bodyLike: 'Wor' });
 * ```
 */
export class PGliteStorageDriver implements StorageDriver {
  readonly name = 'pglite';

  /** Open database, set by initialize() */
  private db: PGlite | null = null;

  /** Configuration options */
  private config: PGliteStorageDriverConfig;

  constructor(config?: PGliteStorageDriverConfig) {
    this.config = config || {};
  }

  async initialize(): Promise<void> {
    if (this.db) {
      return;
    }

    this.db = this.config.dataDir ? new PGlite(this.config.dataDir) : new PGlite();
    await this.db.exec(POSTS_TABLE_SQL);

    if (this.config.debug) {
      console.log(
        `[PGliteStorageDriver] Initialized (${this.config.dataDir ?? 'in-memory'})`
      );
    }
  }

  async insert(input: PostInput): Promise<Post> {
    const result = await this.connection().query<Post>(
      `INSERT INTO posts (title, body) VALUES ($1, $2) RETURNING ${POST_COLUMNS}`,
      [input.title, input.body]
    );

    const post = result.rows[0];
    if (!post) {
      throw new Error('Insert into posts returned no row');
    }

    if (this.config.debug) {
      console.log('[PGliteStorageDriver] Inserted post:', post.id);
    }

    return post;
  }

  async get(id: number): Promise<Post | null> {
    const result = await this.connection().query<Post>(
      `SELECT ${POST_COLUMNS} FROM posts WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async list(filter?: PostFilter): Promise<Post[]> {
    const conditions = filterConditions(filter ?? {});
    const where = conditions.length
      ? ` WHERE ${conditions.map(([column], i) => `${column} LIKE $${i + 1}`).join(' AND ')}`
      : '';

    const result = await this.connection().query<Post>(
      `SELECT ${POST_COLUMNS} FROM posts${where} ORDER BY id ASC`,
      conditions.map(([, pattern]) => pattern)
    );
    return result.rows;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.connection().query<{ id: number }>(
      'DELETE FROM posts WHERE id = $1 RETURNING id',
      [id]
    );
    const deleted = result.rows.length > 0;

    if (this.config.debug && deleted) {
      console.log('[PGliteStorageDriver] Deleted post:', id);
    }

    return deleted;
  }

  async count(): Promise<number> {
    const result = await this.connection().query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM posts'
    );
    return result.rows[0]?.count ?? 0;
  }

  async reset(): Promise<void> {
    await this.connection().exec('TRUNCATE posts RESTART IDENTITY');

    if (this.config.debug) {
      console.log('[PGliteStorageDriver] Reset all data');
    }
  }

  async close(): Promise<void> {
    if (!this.db) {
      return;
    }
    await this.db.close();
    this.db = null;
  }

  /**
   * Get the open database.
   *
   * @throws If initialize() has not completed
   */
  private connection(): PGlite {
    if (!this.db) {
      throw new Error('PGliteStorageDriver not initialized. Call initialize() first.');
    }
    return this.db;
  }
}
