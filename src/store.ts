/**
 * SQLite-backed catalog of game records
 *
 * The store is an explicit handle: open it, use it, close it. Prefer
 * `withCatalogStore`, which closes the handle on every exit path.
 */

import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import {
  ConfigError,
  PersistenceError,
  StoreUninitializedError,
  UnsupportedQueryError,
  describeError,
} from './errors.js';
import { getLogger } from './logger.js';
import type { Logger } from './logger.js';
import { applySchema } from './schema.js';
import type { GameRecord, GrammarProfile } from './types.js';

export interface CatalogStoreOptions {
  /** Database file path (':memory:' for a private in-memory catalog) */
  path: string;

  profile: GrammarProfile;

  /** Fail instead of creating an empty catalog when the file is missing */
  mustExist?: boolean;

  logger?: Logger;
}

interface GameRow {
  name: string;
  filename: string;
  platform: string;
  hash: string | null;
}

const INSERT_SQL: Record<GrammarProfile, string> = {
  filename: 'INSERT OR IGNORE INTO games (name, filename, platform, hash) VALUES (?, ?, ?, ?)',
  'name-platform': 'INSERT OR IGNORE INTO games (name, platform, hash) VALUES (?, ?, ?)',
};

function rowToRecord(row: GameRow): GameRecord {
  return {
    name: row.name,
    filename: row.filename,
    platform: row.platform,
    hash: row.hash ?? '',
  };
}

export class CatalogStore {
  readonly path: string;
  readonly profile: GrammarProfile;
  private mustExist: boolean;
  private log: Logger;
  private db: BetterSqlite3.Database | null = null;

  constructor(options: CatalogStoreOptions) {
    this.path = options.path;
    this.profile = options.profile;
    this.mustExist = options.mustExist ?? false;
    this.log = options.logger ?? getLogger({ module: 'CatalogStore' });
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * Open the database and create the profile's table when missing
   */
  open(): this {
    if (this.db) {
      return this;
    }

    let db: BetterSqlite3.Database;
    try {
      db = new Database(this.path, { fileMustExist: this.mustExist });
    } catch (error) {
      throw new PersistenceError(`Failed to open catalog ${this.path}: ${describeError(error)}`, {
        cause: error,
      });
    }

    try {
      this.checkProfile(db);
      applySchema(db, this.profile);
    } catch (error) {
      db.close();
      if (error instanceof ConfigError) {
        throw error;
      }
      throw new PersistenceError(`Failed to prepare catalog ${this.path}: ${describeError(error)}`, {
        cause: error,
      });
    }

    this.db = db;
    this.log.debug({ path: this.path, profile: this.profile }, 'Catalog opened');
    return this;
  }

  // An existing table must have the columns of the requested profile
  private checkProfile(db: BetterSqlite3.Database): void {
    const columns = db.prepare<[], { name: string }>('PRAGMA table_info(games)').all();
    if (columns.length === 0) {
      return;
    }
    const hasFilename = columns.some(column => column.name === 'filename');
    if (hasFilename !== (this.profile === 'filename')) {
      throw new ConfigError(`Catalog ${this.path} was not built with the '${this.profile}' profile`);
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private requireOpen(): BetterSqlite3.Database {
    if (!this.db) {
      throw new StoreUninitializedError();
    }
    return this.db;
  }

  /**
   * Insert records in a single transaction. Records whose uniqueness key is
   * already present are skipped. Any other failure rolls the whole batch back.
   *
   * @returns Number of rows actually inserted
   */
  bulkInsert(records: readonly GameRecord[]): number {
    const db = this.requireOpen();

    try {
      const insert = db.prepare<unknown[]>(INSERT_SQL[this.profile]);

      const run = db.transaction((batch: readonly GameRecord[]): number => {
        let inserted = 0;
        for (const record of batch) {
          inserted += insert.run(...this.insertParams(record)).changes;
        }
        return inserted;
      });

      const inserted = run(records);
      this.log.debug({ received: records.length, inserted }, 'Inserted games');
      return inserted;
    } catch (error) {
      throw new PersistenceError(
        `Failed to insert ${records.length} games: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Find a game by content hash (case-insensitive). An empty hash never matches.
   */
  lookupByHash(hash: string): GameRecord | null {
    const db = this.requireOpen();
    const normalized = hash.toLowerCase();
    if (normalized.length === 0) {
      return null;
    }

    const row = db
      .prepare<[string], GameRow>(
        `SELECT name, ${this.filenameColumn()} AS filename, platform, hash
         FROM games WHERE hash = ? ORDER BY rowid LIMIT 1`
      )
      .get(normalized);

    return row ? rowToRecord(row) : null;
  }

  /**
   * Find a game by ROM filename (case-insensitive)
   */
  lookupByFilename(filename: string): GameRecord | null {
    const db = this.requireOpen();
    if (this.profile !== 'filename') {
      throw new UnsupportedQueryError(
        `Filename lookups need a catalog built with the 'filename' profile`
      );
    }

    const row = db
      .prepare<[string], GameRow>(
        `SELECT name, filename, platform, hash
         FROM games WHERE filename = ? COLLATE NOCASE ORDER BY rowid LIMIT 1`
      )
      .get(filename);

    return row ? rowToRecord(row) : null;
  }

  count(): number {
    const db = this.requireOpen();
    const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM games').get();
    return row?.count ?? 0;
  }

  private insertParams(record: GameRecord): unknown[] {
    const hash = record.hash.toLowerCase();
    return this.profile === 'filename'
      ? [record.name, record.filename, record.platform, hash]
      : [record.name, record.platform, hash];
  }

  private filenameColumn(): string {
    return this.profile === 'filename' ? 'filename' : "''";
  }
}

/**
 * Open a store, run `fn` with it, and close it whatever the outcome
 */
export async function withCatalogStore<T>(
  options: CatalogStoreOptions,
  fn: (store: CatalogStore) => T | Promise<T>
): Promise<T> {
  const store = new CatalogStore(options).open();
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}
