// Catalog table layouts, one per grammar profile
import type BetterSqlite3 from 'better-sqlite3';
import type { GrammarProfile } from './types.js';

const SCHEMAS: Record<GrammarProfile, string> = {
  filename: `
    CREATE TABLE IF NOT EXISTS games (
      name TEXT NOT NULL,
      filename TEXT NOT NULL,
      platform TEXT NOT NULL,
      hash TEXT,
      UNIQUE(filename, hash)
    );

    CREATE INDEX IF NOT EXISTS idx_hash ON games(hash);
    CREATE INDEX IF NOT EXISTS idx_filename ON games(filename COLLATE NOCASE);
  `,
  'name-platform': `
    CREATE TABLE IF NOT EXISTS games (
      name TEXT NOT NULL,
      platform TEXT NOT NULL,
      hash TEXT,
      UNIQUE(name, platform, hash)
    );

    CREATE INDEX IF NOT EXISTS idx_hash ON games(hash);
  `,
};

export function schemaFor(profile: GrammarProfile): string {
  return SCHEMAS[profile];
}

export function applySchema(db: BetterSqlite3.Database, profile: GrammarProfile): void {
  db.exec(schemaFor(profile));
}
