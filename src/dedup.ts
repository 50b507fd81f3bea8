/**
 * Content-keyed deduplication. Every function here is stable: the first
 * occurrence of a key wins and output keeps the order of first appearance.
 */

import type { GameData, GameRecord, GrammarProfile, RomDescriptor } from './types.js';

export function uniqueBy<T>(items: readonly T[], keyOf: (item: T) => string): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const item of items) {
    const key = keyOf(item);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(item);
    }
  }

  return unique;
}

// Values may contain any character, including ':'
function tupleKey(...parts: string[]): string {
  return JSON.stringify(parts);
}

/**
 * Collapse the ROM list of one parsed file on all four digest fields
 */
export function dedupRoms(roms: readonly RomDescriptor[]): RomDescriptor[] {
  return uniqueBy(roms, rom => tupleKey(rom.crc, rom.md5, rom.sha1, rom.sha256));
}

/**
 * Collapse games combined from several source files on (name, filename, platform)
 */
export function mergeAcrossBatches(games: readonly GameData[]): GameData[] {
  return uniqueBy(games, game => tupleKey(game.name, game.filename, game.platform));
}

/**
 * Key a record the same way the catalog's unique constraint does
 */
export function recordKey(record: GameRecord, profile: GrammarProfile): string {
  const hash = record.hash.toLowerCase();
  return profile === 'filename'
    ? tupleKey(record.filename, hash)
    : tupleKey(record.name, record.platform, hash);
}

export function dedup(records: readonly GameRecord[], profile: GrammarProfile): GameRecord[] {
  return uniqueBy(records, record => recordKey(record, profile));
}
