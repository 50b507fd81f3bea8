/**
 * Type definitions for romdex
 */

/**
 * Which uniqueness convention a catalog uses.
 *
 * - `filename`: records keep the ROM filename; unique on (filename, hash)
 * - `name-platform`: records carry no filename; unique on (name, platform, hash)
 */
export type GrammarProfile = 'filename' | 'name-platform';

export const GRAMMAR_PROFILES: readonly GrammarProfile[] = ['filename', 'name-platform'];

/**
 * Canonical catalog entry
 */
export interface GameRecord {
  /** Display title */
  name: string;

  /** ROM filename as declared by the signature source (empty when unknown) */
  filename: string;

  /** Platform/system name */
  platform: string;

  /** Lowercase hex SHA-1, or empty when the source carried no digest */
  hash: string;
}

/**
 * ROM entry of a JSON signature export
 */
export interface RomDescriptor {
  name: string;
  size: number;
  crc: string;
  md5: string;
  sha1: string;
  sha256: string;
}

/**
 * One title of a JSON signature export, bound to a single platform
 */
export interface GameData {
  name: string;
  filename: string;
  platform: string;
  roms: RomDescriptor[];
}

/**
 * Result of identifying a candidate ROM file against the catalog
 */
export interface IdentifyResult {
  record: GameRecord;
  matchedBy: 'hash' | 'filename';
  /** Fingerprint computed for the candidate file */
  hash: string;
}
