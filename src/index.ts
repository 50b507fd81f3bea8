/**
 * romdex - ROM signature catalog
 *
 * Builds a SQLite catalog of known ROM dumps out of DAT and JSON signature
 * files, and identifies ROM files against it by SHA-1 (with a filename
 * fallback).
 *
 * @example
 * ```typescript
 * import { Romdex } from 'romdex';
 *
 * const romdex = new Romdex({ databasePath: 'catalog.sqlite', profile: 'filename' });
 * await romdex.build('./libretro-database');
 *
 * const result = await romdex.identify('roms/Tetris (World).zip');
 * if (result) {
 *   console.log(result.record.name, result.record.platform, result.matchedBy);
 * }
 * ```
 *
 * @packageDocumentation
 */

// Main class
export { Romdex, identifyFile } from './romdex.js';

// Hash utilities
export { CANONICAL_HASH, calculateHash, calculateSingleHash, fingerprint, hashFile } from './hash.js';
export type { HashType, HashResult } from './hash.js';

// Archive utilities
export { ARCHIVE_EXTENSIONS, ZipEntryError, isArchiveFilename, isZipArchive, streamFirstZipEntry } from './archive.js';

// Signature parsers
export { DatParser, extractGame, parseDatDocument, tokenizeDat } from './parsers/dat.js';
export type { DatDocument, DatEntry, DatList, DatParserOptions, DatToken } from './parsers/dat.js';
export { HasheousParser, processDocument, toGameRecords } from './parsers/hasheous.js';
export type { HasheousParserOptions } from './parsers/hasheous.js';
export { platformFromFilename } from './parsers/platform.js';
export type { SignatureFormat, SignatureParser } from './parsers/types.js';

// Deduplication
export { dedup, dedupRoms, mergeAcrossBatches, uniqueBy } from './dedup.js';

// Catalog store and build pipeline
export { CatalogStore, withCatalogStore } from './store.js';
export type { CatalogStoreOptions } from './store.js';
export { buildCatalog, discoverSignatureFiles, parseSignatureFile } from './catalog.js';
export type { BuildCatalogOptions, BuildSummary, ParsedSignatureFile } from './catalog.js';

// Configuration and logging
export { DEFAULT_CONFIG, loadConfig, parseProfile } from './config.js';
export type { RomdexConfig } from './config.js';
export { getLogger, logger } from './logger.js';
export type { Logger } from './logger.js';

// Errors
export {
  ArchiveError,
  ArchiveOpenError,
  ConfigError,
  EmptyArchiveError,
  EntryOpenError,
  FileOpenError,
  IOError,
  ParseError,
  PersistenceError,
  RomdexError,
  StoreUninitializedError,
  UnsupportedQueryError,
  UsageError,
} from './errors.js';

// Types
export { GRAMMAR_PROFILES } from './types.js';
export type { GameData, GameRecord, GrammarProfile, IdentifyResult, RomDescriptor } from './types.js';
