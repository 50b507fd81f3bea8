/**
 * Main Romdex class: build the catalog and identify ROM files against it
 */

import { basename } from 'node:path';
import { buildCatalog } from './catalog.js';
import type { BuildSummary } from './catalog.js';
import { loadConfig } from './config.js';
import type { RomdexConfig } from './config.js';
import { fingerprint } from './hash.js';
import { getLogger } from './logger.js';
import type { Logger } from './logger.js';
import { withCatalogStore } from './store.js';
import type { CatalogStore } from './store.js';
import type { GameRecord, IdentifyResult } from './types.js';

/**
 * Identify a file against an open store: by fingerprint first, then (when the
 * catalog keeps filenames) by the file's base name.
 */
export async function identifyFile(store: CatalogStore, path: string): Promise<IdentifyResult | null> {
  const hash = await fingerprint(path);

  const byHash = store.lookupByHash(hash);
  if (byHash) {
    return { record: byHash, matchedBy: 'hash', hash };
  }

  if (store.profile === 'filename') {
    const byFilename = store.lookupByFilename(basename(path));
    if (byFilename) {
      return { record: byFilename, matchedBy: 'filename', hash };
    }
  }

  return null;
}

/**
 * Romdex - build a ROM catalog and identify ROM files
 *
 * @example
 * ```typescript
 * const romdex = new Romdex({ databasePath: 'catalog.sqlite' });
 *
 * // Rebuild from a local checkout of the signature corpus
 * await romdex.build('./libretro-database');
 *
 * // Identify a ROM (zip archives are read through their first entry)
 * const result = await romdex.identify('roms/Super Game.zip');
 * console.log(result?.record.name, result?.record.platform);
 * ```
 */
export class Romdex {
  readonly config: RomdexConfig;
  private log: Logger;

  constructor(config: Partial<RomdexConfig> = {}, logger?: Logger) {
    this.config = loadConfig(config);
    this.log = logger ?? getLogger({ module: 'Romdex' });
  }

  /**
   * Rebuild the catalog from the signature corpus under `corpusRoot`
   */
  async build(corpusRoot: string): Promise<BuildSummary> {
    return buildCatalog({
      corpusRoot,
      signatureDirs: this.config.signatureDirs,
      databasePath: this.config.databasePath,
      profile: this.config.profile,
      logger: this.log,
    });
  }

  /**
   * Calculate the catalog fingerprint of a file without looking it up
   */
  async hash(path: string): Promise<string> {
    return fingerprint(path);
  }

  /**
   * Identify a ROM file
   *
   * @returns The matching record, or null if the catalog has no match
   */
  async identify(path: string): Promise<IdentifyResult | null> {
    const result = await this.withStore(store => identifyFile(store, path));
    if (result) {
      this.log.debug({ path, matchedBy: result.matchedBy, name: result.record.name }, 'Identified ROM');
    } else {
      this.log.debug({ path }, 'No catalog match');
    }
    return result;
  }

  async lookupByHash(hash: string): Promise<GameRecord | null> {
    return this.withStore(store => store.lookupByHash(hash));
  }

  async lookupByFilename(filename: string): Promise<GameRecord | null> {
    return this.withStore(store => store.lookupByFilename(filename));
  }

  private withStore<T>(fn: (store: CatalogStore) => T | Promise<T>): Promise<T> {
    return withCatalogStore(
      {
        path: this.config.databasePath,
        profile: this.config.profile,
        mustExist: true,
        logger: this.log,
      },
      fn
    );
  }
}
