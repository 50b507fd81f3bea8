/**
 * Catalog build pipeline
 *
 * signature files -> parser -> records -> dedup -> CatalogStore.bulkInsert
 *
 * Files are parsed one at a time in path order so that a rebuild from the
 * same corpus always inserts the same rows in the same order.
 */

import { readdir, readFile, rm } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { dedup, mergeAcrossBatches } from './dedup.js';
import { IOError, RomdexError, describeError } from './errors.js';
import { getLogger } from './logger.js';
import type { Logger } from './logger.js';
import { DatParser } from './parsers/dat.js';
import { HasheousParser, toGameRecords } from './parsers/hasheous.js';
import { platformFromFilename } from './parsers/platform.js';
import type { SignatureFormat } from './parsers/types.js';
import { withCatalogStore } from './store.js';
import type { GameData, GameRecord, GrammarProfile } from './types.js';

const SIGNATURE_EXTENSIONS: Record<string, SignatureFormat> = {
  '.dat': 'dat',
  '.json': 'json',
};

export function signatureFormatOf(path: string): SignatureFormat | undefined {
  return SIGNATURE_EXTENSIONS[extname(path).toLowerCase()];
}

async function walk(dir: string, found: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(path, found);
    } else if (entry.isFile() && signatureFormatOf(entry.name)) {
      found.push(path);
    }
  }
}

/**
 * Find every `.dat` and `.json` file under the given subdirectories of the
 * corpus root, sorted by path
 */
export async function discoverSignatureFiles(corpusRoot: string, signatureDirs: string[]): Promise<string[]> {
  const files: string[] = [];

  for (const signatureDir of signatureDirs) {
    const dir = join(corpusRoot, signatureDir);
    try {
      await walk(dir, files);
    } catch (error) {
      throw new IOError(`Signature directory ${signatureDir} could not be read`, dir, { cause: error });
    }
  }

  return files.sort();
}

export type ParsedSignatureFile =
  | { format: 'dat'; path: string; records: GameRecord[] }
  | { format: 'json'; path: string; games: GameData[] };

/**
 * Parse one signature file with the parser its extension selects
 */
export async function parseSignatureFile(
  path: string,
  profile: GrammarProfile,
  logger: Logger = getLogger({ module: 'SignatureParser' })
): Promise<ParsedSignatureFile> {
  const format = signatureFormatOf(path);
  if (!format) {
    throw new IOError(`Not a signature file: ${path}`, path);
  }

  let content: Buffer;
  try {
    content = await readFile(path);
  } catch (error) {
    throw new IOError(`Failed to read ${path}`, path, { cause: error });
  }

  const platform = platformFromFilename(path);
  if (format === 'dat') {
    const parser = new DatParser({ profile, logger });
    return { format, path, records: parser.parse(content, platform, path) };
  }

  const parser = new HasheousParser({ logger });
  return { format, path, games: parser.parseGames(content, platform, path) };
}

/**
 * Group records per platform, keeping the order in which platforms first appear
 */
export function groupByPlatform(records: readonly GameRecord[]): Map<string, GameRecord[]> {
  const groups = new Map<string, GameRecord[]>();
  for (const record of records) {
    const group = groups.get(record.platform);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.platform, [record]);
    }
  }
  return groups;
}

export interface BuildCatalogOptions {
  /** Directory holding the signature corpus */
  corpusRoot: string;

  /** Subdirectories of the corpus root to scan */
  signatureDirs: string[];

  databasePath: string;

  profile: GrammarProfile;

  logger?: Logger;
}

export interface BuildSummary {
  filesParsed: number;
  filesFailed: number;
  recordsParsed: number;
  recordsInserted: number;
  platforms: number;
}

/**
 * Rebuild the catalog from scratch out of the signature corpus
 */
export async function buildCatalog(options: BuildCatalogOptions): Promise<BuildSummary> {
  const log = options.logger ?? getLogger({ module: 'CatalogBuilder' });
  const files = await discoverSignatureFiles(options.corpusRoot, options.signatureDirs);
  log.info({ files: files.length }, 'Found signature files');

  const datRecords: GameRecord[] = [];
  const jsonGames: GameData[] = [];
  let filesParsed = 0;
  let filesFailed = 0;

  for (const path of files) {
    let parsed: ParsedSignatureFile;
    try {
      parsed = await parseSignatureFile(path, options.profile, log);
    } catch (error) {
      if (!(error instanceof RomdexError)) {
        throw error;
      }
      filesFailed++;
      log.warn({ path, err: describeError(error) }, 'Skipping signature file');
      continue;
    }

    filesParsed++;
    if (parsed.format === 'dat') {
      datRecords.push(...parsed.records);
      log.info({ path, games: parsed.records.length }, 'Parsed DAT file');
    } else {
      jsonGames.push(...parsed.games);
      log.debug({ path, games: parsed.games.length }, 'Parsed signature document');
    }
  }

  const allRecords = [...datRecords, ...toGameRecords(mergeAcrossBatches(jsonGames))];
  const groups = groupByPlatform(allRecords);
  const ordered: GameRecord[] = [];
  for (const [platform, records] of groups) {
    log.info({ platform, games: records.length }, 'Queued games for platform');
    ordered.push(...records);
  }
  const unique = dedup(ordered, options.profile);

  await rm(options.databasePath, { force: true });
  const recordsInserted = await withCatalogStore(
    { path: options.databasePath, profile: options.profile, logger: log },
    (store) => store.bulkInsert(unique)
  );

  const summary: BuildSummary = {
    filesParsed,
    filesFailed,
    recordsParsed: allRecords.length,
    recordsInserted,
    platforms: groups.size,
  };
  log.info(summary, 'Catalog built');
  return summary;
}
