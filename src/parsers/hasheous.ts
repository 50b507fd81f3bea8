/**
 * Parser for Hasheous JSON signature exports
 * https://github.com/Hasheous/Hasheous
 *
 * One document describes one title: its signature descriptors (one per
 * platform/year variant) and a generic attribute list, of which the `ROMs`
 * attribute carries the ROM digests.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { dedupRoms } from '../dedup.js';
import { IOError, ParseError, describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { GameData, GameRecord, RomDescriptor } from '../types.js';
import { platformFromFilename, stripExtension } from './platform.js';
import { decodeContent } from './types.js';
import type { SignatureParser } from './types.js';

// A field of the wrong type is treated as absent instead of failing the document
const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().optional().catch(undefined);

const RomDescriptorSchema = z.object({
  Name: optionalString,
  Size: optionalNumber,
  Crc: optionalString,
  Md5: optionalString,
  Sha1: optionalString,
  Sha256: optionalString,
});

type RawRomDescriptor = z.infer<typeof RomDescriptorSchema>;

/**
 * The `ROMs` attribute holds either a list of descriptors or a single one
 */
const RomsValueSchema = z.union([
  z
    .array(RomDescriptorSchema.nullable().catch(null))
    .transform(items => ({
      kind: 'list' as const,
      items: items.filter((item): item is RawRomDescriptor => item !== null),
    })),
  RomDescriptorSchema.transform(item => ({ kind: 'single' as const, item })),
]);

type RomsValue = z.infer<typeof RomsValueSchema>;

const SignatureDataObjectSchema = z.object({
  Name: optionalString,
  Year: optionalString,
  Platform: optionalString,
});

const AttributeSchema = z.object({
  attributeName: optionalString,
  Value: z.unknown(),
});

export const SignatureDocumentSchema = z.object({
  Id: optionalNumber,
  ObjectType: optionalString,
  Name: optionalString,
  SignatureDataObjects: z.array(SignatureDataObjectSchema).catch([]),
  Attributes: z.array(AttributeSchema).catch([]),
});

export type SignatureDocument = z.infer<typeof SignatureDocumentSchema>;

function romsFromValue(value: RomsValue): RawRomDescriptor[] {
  return value.kind === 'list' ? value.items : [value.item];
}

function toRomDescriptor(raw: RawRomDescriptor): RomDescriptor {
  return {
    name: raw.Name ?? '',
    size: raw.Size !== undefined && Number.isFinite(raw.Size) ? Math.trunc(raw.Size) : 0,
    crc: raw.Crc ?? '',
    md5: raw.Md5 ?? '',
    sha1: raw.Sha1 ?? '',
    sha256: raw.Sha256 ?? '',
  };
}

function hasDigest(rom: RomDescriptor): boolean {
  return rom.crc !== '' || rom.md5 !== '' || rom.sha1 !== '' || rom.sha256 !== '';
}

/**
 * Distinct non-empty platforms in declaration order
 */
function platformsOf(document: SignatureDocument): string[] {
  const platforms = new Set<string>();
  for (const signature of document.SignatureDataObjects) {
    if (signature.Platform) {
      platforms.add(signature.Platform);
    }
  }
  return Array.from(platforms);
}

/**
 * Turn a decoded JSON document into one GameData per distinct platform
 *
 * @param json - Decoded document
 * @param sourceName - Path or name of the document; its base name without
 *   extension becomes the filename of every entry
 * @param platformHint - Platform used when no signature declares one
 */
export function processDocument(json: unknown, sourceName: string, platformHint: string): GameData[] {
  const parsed = SignatureDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(`${sourceName} is not a signature document`, sourceName, {
      cause: parsed.error,
    });
  }

  const document = parsed.data;
  const name = document.Name ?? '';
  if (name.trim().length === 0) {
    throw new ParseError(`${sourceName} has no title`, sourceName);
  }

  const roms: RomDescriptor[] = [];
  for (const attribute of document.Attributes) {
    if (attribute.attributeName !== 'ROMs') {
      continue;
    }
    const value = RomsValueSchema.safeParse(attribute.Value);
    if (!value.success) {
      continue;
    }
    for (const raw of romsFromValue(value.data)) {
      const rom = toRomDescriptor(raw);
      if (hasDigest(rom)) {
        roms.push(rom);
      }
    }
  }

  const uniqueRoms = dedupRoms(roms);
  const filename = sourceName ? stripExtension(basename(sourceName)) : '';
  const platforms = platformsOf(document);
  if (platforms.length === 0) {
    platforms.push(platformHint);
  }

  return platforms.map(platform => ({
    name,
    filename,
    platform,
    roms: uniqueRoms,
  }));
}

/**
 * Flatten GameData to catalog records, one per ROM, keyed on the SHA-1
 */
export function toGameRecords(games: readonly GameData[]): GameRecord[] {
  const records: GameRecord[] = [];
  for (const game of games) {
    for (const rom of game.roms) {
      records.push({
        name: game.name,
        filename: game.filename,
        platform: game.platform,
        hash: rom.sha1.toLowerCase(),
      });
    }
  }
  return records;
}

export interface HasheousParserOptions {
  logger?: Logger;
}

/**
 * JSON signature export parser
 */
export class HasheousParser implements SignatureParser {
  readonly format = 'json';
  private logger?: Logger;

  constructor(options: HasheousParserOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * Parse one document into GameData entries
   */
  parseGames(content: string | Uint8Array, platformHint: string, sourceName = ''): GameData[] {
    let json: unknown;
    try {
      json = JSON.parse(decodeContent(content));
    } catch (error) {
      throw new ParseError(
        `Error parsing JSON in ${sourceName || 'document'}: ${describeError(error)}`,
        sourceName,
        { cause: error }
      );
    }

    const games = processDocument(json, sourceName, platformHint);
    this.logger?.debug(
      { source: sourceName, games: games.length, roms: games[0]?.roms.length ?? 0 },
      'Parsed signature document'
    );
    return games;
  }

  parse(content: string | Uint8Array, platformHint: string, sourceName = ''): GameRecord[] {
    return toGameRecords(this.parseGames(content, platformHint, sourceName));
  }

  /**
   * Read and parse a single JSON signature file
   */
  async processFile(path: string): Promise<GameData[]> {
    let content: Buffer;
    try {
      content = await readFile(path);
    } catch (error) {
      throw new IOError(`Error reading file ${path}`, path, { cause: error });
    }
    return this.parseGames(content, platformFromFilename(path), path);
  }
}
