/**
 * Hash utilities for ROM files
 *
 * The catalog keys on SHA-1. MD5 and CRC32 are available for comparison with
 * the other digest kinds carried by signature exports.
 */

import { createHash, type Hash } from 'node:crypto';
import { open, type FileHandle } from 'node:fs/promises';
import CRC32 from 'crc-32';
import { ZipEntryError, isArchiveFilename, streamFirstZipEntry } from './archive.js';
import {
  ArchiveOpenError,
  EmptyArchiveError,
  EntryOpenError,
  FileOpenError,
  IOError,
} from './errors.js';

/**
 * Hash types supported by romdex
 */
export type HashType = 'md5' | 'sha1' | 'crc32';

/**
 * Digest kind the catalog is keyed on
 */
export const CANONICAL_HASH: HashType = 'sha1';

const ALL_HASH_TYPES: HashType[] = ['md5', 'sha1', 'crc32'];

/**
 * Result of hashing a ROM file
 */
export interface HashResult {
  md5?: string;
  sha1?: string;
  crc32?: string;
}

interface Digester {
  update(chunk: Uint8Array): void;
  digest(): HashResult;
}

/**
 * Incremental digester over the requested hash types
 */
function createDigester(types: HashType[]): Digester {
  const md5 = types.includes('md5') ? createHash('md5') : undefined;
  const sha1 = types.includes('sha1') ? createHash('sha1') : undefined;
  const withCrc = types.includes('crc32');
  let crc = 0;

  const hashes: Hash[] = [md5, sha1].filter((hash): hash is Hash => hash !== undefined);

  return {
    update(chunk) {
      for (const hash of hashes) {
        hash.update(chunk);
      }
      if (withCrc) {
        crc = CRC32.buf(chunk, crc);
      }
    },
    digest() {
      const result: HashResult = {};
      if (md5) result.md5 = md5.digest('hex');
      if (sha1) result.sha1 = sha1.digest('hex');
      // Convert to unsigned 32-bit hex string
      if (withCrc) result.crc32 = (crc >>> 0).toString(16).padStart(8, '0');
      return result;
    },
  };
}

/**
 * Calculate hash(es) for in-memory ROM data
 *
 * @param data - ROM data as Uint8Array, ArrayBuffer, or Buffer
 * @param types - Hash types to calculate (defaults to all)
 * @returns Object containing requested hash values
 *
 * @example
 * ```typescript
 * const buffer = readFileSync('game.bin');
 * const hashes = calculateHash(buffer, ['md5', 'sha1']);
 * console.log(hashes); // { md5: '...', sha1: '...' }
 * ```
 */
export function calculateHash(
  data: Uint8Array | ArrayBuffer,
  types: HashType[] = ALL_HASH_TYPES
): HashResult {
  const uint8Data = data instanceof ArrayBuffer ? new Uint8Array(data) : data;
  const digester = createDigester(types);
  digester.update(uint8Data);
  return digester.digest();
}

/**
 * Calculate a single hash type
 */
export function calculateSingleHash(data: Uint8Array | ArrayBuffer, type: HashType): string {
  return calculateHash(data, [type])[type] ?? '';
}

/**
 * Hash a file from disk. A `.zip` path is hashed through its first entry
 * instead of the container bytes.
 */
export async function hashFile(path: string, types: HashType[] = ALL_HASH_TYPES): Promise<HashResult> {
  if (isArchiveFilename(path)) {
    return hashFirstArchiveEntry(path, types);
  }
  return hashPlainFile(path, types);
}

/**
 * Canonical fingerprint used as the catalog lookup key: lowercase hex SHA-1
 * of the file, or of the first entry when the file is a zip archive.
 */
export async function fingerprint(path: string): Promise<string> {
  const result = await hashFile(path, [CANONICAL_HASH]);
  return result[CANONICAL_HASH] ?? '';
}

async function hashPlainFile(path: string, types: HashType[]): Promise<HashResult> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    throw new FileOpenError(`Failed to open file ${path}`, path, { cause: error });
  }

  try {
    const digester = createDigester(types);
    try {
      for await (const chunk of handle.createReadStream({ autoClose: false })) {
        digester.update(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
    } catch (error) {
      throw new IOError(`Failed to calculate hash for ${path}`, path, { cause: error });
    }
    return digester.digest();
  } finally {
    await handle.close();
  }
}

async function hashFirstArchiveEntry(path: string, types: HashType[]): Promise<HashResult> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    throw new ArchiveOpenError(`Failed to open zip file ${path}`, path, { cause: error });
  }

  try {
    const digester = createDigester(types);
    let entryName: string | null;
    try {
      entryName = await streamFirstZipEntry(
        handle.createReadStream({ autoClose: false }),
        chunk => digester.update(chunk)
      );
    } catch (error) {
      if (error instanceof ZipEntryError) {
        throw new EntryOpenError(
          `Failed to open file ${error.entryName} within zip ${path}`,
          path,
          error.entryName,
          { cause: error }
        );
      }
      throw new ArchiveOpenError(`Failed to open zip file ${path}`, path, { cause: error });
    }

    if (entryName === null) {
      throw new EmptyArchiveError(`Zip file ${path} is empty`, path);
    }
    return digester.digest();
  } finally {
    await handle.close();
  }
}
