/**
 * Archive utilities for ROM files
 * Reads ZIP archives with fflate's streaming unzipper; only the first entry is
 * ever decompressed, and never held in memory as a whole
 */

import { Unzip, UnzipInflate } from 'fflate';

export const ARCHIVE_EXTENSIONS = ['.zip'];

/**
 * Check if a file is a ZIP archive by checking the magic bytes
 */
export function isZipArchive(data: Uint8Array): boolean {
  // ZIP files start with PK (0x50 0x4B)
  return data.length >= 4 && data[0] === 0x50 && data[1] === 0x4B;
}

/**
 * Check if filename suggests it's an archive file
 */
export function isArchiveFilename(filename?: string): boolean {
  if (!filename) return false;

  const lowerFilename = filename.toLowerCase();
  return ARCHIVE_EXTENSIONS.some(ext => lowerFilename.endsWith(ext));
}

/**
 * The first entry was found but its data could not be decompressed
 */
export class ZipEntryError extends Error {
  constructor(
    readonly entryName: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to decompress zip entry ${entryName}`, options);
    this.name = 'ZipEntryError';
  }
}

interface FirstEntryState {
  name: string | null;
  done: boolean;
  failure?: unknown;
}

/**
 * Stream the decompressed bytes of the first entry of a ZIP archive into
 * `onData`. Entries are taken in the order their local headers appear
 * (directories are not skipped); later entries are never decompressed.
 *
 * Throws a plain `Error` when the data is not a ZIP archive, and a
 * `ZipEntryError` when the first entry cannot be decompressed.
 *
 * @returns Name of the first entry, or null for an archive without entries
 *
 * @example
 * ```typescript
 * const hash = createHash('sha1');
 * const name = await streamFirstZipEntry(createReadStream('game.zip'), chunk => hash.update(chunk));
 * ```
 */
export async function streamFirstZipEntry(
  source: AsyncIterable<Uint8Array>,
  onData: (chunk: Uint8Array) => void
): Promise<string | null> {
  const state: FirstEntryState = { name: null, done: false };

  const unzip = new Unzip((file) => {
    if (state.name !== null) {
      return;
    }
    state.name = file.name;
    file.ondata = (error, chunk, final) => {
      if (error) {
        state.failure = error;
        return;
      }
      onData(chunk);
      if (final) {
        state.done = true;
      }
    };
    file.start();
  });
  unzip.register(UnzipInflate);

  const push = (chunk: Uint8Array, final: boolean): void => {
    try {
      unzip.push(chunk, final);
    } catch (error) {
      if (state.name === null) {
        throw error;
      }
      state.failure = error;
    }
    if (state.name !== null && state.failure !== undefined) {
      throw new ZipEntryError(state.name, { cause: state.failure });
    }
  };

  let signatureChecked = false;
  for await (const chunk of source) {
    if (!signatureChecked) {
      if (!isZipArchive(chunk)) {
        throw new Error('Not a ZIP archive');
      }
      signatureChecked = true;
    }
    push(chunk, false);
    if (state.done) {
      return state.name;
    }
  }

  if (!signatureChecked) {
    throw new Error('Not a ZIP archive');
  }
  push(new Uint8Array(0), true);

  if (state.name !== null && !state.done) {
    throw new ZipEntryError(state.name, { cause: new Error('Entry data ended early') });
  }
  return state.name;
}
