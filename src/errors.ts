/**
 * Error taxonomy for romdex
 *
 * Hashing and persistence errors propagate to the caller. Parse errors are
 * raised per signature file and caught by the build pipeline, which logs them
 * and moves on to the next file.
 */

export class RomdexError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Open or read failure on a plain file
 */
export class IOError extends RomdexError {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class FileOpenError extends IOError {}

/**
 * Base class for zip archive failures
 */
export class ArchiveError extends RomdexError {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ArchiveOpenError extends ArchiveError {}

export class EmptyArchiveError extends ArchiveError {}

export class EntryOpenError extends ArchiveError {
  constructor(
    message: string,
    path: string,
    readonly entryName: string,
    options?: { cause?: unknown }
  ) {
    super(message, path, options);
  }
}

/**
 * A signature file (or a block inside one) could not be parsed
 */
export class ParseError extends RomdexError {
  constructor(
    message: string,
    readonly source?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class StoreUninitializedError extends RomdexError {
  constructor() {
    super('Catalog store is not open. Call open() first.');
  }
}

/**
 * A bulk insert failed and its transaction was rolled back
 */
export class PersistenceError extends RomdexError {}

export class UnsupportedQueryError extends RomdexError {}

export class ConfigError extends RomdexError {}

/**
 * Bad command-line arguments
 */
export class UsageError extends RomdexError {}

/**
 * Human-readable message for an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
