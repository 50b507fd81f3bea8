import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  ArchiveError,
  ArchiveOpenError,
  EmptyArchiveError,
  EntryOpenError,
  FileOpenError,
  IOError,
  ParseError,
  RomdexError,
  StoreUninitializedError,
  describeError,
} from './errors.js';

describe('errors', () => {
  it('should name errors after their class', () => {
    assert.strictEqual(new FileOpenError('boom', 'a.bin').name, 'FileOpenError');
    assert.strictEqual(new StoreUninitializedError().name, 'StoreUninitializedError');
  });

  it('should keep the taxonomy', () => {
    const error = new EntryOpenError('bad entry', 'a.zip', 'game.bin');

    assert.ok(error instanceof ArchiveError);
    assert.ok(error instanceof RomdexError);
    assert.ok(error instanceof Error);
    assert.ok(!(new ArchiveOpenError('x', 'a.zip') instanceof IOError));
    assert.ok(new EmptyArchiveError('x', 'a.zip') instanceof ArchiveError);
    assert.ok(new FileOpenError('x', 'a.bin') instanceof IOError);
  });

  it('should carry context fields and the cause', () => {
    const cause = new Error('inner');
    const error = new EntryOpenError('bad entry', 'a.zip', 'game.bin', { cause });

    assert.strictEqual(error.path, 'a.zip');
    assert.strictEqual(error.entryName, 'game.bin');
    assert.strictEqual(error.cause, cause);
    assert.strictEqual(new ParseError('bad', 'x.json').source, 'x.json');
    assert.strictEqual(new ParseError('bad').source, undefined);
  });

  it('should describe a store that was never opened', () => {
    assert.strictEqual(
      new StoreUninitializedError().message,
      'Catalog store is not open. Call open() first.'
    );
  });

  it('should describe unknown thrown values', () => {
    assert.strictEqual(describeError(new Error('message')), 'message');
    assert.strictEqual(describeError('text'), 'text');
    assert.strictEqual(describeError(42), '42');
  });
});
