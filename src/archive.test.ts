import { describe, it } from 'node:test';
import assert from 'node:assert';
import { zipSync, strToU8 } from 'fflate';
import { ZipEntryError, isArchiveFilename, isZipArchive, streamFirstZipEntry } from './archive.js';

async function* chunked(data: Uint8Array, size: number): AsyncGenerator<Uint8Array> {
  for (let offset = 0; offset < data.length; offset += size) {
    yield data.subarray(offset, offset + size);
  }
}

async function readFirst(data: Uint8Array, size = 64 * 1024): Promise<{ name: string | null; text: string }> {
  const parts: Uint8Array[] = [];
  const name = await streamFirstZipEntry(chunked(data, size), chunk => {
    parts.push(chunk.slice());
  });
  return { name, text: new TextDecoder().decode(Buffer.concat(parts)) };
}

describe('Archive utilities', () => {
  describe('isArchiveFilename', () => {
    it('should recognise zip extensions regardless of case', () => {
      assert.strictEqual(isArchiveFilename('game.zip'), true);
      assert.strictEqual(isArchiveFilename('GAME.ZIP'), true);
      assert.strictEqual(isArchiveFilename('game.bin'), false);
      assert.strictEqual(isArchiveFilename('zipper.gb'), false);
      assert.strictEqual(isArchiveFilename(undefined), false);
    });
  });

  describe('isZipArchive', () => {
    it('should detect the PK signature', () => {
      assert.strictEqual(isZipArchive(zipSync({ 'a.bin': strToU8('a') })), true);
      assert.strictEqual(isZipArchive(zipSync({})), true);
      assert.strictEqual(isZipArchive(strToU8('not a zip')), false);
      assert.strictEqual(isZipArchive(new Uint8Array([0x50, 0x4b])), false);
    });
  });

  describe('streamFirstZipEntry', () => {
    it('should stream only the first entry', async () => {
      const archive = zipSync({
        'second-name-first.bin': strToU8('first bytes'),
        'another.bin': strToU8('second bytes'),
      });

      assert.deepStrictEqual(await readFirst(archive), {
        name: 'second-name-first.bin',
        text: 'first bytes',
      });
    });

    it('should reassemble an entry split across small chunks', async () => {
      const content = 'deflated rom data '.repeat(200);
      const archive = zipSync({ 'rom.bin': strToU8(content), 'extra.bin': strToU8('x') });

      assert.deepStrictEqual(await readFirst(archive, 7), { name: 'rom.bin', text: content });
    });

    it('should not skip a leading directory entry', async () => {
      const archive = zipSync({ folder: {}, 'alpha.bin': strToU8('a') });

      assert.deepStrictEqual(await readFirst(archive), { name: 'folder/', text: '' });
    });

    it('should return null for an empty archive', async () => {
      assert.deepStrictEqual(await readFirst(zipSync({})), { name: null, text: '' });
    });

    it('should reject data that is not an archive', async () => {
      await assert.rejects(readFirst(strToU8('definitely not an archive, only text')), /Not a ZIP archive/);
      await assert.rejects(readFirst(new Uint8Array(0)), /Not a ZIP archive/);
    });

    it('should report the entry name when its data cannot be decompressed', async () => {
      const archive = zipSync({ 'rom.bin': [strToU8('Hello, World!'), { level: 0 }] });
      // Compression method field of the local header
      new DataView(archive.buffer, archive.byteOffset, archive.byteLength).setUint16(8, 99, true);

      await assert.rejects(readFirst(archive), (error: unknown) => {
        assert.ok(error instanceof ZipEntryError);
        assert.strictEqual(error.entryName, 'rom.bin');
        return true;
      });
    });
  });
});
