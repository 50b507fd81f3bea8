import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import {
  buildCatalog,
  discoverSignatureFiles,
  groupByPlatform,
  parseSignatureFile,
  signatureFormatOf,
} from './catalog.js';
import { IOError, ParseError } from './errors.js';
import { withCatalogStore } from './store.js';

const logger = pino({ level: 'silent' });

const SHA_A = 'a'.repeat(40);
const SHA_B = 'b'.repeat(40);
const SHA_C = 'c'.repeat(40);

const GAME_BOY_DAT = [
  'clrmamepro ( name "Nintendo - Game Boy" )',
  `game ( name "Alpha (World)" rom ( name "Alpha (World).gb" size 32768 sha1 ${SHA_A} ) )`,
  `game ( name "Alpha (World) [copy]" rom ( name "Alpha (World).gb" size 32768 sha1 ${SHA_A.toUpperCase()} ) )`,
  `game ( name "Beta" rom ( name beta.gb size 65536 sha1 ${SHA_B} ) )`,
].join('\n');

const SUPER_GAME_JSON = JSON.stringify({
  Id: 7,
  Name: 'Super Game',
  SignatureDataObjects: [
    { Name: 'Super Game', Platform: 'Sega Mega Drive' },
    { Name: 'Super Game', Platform: 'Sega Genesis' },
  ],
  Attributes: [
    {
      attributeName: 'ROMs',
      Value: [
        { Name: 'Super Game.md', Size: 524288, Crc: '11223344', Sha1: SHA_C },
        { Name: 'Super Game (Alt).md', Size: 524288, Crc: '55667788' },
      ],
    },
  ],
});

describe('Catalog pipeline', () => {
  let corpus: string;

  before(async () => {
    corpus = await mkdtemp(join(tmpdir(), 'romdex-corpus-'));
    await mkdir(join(corpus, 'metadat', 'no-intro'), { recursive: true });
    await mkdir(join(corpus, 'metadat', 'hasheous', 'sega'), { recursive: true });

    await writeFile(join(corpus, 'metadat', 'no-intro', 'Nintendo - Game Boy (20240101).dat'), GAME_BOY_DAT);
    await writeFile(join(corpus, 'metadat', 'no-intro', 'Broken.json'), '{ "Name": "Broken", ');
    await writeFile(join(corpus, 'metadat', 'no-intro', 'readme.txt'), 'not a signature file');
    await writeFile(join(corpus, 'metadat', 'hasheous', 'sega', 'Super Game.json'), SUPER_GAME_JSON);
  });

  after(async () => {
    await rm(corpus, { recursive: true, force: true });
  });

  describe('signatureFormatOf', () => {
    it('should map extensions to formats', () => {
      assert.strictEqual(signatureFormatOf('a/b/Game Boy.DAT'), 'dat');
      assert.strictEqual(signatureFormatOf('a/b/game.json'), 'json');
      assert.strictEqual(signatureFormatOf('a/b/readme.txt'), undefined);
    });
  });

  describe('discoverSignatureFiles', () => {
    it('should find signature files recursively in path order', async () => {
      const files = await discoverSignatureFiles(corpus, ['metadat/no-intro', 'metadat/hasheous']);

      assert.deepStrictEqual(files, [
        join(corpus, 'metadat', 'hasheous', 'sega', 'Super Game.json'),
        join(corpus, 'metadat', 'no-intro', 'Broken.json'),
        join(corpus, 'metadat', 'no-intro', 'Nintendo - Game Boy (20240101).dat'),
      ]);
    });

    it('should fail for a missing directory', async () => {
      await assert.rejects(discoverSignatureFiles(corpus, ['metadat/missing']), IOError);
    });
  });

  describe('parseSignatureFile', () => {
    it('should derive the DAT platform from the file name', async () => {
      const parsed = await parseSignatureFile(
        join(corpus, 'metadat', 'no-intro', 'Nintendo - Game Boy (20240101).dat'),
        'filename',
        logger
      );

      assert.ok(parsed.format === 'dat');
      assert.deepStrictEqual(
        parsed.records.map(record => record.platform),
        ['Nintendo - Game Boy', 'Nintendo - Game Boy', 'Nintendo - Game Boy']
      );
    });

    it('should return GameData for JSON documents', async () => {
      const parsed = await parseSignatureFile(
        join(corpus, 'metadat', 'hasheous', 'sega', 'Super Game.json'),
        'filename',
        logger
      );

      assert.ok(parsed.format === 'json');
      assert.deepStrictEqual(parsed.games.map(game => game.platform), ['Sega Mega Drive', 'Sega Genesis']);
      assert.strictEqual(parsed.games[0].filename, 'Super Game');
    });

    it('should raise ParseError for a malformed document', async () => {
      await assert.rejects(
        parseSignatureFile(join(corpus, 'metadat', 'no-intro', 'Broken.json'), 'filename', logger),
        ParseError
      );
    });
  });

  describe('groupByPlatform', () => {
    it('should keep platforms in first-appearance order', () => {
      const groups = groupByPlatform([
        { name: 'a', filename: '', platform: 'P2', hash: '' },
        { name: 'b', filename: '', platform: 'P1', hash: '' },
        { name: 'c', filename: '', platform: 'P2', hash: '' },
      ]);

      assert.deepStrictEqual(Array.from(groups.keys()), ['P2', 'P1']);
      assert.deepStrictEqual(groups.get('P2')?.map(record => record.name), ['a', 'c']);
    });
  });

  describe('buildCatalog', () => {
    it('should build a filename-profile catalog and skip broken files', async () => {
      const databasePath = join(corpus, 'filename.sqlite');
      const summary = await buildCatalog({
        corpusRoot: corpus,
        signatureDirs: ['metadat/no-intro', 'metadat/hasheous'],
        databasePath,
        profile: 'filename',
        logger,
      });

      assert.deepStrictEqual(summary, {
        filesParsed: 2,
        filesFailed: 1,
        recordsParsed: 7,
        recordsInserted: 4,
        platforms: 3,
      });

      await withCatalogStore({ path: databasePath, profile: 'filename', logger }, (store) => {
        assert.strictEqual(store.count(), 4);
        assert.deepStrictEqual(store.lookupByHash(SHA_A.toUpperCase()), {
          name: 'Alpha (World)',
          filename: '',
          platform: 'Nintendo - Game Boy',
          hash: SHA_A,
        });
        assert.deepStrictEqual(store.lookupByHash(SHA_C), {
          name: 'Super Game',
          filename: 'Super Game',
          platform: 'Sega Mega Drive',
          hash: SHA_C,
        });
      });
    });

    it('should rebuild from scratch with the same result', async () => {
      const databasePath = join(corpus, 'rebuild.sqlite');
      const options = {
        corpusRoot: corpus,
        signatureDirs: ['metadat/no-intro', 'metadat/hasheous'],
        databasePath,
        profile: 'filename' as const,
        logger,
      };

      await buildCatalog(options);
      const second = await buildCatalog(options);

      assert.strictEqual(second.recordsInserted, 4);
      await withCatalogStore({ path: databasePath, profile: 'filename', logger }, (store) => {
        assert.strictEqual(store.count(), 4);
      });
    });

    it('should keep name variants apart in the name-platform profile', async () => {
      const databasePath = join(corpus, 'name-platform.sqlite');
      const summary = await buildCatalog({
        corpusRoot: corpus,
        signatureDirs: ['metadat/no-intro', 'metadat/hasheous'],
        databasePath,
        profile: 'name-platform',
        logger,
      });

      assert.strictEqual(summary.recordsParsed, 7);
      assert.strictEqual(summary.recordsInserted, 7);

      await withCatalogStore({ path: databasePath, profile: 'name-platform', logger }, (store) => {
        assert.deepStrictEqual(store.lookupByHash(SHA_B), {
          name: 'Beta',
          filename: '',
          platform: 'Nintendo - Game Boy',
          hash: SHA_B,
        });
      });
    });
  });
});
