/**
 * Parser for clrmamepro-style DAT files
 *
 * ```
 * clrmamepro ( name "Nintendo - Game Boy" )
 * game (
 *   name "Super Game (World)"
 *   rom ( name "Super Game (World).gb" size 32768 crc 1A2B3C4D sha1 0123...cdef )
 * )
 * ```
 *
 * The text is tokenized, then read by a recursive-descent parser into a tree
 * of `key value` entries where a value is an atom or a parenthesised list.
 * Records are extracted from the top-level `game` entries of that tree.
 *
 * A `game` block missing its closing parenthesis ends at the next `game (`
 * (or at the end of the text) and is marked unclosed; the parser skips it and
 * carries on with the blocks after it.
 */

import type { Logger } from '../logger.js';
import type { GameRecord, GrammarProfile } from '../types.js';
import { decodeContent } from './types.js';
import type { SignatureParser } from './types.js';

export type DatTokenKind = 'open' | 'close' | 'quoted' | 'word' | 'malformed';

export interface DatToken {
  kind: DatTokenKind;
  /** Unquoted text for quoted tokens, raw text otherwise */
  text: string;
  line: number;
}

export interface DatAtom {
  kind: 'atom';
  text: string;
  /** Token began with a quote (well-formed or not) */
  quoted: boolean;
  /** Starts with a quote but is not a well-formed quoted string */
  malformed: boolean;
}

export interface DatList {
  kind: 'list';
  entries: DatEntry[];
  /** False when the text ended, or a new `game` block began, before its `)` */
  closed: boolean;
}

export type DatValue = DatAtom | DatList;

export interface DatEntry {
  key: string;
  value?: DatValue;
  line: number;
}

export interface DatIssue {
  line: number;
  message: string;
}

export interface DatDocument {
  entries: DatEntry[];
  issues: DatIssue[];
}

const SHA1_PATTERN = /^[0-9a-fA-F]{40}$/;

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r' || char === '\f' || char === '\v';
}

function isDelimiter(char: string | undefined): boolean {
  return char === undefined || char === '(' || char === ')' || isWhitespace(char);
}

/**
 * Split DAT text into tokens
 */
export function tokenizeDat(text: string): DatToken[] {
  const tokens: DatToken[] = [];
  let line = 1;
  let pos = 0;

  const readRun = (start: number): number => {
    let end = start;
    while (end < text.length && !isDelimiter(text[end])) {
      end++;
    }
    return end;
  };

  while (pos < text.length) {
    const char = text[pos];

    if (char === '\n') {
      line++;
      pos++;
      continue;
    }
    if (isWhitespace(char)) {
      pos++;
      continue;
    }
    if (char === '(' || char === ')') {
      tokens.push({ kind: char === '(' ? 'open' : 'close', text: char, line });
      pos++;
      continue;
    }

    if (char === '"') {
      const lineEnd = text.indexOf('\n', pos);
      const close = text.indexOf('"', pos + 1);
      const closedOnLine = close !== -1 && (lineEnd === -1 || close < lineEnd);

      if (closedOnLine && isDelimiter(text[close + 1])) {
        tokens.push({ kind: 'quoted', text: text.slice(pos + 1, close), line });
        pos = close + 1;
        continue;
      }

      // A quote that does not form a string runs like a bare word
      const end = readRun(pos + 1);
      tokens.push({ kind: 'malformed', text: text.slice(pos, end), line });
      pos = end;
      continue;
    }

    const end = readRun(pos);
    tokens.push({ kind: 'word', text: text.slice(pos, end), line });
    pos = end;
  }

  return tokens;
}

class DatReader {
  private pos = 0;
  // Set while reading a top-level `game` entry
  private inGame = false;
  readonly issues: DatIssue[] = [];

  constructor(private readonly tokens: DatToken[]) {}

  readDocument(): DatEntry[] {
    const entries: DatEntry[] = [];

    while (this.pos < this.tokens.length) {
      const token = this.tokens[this.pos];
      if (token.kind === 'close') {
        this.issues.push({ line: token.line, message: 'Unexpected ")"' });
        this.pos++;
        continue;
      }

      this.inGame = this.startsGame(this.pos);
      entries.push(this.readEntry());
    }

    this.inGame = false;
    return entries;
  }

  private startsGame(pos: number): boolean {
    const key = this.tokens[pos];
    const next = this.tokens[pos + 1];
    return key?.kind === 'word' && key.text === 'game' && next?.kind === 'open';
  }

  private readEntry(): DatEntry {
    const token = this.tokens[this.pos];

    if (token.kind === 'open') {
      this.issues.push({ line: token.line, message: 'Block without a key' });
      return { key: '', value: this.readList(), line: token.line };
    }

    this.pos++;
    return { key: token.text, value: this.readValue(), line: token.line };
  }

  private readValue(): DatValue | undefined {
    const token = this.tokens[this.pos];
    if (!token || token.kind === 'close') {
      return undefined;
    }
    if (token.kind === 'open') {
      return this.readList();
    }

    this.pos++;
    return {
      kind: 'atom',
      text: token.text,
      quoted: token.kind === 'quoted' || token.kind === 'malformed',
      malformed: token.kind === 'malformed',
    };
  }

  private readList(): DatList {
    const open = this.tokens[this.pos];
    this.pos++;
    const entries: DatEntry[] = [];

    for (;;) {
      const token = this.tokens[this.pos];
      if (!token || (this.inGame && this.startsGame(this.pos))) {
        this.issues.push({ line: open.line, message: `Unterminated block opened on line ${open.line}` });
        return { kind: 'list', entries, closed: false };
      }
      if (token.kind === 'close') {
        this.pos++;
        return { kind: 'list', entries, closed: true };
      }
      entries.push(this.readEntry());
    }
  }
}

/**
 * Parse DAT text into its entry tree. Unbalanced parentheses are reported as
 * issues; unclosed blocks are kept with `closed: false`.
 */
export function parseDatDocument(content: string | Uint8Array): DatDocument {
  const reader = new DatReader(tokenizeDat(decodeContent(content)));
  const entries = reader.readDocument();
  return { entries, issues: reader.issues };
}

function findEntry(list: DatList, key: string): DatEntry | undefined {
  return list.entries.find(entry => entry.key === key);
}

function atomOf(entry: DatEntry | undefined): DatAtom | undefined {
  return entry?.value?.kind === 'atom' ? entry.value : undefined;
}

function listsOf(list: DatList, key: string): DatList[] {
  const lists: DatList[] = [];
  for (const entry of list.entries) {
    if (entry.key === key && entry.value?.kind === 'list') {
      lists.push(entry.value);
    }
  }
  return lists;
}

type Extraction =
  | { ok: true; record: GameRecord }
  | { ok: false; reason: string };

/**
 * Build a record from one `game ( ... )` block
 */
export function extractGame(block: DatList, platform: string, profile: GrammarProfile): Extraction {
  const name = atomOf(findEntry(block, 'name'));
  if (!name || name.malformed || name.text.length === 0) {
    return { ok: false, reason: 'missing game name' };
  }

  for (const rom of listsOf(block, 'rom')) {
    const sha1 = atomOf(findEntry(rom, 'sha1'));
    if (!sha1 || !SHA1_PATTERN.test(sha1.text)) {
      continue;
    }

    let filename = '';
    if (profile === 'filename') {
      const romName = atomOf(findEntry(rom, 'name'));
      if (!romName) {
        return { ok: false, reason: 'missing rom name' };
      }
      // Quote-leading names are not kept; only bare filename tokens are
      filename = romName.quoted ? '' : romName.text;
    }

    return {
      ok: true,
      record: {
        name: name.text,
        filename,
        platform,
        hash: sha1.text.toLowerCase(),
      },
    };
  }

  return { ok: false, reason: 'no rom with a sha1 digest' };
}

export interface DatParserOptions {
  profile: GrammarProfile;
  logger?: Logger;
}

/**
 * Line-grammar DAT parser
 *
 * @example
 * ```typescript
 * const parser = new DatParser({ profile: 'filename' });
 * const records = parser.parse(readFileSync(path), platformFromFilename(path));
 * ```
 */
export class DatParser implements SignatureParser {
  readonly format = 'dat';
  private profile: GrammarProfile;
  private logger?: Logger;

  constructor(options: DatParserOptions) {
    this.profile = options.profile;
    this.logger = options.logger;
  }

  parse(content: string | Uint8Array, platformHint: string, sourceName?: string): GameRecord[] {
    const document = parseDatDocument(content);
    const records: GameRecord[] = [];

    for (const issue of document.issues) {
      this.logger?.debug({ line: issue.line, platform: platformHint, source: sourceName }, issue.message);
    }

    for (const entry of document.entries) {
      if (entry.key !== 'game' || entry.value?.kind !== 'list') {
        continue;
      }
      if (!entry.value.closed) {
        this.logger?.debug(
          { line: entry.line, platform: platformHint, source: sourceName },
          'Skipping unclosed game block'
        );
        continue;
      }

      const result = extractGame(entry.value, platformHint, this.profile);
      if (result.ok) {
        records.push(result.record);
      } else {
        this.logger?.debug(
          { line: entry.line, platform: platformHint, source: sourceName, reason: result.reason },
          'Skipping game block'
        );
      }
    }

    return records;
  }
}
