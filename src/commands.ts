/**
 * Command-line commands
 *
 * `runCommand` takes the arguments after the executable and returns the exit
 * code, writing its report through `print`.
 */

import { resolve } from 'node:path';
import { parseProfile } from './config.js';
import type { RomdexConfig } from './config.js';
import { UsageError } from './errors.js';
import { hashFile } from './hash.js';
import type { Logger } from './logger.js';
import { Romdex } from './romdex.js';
import type { GameRecord } from './types.js';

export const USAGE = `
Usage:
  romdex build <corpus-root> [--db <path>] [--profile <profile>] [--dir <subdir>]...
  romdex hash <file>
  romdex identify <file> [--db <path>] [--profile <profile>]
  romdex lookup (--hash <sha1> | --filename <name>) [--db <path>] [--profile <profile>]

Commands:
  build       Rebuild the catalog from the signature files under <corpus-root>
  hash        Print the SHA-1, MD5 and CRC32 of a file (zip: its first entry)
  identify    Find the catalog record for a ROM file
  lookup      Query the catalog directly

Options:
  --db        Catalog file (default: romdex.sqlite, or ROMDEX_DATABASE)
  --profile   filename | name-platform (default: filename, or ROMDEX_PROFILE)
  --dir       Signature directory under the corpus root, repeatable
              (default: metadat/no-intro and metadat/fbneo-split)
`;

const VALUE_FLAGS = new Set(['--db', '--profile', '--dir', '--hash', '--filename']);

export interface ParsedArgs {
  command?: string;
  positionals: string[];
  flags: Map<string, string[]>;
}

export function parseArgs(args: string[]): ParsedArgs {
  const [command, ...rest] = args;
  const positionals: string[] = [];
  const flags = new Map<string, string[]>();

  for (let index = 0; index < rest.length; index += 1) {
    const token = rest[index];
    if (token === '--') {
      continue;
    }
    if (!token.startsWith('--')) {
      positionals.push(token);
      continue;
    }
    if (!VALUE_FLAGS.has(token)) {
      throw new UsageError(`Unknown option: ${token}`);
    }

    const value = rest[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Missing value for ${token}`);
    }
    flags.set(token, [...(flags.get(token) ?? []), value]);
    index += 1;
  }

  return { command, positionals, flags };
}

function lastFlag(parsed: ParsedArgs, name: string): string | undefined {
  const values = parsed.flags.get(name);
  return values?.[values.length - 1];
}

function requirePositional(parsed: ParsedArgs, label: string): string {
  const [value] = parsed.positionals;
  if (!value) {
    throw new UsageError(`${parsed.command ?? 'romdex'} needs a ${label}`);
  }
  return value;
}

function configFrom(parsed: ParsedArgs): Partial<RomdexConfig> {
  const config: Partial<RomdexConfig> = {};
  const db = lastFlag(parsed, '--db');
  if (db !== undefined) {
    config.databasePath = db;
  }
  const profile = lastFlag(parsed, '--profile');
  if (profile !== undefined) {
    config.profile = parseProfile(profile);
  }
  const dirs = parsed.flags.get('--dir');
  if (dirs) {
    config.signatureDirs = dirs;
  }
  return config;
}

function formatRecord(record: GameRecord): string {
  const filename = record.filename ? `  ${record.filename}` : '';
  return `${record.name}  [${record.platform}]${filename}  ${record.hash || '-'}`;
}

export interface CommandContext {
  print: (line: string) => void;
  logger?: Logger;
}

export async function runCommand(
  args: string[],
  context: CommandContext = { print: line => console.log(line) }
): Promise<number> {
  const { print, logger } = context;
  const parsed = parseArgs(args);

  switch (parsed.command) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      print(USAGE.trim());
      return 0;

    case 'build': {
      const corpusRoot = resolve(requirePositional(parsed, 'corpus root'));
      const romdex = new Romdex(configFrom(parsed), logger);
      const summary = await romdex.build(corpusRoot);
      print(`Catalog: ${romdex.config.databasePath} (${romdex.config.profile} profile)`);
      print(`Signature files parsed: ${summary.filesParsed}`);
      print(`Signature files skipped: ${summary.filesFailed}`);
      print(`Platforms: ${summary.platforms}`);
      print(`Records parsed: ${summary.recordsParsed}`);
      print(`Records inserted: ${summary.recordsInserted}`);
      return 0;
    }

    case 'hash': {
      const file = requirePositional(parsed, 'file');
      const hashes = await hashFile(file);
      print(`sha1   ${hashes.sha1}`);
      print(`md5    ${hashes.md5}`);
      print(`crc32  ${hashes.crc32}`);
      return 0;
    }

    case 'identify': {
      const file = requirePositional(parsed, 'file');
      const romdex = new Romdex(configFrom(parsed), logger);
      const result = await romdex.identify(file);
      if (!result) {
        print(`No match for ${file}`);
        return 1;
      }
      print(`${formatRecord(result.record)}  (matched by ${result.matchedBy})`);
      return 0;
    }

    case 'lookup': {
      const hash = lastFlag(parsed, '--hash');
      const filename = lastFlag(parsed, '--filename');
      if ((hash === undefined) === (filename === undefined)) {
        throw new UsageError('lookup needs exactly one of --hash or --filename');
      }
      const romdex = new Romdex(configFrom(parsed), logger);
      const record = hash !== undefined
        ? await romdex.lookupByHash(hash)
        : await romdex.lookupByFilename(filename ?? '');
      if (!record) {
        print('No match');
        return 1;
      }
      print(formatRecord(record));
      return 0;
    }

    default:
      throw new UsageError(`Unknown command: ${parsed.command}`);
  }
}
