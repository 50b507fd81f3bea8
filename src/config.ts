/**
 * Runtime configuration: defaults, then environment, then explicit overrides
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { GRAMMAR_PROFILES } from './types.js';
import type { GrammarProfile } from './types.js';

export interface RomdexConfig {
  /** SQLite catalog file */
  databasePath: string;

  /** Uniqueness convention for the catalog (defaults to 'filename') */
  profile: GrammarProfile;

  /** Directories under the corpus root that hold signature files */
  signatureDirs: string[];
}

export const DEFAULT_CONFIG: RomdexConfig = {
  databasePath: 'romdex.sqlite',
  profile: 'filename',
  signatureDirs: ['metadat/no-intro', 'metadat/fbneo-split'],
};

const ConfigSchema = z.object({
  databasePath: z.string().min(1),
  profile: z.enum(['filename', 'name-platform']),
  signatureDirs: z.array(z.string().min(1)),
});

function fromEnvironment(env: NodeJS.ProcessEnv): Partial<RomdexConfig> {
  const config: Partial<RomdexConfig> = {};

  if (env.ROMDEX_DATABASE) {
    config.databasePath = env.ROMDEX_DATABASE;
  }
  if (env.ROMDEX_PROFILE) {
    config.profile = parseProfile(env.ROMDEX_PROFILE);
  }
  if (env.ROMDEX_SIGNATURE_DIRS) {
    config.signatureDirs = env.ROMDEX_SIGNATURE_DIRS
      .split(',')
      .map(dir => dir.trim())
      .filter(dir => dir.length > 0);
  }

  return config;
}

/**
 * Validate a grammar profile name
 */
export function parseProfile(value: string): GrammarProfile {
  const profile = GRAMMAR_PROFILES.find(candidate => candidate === value);
  if (!profile) {
    throw new ConfigError(
      `Unknown grammar profile: ${value} (expected one of ${GRAMMAR_PROFILES.join(', ')})`
    );
  }
  return profile;
}

export function loadConfig(
  overrides: Partial<RomdexConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): RomdexConfig {
  const merged = {
    ...DEFAULT_CONFIG,
    ...fromEnvironment(env),
    ...withoutUndefined(overrides),
  };

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  return parsed.data;
}

function withoutUndefined(overrides: Partial<RomdexConfig>): Partial<RomdexConfig> {
  const result: Partial<RomdexConfig> = {};
  if (overrides.databasePath !== undefined) result.databasePath = overrides.databasePath;
  if (overrides.profile !== undefined) result.profile = overrides.profile;
  if (overrides.signatureDirs !== undefined) result.signatureDirs = overrides.signatureDirs;
  return result;
}
