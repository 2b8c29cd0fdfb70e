import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/KeytoolError.js';
import { KEY_FORMATS, type KeyFormat } from '../types/keys.js';
import { hasErrorCode } from '../utils/errno.js';

export const APP_NAME = 'nostr-keytool';

export interface KeytoolConfig {
  defaultFormat: KeyFormat;
  verbose: boolean;
  color: boolean;
}

// Unknown keys are stripped, so older or newer config files still load.
export const KeytoolConfigSchema = z.object({
  defaultFormat: z.enum(KEY_FORMATS).default('hex'),
  verbose: z.boolean().default(false),
  color: z.boolean().default(true),
});

export const DEFAULT_CONFIG: Readonly<KeytoolConfig> = Object.freeze(KeytoolConfigSchema.parse({}));

export type Env = Record<string, string | undefined>;

export function getConfigDir(env: Env = process.env): string {
  const configHome = env.XDG_CONFIG_HOME;
  return configHome ? join(configHome, APP_NAME) : join(homedir(), '.config', APP_NAME);
}

export function getConfigFilePath(env: Env = process.env): string {
  return join(getConfigDir(env), 'config.json');
}

function applyEnvOverrides(config: KeytoolConfig, env: Env): KeytoolConfig {
  return {
    ...config,
    verbose: env.NOSTR_KEYTOOL_VERBOSE?.trim() === '1' ? true : config.verbose,
    color: env.NO_COLOR !== undefined && env.NO_COLOR !== '' ? false : config.color,
  };
}

export interface LoadConfigOptions {
  /** Explicit file path; defaults to the XDG location. */
  path?: string;
  env?: Env;
}

/**
 * Read and validate the config file. A missing file yields the defaults.
 * @throws ConfigurationError if the file cannot be read, is not JSON, or fails the schema.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<KeytoolConfig> {
  const env = options.env ?? process.env;
  const path = options.path ?? getConfigFilePath(env);

  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return applyEnvOverrides({ ...DEFAULT_CONFIG }, env);
    throw ConfigurationError.unreadable(path, err);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw ConfigurationError.invalid(path, err instanceof Error ? err.message : String(err));
  }

  const parsed = KeytoolConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw ConfigurationError.invalid(path, `${where}${issue?.message ?? 'schema mismatch'}`);
  }
  return applyEnvOverrides(parsed.data, env);
}
