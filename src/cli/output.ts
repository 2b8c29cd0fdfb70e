import { stat, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ValidationError } from '../errors/KeytoolError.js';
import type { FormattedKeypair, FormattedKeypairBoth } from '../types/keys.js';
import { hasErrorCode } from '../utils/errno.js';

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function formatKeypairText(keys: FormattedKeypair): string {
  return `Private Key: ${keys.privateKey}\nPublic Key:  ${keys.publicKey}`;
}

export function formatKeypairBothText(keys: FormattedKeypairBoth): string {
  return `HEX Format:\n${formatKeypairText(keys.hex)}\n\nBech32 Format:\n${formatKeypairText(keys.bech32)}`;
}

/** @throws ValidationError if the parent directory is missing or is not a directory. */
export async function checkOutputPath(path: string): Promise<string> {
  const resolved = resolve(path);
  const dir = dirname(resolved);
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(dir)).isDirectory();
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw ValidationError.outputPath(`Directory does not exist: ${dir}`, path);
    }
    throw err;
  }
  if (!isDirectory) {
    throw ValidationError.outputPath(`Not a directory: ${dir}`, path);
  }
  return resolved;
}

export interface WriteOutputOptions {
  /** Overwrite an existing file. */
  force?: boolean;
}

/**
 * Write `content` plus a trailing newline, readable by the owner only.
 * @throws ValidationError if the file exists and `force` is not set.
 */
export async function writeOutputFile(path: string, content: string, options: WriteOutputOptions = {}): Promise<string> {
  const resolved = await checkOutputPath(path);
  try {
    await writeFile(resolved, `${content}\n`, { mode: 0o600, flag: options.force ? 'w' : 'wx' });
  } catch (err) {
    if (hasErrorCode(err, 'EEXIST')) {
      throw ValidationError.outputPath(`File already exists: ${path} (use --force to overwrite)`, path);
    }
    throw err;
  }
  return resolved;
}
