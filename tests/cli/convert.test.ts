import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runConvert } from '../../src/cli/commands/convert.js';
import { KeyFormatError, ValidationError } from '../../src/errors/KeytoolError.js';
import { ErrorCodes } from '../../src/types/errors.js';
import { catchAsyncError } from '../helpers/catchError.js';
import { createTestContext } from '../helpers/context.js';
import { loadKeyVectors } from '../helpers/loadVectors.js';

const { vectors } = loadKeyVectors();
const v = vectors[3];

describe('keys convert', () => {
  it('converts nsec to hex by default', async () => {
    const ctx = createTestContext();
    const result = await runConvert(v.nsec, {}, ctx);
    expect(result).toEqual({
      originalKey: v.nsec,
      originalFormat: 'bech32',
      originalType: 'private',
      convertedKey: v.privateKeyHex,
      targetFormat: 'hex',
    });
    expect(ctx.out).toEqual([v.privateKeyHex]);
    expect(ctx.logs).toContainEqual({ level: 'success', message: 'Converted bech32 private key to hex format' });
  });

  it('converts npub to hex', async () => {
    const ctx = createTestContext();
    await runConvert(v.npub, { to: 'hex' }, ctx);
    expect(ctx.out).toEqual([v.publicKeyHex]);
  });

  it('converts a hex public key to npub', async () => {
    const ctx = createTestContext();
    await runConvert(v.publicKeyHex, { to: 'bech32', type: 'public' }, ctx);
    expect(ctx.out).toEqual([v.npub]);
    expect(ctx.logs).toContainEqual({ level: 'success', message: 'Converted hex public key to bech32 format' });
  });

  it('converts a hex private key to nsec, accepting uppercase input and --to', async () => {
    const ctx = createTestContext();
    await runConvert(v.privateKeyHex.toUpperCase(), { to: 'BECH32', type: 'Private' }, ctx);
    expect(ctx.out).toEqual([v.nsec]);
  });

  it('warns and still prints when the key is already in the target format', async () => {
    const ctx = createTestContext();
    await runConvert(v.publicKeyHex.toUpperCase(), { to: 'hex', type: 'public' }, ctx);
    expect(ctx.out).toEqual([v.publicKeyHex]);
    expect(ctx.logs).toContainEqual({ level: 'warn', message: 'Key is already in hex format' });
  });

  it('prints JSON', async () => {
    const ctx = createTestContext();
    await runConvert(v.npub, { to: 'hex', json: true }, ctx);
    expect(JSON.parse(ctx.out[0])).toEqual({
      originalKey: v.npub,
      originalFormat: 'bech32',
      originalType: 'public',
      convertedKey: v.publicKeyHex,
      targetFormat: 'hex',
    });
  });

  it('requires --type for hex input', async () => {
    const err = await catchAsyncError(() => runConvert(v.privateKeyHex, { to: 'bech32' }, createTestContext()));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err.message).toBe('Hex keys require --type to specify private or public');
  });

  it('rejects an unknown --type', async () => {
    const err = await catchAsyncError(() =>
      runConvert(v.privateKeyHex, { to: 'bech32', type: 'secret' }, createTestContext()),
    );
    expect(err.message).toBe('Invalid key type: secret (valid types: private, public)');
  });

  it('rejects an unknown target format', async () => {
    const err = await catchAsyncError(() => runConvert(v.nsec, { to: 'base64' }, createTestContext()));
    expect(err).toMatchObject({
      code: ErrorCodes.INVALID_ARGUMENT,
      message: 'Invalid target format: base64 (valid formats: hex, bech32)',
    });
  });

  it('rejects a malformed nsec with KeyFormatError', async () => {
    const err = await catchAsyncError(() => runConvert('nsec0000', {}, createTestContext()));
    expect(err).toBeInstanceOf(KeyFormatError);
    expect(err).toMatchObject({ code: ErrorCodes.INVALID_BASE58 });
  });

  it('rejects input of unknown shape', async () => {
    const err = await catchAsyncError(() => runConvert('abc123', { type: 'private' }, createTestContext()));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err.message).toBe(
      'Could not detect key type: expected a 64-character hex string or a key starting with nsec/npub',
    );
  });

  describe('--output', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'keytool-convert-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('writes the converted key to a file', async () => {
      const ctx = createTestContext();
      const path = join(dir, 'npub.txt');
      await runConvert(v.publicKeyHex, { to: 'bech32', type: 'public', output: path }, ctx);
      expect(await readFile(path, 'utf-8')).toBe(`${v.npub}\n`);
      expect(ctx.out).toEqual([]);
      expect(ctx.logs).toContainEqual({ level: 'success', message: `Converted key written to ${path}` });
    });
  });
});
