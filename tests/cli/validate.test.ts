import { describe, it, expect } from 'vitest';
import { runValidate, validateKey } from '../../src/cli/commands/validate.js';
import { ValidationError } from '../../src/errors/KeytoolError.js';
import { ErrorCodes } from '../../src/types/errors.js';
import { catchAsyncError, catchError } from '../helpers/catchError.js';
import { createTestContext } from '../helpers/context.js';
import { loadKeyVectors } from '../helpers/loadVectors.js';

const { vectors } = loadKeyVectors();
const v = vectors[2];

describe('keys validate', () => {
  describe('validateKey', () => {
    it('accepts a hex key as private or public', () => {
      expect(validateKey(v.publicKeyHex)).toEqual({
        valid: true,
        kind: 'hex',
        purpose: 'private or public',
        reasons: [],
      });
    });

    it('accepts nsec and npub keys', () => {
      expect(validateKey(v.nsec)).toMatchObject({ valid: true, kind: 'nsec', purpose: 'private' });
      expect(validateKey(v.npub)).toMatchObject({ valid: true, kind: 'npub', purpose: 'public' });
    });

    it('trims surrounding whitespace', () => {
      expect(validateKey(`  ${v.npub}\n`).valid).toBe(true);
    });

    it('reports a bad nsec payload', () => {
      expect(validateKey('nsec' + '1'.repeat(31))).toEqual({
        valid: false,
        kind: 'nsec',
        purpose: 'private',
        reasons: ["Invalid bech32 key: 'nsec' payload decodes to 31 bytes, expected 32"],
      });
    });

    it.each([
      ['private', v.privateKeyHex, true],
      ['private', v.nsec, true],
      ['private', v.npub, false],
      ['public', v.publicKeyHex, true],
      ['public', v.npub, true],
      ['public', v.nsec, false],
      ['nsec', v.nsec, true],
      ['nsec', v.privateKeyHex, false],
      ['npub', v.npub, true],
      ['npub', v.publicKeyHex, false],
    ])('--type %s with %s -> %s', (type, key, valid) => {
      expect(validateKey(key, type).valid).toBe(valid);
    });

    it('names the mismatch', () => {
      expect(validateKey(v.npub, 'nsec').reasons).toEqual(['Expected nsec, got npub']);
    });

    it('rejects an undetectable key', () => {
      const err = catchError(() => validateKey('hello'));
      expect(err).toBeInstanceOf(ValidationError);
      expect(err.message).toBe('Could not detect key type: key must be 64-character hex or start with nsec/npub');
    });

    it('rejects an unknown --type', () => {
      expect(catchError(() => validateKey(v.npub, 'secret')).message).toBe(
        'Invalid key type: secret (valid types: private, public, nsec, npub)',
      );
      expect(() => validateKey(v.npub, 'constructor')).toThrow(ValidationError);
    });
  });

  describe('runValidate', () => {
    it('logs success', async () => {
      const ctx = createTestContext();
      await runValidate(v.npub, {}, ctx);
      expect(ctx.logs[0]).toEqual({ level: 'success', message: 'Valid npub key (public)' });
      expect(ctx.out).toEqual([]);
    });

    it('logs details at debug level', async () => {
      const ctx = createTestContext();
      await runValidate(v.privateKeyHex, {}, ctx);
      expect(ctx.logs.slice(1)).toEqual([
        { level: 'debug', message: 'Key type: hex' },
        { level: 'debug', message: 'Key length: 64 characters' },
        { level: 'debug', message: 'Format: Hexadecimal' },
      ]);
    });

    it('throws with the reasons when invalid', async () => {
      const err = await catchAsyncError(() => runValidate(v.nsec, { type: 'public' }, createTestContext()));
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({
        code: ErrorCodes.INVALID_KEY,
        message: 'Invalid key format',
        data: { reasons: ['Expected public, got nsec'] },
      });
    });
  });
});
