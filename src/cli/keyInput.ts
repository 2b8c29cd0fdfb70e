import { KeyCodec } from '../crypto/KeyCodec.js';
import { ValidationError } from '../errors/KeytoolError.js';
import { PrivateKey } from '../keys/PrivateKey.js';
import { PublicKey } from '../keys/PublicKey.js';
import type { KeyRole, SingleKeyFormat } from '../types/keys.js';

export type KeyKind = 'hex' | 'nsec' | 'npub';

/** Classify by shape only: prefix for nsec/npub, 64 hex characters otherwise. */
export function detectKeyKind(key: string): KeyKind | undefined {
  if (key.startsWith('nsec')) return 'nsec';
  if (key.startsWith('npub')) return 'npub';
  if (KeyCodec.isValidHexKey(key)) return 'hex';
  return undefined;
}

export function parseRole(value: string): KeyRole {
  const role = value.trim().toLowerCase();
  if (role === 'private' || role === 'public') return role;
  throw ValidationError.invalidArgument(`Invalid key type: ${value} (valid types: private, public)`, { value });
}

export function parseTargetFormat(value: string): SingleKeyFormat {
  const format = value.trim().toLowerCase();
  if (format === 'hex' || format === 'bech32') return format;
  throw ValidationError.invalidArgument(`Invalid target format: ${value} (valid formats: hex, bech32)`, { value });
}

export interface ParsedKey {
  key: PrivateKey | PublicKey;
  format: SingleKeyFormat;
}

/**
 * Decode a key given on the command line. nsec/npub keys carry their role;
 * hex keys need `role`.
 * @throws ValidationError when the kind cannot be detected or a hex key has no role.
 * @throws KeyFormatError when the key does not decode.
 */
export function parseKeyInput(input: string, role?: string): ParsedKey {
  const key = input.trim();
  switch (detectKeyKind(key)) {
    case 'nsec':
      return { key: PrivateKey.fromBech32(key), format: 'bech32' };
    case 'npub':
      return { key: PublicKey.fromBech32(key), format: 'bech32' };
    case 'hex': {
      if (role === undefined) {
        throw ValidationError.invalidArgument('Hex keys require --type to specify private or public');
      }
      const parsedRole = parseRole(role);
      return {
        key: parsedRole === 'private' ? PrivateKey.fromHex(key) : PublicKey.fromHex(key),
        format: 'hex',
      };
    }
    case undefined:
      throw ValidationError.invalidArgument(
        'Could not detect key type: expected a 64-character hex string or a key starting with nsec/npub',
        { length: key.length },
      );
  }
}

/** Hex or nsec input to a private key. */
export function parsePrivateKeyInput(input: string): PrivateKey {
  const { key } = parseKeyInput(input, 'private');
  if (!(key instanceof PrivateKey)) {
    throw ValidationError.invalidArgument('Expected a private key (hex or nsec), got an npub key');
  }
  return key;
}
