import { secp256k1 } from '@noble/curves/secp256k1.js';
import { bytesToHex, hexToBytes, randomBytes } from '@noble/hashes/utils.js';
import bs58 from 'bs58';
import { CryptographicError, KeyFormatError } from '../errors/KeytoolError.js';
import { PREFIX_FOR_ROLE, type KeyHex, type KeyPrefix, type PseudoBech32, type RawKeypair } from '../types/keys.js';

export const KEY_LENGTH = 32;

const HEX_KEY_PATTERN = /^[0-9a-fA-F]{64}$/;

const KNOWN_PREFIXES: readonly KeyPrefix[] = Object.values(PREFIX_FOR_ROLE);

export type DecodeResult = { ok: true; bytes: Uint8Array } | { ok: false; error: KeyFormatError };

function assertKeyLength(bytes: Uint8Array): void {
  if (bytes.length !== KEY_LENGTH) {
    throw KeyFormatError.invalidByteLength(bytes.length);
  }
}

/**
 * Key generation, secp256k1 derivation and the two textual encodings.
 *
 * The "bech32" form is NOT NIP-19: it is the literal prefix (`nsec`/`npub`)
 * followed by base58 of the raw 32 bytes, with no checksum. Other Nostr
 * clients will not accept it.
 */
export class KeyCodec {
  /** 32 bytes from the platform CSPRNG. Not checked against the curve order. */
  static generatePrivateKey(): Uint8Array {
    return randomBytes(KEY_LENGTH);
  }

  /**
   * Derive the x-only public key: multiply G by the big-endian scalar, take the
   * uncompressed encoding and keep bytes 1..33.
   * @throws CryptographicError if the scalar is zero or not below the curve order.
   */
  static derivePublicKey(privateKey: Uint8Array): Uint8Array {
    if (privateKey.length !== KEY_LENGTH) {
      throw CryptographicError.invalidKeyLength(privateKey.length);
    }
    let uncompressed: Uint8Array;
    try {
      uncompressed = secp256k1.getPublicKey(privateKey, false);
    } catch (err) {
      throw CryptographicError.invalidScalar(err);
    }
    return uncompressed.slice(1, 1 + KEY_LENGTH);
  }

  /** Draw a private key and derive its public key. A rejected draw is surfaced, not retried. */
  static generateKeypair(): RawKeypair {
    const privateKey = KeyCodec.generatePrivateKey();
    const publicKey = KeyCodec.derivePublicKey(privateKey);
    return { privateKey, publicKey };
  }

  /** @returns 64-char lowercase hex string. */
  static toHex(key: Uint8Array): KeyHex {
    assertKeyLength(key);
    return bytesToHex(key);
  }

  static decodeHex(hex: string): DecodeResult {
    if (hex.length !== KEY_LENGTH * 2) {
      return {
        ok: false,
        error: KeyFormatError.invalidHex(`expected 64 characters, got ${hex.length}`, hex.length),
      };
    }
    if (!HEX_KEY_PATTERN.test(hex)) {
      return { ok: false, error: KeyFormatError.invalidHex('contains non-hex characters', hex.length) };
    }
    return { ok: true, bytes: hexToBytes(hex.toLowerCase()) };
  }

  /** Case-insensitive. @throws KeyFormatError */
  static fromHex(hex: string): Uint8Array {
    const result = KeyCodec.decodeHex(hex);
    if (!result.ok) throw result.error;
    return result.bytes;
  }

  static toPseudoBech32(key: Uint8Array, prefix: KeyPrefix): PseudoBech32 {
    assertKeyLength(key);
    return prefix + bs58.encode(key);
  }

  static decodePseudoBech32(encoded: string, expectedPrefix: KeyPrefix): DecodeResult {
    if (!encoded.startsWith(expectedPrefix)) {
      const other = KNOWN_PREFIXES.find((prefix) => encoded.startsWith(prefix));
      return {
        ok: false,
        error: other
          ? KeyFormatError.invalidPrefix(expectedPrefix, other)
          : KeyFormatError.missingPrefix(expectedPrefix, encoded.length),
      };
    }
    const payload = encoded.slice(expectedPrefix.length);
    let bytes: Uint8Array;
    try {
      bytes = bs58.decode(payload);
    } catch {
      return { ok: false, error: KeyFormatError.invalidBase58(expectedPrefix, payload.length) };
    }
    if (bytes.length !== KEY_LENGTH) {
      return { ok: false, error: KeyFormatError.invalidPayloadLength(expectedPrefix, bytes.length) };
    }
    return { ok: true, bytes };
  }

  /** @throws KeyFormatError on prefix mismatch, bad base58, or a payload that is not 32 bytes. */
  static fromPseudoBech32(encoded: string, expectedPrefix: KeyPrefix): Uint8Array {
    const result = KeyCodec.decodePseudoBech32(encoded, expectedPrefix);
    if (!result.ok) throw result.error;
    return result.bytes;
  }

  static isValidHexKey(hex: string): boolean {
    return HEX_KEY_PATTERN.test(hex);
  }

  static isValidPseudoBech32(encoded: string, prefix: KeyPrefix): boolean {
    return KeyCodec.decodePseudoBech32(encoded, prefix).ok;
  }
}
