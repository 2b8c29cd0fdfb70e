import { KeyCodec } from '../crypto/KeyCodec.js';
import { KeytoolError } from '../errors/KeytoolError.js';
import type { KeyHex, KeyPrefix, KeyRole, PseudoBech32, SingleKeyFormat } from '../types/keys.js';
import { PREFIX_FOR_ROLE } from '../types/keys.js';

export function assertNever(value: never): never {
  throw KeytoolError.unsupportedFormat(value);
}

/** Immutable 32-byte key. Subclasses fix the role and therefore the nsec/npub prefix. */
export abstract class Key {
  abstract readonly role: KeyRole;
  readonly #bytes: Uint8Array;

  protected constructor(bytes: Uint8Array) {
    this.#bytes = Uint8Array.from(bytes);
  }

  get prefix(): KeyPrefix {
    return PREFIX_FOR_ROLE[this.role];
  }

  /** Copy of the raw key bytes. */
  get bytes(): Uint8Array {
    return Uint8Array.from(this.#bytes);
  }

  get hex(): KeyHex {
    return KeyCodec.toHex(this.#bytes);
  }

  get bech32(): PseudoBech32 {
    return KeyCodec.toPseudoBech32(this.#bytes, this.prefix);
  }

  toFormat(format: SingleKeyFormat): string {
    switch (format) {
      case 'hex':
        return this.hex;
      case 'bech32':
        return this.bech32;
      default:
        return assertNever(format);
    }
  }

  equals(other: Key): boolean {
    if (other.role !== this.role) return false;
    const a = this.#bytes;
    const b = other.#bytes;
    if (a.length !== b.length) return false;
    let diff = 0;
    for (let i = 0; i < a.length; i++) diff |= a[i] ^ b[i];
    return diff === 0;
  }

  // Keeps secrets out of template strings and error messages.
  toString(): string {
    return this.role === 'private' ? 'PrivateKey(redacted)' : `PublicKey(${this.hex})`;
  }
}
