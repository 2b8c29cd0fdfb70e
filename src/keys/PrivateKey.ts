import { KeyCodec } from '../crypto/KeyCodec.js';
import { KeyFormatError } from '../errors/KeytoolError.js';
import { Key } from './Key.js';
import { PublicKey } from './PublicKey.js';

export class PrivateKey extends Key {
  readonly role = 'private' as const;

  private constructor(bytes: Uint8Array) {
    super(bytes);
  }

  /** Only the length is checked; curve validity is checked on derivation. */
  static fromBytes(bytes: Uint8Array): PrivateKey {
    if (bytes.length !== 32) throw KeyFormatError.invalidByteLength(bytes.length);
    return new PrivateKey(bytes);
  }

  static fromHex(hex: string): PrivateKey {
    return new PrivateKey(KeyCodec.fromHex(hex));
  }

  static fromBech32(nsec: string): PrivateKey {
    return new PrivateKey(KeyCodec.fromPseudoBech32(nsec, 'nsec'));
  }

  static generate(): PrivateKey {
    return new PrivateKey(KeyCodec.generatePrivateKey());
  }

  /** @throws CryptographicError if the scalar is not a valid secp256k1 secret key. */
  publicKey(): PublicKey {
    return PublicKey.fromBytes(KeyCodec.derivePublicKey(this.bytes));
  }
}
