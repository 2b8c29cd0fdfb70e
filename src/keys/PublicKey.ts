import { KeyCodec } from '../crypto/KeyCodec.js';
import { KeyFormatError } from '../errors/KeytoolError.js';
import { Key } from './Key.js';

/** A decoded public key is not checked against any private key or against the curve. */
export class PublicKey extends Key {
  readonly role = 'public' as const;

  private constructor(bytes: Uint8Array) {
    super(bytes);
  }

  static fromBytes(bytes: Uint8Array): PublicKey {
    if (bytes.length !== 32) throw KeyFormatError.invalidByteLength(bytes.length);
    return new PublicKey(bytes);
  }

  static fromHex(hex: string): PublicKey {
    return new PublicKey(KeyCodec.fromHex(hex));
  }

  static fromBech32(npub: string): PublicKey {
    return new PublicKey(KeyCodec.fromPseudoBech32(npub, 'npub'));
  }
}
