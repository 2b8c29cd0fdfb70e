import { KeyCodec } from '../crypto/KeyCodec.js';
import { KeyFormatError } from '../errors/KeytoolError.js';
import type { FormattedKeypair, FormattedKeypairBoth, KeyFormat, SingleKeyFormat } from '../types/keys.js';
import { assertNever } from './Key.js';
import { PrivateKey } from './PrivateKey.js';
import { PublicKey } from './PublicKey.js';

export type KeypairOutput<F extends KeyFormat> = F extends 'both' ? FormattedKeypairBoth : FormattedKeypair;

/**
 * A private key and the public key derived from it.
 * `publicKey == derive(privateKey)` is checked on construction and cannot change afterwards.
 */
export class Keypair {
  readonly privateKey: PrivateKey;
  readonly publicKey: PublicKey;

  private constructor(privateKey: PrivateKey, publicKey: PublicKey) {
    this.privateKey = privateKey;
    this.publicKey = publicKey;
    Object.freeze(this);
  }

  /** @throws CryptographicError if the random draw is not a valid scalar. */
  static generate(): Keypair {
    const { privateKey, publicKey } = KeyCodec.generateKeypair();
    return new Keypair(PrivateKey.fromBytes(privateKey), PublicKey.fromBytes(publicKey));
  }

  static fromPrivateKey(privateKey: PrivateKey): Keypair {
    return new Keypair(privateKey, privateKey.publicKey());
  }

  /** @throws KeyFormatError if the public key is not the one derived from the private key. */
  static fromKeys(privateKey: PrivateKey, publicKey: PublicKey): Keypair {
    if (!privateKey.publicKey().equals(publicKey)) {
      throw KeyFormatError.keypairMismatch();
    }
    return new Keypair(privateKey, publicKey);
  }

  toFormat<F extends KeyFormat>(format: F): KeypairOutput<F>;
  toFormat(format: KeyFormat): FormattedKeypair | FormattedKeypairBoth {
    switch (format) {
      case 'hex':
      case 'bech32':
        return this.single(format);
      case 'both':
        return { hex: this.single('hex'), bech32: this.single('bech32') };
      default:
        return assertNever(format);
    }
  }

  toJSON(): FormattedKeypair {
    return this.single('hex');
  }

  private single(format: SingleKeyFormat): FormattedKeypair {
    return {
      privateKey: this.privateKey.toFormat(format),
      publicKey: this.publicKey.toFormat(format),
    };
  }
}
