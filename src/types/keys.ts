export type HexString = string;

/** 64 lowercase hex characters representing 32 key bytes. */
export type KeyHex = HexString;

/** Prefix + base58 of the 32 key bytes, e.g. `npub9CEiu...`. Not NIP-19. */
export type PseudoBech32 = string;

export type KeyRole = 'private' | 'public';

export type KeyPrefix = 'nsec' | 'npub';

export const KEY_FORMATS = ['hex', 'bech32', 'both'] as const;

/** Textual representation selector. `both` only applies to a whole keypair. */
export type KeyFormat = (typeof KEY_FORMATS)[number];

export type SingleKeyFormat = Exclude<KeyFormat, 'both'>;

export function isKeyFormat(value: string): value is KeyFormat {
  return KEY_FORMATS.some((format) => format === value);
}

export const PREFIX_FOR_ROLE: Readonly<Record<KeyRole, KeyPrefix>> = {
  private: 'nsec',
  public: 'npub',
};

export interface RawKeypair {
  privateKey: Uint8Array;
  publicKey: Uint8Array;
}

export interface FormattedKeypair {
  privateKey: string;
  publicKey: string;
}

export interface FormattedKeypairBoth {
  hex: FormattedKeypair;
  bech32: FormattedKeypair;
}
