import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VECTORS_DIR = resolve(__dirname, '..', 'vectors');

export interface KeyVector {
  description: string;
  privateKeyHex: string;
  publicKeyHex: string;
  nsec: string;
  npub: string;
}

export function loadKeyVectors(): { description: string; vectors: KeyVector[] } {
  return JSON.parse(readFileSync(resolve(VECTORS_DIR, 'keys.json'), 'utf-8'));
}

/** Secp256k1 group order n. */
export const CURVE_ORDER_HEX = 'fffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141';
