import { createHash } from 'crypto';
import * as secp from '@noble/secp256k1';
import { Hex } from '../types';

const HEX_RE = /^[0-9a-fA-F]*$/;

export function sha256Hex(input: string): Hex {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

export function sha256Bytes(input: string): Uint8Array {
  return new Uint8Array(createHash('sha256').update(input, 'utf8').digest());
}

export function isHex(s: string): boolean {
  return s.length % 2 === 0 && HEX_RE.test(s);
}

function toHex(b: Uint8Array): Hex {
  return Buffer.from(b).toString('hex');
}

/**
 * Addresses are hex public keys. Raw 64-byte points get the uncompressed
 * 0x04 marker so they decode the same as their prefixed form; compressed
 * keys pass through. Returns null when the string cannot be a key.
 */
export function normalizePublicKey(address: string): Hex | null {
  const key = address.toLowerCase();
  if (!isHex(key)) return null;
  if (key.length === 128) return '04' + key;
  if (key.length === 130 && key.startsWith('04')) return key;
  if (key.length === 66 && (key.startsWith('02') || key.startsWith('03'))) return key;
  return null;
}

export function verifySignature(message: string, signatureHex: Hex, address: string): boolean {
  const pub = normalizePublicKey(address);
  if (!pub || !isHex(signatureHex)) return false;
  try {
    return secp.verify(signatureHex, sha256Bytes(message), pub, { strict: false });
  } catch (e) {
    return false;
  }
}

export async function signMessage(message: string, privateKeyHex: Hex): Promise<Hex> {
  const sig = await secp.sign(sha256Bytes(message), privateKeyHex, { der: false });
  return toHex(sig);
}

export type KeyPair = {
  privateKey: Hex;
  publicKey: Hex; // uncompressed, 04-prefixed
};

export function generateKeyPair(): KeyPair {
  const priv = secp.utils.randomPrivateKey();
  return { privateKey: toHex(priv), publicKey: toHex(secp.getPublicKey(priv)) };
}

export function publicKeyOf(privateKeyHex: Hex): Hex {
  return toHex(secp.getPublicKey(privateKeyHex));
}
