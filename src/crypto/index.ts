import * as crypto from 'crypto';
import * as ecc from 'tiny-secp256k1';
import { ECPairFactory } from 'ecpair';
import { ProtocolError } from '../errors';

const ECPair = ECPairFactory(ecc);

const HEX_32 = /^[0-9a-f]{64}$/;
const HEX_64 = /^[0-9a-f]{128}$/;

export interface KeyPair {
  /** 32-byte secret scalar, hex */
  privateKey: string;
  /** 32-byte x-only public key (BIP-340), hex */
  publicKey: string;
}

export function sha256(data: string | Uint8Array): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return crypto.createHash('sha256').update(buffer).digest('hex');
}

export function sha256Hex(hex: string): string {
  return sha256(Buffer.from(hex, 'hex'));
}

export function isHex32(value: string): boolean {
  return HEX_32.test(value);
}

export function isHex64(value: string): boolean {
  return HEX_64.test(value);
}

export function generateKeyPair(): KeyPair {
  const keyPair = ECPair.makeRandom();
  if (!keyPair.privateKey) {
    throw new ProtocolError('INVALID_KEY', 'Key generation returned no private key');
  }
  return {
    privateKey: keyPair.privateKey.toString('hex'),
    // Compressed SEC1 key minus the parity byte is the x-only key
    publicKey: keyPair.publicKey.subarray(1, 33).toString('hex'),
  };
}

export function keyPairFromPrivateKey(privateKeyHex: string): KeyPair {
  if (!isHex32(privateKeyHex)) {
    throw new ProtocolError('INVALID_KEY', 'Private key must be 32 bytes of lowercase hex');
  }
  const keyPair = ECPair.fromPrivateKey(Buffer.from(privateKeyHex, 'hex'));
  return {
    privateKey: privateKeyHex,
    publicKey: keyPair.publicKey.subarray(1, 33).toString('hex'),
  };
}

/**
 * BIP-340 Schnorr signature over a 32-byte message (an event id).
 */
export function signSchnorr(messageHex: string, privateKeyHex: string): string {
  if (!isHex32(messageHex)) {
    throw new ProtocolError('INVALID_KEY', 'Schnorr messages must be 32 bytes of hex');
  }
  const privateKey = Buffer.from(privateKeyHex, 'hex');
  if (!ecc.isPrivate(privateKey)) {
    throw new ProtocolError('INVALID_KEY', 'Invalid secp256k1 private key');
  }
  const auxRand = crypto.randomBytes(32);
  const signature = ecc.signSchnorr(Buffer.from(messageHex, 'hex'), privateKey, auxRand);
  return Buffer.from(signature).toString('hex');
}

export function verifySchnorr(messageHex: string, signatureHex: string, publicKeyHex: string): boolean {
  if (!isHex32(messageHex) || !isHex64(signatureHex) || !isHex32(publicKeyHex)) {
    return false;
  }
  try {
    const publicKey = Buffer.from(publicKeyHex, 'hex');
    if (!ecc.isXOnlyPoint(publicKey)) return false;
    return ecc.verifySchnorr(Buffer.from(messageHex, 'hex'), publicKey, Buffer.from(signatureHex, 'hex'));
  } catch {
    return false;
  }
}

/**
 * Number of leading zero bits in a hex digest.
 */
export function leadingZeroBits(hex: string): number {
  let bits = 0;
  for (const ch of hex) {
    const nibble = parseInt(ch, 16);
    if (Number.isNaN(nibble)) break;
    if (nibble === 0) {
      bits += 4;
      continue;
    }
    bits += Math.clz32(nibble) - 28;
    break;
  }
  return bits;
}

export function randomHex(bytes: number): string {
  return crypto.randomBytes(bytes).toString('hex');
}

/**
 * Constant-time comparison of two equal-length hex strings.
 */
export function hexEquals(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

export { canonicalEventBytes, canonicalJson } from './canonical-json';
