/**
 * Event Codec & Verifier
 *
 * Canonical serialization, content-addressed ids and Schnorr signatures.
 * Everything here is pure; the node decides what to do with a failure.
 */

import {
  canonicalEventBytes,
  isHex32,
  isHex64,
  keyPairFromPrivateKey,
  sha256,
  signSchnorr,
  verifySchnorr,
} from '../crypto';
import { Outcome, fail, ok } from '../errors';
import { EventTemplate, MarketEvent, Tag, UnsignedEvent } from './types';

export type VerifyError = 'IdMismatch' | 'BadSignature';

export type MalformedError = 'Malformed';

export function canonicalize(
  pubkey: string,
  createdAt: number,
  kind: number,
  tags: Tag[],
  content: string
): Buffer {
  return canonicalEventBytes(pubkey, createdAt, kind, tags, content);
}

export function computeId(bytes: Uint8Array): string {
  return sha256(bytes);
}

export function getEventId(event: UnsignedEvent): string {
  return computeId(canonicalize(event.pubkey, event.created_at, event.kind, event.tags, event.content));
}

/**
 * Recompute the id, then check the signature over it.
 */
export function verifyEvent(event: MarketEvent): Outcome<void, VerifyError> {
  let expectedId: string;
  try {
    expectedId = computeId(canonicalize(event.pubkey, event.created_at, event.kind, event.tags, event.content));
  } catch (err) {
    return fail('IdMismatch', `Event cannot be serialized: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (expectedId !== event.id) {
    return fail('IdMismatch', `Event id ${event.id.slice(0, 16)}… does not match its content`);
  }

  if (!verifySchnorr(event.id, event.sig, event.pubkey)) {
    return fail('BadSignature', `Signature does not verify for author ${event.pubkey.slice(0, 16)}…`);
  }

  return ok(undefined);
}

export function signEvent(event: UnsignedEvent, privateKeyHex: string): MarketEvent {
  const id = getEventId(event);
  return {
    id,
    pubkey: event.pubkey,
    created_at: event.created_at,
    kind: event.kind,
    tags: event.tags,
    content: event.content,
    sig: signSchnorr(id, privateKeyHex),
  };
}

/**
 * Attach the author's key, compute the id and sign.
 */
export function finalizeEvent(template: EventTemplate, privateKeyHex: string): MarketEvent {
  const { publicKey } = keyPairFromPrivateKey(privateKeyHex);
  return signEvent({ ...template, pubkey: publicKey }, privateKeyHex);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTagList(value: unknown): value is Tag[] {
  return Array.isArray(value) && value.every(tag => Array.isArray(tag) && tag.every(entry => typeof entry === 'string'));
}

/**
 * Structural validation of an event received from the network.
 * Does not check the id or signature; see verifyEvent.
 */
export function parseEvent(raw: unknown): Outcome<MarketEvent, MalformedError> {
  let value: unknown = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      return fail('Malformed', 'Event is not valid JSON');
    }
  }

  if (!isRecord(value)) return fail('Malformed', 'Event must be an object');

  const { id, pubkey, created_at: createdAt, kind, tags, content, sig } = value;

  if (typeof id !== 'string' || !isHex32(id)) return fail('Malformed', 'Invalid event id format');
  if (typeof pubkey !== 'string' || !isHex32(pubkey)) return fail('Malformed', 'Invalid pubkey format');
  if (typeof createdAt !== 'number' || !Number.isSafeInteger(createdAt) || createdAt < 0) {
    return fail('Malformed', 'created_at must be a non-negative integer timestamp');
  }
  if (typeof kind !== 'number' || !Number.isSafeInteger(kind) || kind < 0) {
    return fail('Malformed', 'kind must be a non-negative integer');
  }
  if (!isTagList(tags)) return fail('Malformed', 'tags must be an array of string arrays');
  if (typeof content !== 'string') return fail('Malformed', 'content must be a string');
  if (typeof sig !== 'string' || !isHex64(sig)) return fail('Malformed', 'Invalid signature format');

  return ok({ id, pubkey, created_at: createdAt, kind, tags, content, sig });
}

export function serializeEvent(event: MarketEvent): string {
  return JSON.stringify({
    id: event.id,
    pubkey: event.pubkey,
    created_at: event.created_at,
    kind: event.kind,
    tags: event.tags,
    content: event.content,
    sig: event.sig,
  });
}
