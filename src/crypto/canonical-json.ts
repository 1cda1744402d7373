/**
 * Canonical JSON for event ids
 *
 * The id of an event is the SHA-256 of
 *   [0,<pubkey>,<created_at>,<kind>,<tags>,<content>]
 * written with no whitespace, fields in that order, strings escaped the way
 * JSON.stringify escapes them (control characters, quote and backslash only;
 * everything else stays raw UTF-8).
 *
 * Only the value shapes an event can hold are accepted: strings, safe
 * integers and arrays of them. Objects are rejected outright because key
 * order would make the encoding ambiguous.
 */

export type CanonicalValue = string | number | CanonicalValue[];

function encodeInteger(value: number): string {
  if (!Number.isFinite(value)) throw new Error('Canonical JSON does not allow NaN/Infinity');
  if (!Number.isInteger(value)) throw new Error('Canonical JSON forbids non-integer numbers');
  if (!Number.isSafeInteger(value)) throw new Error('Integer is outside the safe range');
  // -0 would otherwise print as "0" for one caller and "-0" for another
  return Object.is(value, -0) ? '0' : String(value);
}

export function canonicalJson(value: CanonicalValue): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number') return encodeInteger(value);

  if (Array.isArray(value)) {
    const parts: string[] = [];
    for (const item of value) {
      parts.push(canonicalJson(item));
    }
    return `[${parts.join(',')}]`;
  }

  throw new Error(`Unsupported canonical JSON type: ${typeof value}`);
}

export function canonicalEventBytes(
  pubkey: string,
  createdAt: number,
  kind: number,
  tags: string[][],
  content: string
): Buffer {
  for (const tag of tags) {
    if (!Array.isArray(tag) || tag.some(entry => typeof entry !== 'string')) {
      throw new Error('Event tags must be arrays of strings');
    }
  }
  if (createdAt < 0) throw new Error('created_at must be non-negative');

  return Buffer.from(canonicalJson([0, pubkey, createdAt, kind, tags, content]), 'utf8');
}
