/**
 * Proof-of-Work
 *
 * The proof tag ["anti_spam_proof","pow",nonce,difficulty] is part of the
 * signed tags, so mining means re-hashing the event with successive nonces
 * until its id starts with `difficulty` zero bits. Checking is one hash.
 */

import { leadingZeroBits } from '../crypto';
import { ProtocolError } from '../errors';
import { getEventId } from '../events/codec';
import { PROOF_TAG, withoutProofTags } from '../events/tags';
import { Tag, UnsignedEvent } from '../events/types';

const DEFAULT_BATCH_SIZE = 2_000;

export interface MinedEvent {
  event: UnsignedEvent;
  id: string;
  nonce: number;
  attempts: number;
}

export interface MineOptions {
  signal?: AbortSignal;
  /** Hashes between yields to the event loop */
  batchSize?: number;
  startNonce?: number;
}

export function powTag(nonce: number | string, difficulty: number): Tag {
  return [PROOF_TAG, 'pow', String(nonce), String(difficulty)];
}

export function meetsDifficulty(eventId: string, difficulty: number): boolean {
  return leadingZeroBits(eventId) >= difficulty;
}

function withNonce(event: UnsignedEvent, baseTags: Tag[], nonce: number, difficulty: number): UnsignedEvent {
  return { ...event, tags: [...baseTags, powTag(nonce, difficulty)] };
}

/**
 * Search `maxAttempts` nonces starting at `startNonce`. Blocks the caller;
 * used inside the worker thread and by the cooperative miner below.
 */
export function mineRange(
  event: UnsignedEvent,
  difficulty: number,
  startNonce: number,
  maxAttempts: number
): MinedEvent | undefined {
  const baseTags = withoutProofTags(event.tags);
  for (let i = 0; i < maxAttempts; i++) {
    const nonce = startNonce + i;
    const candidate = withNonce(event, baseTags, nonce, difficulty);
    const id = getEventId(candidate);
    if (meetsDifficulty(id, difficulty)) {
      return { event: candidate, id, nonce, attempts: i + 1 };
    }
  }
  return undefined;
}

function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Mine in-process, yielding between batches so ingestion keeps running.
 * Rejects with ProtocolError('ABORTED') once the signal fires.
 */
export async function mineEvent(event: UnsignedEvent, difficulty: number, opts: MineOptions = {}): Promise<MinedEvent> {
  const batchSize = opts.batchSize ?? DEFAULT_BATCH_SIZE;
  let nonce = opts.startNonce ?? 0;
  let attempts = 0;

  for (;;) {
    if (opts.signal?.aborted) {
      throw new ProtocolError('ABORTED', `Mining cancelled after ${attempts} attempts`);
    }
    const found = mineRange(event, difficulty, nonce, batchSize);
    if (found) {
      return { ...found, attempts: attempts + found.attempts };
    }
    nonce += batchSize;
    attempts += batchSize;
    await yieldToEventLoop();
  }
}
