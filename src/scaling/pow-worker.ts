/**
 * PoW Worker: mines anti-spam nonces off the main event loop
 *
 * Receives { id, event, difficulty, startNonce, batchSize } and answers
 * { id, result } when a nonce is found or { id, error } on failure.
 * Cancellation is done by the pool terminating the thread.
 */
import { parentPort } from 'worker_threads';
import { mineRange } from '../anti-spam/pow';
import { UnsignedEvent } from '../events/types';

export interface PowTaskMessage {
  id: string;
  event: UnsignedEvent;
  difficulty: number;
  startNonce: number;
  batchSize: number;
}

function handle(msg: PowTaskMessage): void {
  let nonce = msg.startNonce;
  for (;;) {
    const found = mineRange(msg.event, msg.difficulty, nonce, msg.batchSize);
    if (found) {
      parentPort?.postMessage({ id: msg.id, result: { ...found, attempts: nonce - msg.startNonce + found.attempts } });
      return;
    }
    nonce += msg.batchSize;
  }
}

parentPort?.on('message', (msg: PowTaskMessage) => {
  try {
    handle(msg);
  } catch (err) {
    parentPort?.postMessage({ id: msg.id, error: err instanceof Error ? err.message : 'Worker error' });
  }
});
