import { PROOF_TAG, withoutProofTags } from '../events/tags';
import { Tag, UnsignedEvent } from '../events/types';

export function paymentProofTag(paymentHash: string, amountSats: number): Tag {
  return [PROOF_TAG, 'ln', paymentHash, String(amountSats)];
}

export function referenceProofTag(eventId: string, kind: number): Tag {
  return [PROOF_TAG, 'ref', eventId, String(kind)];
}

/**
 * Replace whatever proof an event carries with `tag`.
 */
export function withProofTag(event: UnsignedEvent, tag: Tag): UnsignedEvent {
  return { ...event, tags: [...withoutProofTags(event.tags), tag] };
}
