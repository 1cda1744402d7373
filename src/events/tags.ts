import { EventReference, RefMarker, Tag } from './types';

export const REF_TAG = 'ref';
export const IDENTIFIER_TAG = 'd';
export const PROOF_TAG = 'anti_spam_proof';

export function refTag(eventId: string, marker: RefMarker, relayHint = ''): Tag {
  return [REF_TAG, eventId, relayHint, marker];
}

export function identifierTag(identifier: string): Tag {
  return [IDENTIFIER_TAG, identifier];
}

export function getReferences(tags: Tag[]): EventReference[] {
  const refs: EventReference[] = [];
  for (const tag of tags) {
    if (tag[0] !== REF_TAG || tag.length < 2) continue;
    const marker = tag[3];
    refs.push({
      eventId: tag[1],
      relayHint: tag[2] ?? '',
      marker: marker === 'root' || marker === 'reply' || marker === 'mention' ? marker : undefined,
    });
  }
  return refs;
}

export function getProofTags(tags: Tag[]): Tag[] {
  return tags.filter(tag => tag[0] === PROOF_TAG);
}

export function withoutProofTags(tags: Tag[]): Tag[] {
  return tags.filter(tag => tag[0] !== PROOF_TAG);
}
