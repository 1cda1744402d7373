/**
 * Event Builders
 *
 * Typed constructors for outbound events. A builder only shapes the template;
 * the participant stamps the anti-spam proof and signs it afterwards.
 *
 * Every event that belongs to a transaction carries a `root` reference to the
 * listing and a `reply` reference to the event it answers.
 */

import { ContentByKind } from './content';
import { identifierTag, refTag } from './tags';
import { EventKind, EventTemplate, Tag } from './types';

export interface TemplateRefs {
  /** Listing id the event belongs to */
  root?: string;
  /** Event the new one answers */
  reply?: string;
  mentions?: string[];
  relayHint?: string;
  identifier?: string;
}

export function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

function buildTags(refs: TemplateRefs): Tag[] {
  const tags: Tag[] = [];
  const relay = refs.relayHint ?? '';
  if (refs.identifier) tags.push(identifierTag(refs.identifier));
  if (refs.root) tags.push(refTag(refs.root, 'root', relay));
  if (refs.reply && refs.reply !== refs.root) tags.push(refTag(refs.reply, 'reply', relay));
  for (const mention of refs.mentions ?? []) {
    tags.push(refTag(mention, 'mention', relay));
  }
  return tags;
}

function dropUndefined<T extends object>(content: T): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(content)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function buildTemplate<K extends EventKind>(
  kind: K,
  content: ContentByKind[K],
  refs: TemplateRefs = {},
  createdAt: number = unixNow()
): EventTemplate {
  return {
    kind,
    created_at: createdAt,
    tags: buildTags(refs),
    content: JSON.stringify(dropUndefined(content)),
  };
}

export function listingTemplate(content: ContentByKind[EventKind.PRODUCT_LISTING], createdAt?: number): EventTemplate {
  return buildTemplate(EventKind.PRODUCT_LISTING, content, { identifier: content.product_name }, createdAt);
}

export function bidTemplate(
  listingId: string,
  content: Omit<ContentByKind[EventKind.BID_SUBMISSION], 'product_ref'>,
  createdAt?: number
): EventTemplate {
  return buildTemplate(
    EventKind.BID_SUBMISSION,
    { product_ref: listingId, ...content },
    { root: listingId, reply: listingId },
    createdAt
  );
}

export function counterBidTemplate(
  listingId: string,
  bidId: string,
  counterAmountSats: number,
  message?: string,
  createdAt?: number
): EventTemplate {
  return buildTemplate(
    EventKind.COUNTER_BID,
    { bid_ref: bidId, counter_amount_satoshis: counterAmountSats, message },
    { root: listingId, reply: bidId },
    createdAt
  );
}

export function acceptanceTemplate(
  listingId: string,
  content: ContentByKind[EventKind.BID_ACCEPTANCE],
  createdAt?: number
): EventTemplate {
  return buildTemplate(EventKind.BID_ACCEPTANCE, content, { root: listingId, reply: content.bid_ref }, createdAt);
}

export function collateralDepositTemplate(
  listingId: string,
  content: ContentByKind[EventKind.COLLATERAL_DEPOSIT],
  createdAt?: number
): EventTemplate {
  return buildTemplate(EventKind.COLLATERAL_DEPOSIT, content, { root: listingId, reply: content.acceptance_ref }, createdAt);
}

export function paymentConfirmationTemplate(
  listingId: string,
  content: ContentByKind[EventKind.PAYMENT_CONFIRMATION],
  createdAt?: number
): EventTemplate {
  return buildTemplate(
    EventKind.PAYMENT_CONFIRMATION,
    content,
    { root: listingId, reply: content.acceptance_ref, mentions: [content.bid_ref] },
    createdAt
  );
}

export function disputeTemplate(
  listingId: string,
  content: ContentByKind[EventKind.ESCROW_DISPUTE],
  createdAt?: number
): EventTemplate {
  return buildTemplate(EventKind.ESCROW_DISPUTE, content, { root: listingId, reply: content.payment_ref }, createdAt);
}

export function receiptTemplate(
  listingId: string,
  content: ContentByKind[EventKind.RECEIPT_CONFIRMATION],
  createdAt?: number
): EventTemplate {
  return buildTemplate(EventKind.RECEIPT_CONFIRMATION, content, { root: listingId, reply: content.payment_ref }, createdAt);
}

export function refundTemplate(listingId: string, reason?: string, createdAt?: number): EventTemplate {
  return buildTemplate(
    EventKind.REFUND_INITIATION,
    { transaction_ref: listingId, reason },
    { root: listingId, reply: listingId },
    createdAt
  );
}

export function mutualAgreementTemplate(
  listingId: string,
  content: ContentByKind[EventKind.MUTUAL_AGREEMENT],
  createdAt?: number
): EventTemplate {
  return buildTemplate(EventKind.MUTUAL_AGREEMENT, content, { root: listingId, reply: content.dispute_ref }, createdAt);
}

export function arbitrationOfferTemplate(
  listingId: string,
  content: ContentByKind[EventKind.ARBITRATION_OFFER],
  createdAt?: number
): EventTemplate {
  return buildTemplate(EventKind.ARBITRATION_OFFER, content, { root: listingId, reply: content.dispute_ref }, createdAt);
}

export function arbitrationResolutionTemplate(
  listingId: string,
  content: ContentByKind[EventKind.ARBITRATION_RESOLUTION],
  createdAt?: number
): EventTemplate {
  return buildTemplate(EventKind.ARBITRATION_RESOLUTION, content, { root: listingId, reply: content.offer_ref }, createdAt);
}

export function messageTemplate(content: ContentByKind[EventKind.COMMUNICATION_MESSAGE], createdAt?: number): EventTemplate {
  const refs: TemplateRefs = content.transaction_ref
    ? { root: content.transaction_ref, reply: content.transaction_ref }
    : {};
  return buildTemplate(EventKind.COMMUNICATION_MESSAGE, content, refs, createdAt);
}

export function userFeedbackTemplate(
  content: ContentByKind[EventKind.USER_REPUTATION_FEEDBACK],
  createdAt?: number
): EventTemplate {
  return buildTemplate(
    EventKind.USER_REPUTATION_FEEDBACK,
    content,
    { root: content.transaction_ref, reply: content.transaction_ref },
    createdAt
  );
}

export function arbitratorFeedbackTemplate(
  content: ContentByKind[EventKind.ARBITRATOR_REPUTATION_FEEDBACK],
  createdAt?: number
): EventTemplate {
  return buildTemplate(
    EventKind.ARBITRATOR_REPUTATION_FEEDBACK,
    content,
    { root: content.transaction_ref, reply: content.transaction_ref },
    createdAt
  );
}

export function relayFeedbackTemplate(
  content: ContentByKind[EventKind.RELAY_REPUTATION_FEEDBACK],
  createdAt?: number
): EventTemplate {
  return buildTemplate(EventKind.RELAY_REPUTATION_FEEDBACK, content, {}, createdAt);
}
