/**
 * Event Types
 *
 * Wire-level shapes of marketplace events. Events are immutable once signed;
 * every later fact about a listing is a new event pointing back at it.
 */

export enum EventKind {
  PRODUCT_LISTING = 300,
  BID_SUBMISSION = 301,
  COUNTER_BID = 302,
  BID_ACCEPTANCE = 303,
  COLLATERAL_DEPOSIT = 310,
  PAYMENT_CONFIRMATION = 311,
  ESCROW_DISPUTE = 312,
  RECEIPT_CONFIRMATION = 313,
  REFUND_INITIATION = 314,
  MUTUAL_AGREEMENT = 315,
  ARBITRATION_OFFER = 316,
  ARBITRATION_RESOLUTION = 317,
  COMMUNICATION_MESSAGE = 320,
  USER_REPUTATION_FEEDBACK = 321,
  ARBITRATOR_REPUTATION_FEEDBACK = 322,
  RELAY_REPUTATION_FEEDBACK = 323,
}

export const EVENT_KIND_NAMES: Record<EventKind, string> = {
  [EventKind.PRODUCT_LISTING]: 'Product Listing',
  [EventKind.BID_SUBMISSION]: 'Bid Submission',
  [EventKind.COUNTER_BID]: 'Counter Bid',
  [EventKind.BID_ACCEPTANCE]: 'Bid Acceptance',
  [EventKind.COLLATERAL_DEPOSIT]: 'Collateral Deposit',
  [EventKind.PAYMENT_CONFIRMATION]: 'Payment Confirmation',
  [EventKind.ESCROW_DISPUTE]: 'Escrow Dispute',
  [EventKind.RECEIPT_CONFIRMATION]: 'Receipt Confirmation',
  [EventKind.REFUND_INITIATION]: 'Refund Initiation',
  [EventKind.MUTUAL_AGREEMENT]: 'Mutual Agreement',
  [EventKind.ARBITRATION_OFFER]: 'Arbitration Offer',
  [EventKind.ARBITRATION_RESOLUTION]: 'Arbitration Resolution',
  [EventKind.COMMUNICATION_MESSAGE]: 'Communication Message',
  [EventKind.USER_REPUTATION_FEEDBACK]: 'User Reputation Feedback',
  [EventKind.ARBITRATOR_REPUTATION_FEEDBACK]: 'Arbitrator Reputation Feedback',
  [EventKind.RELAY_REPUTATION_FEEDBACK]: 'Relay Reputation Feedback',
};

export const REPUTATION_KINDS: readonly EventKind[] = [
  EventKind.USER_REPUTATION_FEEDBACK,
  EventKind.ARBITRATOR_REPUTATION_FEEDBACK,
  EventKind.RELAY_REPUTATION_FEEDBACK,
];

export function isEventKind(kind: number): kind is EventKind {
  return Object.prototype.hasOwnProperty.call(EVENT_KIND_NAMES, kind);
}

export type Tag = string[];

/**
 * A signed event as it travels over the broadcast network.
 */
export interface MarketEvent {
  id: string;          // SHA-256 of the canonical serialization, hex
  pubkey: string;      // x-only author key, hex
  created_at: number;  // Unix seconds
  kind: number;
  tags: Tag[];
  content: string;
  sig: string;         // BIP-340 signature over id, hex
}

/**
 * Everything an author decides before signing.
 */
export interface EventTemplate {
  kind: EventKind;
  created_at: number;
  tags: Tag[];
  content: string;
}

export interface UnsignedEvent extends EventTemplate {
  pubkey: string;
}

export type RefMarker = 'root' | 'reply' | 'mention';

export interface EventReference {
  eventId: string;
  relayHint: string;
  marker?: RefMarker;
}
