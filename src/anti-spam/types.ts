import { MarketEvent } from '../events/types';

/**
 * Minimums a node enforces on incoming proofs.
 */
export interface AntiSpamPolicy {
  /** Leading zero bits an event id must carry for a PoW proof */
  minPowDifficulty: number;
  minPaymentSats: number;
  /** Kinds that only accept an event-reference proof */
  referenceRequiredKinds: number[];
}

export type ProofError =
  | 'MissingProof'
  | 'AmbiguousProof'
  | 'InsufficientDifficulty'
  | 'UnconfirmedPayment'
  | 'PaymentAlreadyConsumed'
  | 'ReferenceAlreadyConsumed'
  | 'ReferenceNotFound';

export type AntiSpamProof =
  | { type: 'pow'; nonce: string; difficulty: number }
  | { type: 'ln'; paymentHash: string; amountSats: number }
  | { type: 'ref'; eventId: string; kind: number };

export type ProofType = AntiSpamProof['type'];

/**
 * A reference proof that passed validation but is only spent once the
 * event carrying it has been accepted.
 */
export interface ReferenceClaim {
  author: string;
  eventId: string;
  /** Kind of the event spending the reference */
  spendingKind: number;
}

/**
 * A payment proof stamps a single event; the hash is spent on acceptance.
 */
export interface PaymentClaim {
  paymentHash: string;
}

export type ProofClaim = ReferenceClaim | PaymentClaim;

export interface ValidatedProof {
  proof: AntiSpamProof;
  claim?: ProofClaim;
}

export interface EventLookup {
  getEvent(id: string): MarketEvent | undefined;
}
