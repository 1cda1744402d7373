/**
 * Market Types
 *
 * Derived views of the event stream: listings, bids and the transaction
 * aggregate rooted at a listing once one of its bids is accepted.
 */

import { FundDistribution } from '../escrow/types';
import { ReceiptStatus, ResolutionOutcome } from '../events/content';

export interface MarketPolicy {
  /** Buyer collateral must be at least this fraction of the bid */
  minBuyerCollateralRatio: number;
  /** Bids may exceed the asking price by at most this fraction */
  maxOverbidRatio: number;
  defaultHtlcTimeoutBlocks: number;
  blockIntervalSeconds: number;
}

export enum TransactionState {
  LISTED = 'Listed',
  BID_RECEIVED = 'BidReceived',
  BID_ACCEPTED = 'BidAccepted',
  PAYMENT_CONFIRMED = 'PaymentConfirmed',
  COMPLETED = 'Completed',
  DISPUTED = 'Disputed',
  ARBITRATION_OFFERED = 'ArbitrationOffered',
  MUTUALLY_AGREED = 'MutuallyAgreed',
  REFUNDED = 'Refunded',
  EXPIRED = 'Expired',
}

export const TERMINAL_STATES: readonly TransactionState[] = [
  TransactionState.COMPLETED,
  TransactionState.REFUNDED,
  TransactionState.EXPIRED,
];

export function isTerminalState(state: TransactionState): boolean {
  return TERMINAL_STATES.includes(state);
}

export enum BidState {
  RECEIVED = 'BidReceived',
  ACCEPTED = 'BidAccepted',
  CLOSED = 'Closed',
}

export interface Listing {
  id: string;
  seller: string;
  productName: string;
  description: string;
  priceSats: number;
  sellerCollateralSats: number;
  category?: string;
  createdAt: number;
  state: TransactionState;
}

export interface CounterOffer {
  eventId: string;
  amountSats: number;
  message?: string;
}

export interface Bid {
  id: string;
  listingId: string;
  buyer: string;
  amountSats: number;
  buyerCollateralSats: number;
  paymentHash?: string;
  message?: string;
  counterOffer?: CounterOffer;
  createdAt: number;
  state: BidState;
}

export interface TransactionRefs {
  listing: string;
  bid: string;
  acceptance: string;
  collateralDeposits: string[];
  payment?: string;
  receipt?: string;
  /** Escrow disputes and non-received receipts */
  disputes: string[];
  agreements: string[];
  arbitrationOffer?: string;
  arbitrationResolution?: string;
  refund?: string;
}

export interface DisputeInfo {
  eventId: string;
  raisedBy: string;
  reason: string;
  receiptStatus?: ReceiptStatus;
}

export interface AgreementProposal {
  eventId: string;
  proposedBy: string;
  outcome: ResolutionOutcome;
}

export interface TransitionRecord {
  from: TransactionState;
  to: TransactionState;
  /** Undefined for clock-driven transitions */
  eventId?: string;
  kind?: number;
  at: number;
}

export interface Transaction {
  id: string;
  listingId: string;
  seller: string;
  buyer: string;
  bidId: string;
  acceptanceId: string;
  state: TransactionState;
  amountSats: number;
  buyerCollateralSats: number;
  sellerCollateralSats: number;
  invoice: string;
  timeout: number;
  timeoutBlocks: number;
  refs: TransactionRefs;
  dispute?: DisputeInfo;
  agreement?: AgreementProposal;
  arbitrator?: string;
  arbitrationFeeSats?: number;
  history: TransitionRecord[];
  createdAt: number;
  updatedAt: number;
  closedAt?: number;
}

export type TransitionError = 'InvalidTransition' | 'AmountMismatch' | 'PreimageMismatch' | 'IncompleteFunding';

/**
 * What an accepted event did. `transition` is absent for events that are
 * recorded without moving the transaction (counter bids, deposits, messages).
 */
export interface AppliedEvent {
  listingId: string;
  transactionId?: string;
  eventId: string;
  kind: number;
  transition?: TransitionRecord;
  distribution?: FundDistribution;
}

export interface TimeoutResult {
  transactionId: string;
  transition: TransitionRecord;
  distribution: FundDistribution;
}
