/**
 * Event Content Schemas
 *
 * Each event kind carries a JSON document in `content`. parseContent turns it
 * into a tagged union keyed by kind so the state machine never touches an
 * untyped map. Wire field names stay snake_case; amounts are integer sats.
 */

import { Outcome, fail, ok } from '../errors';
import { EventKind } from './types';

export interface PaymentProof {
  payment_hash: string;
  amount_satoshis: number;
}

export type PaymentMethod = 'lightning_htlc' | 'lightning_keysend' | 'onchain';
export type ReceiptStatus = 'received' | 'partially_received' | 'not_received' | 'damaged';
export type ResolutionOutcome = 'refund' | 'release';

export const PAYMENT_METHODS: readonly PaymentMethod[] = ['lightning_htlc', 'lightning_keysend', 'onchain'];
export const RECEIPT_STATUSES: readonly ReceiptStatus[] = ['received', 'partially_received', 'not_received', 'damaged'];
export const RESOLUTION_OUTCOMES: readonly ResolutionOutcome[] = ['refund', 'release'];

const INVOICE_PREFIXES = ['lnbc', 'lntb', 'lnbcrt'];
const MAX_PRODUCT_NAME_LENGTH = 100;
const HEX_32 = /^[0-9a-f]{64}$/;

export interface ListingContent {
  product_name: string;
  description: string;
  price_satoshis: number;
  seller_collateral_satoshis?: number;
  category?: string;
  storage_link?: string;
  shipping_info?: Record<string, unknown>;
}

export interface BidContent {
  product_ref: string;
  bid_amount_satoshis: number;
  buyer_collateral_satoshis: number;
  /** Hash of a buyer-held escrow preimage */
  payment_hash?: string;
  message?: string;
  payment_timeout_hours?: number;
}

export interface CounterBidContent {
  bid_ref: string;
  counter_amount_satoshis: number;
  message?: string;
}

export interface AcceptanceContent {
  bid_ref: string;
  ln_invoice: string;
  invoice_amount_satoshis: number;
  htlc_timeout_blocks?: number;
  terms?: string;
  shipping_time_days?: number;
}

export interface CollateralDepositContent {
  acceptance_ref: string;
  collateral_proof: PaymentProof;
  message?: string;
}

export interface PaymentConfirmationContent {
  acceptance_ref: string;
  bid_ref: string;
  payment_proof: PaymentProof;
  payment_method: PaymentMethod;
  collateral_proof?: PaymentProof;
  payment_timestamp?: number;
}

export interface DisputeContent {
  payment_ref: string;
  reason: string;
  evidence?: string;
}

export interface ReceiptContent {
  payment_ref: string;
  status: ReceiptStatus;
  dispute_reason?: string;
  preimage?: string;
  rating?: number;
  feedback?: string;
  item_condition?: string;
  shipping_rating?: number;
  communication_rating?: number;
  would_buy_again?: boolean;
}

export interface RefundContent {
  transaction_ref: string;
  reason?: string;
}

export interface MutualAgreementContent {
  dispute_ref: string;
  outcome: ResolutionOutcome;
  terms?: string;
  preimage?: string;
}

export interface ArbitrationOfferContent {
  dispute_ref: string;
  fee_satoshis: number;
  terms?: string;
}

export interface ArbitrationResolutionContent {
  offer_ref: string;
  outcome: ResolutionOutcome;
  preimage?: string;
  notes?: string;
}

export interface MessageContent {
  message: string;
  transaction_ref?: string;
  recipient?: string;
}

export interface UserFeedbackContent {
  transaction_ref: string;
  rated_pubkey: string;
  rating: number;
  item_quality?: number;
  shipping_speed?: number;
  communication?: number;
  payment_reliability?: number;
  review?: string;
}

export interface ArbitratorFeedbackContent {
  transaction_ref: string;
  rated_pubkey: string;
  rating: number;
  review?: string;
}

export interface RelayFeedbackContent {
  relay_url: string;
  rating: number;
  review?: string;
}

export interface ContentByKind {
  [EventKind.PRODUCT_LISTING]: ListingContent;
  [EventKind.BID_SUBMISSION]: BidContent;
  [EventKind.COUNTER_BID]: CounterBidContent;
  [EventKind.BID_ACCEPTANCE]: AcceptanceContent;
  [EventKind.COLLATERAL_DEPOSIT]: CollateralDepositContent;
  [EventKind.PAYMENT_CONFIRMATION]: PaymentConfirmationContent;
  [EventKind.ESCROW_DISPUTE]: DisputeContent;
  [EventKind.RECEIPT_CONFIRMATION]: ReceiptContent;
  [EventKind.REFUND_INITIATION]: RefundContent;
  [EventKind.MUTUAL_AGREEMENT]: MutualAgreementContent;
  [EventKind.ARBITRATION_OFFER]: ArbitrationOfferContent;
  [EventKind.ARBITRATION_RESOLUTION]: ArbitrationResolutionContent;
  [EventKind.COMMUNICATION_MESSAGE]: MessageContent;
  [EventKind.USER_REPUTATION_FEEDBACK]: UserFeedbackContent;
  [EventKind.ARBITRATOR_REPUTATION_FEEDBACK]: ArbitratorFeedbackContent;
  [EventKind.RELAY_REPUTATION_FEEDBACK]: RelayFeedbackContent;
}

export type EventContent = {
  [K in EventKind]: { kind: K; content: ContentByKind[K] };
}[EventKind];

export type ContentError = 'InvalidContent';

class ContentValidationError extends Error {}

/**
 * Reads typed fields off a parsed JSON object, throwing on the first bad one.
 */
class ContentReader {
  constructor(private readonly data: Record<string, unknown>) {}

  private has(name: string): boolean {
    return this.data[name] !== undefined && this.data[name] !== null;
  }

  requireString(name: string, opts: { maxLength?: number; pattern?: RegExp } = {}): string {
    const value = this.data[name];
    if (typeof value !== 'string' || value.length === 0) {
      throw new ContentValidationError(`Missing required content field: ${name}`);
    }
    if (opts.maxLength !== undefined && value.length > opts.maxLength) {
      throw new ContentValidationError(`${name} is longer than ${opts.maxLength} characters`);
    }
    if (opts.pattern && !opts.pattern.test(value)) {
      throw new ContentValidationError(`${name} has an invalid format`);
    }
    return value;
  }

  optionalString(name: string, opts: { maxLength?: number; pattern?: RegExp } = {}): string | undefined {
    return this.has(name) ? this.requireString(name, opts) : undefined;
  }

  requireInt(name: string, opts: { min?: number; max?: number } = {}): number {
    const value = this.data[name];
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
      throw new ContentValidationError(
        value === undefined ? `Missing required content field: ${name}` : `${name} must be an integer`
      );
    }
    if (opts.min !== undefined && value < opts.min) {
      throw new ContentValidationError(`${name} must be >= ${opts.min}`);
    }
    if (opts.max !== undefined && value > opts.max) {
      throw new ContentValidationError(`${name} must be <= ${opts.max}`);
    }
    return value;
  }

  optionalInt(name: string, opts: { min?: number; max?: number } = {}): number | undefined {
    return this.has(name) ? this.requireInt(name, opts) : undefined;
  }

  requireEnum<T extends string>(name: string, values: readonly T[]): T {
    const raw = this.data[name];
    const match = values.find(v => v === raw);
    if (match === undefined) {
      throw new ContentValidationError(`Invalid ${name}: ${String(raw)}`);
    }
    return match;
  }

  optionalBoolean(name: string): boolean | undefined {
    if (!this.has(name)) return undefined;
    const value = this.data[name];
    if (typeof value !== 'boolean') throw new ContentValidationError(`${name} must be a boolean`);
    return value;
  }

  optionalRecord(name: string): Record<string, unknown> | undefined {
    if (!this.has(name)) return undefined;
    const value = this.data[name];
    if (!isRecord(value)) throw new ContentValidationError(`${name} must be an object`);
    return value;
  }

  requireProof(name: string): PaymentProof {
    const value = this.data[name];
    if (!isRecord(value)) throw new ContentValidationError(`Missing required content field: ${name}`);
    const inner = new ContentReader(value);
    return {
      payment_hash: inner.requireString('payment_hash', { pattern: HEX_32 }),
      amount_satoshis: inner.requireInt('amount_satoshis', { min: 1 }),
    };
  }

  optionalProof(name: string): PaymentProof | undefined {
    return this.has(name) ? this.requireProof(name) : undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRating(r: ContentReader, name: string): number {
  return r.requireInt(name, { min: 1, max: 5 });
}

function optionalRating(r: ContentReader, name: string): number | undefined {
  return r.optionalInt(name, { min: 1, max: 5 });
}

function parseListing(r: ContentReader): ListingContent {
  return {
    product_name: r.requireString('product_name', { maxLength: MAX_PRODUCT_NAME_LENGTH }),
    description: r.requireString('description'),
    price_satoshis: r.requireInt('price_satoshis', { min: 1 }),
    seller_collateral_satoshis: r.optionalInt('seller_collateral_satoshis', { min: 0 }),
    category: r.optionalString('category'),
    storage_link: r.optionalString('storage_link'),
    shipping_info: r.optionalRecord('shipping_info'),
  };
}

function parseBid(r: ContentReader): BidContent {
  return {
    product_ref: r.requireString('product_ref', { pattern: HEX_32 }),
    bid_amount_satoshis: r.requireInt('bid_amount_satoshis', { min: 1 }),
    buyer_collateral_satoshis: r.requireInt('buyer_collateral_satoshis', { min: 0 }),
    payment_hash: r.optionalString('payment_hash', { pattern: HEX_32 }),
    message: r.optionalString('message'),
    payment_timeout_hours: r.optionalInt('payment_timeout_hours', { min: 1 }),
  };
}

function parseAcceptance(r: ContentReader): AcceptanceContent {
  const invoice = r.requireString('ln_invoice');
  if (!INVOICE_PREFIXES.some(prefix => invoice.startsWith(prefix))) {
    throw new ContentValidationError('Invalid Lightning invoice format');
  }
  return {
    bid_ref: r.requireString('bid_ref', { pattern: HEX_32 }),
    ln_invoice: invoice,
    invoice_amount_satoshis: r.requireInt('invoice_amount_satoshis', { min: 1 }),
    htlc_timeout_blocks: r.optionalInt('htlc_timeout_blocks', { min: 1 }),
    terms: r.optionalString('terms'),
    shipping_time_days: r.optionalInt('shipping_time_days', { min: 0 }),
  };
}

function parseReceipt(r: ContentReader): ReceiptContent {
  const status = r.requireEnum('status', RECEIPT_STATUSES);
  const disputeReason = r.optionalString('dispute_reason');
  if (status !== 'received' && disputeReason === undefined) {
    throw new ContentValidationError('dispute_reason required for non-received status');
  }
  return {
    payment_ref: r.requireString('payment_ref', { pattern: HEX_32 }),
    status,
    dispute_reason: disputeReason,
    preimage: r.optionalString('preimage', { pattern: HEX_32 }),
    rating: optionalRating(r, 'rating'),
    feedback: r.optionalString('feedback'),
    item_condition: r.optionalString('item_condition'),
    shipping_rating: optionalRating(r, 'shipping_rating'),
    communication_rating: optionalRating(r, 'communication_rating'),
    would_buy_again: r.optionalBoolean('would_buy_again'),
  };
}

function parseUserFeedback(r: ContentReader): UserFeedbackContent {
  return {
    transaction_ref: r.requireString('transaction_ref', { pattern: HEX_32 }),
    rated_pubkey: r.requireString('rated_pubkey', { pattern: HEX_32 }),
    rating: readRating(r, 'rating'),
    item_quality: optionalRating(r, 'item_quality'),
    shipping_speed: optionalRating(r, 'shipping_speed'),
    communication: optionalRating(r, 'communication'),
    payment_reliability: optionalRating(r, 'payment_reliability'),
    review: r.optionalString('review'),
  };
}

function parseByKind(kind: EventKind, r: ContentReader): EventContent {
  switch (kind) {
    case EventKind.PRODUCT_LISTING:
      return { kind, content: parseListing(r) };
    case EventKind.BID_SUBMISSION:
      return { kind, content: parseBid(r) };
    case EventKind.COUNTER_BID:
      return {
        kind,
        content: {
          bid_ref: r.requireString('bid_ref', { pattern: HEX_32 }),
          counter_amount_satoshis: r.requireInt('counter_amount_satoshis', { min: 1 }),
          message: r.optionalString('message'),
        },
      };
    case EventKind.BID_ACCEPTANCE:
      return { kind, content: parseAcceptance(r) };
    case EventKind.COLLATERAL_DEPOSIT:
      return {
        kind,
        content: {
          acceptance_ref: r.requireString('acceptance_ref', { pattern: HEX_32 }),
          collateral_proof: r.requireProof('collateral_proof'),
          message: r.optionalString('message'),
        },
      };
    case EventKind.PAYMENT_CONFIRMATION:
      return {
        kind,
        content: {
          acceptance_ref: r.requireString('acceptance_ref', { pattern: HEX_32 }),
          bid_ref: r.requireString('bid_ref', { pattern: HEX_32 }),
          payment_proof: r.requireProof('payment_proof'),
          payment_method: r.requireEnum('payment_method', PAYMENT_METHODS),
          collateral_proof: r.optionalProof('collateral_proof'),
          payment_timestamp: r.optionalInt('payment_timestamp', { min: 0 }),
        },
      };
    case EventKind.ESCROW_DISPUTE:
      return {
        kind,
        content: {
          payment_ref: r.requireString('payment_ref', { pattern: HEX_32 }),
          reason: r.requireString('reason'),
          evidence: r.optionalString('evidence'),
        },
      };
    case EventKind.RECEIPT_CONFIRMATION:
      return { kind, content: parseReceipt(r) };
    case EventKind.REFUND_INITIATION:
      return {
        kind,
        content: {
          transaction_ref: r.requireString('transaction_ref', { pattern: HEX_32 }),
          reason: r.optionalString('reason'),
        },
      };
    case EventKind.MUTUAL_AGREEMENT:
      return {
        kind,
        content: {
          dispute_ref: r.requireString('dispute_ref', { pattern: HEX_32 }),
          outcome: r.requireEnum('outcome', RESOLUTION_OUTCOMES),
          terms: r.optionalString('terms'),
          preimage: r.optionalString('preimage', { pattern: HEX_32 }),
        },
      };
    case EventKind.ARBITRATION_OFFER:
      return {
        kind,
        content: {
          dispute_ref: r.requireString('dispute_ref', { pattern: HEX_32 }),
          fee_satoshis: r.requireInt('fee_satoshis', { min: 0 }),
          terms: r.optionalString('terms'),
        },
      };
    case EventKind.ARBITRATION_RESOLUTION:
      return {
        kind,
        content: {
          offer_ref: r.requireString('offer_ref', { pattern: HEX_32 }),
          outcome: r.requireEnum('outcome', RESOLUTION_OUTCOMES),
          preimage: r.optionalString('preimage', { pattern: HEX_32 }),
          notes: r.optionalString('notes'),
        },
      };
    case EventKind.COMMUNICATION_MESSAGE:
      return {
        kind,
        content: {
          message: r.requireString('message'),
          transaction_ref: r.optionalString('transaction_ref', { pattern: HEX_32 }),
          recipient: r.optionalString('recipient', { pattern: HEX_32 }),
        },
      };
    case EventKind.USER_REPUTATION_FEEDBACK:
      return { kind, content: parseUserFeedback(r) };
    case EventKind.ARBITRATOR_REPUTATION_FEEDBACK:
      return {
        kind,
        content: {
          transaction_ref: r.requireString('transaction_ref', { pattern: HEX_32 }),
          rated_pubkey: r.requireString('rated_pubkey', { pattern: HEX_32 }),
          rating: readRating(r, 'rating'),
          review: r.optionalString('review'),
        },
      };
    case EventKind.RELAY_REPUTATION_FEEDBACK:
      return {
        kind,
        content: {
          relay_url: r.requireString('relay_url', { pattern: /^wss?:\/\/\S+$/ }),
          rating: readRating(r, 'rating'),
          review: r.optionalString('review'),
        },
      };
  }
}

export function parseContent(kind: EventKind, content: string): Outcome<EventContent, ContentError> {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return fail('InvalidContent', 'Content must be valid JSON');
  }
  if (!isRecord(data)) {
    return fail('InvalidContent', 'Content must be a JSON object');
  }

  try {
    return ok(parseByKind(kind, new ContentReader(data)));
  } catch (err) {
    if (err instanceof ContentValidationError) {
      return fail('InvalidContent', err.message);
    }
    throw err;
  }
}

