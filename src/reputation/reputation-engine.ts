/**
 * Reputation Engine
 *
 * Turns feedback events (321/322/323) and rated receipt confirmations (313)
 * into reputation records, and aggregates records into scores.
 *
 * Scoring:
 *   - time weight:    exp(-age_days / 365)
 *   - volume weight:  log10(max(1, amount_sats / 100_000))
 *   - bonus:          1 + 0.2 (verified purchase) + 0.3 (escrow completed)
 *   - score:          weighted average of ratings, 0 when the weights sum to 0
 *
 * Sybil resistance comes from the inputs: a user rating must reference a
 * terminal transaction the rater was party to, and each rater gets one
 * record per transaction.
 */

import { fail, ok, Outcome } from '../errors';
import { EventContent, ReceiptContent } from '../events/content';
import { EventKind, MarketEvent } from '../events/types';
import { isTerminalState, Transaction, TransactionState } from '../market/types';
import { logger, StructuredLogger } from '../scaling/structured-logger';
import { ReputationStore } from './reputation-store';
import { ReliabilityLabel, ReputationError, ReputationRecord, ReputationSummary } from './types';

const SECONDS_PER_DAY = 24 * 3600;
const TIME_DECAY_DAYS = 365;
const VOLUME_UNIT_SATS = 100_000;
const VERIFIED_PURCHASE_BONUS = 0.2;
const ESCROW_COMPLETED_BONUS = 0.3;
const SATS_PER_BTC = 100_000_000;
const RECENT_WINDOW_SECONDS = 30 * SECONDS_PER_DAY;
const MIN_RECORDS_FOR_RELIABILITY = 5;

type ReputationResult = Outcome<ReputationRecord | undefined, ReputationError>;

export function recordWeight(record: ReputationRecord, now: number): number {
  const ageDays = Math.max(0, now - record.timestamp) / SECONDS_PER_DAY;
  const timeWeight = Math.exp(-ageDays / TIME_DECAY_DAYS);
  const volumeWeight = Math.log10(Math.max(1, record.amountSats / VOLUME_UNIT_SATS));
  const bonus =
    1 + (record.verifiedPurchase ? VERIFIED_PURCHASE_BONUS : 0) + (record.escrowCompleted ? ESCROW_COMPLETED_BONUS : 0);
  return timeWeight * volumeWeight * bonus;
}

/**
 * Weighted average rating over the records, or 0 when there is nothing to
 * weigh.
 */
export function computeScore(records: ReputationRecord[], now: number): number {
  let totalWeight = 0;
  let weighted = 0;
  for (const record of records) {
    const weight = recordWeight(record, now);
    totalWeight += weight;
    weighted += record.rating * weight;
  }
  return totalWeight > 0 ? weighted / totalWeight : 0;
}

export function trustScore(summary: ReputationSummary): number {
  const score =
    0.4 * (summary.overallScore / 5) +
    0.2 * Math.min(1, summary.volumeBtc / 10) +
    0.2 * Math.min(1, summary.totalTransactions / 50) +
    0.1 * Math.min(1, summary.uniqueReviewers / 20) +
    0.1 * (summary.verifiedPurchases / Math.max(1, summary.totalTransactions));
  return Math.min(1, Math.max(0, score));
}

/**
 * Gini coefficient of reviews per reviewer.
 */
export function giniCoefficient(reviewers: string[]): number {
  if (reviewers.length === 0) return 0;
  const counts = new Map<string, number>();
  for (const reviewer of reviewers) {
    counts.set(reviewer, (counts.get(reviewer) ?? 0) + 1);
  }
  const sorted = [...counts.values()].sort((a, b) => a - b);
  const n = sorted.length;
  const total = sorted.reduce((sum, c) => sum + c, 0);
  const cumulative = sorted.reduce((sum, c, i) => sum + (i + 1) * c, 0);
  return Math.min(1, Math.max(0, (2 * cumulative) / (n * total) - (n + 1) / n));
}

export function reliabilityLabel(totalTransactions: number, overallScore: number): ReliabilityLabel {
  if (totalTransactions === 0) return 'Unknown';
  if (totalTransactions < MIN_RECORDS_FOR_RELIABILITY) {
    return totalTransactions < 3 ? 'New Seller' : 'Limited Data';
  }
  if (overallScore >= 4.5) return 'Excellent';
  if (overallScore >= 4.0) return 'Good';
  if (overallScore >= 3.5) return 'Average';
  if (overallScore >= 2.5) return 'Below Average';
  return 'Poor';
}

function average(values: Array<number | undefined>): number | undefined {
  const present = values.filter((v): v is number => v !== undefined);
  return present.length > 0 ? present.reduce((sum, v) => sum + v, 0) / present.length : undefined;
}

export function summarizeRecords(subject: string, records: ReputationRecord[], now: number): ReputationSummary {
  const timestamps = records.map(r => r.timestamp);
  const reviewers = records.map(r => r.rater);
  const totalVolumeSats = records.reduce((sum, r) => sum + r.amountSats, 0);
  const overallScore = computeScore(records, now);
  const disputed = records.filter(r => r.disputed).length;

  return {
    subject,
    totalTransactions: records.length,
    totalVolumeSats,
    volumeBtc: totalVolumeSats / SATS_PER_BTC,
    overallScore,
    avgItemQuality: average(records.map(r => r.itemQuality)),
    avgShippingSpeed: average(records.map(r => r.shippingSpeed)),
    avgCommunication: average(records.map(r => r.communication)),
    avgPaymentReliability: average(records.map(r => r.paymentReliability)),
    verifiedPurchases: records.filter(r => r.verifiedPurchase).length,
    completedEscrows: records.filter(r => r.escrowCompleted).length,
    disputeRate: records.length > 0 ? disputed / records.length : 0,
    firstTimestamp: timestamps.length > 0 ? Math.min(...timestamps) : undefined,
    lastTimestamp: timestamps.length > 0 ? Math.max(...timestamps) : undefined,
    recentActivity: timestamps.filter(t => t > now - RECENT_WINDOW_SECONDS).length,
    uniqueReviewers: new Set(reviewers).size,
    reviewConcentration: giniCoefficient(reviewers),
    reliability: reliabilityLabel(records.length, overallScore),
  };
}

export class ReputationEngine {
  private store: ReputationStore;
  private log: StructuredLogger;

  constructor(opts: { store: ReputationStore; logger?: StructuredLogger }) {
    this.store = opts.store;
    this.log = opts.logger ?? logger;
  }

  getStore(): ReputationStore {
    return this.store;
  }

  record(record: ReputationRecord): Outcome<void, ReputationError> {
    return this.store.record(record);
  }

  /**
   * Derive and store the record a feedback event carries. `tx` is the
   * transaction the feedback references, if known. Resolves to undefined
   * for events that carry no rating.
   */
  apply(event: MarketEvent, parsed: EventContent, tx: Transaction | undefined): ReputationResult {
    const derived = this.derive(event, parsed, tx);
    if (!derived.success || derived.value === undefined) return derived;

    const stored = this.store.record(derived.value);
    if (!stored.success) return stored;

    this.log.debug('Reputation', `Recorded ${derived.value.subjectKind} rating ${derived.value.rating}`, {
      subject: derived.value.subject.slice(0, 16),
      rater: derived.value.rater.slice(0, 16),
    });
    return derived;
  }

  /**
   * Check an event without storing anything.
   */
  derive(event: MarketEvent, parsed: EventContent, tx: Transaction | undefined): ReputationResult {
    switch (parsed.kind) {
      case EventKind.USER_REPUTATION_FEEDBACK: {
        const checked = this.checkParticipant(event, tx, parsed.content.transaction_ref);
        if (!checked.success) return checked;
        const counterparty = checked.value.buyer === event.pubkey ? checked.value.seller : checked.value.buyer;
        if (parsed.content.rated_pubkey !== counterparty) {
          return fail('NotAParticipant', 'Only the counterparty of the transaction can be rated');
        }
        return ok({
          ...this.transactionFields(checked.value, event),
          subject: parsed.content.rated_pubkey,
          subjectKind: 'user',
          rating: parsed.content.rating,
          itemQuality: parsed.content.item_quality,
          shippingSpeed: parsed.content.shipping_speed,
          communication: parsed.content.communication,
          paymentReliability: parsed.content.payment_reliability,
          review: parsed.content.review,
        });
      }

      case EventKind.ARBITRATOR_REPUTATION_FEEDBACK: {
        const checked = this.checkParticipant(event, tx, parsed.content.transaction_ref);
        if (!checked.success) return checked;
        if (!checked.value.arbitrator || parsed.content.rated_pubkey !== checked.value.arbitrator) {
          return fail('NotAParticipant', 'Rated key did not arbitrate this transaction');
        }
        return ok({
          ...this.transactionFields(checked.value, event),
          subject: parsed.content.rated_pubkey,
          subjectKind: 'arbitrator',
          rating: parsed.content.rating,
          review: parsed.content.review,
        });
      }

      case EventKind.RELAY_REPUTATION_FEEDBACK:
        return ok({
          subject: parsed.content.relay_url,
          subjectKind: 'relay',
          rater: event.pubkey,
          referencedEventId: parsed.content.relay_url,
          sourceEventId: event.id,
          rating: parsed.content.rating,
          amountSats: 0,
          timestamp: event.created_at,
          verifiedPurchase: false,
          escrowCompleted: false,
          disputed: false,
          review: parsed.content.review,
        });

      case EventKind.RECEIPT_CONFIRMATION:
        return ok(tx ? this.fromReceipt(event, parsed.content, tx) : undefined);

      default:
        return ok(undefined);
    }
  }

  /**
   * A received-and-rated receipt on a completed transaction rates the seller.
   */
  private fromReceipt(event: MarketEvent, content: ReceiptContent, tx: Transaction): ReputationRecord | undefined {
    if (content.status !== 'received' || content.rating === undefined) return undefined;
    if (tx.state !== TransactionState.COMPLETED || event.pubkey !== tx.buyer) return undefined;
    return {
      ...this.transactionFields(tx, event),
      subject: tx.seller,
      subjectKind: 'user',
      rating: content.rating,
      shippingSpeed: content.shipping_rating,
      communication: content.communication_rating,
      review: content.feedback,
    };
  }

  private checkParticipant(
    event: MarketEvent,
    tx: Transaction | undefined,
    transactionRef: string
  ): Outcome<Transaction, ReputationError> {
    if (!tx || tx.id !== transactionRef) {
      return fail('TransactionNotTerminal', `Transaction ${transactionRef.slice(0, 16)} not found`);
    }
    if (!isTerminalState(tx.state)) {
      return fail('TransactionNotTerminal', `Transaction ${tx.id.slice(0, 16)} is still ${tx.state}`);
    }
    if (event.pubkey !== tx.buyer && event.pubkey !== tx.seller) {
      return fail('NotAParticipant', 'Rater was not party to the transaction');
    }
    return ok(tx);
  }

  private transactionFields(
    tx: Transaction,
    event: MarketEvent
  ): Pick<
    ReputationRecord,
    'rater' | 'referencedEventId' | 'sourceEventId' | 'amountSats' | 'timestamp' | 'verifiedPurchase' | 'escrowCompleted' | 'disputed'
  > {
    return {
      rater: event.pubkey,
      referencedEventId: tx.id,
      sourceEventId: event.id,
      amountSats: tx.amountSats,
      timestamp: event.created_at,
      verifiedPurchase: tx.refs.payment !== undefined,
      escrowCompleted: tx.state === TransactionState.COMPLETED,
      disputed: tx.refs.disputes.length > 0,
    };
  }

  computeScore(subject: string, now: number): number {
    return computeScore(this.store.getRecords(subject), now);
  }

  summarize(subject: string, now: number): ReputationSummary {
    return summarizeRecords(subject, this.store.getRecords(subject), now);
  }

  trustScore(subject: string, now: number): number {
    return trustScore(this.summarize(subject, now));
  }

  /**
   * Summaries for several subjects, best overall score first.
   */
  compareSubjects(subjects: string[], now: number): ReputationSummary[] {
    return subjects.map(subject => this.summarize(subject, now)).sort((a, b) => b.overallScore - a.overallScore);
  }

  clear(): void {
    this.store.clear();
  }
}
