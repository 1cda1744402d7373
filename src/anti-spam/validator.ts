/**
 * Anti-Spam Validator
 *
 * Every event carries exactly one proof tag:
 * - pow: the event id has at least `difficulty` leading zero bits
 * - ln:  a settled payment of at least the declared amount and the policy
 *        minimum, spent by exactly one event
 * - ref: an earlier event by the same author, spent at most once per kind
 *
 * Payment and reference claims are reserved while the event is being applied
 * and only committed when it is accepted, so a rejected event keeps its proof.
 */

import { errorMessage, fail, ok, Outcome } from '../errors';
import { getProofTags } from '../events/tags';
import { MarketEvent, Tag } from '../events/types';
import { PaymentNetwork } from '../network/types';
import { logger, StructuredLogger } from '../scaling/structured-logger';
import { meetsDifficulty } from './pow';
import {
  AntiSpamPolicy,
  AntiSpamProof,
  EventLookup,
  PaymentClaim,
  ProofClaim,
  ProofError,
  ReferenceClaim,
  ValidatedProof,
} from './types';

const HEX_32 = /^[0-9a-f]{64}$/;
const UINT = /^\d+$/;

export function parseProofTag(tag: Tag): AntiSpamProof | undefined {
  const [, type, a, b] = tag;
  if (a === undefined || b === undefined || !UINT.test(b)) return undefined;

  switch (type) {
    case 'pow':
      return { type: 'pow', nonce: a, difficulty: Number(b) };
    case 'ln':
      return HEX_32.test(a) ? { type: 'ln', paymentHash: a, amountSats: Number(b) } : undefined;
    case 'ref':
      return HEX_32.test(a) ? { type: 'ref', eventId: a, kind: Number(b) } : undefined;
    default:
      return undefined;
  }
}

export function claimKey(claim: ProofClaim): string {
  if ('paymentHash' in claim) return `ln:${claim.paymentHash}`;
  return `ref:${claim.author}:${claim.eventId}:${claim.spendingKind}`;
}

export class AntiSpamValidator {
  private policy: AntiSpamPolicy;
  private events: EventLookup;
  private payments?: PaymentNetwork;
  private log: StructuredLogger;

  private consumed: Set<string> = new Set();
  private reserved: Set<string> = new Set();

  constructor(opts: {
    policy: AntiSpamPolicy;
    events: EventLookup;
    payments?: PaymentNetwork;
    logger?: StructuredLogger;
  }) {
    this.policy = opts.policy;
    this.events = opts.events;
    this.payments = opts.payments;
    this.log = opts.logger ?? logger;
  }

  getPolicy(): AntiSpamPolicy {
    return this.policy;
  }

  /**
   * Pick the single proof tag off an event.
   */
  extractProof(event: MarketEvent): Outcome<AntiSpamProof, ProofError> {
    const tags = getProofTags(event.tags);
    if (tags.length === 0) {
      return fail('MissingProof', 'Event carries no anti-spam proof');
    }
    if (tags.length > 1) {
      return fail('AmbiguousProof', `Event carries ${tags.length} anti-spam proofs, expected one`);
    }
    const proof = parseProofTag(tags[0]);
    if (!proof) {
      return fail('MissingProof', `Unrecognized anti-spam proof: ${tags[0].slice(1).join(',')}`);
    }
    return ok(proof);
  }

  async validate(event: MarketEvent): Promise<Outcome<ValidatedProof, ProofError>> {
    const extracted = this.extractProof(event);
    if (!extracted.success) return extracted;
    const proof = extracted.value;

    if (this.policy.referenceRequiredKinds.includes(event.kind) && proof.type !== 'ref') {
      return fail('MissingProof', `Kind ${event.kind} requires an event-reference proof`);
    }

    switch (proof.type) {
      case 'pow':
        return this.checkPow(event, proof.difficulty, proof);
      case 'ln':
        return this.checkPayment(proof.paymentHash, proof.amountSats, proof);
      case 'ref':
        return this.checkReference(event, proof.eventId, proof.kind, proof);
    }
  }

  private checkPow(event: MarketEvent, difficulty: number, proof: AntiSpamProof): Outcome<ValidatedProof, ProofError> {
    if (difficulty < this.policy.minPowDifficulty) {
      return fail(
        'InsufficientDifficulty',
        `Declared difficulty ${difficulty} is below the required ${this.policy.minPowDifficulty}`
      );
    }
    if (!meetsDifficulty(event.id, difficulty)) {
      return fail('InsufficientDifficulty', `Event id does not have ${difficulty} leading zero bits`);
    }
    return ok({ proof });
  }

  private async checkPayment(
    paymentHash: string,
    declaredSats: number,
    proof: AntiSpamProof
  ): Promise<Outcome<ValidatedProof, ProofError>> {
    if (!this.payments) {
      return fail('UnconfirmedPayment', 'No payment network configured to confirm payment proofs');
    }
    const claim: PaymentClaim = { paymentHash };
    if (this.consumed.has(claimKey(claim))) {
      return fail('PaymentAlreadyConsumed', `Payment ${paymentHash.slice(0, 16)} already stamped another event`);
    }

    try {
      const record = await this.payments.lookupPayment(paymentHash);
      if (!record || !record.settled) {
        return fail('UnconfirmedPayment', `Payment ${paymentHash.slice(0, 16)} is not settled`);
      }
      if (record.amountSats < this.policy.minPaymentSats) {
        return fail(
          'UnconfirmedPayment',
          `Payment of ${record.amountSats} sats is below the required ${this.policy.minPaymentSats}`
        );
      }
      if (record.amountSats < declaredSats) {
        return fail('UnconfirmedPayment', `Payment of ${record.amountSats} sats is below the declared ${declaredSats}`);
      }
      return ok({ proof, claim });
    } catch (err) {
      this.log.warn('AntiSpam', 'Payment lookup failed', { paymentHash, error: errorMessage(err) });
      return fail('UnconfirmedPayment', `Payment lookup failed: ${errorMessage(err)}`);
    }
  }

  private checkReference(
    event: MarketEvent,
    eventId: string,
    declaredKind: number,
    proof: AntiSpamProof
  ): Outcome<ValidatedProof, ProofError> {
    const referenced = this.events.getEvent(eventId);
    if (!referenced) {
      return fail('ReferenceNotFound', `Referenced event ${eventId.slice(0, 16)} is not stored`);
    }
    if (referenced.pubkey !== event.pubkey) {
      return fail('ReferenceNotFound', 'Referenced event was written by another author');
    }
    if (referenced.kind !== declaredKind) {
      return fail('ReferenceNotFound', `Referenced event is kind ${referenced.kind}, proof declares ${declaredKind}`);
    }

    const claim: ReferenceClaim = { author: event.pubkey, eventId, spendingKind: event.kind };
    if (this.consumed.has(claimKey(claim))) {
      return fail('ReferenceAlreadyConsumed', `Reference ${eventId.slice(0, 16)} already used for kind ${event.kind}`);
    }
    return ok({ proof, claim });
  }

  /**
   * Hold a claim while its event is applied. False if it is already spent
   * or held by another event in flight.
   */
  reserve(claim: ProofClaim): boolean {
    const key = claimKey(claim);
    if (this.consumed.has(key) || this.reserved.has(key)) return false;
    this.reserved.add(key);
    return true;
  }

  commit(claim: ProofClaim): void {
    const key = claimKey(claim);
    this.reserved.delete(key);
    this.consumed.add(key);
  }

  release(claim: ProofClaim): void {
    this.reserved.delete(claimKey(claim));
  }

  isConsumed(claim: ProofClaim): boolean {
    return this.consumed.has(claimKey(claim));
  }

  clear(): void {
    this.consumed.clear();
    this.reserved.clear();
  }
}
