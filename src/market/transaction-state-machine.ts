/**
 * Transaction State Machine
 *
 * Folds verified events into listings, bids and transactions.
 *
 *   Listed -> BidReceived -> BidAccepted -> PaymentConfirmed -> Completed
 *                                               |
 *                                            Disputed -> MutuallyAgreed / ArbitrationOffered
 *                                               |
 *                                   Refunded / Completed / Expired
 *
 * Every handler validates first and mutates last. An event that does not fit
 * the current state is rejected with no side effect; escrow failures leave
 * the transaction where it was so the sender can resubmit.
 *
 * Callers serialize events per listing (see KeyedExecutor); this class does
 * not lock.
 */

import { EscrowManager } from '../escrow/escrow-manager';
import { EscrowError, FundDistribution } from '../escrow/types';
import { fail, ok, Outcome } from '../errors';
import {
  AcceptanceContent,
  ArbitrationOfferContent,
  ArbitrationResolutionContent,
  BidContent,
  CollateralDepositContent,
  CounterBidContent,
  DisputeContent,
  EventContent,
  ListingContent,
  MutualAgreementContent,
  PaymentConfirmationContent,
  ReceiptContent,
  RefundContent,
  ResolutionOutcome,
} from '../events/content';
import { getReferences } from '../events/tags';
import { EventKind, MarketEvent } from '../events/types';
import { logger, StructuredLogger } from '../scaling/structured-logger';
import {
  AppliedEvent,
  Bid,
  BidState,
  isTerminalState,
  Listing,
  MarketPolicy,
  TimeoutResult,
  Transaction,
  TransactionState,
  TransitionError,
  TransitionRecord,
} from './types';

type ApplyResult = Outcome<AppliedEvent, TransitionError>;

const EXPIRABLE_STATES: readonly TransactionState[] = [
  TransactionState.BID_ACCEPTED,
  TransactionState.PAYMENT_CONFIRMED,
  TransactionState.DISPUTED,
  TransactionState.MUTUALLY_AGREED,
  TransactionState.ARBITRATION_OFFERED,
];

const REFUNDABLE_STATES: readonly TransactionState[] = [
  TransactionState.PAYMENT_CONFIRMED,
  TransactionState.DISPUTED,
  TransactionState.MUTUALLY_AGREED,
  TransactionState.ARBITRATION_OFFERED,
];

const DISPUTE_STATES: readonly TransactionState[] = [
  TransactionState.DISPUTED,
  TransactionState.MUTUALLY_AGREED,
  TransactionState.ARBITRATION_OFFERED,
];

function invalid(message: string): { success: false; error: TransitionError; message: string } {
  return fail('InvalidTransition', message);
}

function short(id: string): string {
  return id.slice(0, 12);
}

// Escrow errors that describe the caller's proof map through; the rest mean
// the event arrived at the wrong time.
function fromEscrowError(error: EscrowError, message: string): { success: false; error: TransitionError; message: string } {
  switch (error) {
    case 'AmountMismatch':
    case 'PreimageMismatch':
    case 'IncompleteFunding':
      return fail(error, message);
    default:
      return invalid(message);
  }
}

export class TransactionStateMachine {
  private listings: Map<string, Listing> = new Map();
  private bids: Map<string, Bid> = new Map();
  private transactions: Map<string, Transaction> = new Map();
  /** Any transaction event id -> listing id */
  private roots: Map<string, string> = new Map();

  private policy: MarketPolicy;
  private escrow: EscrowManager;
  private log: StructuredLogger;

  constructor(opts: { policy: MarketPolicy; escrow: EscrowManager; logger?: StructuredLogger }) {
    this.policy = opts.policy;
    this.escrow = opts.escrow;
    this.log = opts.logger ?? logger;
  }

  // ── Queries ──

  getListing(id: string): Listing | undefined {
    return this.listings.get(id);
  }

  getBid(id: string): Bid | undefined {
    return this.bids.get(id);
  }

  getBidsForListing(listingId: string): Bid[] {
    return [...this.bids.values()].filter(bid => bid.listingId === listingId);
  }

  getTransaction(id: string): Transaction | undefined {
    return this.transactions.get(id);
  }

  listListings(): Listing[] {
    return [...this.listings.values()];
  }

  listTransactions(state?: TransactionState): Transaction[] {
    const all = [...this.transactions.values()];
    return state ? all.filter(tx => tx.state === state) : all;
  }

  /**
   * State of the listing's transaction, or of the listing itself before a bid
   * is accepted.
   */
  getState(listingId: string): TransactionState | undefined {
    return this.transactions.get(listingId)?.state ?? this.listings.get(listingId)?.state;
  }

  countOpen(): number {
    let open = 0;
    for (const tx of this.transactions.values()) {
      if (!isTerminalState(tx.state)) open++;
    }
    return open;
  }

  /**
   * The listing an event belongs to, used to pick its serialization lane.
   * Falls back to the event's own id when nothing is known yet.
   */
  rootOf(event: MarketEvent, parsed?: EventContent): string {
    if (event.kind === EventKind.PRODUCT_LISTING) return event.id;

    const rootTag = getReferences(event.tags).find(ref => ref.marker === 'root');
    if (rootTag) return rootTag.eventId;

    if (parsed) {
      const resolved = this.resolveListingId(parsed);
      if (resolved) return resolved;
    }
    return event.id;
  }

  private resolveListingId(parsed: EventContent): string | undefined {
    switch (parsed.kind) {
      case EventKind.PRODUCT_LISTING:
        return undefined;
      case EventKind.BID_SUBMISSION:
        return parsed.content.product_ref;
      case EventKind.COUNTER_BID:
      case EventKind.BID_ACCEPTANCE:
        return this.roots.get(parsed.content.bid_ref);
      case EventKind.COLLATERAL_DEPOSIT:
      case EventKind.PAYMENT_CONFIRMATION:
        return this.roots.get(parsed.content.acceptance_ref);
      case EventKind.ESCROW_DISPUTE:
      case EventKind.RECEIPT_CONFIRMATION:
        return this.roots.get(parsed.content.payment_ref);
      case EventKind.MUTUAL_AGREEMENT:
      case EventKind.ARBITRATION_OFFER:
        return this.roots.get(parsed.content.dispute_ref);
      case EventKind.ARBITRATION_RESOLUTION:
        return this.roots.get(parsed.content.offer_ref);
      case EventKind.REFUND_INITIATION:
      case EventKind.USER_REPUTATION_FEEDBACK:
      case EventKind.ARBITRATOR_REPUTATION_FEEDBACK:
        return parsed.content.transaction_ref;
      case EventKind.COMMUNICATION_MESSAGE:
        return parsed.content.transaction_ref;
      case EventKind.RELAY_REPUTATION_FEEDBACK:
        return undefined;
    }
  }

  // A root tag, when present, must agree with the content references
  private checkRootTag(event: MarketEvent, listingId: string): ApplyResult | undefined {
    const rootTag = getReferences(event.tags).find(ref => ref.marker === 'root');
    if (rootTag && rootTag.eventId !== listingId) {
      return invalid(`Root reference ${short(rootTag.eventId)} does not match listing ${short(listingId)}`);
    }
    return undefined;
  }

  // ── Event application ──

  async apply(event: MarketEvent, parsed: EventContent): Promise<ApplyResult> {
    switch (parsed.kind) {
      case EventKind.PRODUCT_LISTING:
        return this.applyListing(event, parsed.content);
      case EventKind.BID_SUBMISSION:
        return this.applyBid(event, parsed.content);
      case EventKind.COUNTER_BID:
        return this.applyCounterBid(event, parsed.content);
      case EventKind.BID_ACCEPTANCE:
        return this.applyAcceptance(event, parsed.content);
      case EventKind.COLLATERAL_DEPOSIT:
        return this.applyCollateralDeposit(event, parsed.content);
      case EventKind.PAYMENT_CONFIRMATION:
        return this.applyPaymentConfirmation(event, parsed.content);
      case EventKind.ESCROW_DISPUTE:
        return this.applyDispute(event, parsed.content);
      case EventKind.RECEIPT_CONFIRMATION:
        return this.applyReceipt(event, parsed.content);
      case EventKind.REFUND_INITIATION:
        return this.applyRefund(event, parsed.content);
      case EventKind.MUTUAL_AGREEMENT:
        return this.applyMutualAgreement(event, parsed.content);
      case EventKind.ARBITRATION_OFFER:
        return this.applyArbitrationOffer(event, parsed.content);
      case EventKind.ARBITRATION_RESOLUTION:
        return this.applyArbitrationResolution(event, parsed.content);
      case EventKind.COMMUNICATION_MESSAGE:
        return ok({ listingId: this.rootOf(event, parsed), eventId: event.id, kind: event.kind });
      case EventKind.USER_REPUTATION_FEEDBACK:
      case EventKind.ARBITRATOR_REPUTATION_FEEDBACK:
      case EventKind.RELAY_REPUTATION_FEEDBACK:
        // Feedback does not move transactions; the reputation engine takes it
        return ok({ listingId: this.rootOf(event, parsed), eventId: event.id, kind: event.kind });
    }
  }

  private applyListing(event: MarketEvent, content: ListingContent): ApplyResult {
    if (this.listings.has(event.id)) {
      return invalid(`Listing ${short(event.id)} already exists`);
    }
    const listing: Listing = {
      id: event.id,
      seller: event.pubkey,
      productName: content.product_name,
      description: content.description,
      priceSats: content.price_satoshis,
      sellerCollateralSats: content.seller_collateral_satoshis ?? 0,
      category: content.category,
      createdAt: event.created_at,
      state: TransactionState.LISTED,
    };
    this.listings.set(listing.id, listing);
    this.roots.set(listing.id, listing.id);
    return ok({ listingId: listing.id, eventId: event.id, kind: event.kind });
  }

  private applyBid(event: MarketEvent, content: BidContent): ApplyResult {
    const listing = this.listings.get(content.product_ref);
    if (!listing) {
      return invalid(`Referenced listing ${short(content.product_ref)} not found`);
    }
    const rootError = this.checkRootTag(event, listing.id);
    if (rootError) return rootError;

    if (listing.state !== TransactionState.LISTED && listing.state !== TransactionState.BID_RECEIVED) {
      return invalid(`Listing ${short(listing.id)} is ${listing.state} and no longer takes bids`);
    }
    if (event.pubkey === listing.seller) {
      return invalid('Sellers cannot bid on their own listing');
    }
    const amount = content.bid_amount_satoshis;
    const minCollateral = amount * this.policy.minBuyerCollateralRatio;
    if (content.buyer_collateral_satoshis < minCollateral) {
      return invalid(`Buyer collateral ${content.buyer_collateral_satoshis} is below the required ${Math.ceil(minCollateral)} sats`);
    }
    const maxBid = listing.priceSats * (1 + this.policy.maxOverbidRatio);
    if (amount > maxBid) {
      return invalid(`Bid of ${amount} sats exceeds the ${Math.floor(maxBid)} sat limit for this listing`);
    }

    const bid: Bid = {
      id: event.id,
      listingId: listing.id,
      buyer: event.pubkey,
      amountSats: amount,
      buyerCollateralSats: content.buyer_collateral_satoshis,
      paymentHash: content.payment_hash,
      message: content.message,
      createdAt: event.created_at,
      state: BidState.RECEIVED,
    };
    this.bids.set(bid.id, bid);
    this.roots.set(bid.id, listing.id);

    let transition: TransitionRecord | undefined;
    if (listing.state === TransactionState.LISTED) {
      transition = this.recordListingTransition(listing, TransactionState.BID_RECEIVED, event);
    }
    return ok({ listingId: listing.id, eventId: event.id, kind: event.kind, transition });
  }

  private applyCounterBid(event: MarketEvent, content: CounterBidContent): ApplyResult {
    const bid = this.bids.get(content.bid_ref);
    if (!bid) return invalid(`Referenced bid ${short(content.bid_ref)} not found`);
    const listing = this.listings.get(bid.listingId);
    if (!listing) return invalid(`Listing for bid ${short(bid.id)} not found`);
    const rootError = this.checkRootTag(event, listing.id);
    if (rootError) return rootError;

    if (event.pubkey !== listing.seller) {
      return invalid('Only the seller can counter a bid');
    }
    if (bid.state !== BidState.RECEIVED) {
      return invalid(`Bid ${short(bid.id)} is ${bid.state}`);
    }

    bid.counterOffer = { eventId: event.id, amountSats: content.counter_amount_satoshis, message: content.message };
    this.roots.set(event.id, listing.id);
    return ok({ listingId: listing.id, eventId: event.id, kind: event.kind });
  }

  private applyAcceptance(event: MarketEvent, content: AcceptanceContent): ApplyResult {
    const bid = this.bids.get(content.bid_ref);
    if (!bid) return invalid(`Referenced bid ${short(content.bid_ref)} not found`);
    const listing = this.listings.get(bid.listingId);
    if (!listing) return invalid(`Listing for bid ${short(bid.id)} not found`);
    const rootError = this.checkRootTag(event, listing.id);
    if (rootError) return rootError;

    if (event.pubkey !== listing.seller) {
      return invalid('Only the seller can accept a bid');
    }
    if (this.transactions.has(listing.id)) {
      return invalid(`Listing ${short(listing.id)} already has an accepted bid`);
    }
    if (bid.state !== BidState.RECEIVED || listing.state !== TransactionState.BID_RECEIVED) {
      return invalid(`Bid ${short(bid.id)} is ${bid.state}, listing is ${listing.state}`);
    }
    if (content.invoice_amount_satoshis !== bid.amountSats) {
      return fail('AmountMismatch', `Invoice of ${content.invoice_amount_satoshis} sats does not match the bid of ${bid.amountSats}`);
    }

    const timeoutBlocks = content.htlc_timeout_blocks ?? this.policy.defaultHtlcTimeoutBlocks;
    const timeout = event.created_at + timeoutBlocks * this.policy.blockIntervalSeconds;

    this.escrow.create({
      transactionId: listing.id,
      purchaseAmountSats: bid.amountSats,
      buyerCollateralSats: bid.buyerCollateralSats,
      sellerCollateralSats: listing.sellerCollateralSats,
      timeout,
      timeoutBlocks,
      buyer: bid.buyer,
      seller: listing.seller,
      paymentHash: bid.paymentHash,
      createdAt: event.created_at,
    });

    const tx: Transaction = {
      id: listing.id,
      listingId: listing.id,
      seller: listing.seller,
      buyer: bid.buyer,
      bidId: bid.id,
      acceptanceId: event.id,
      state: TransactionState.BID_ACCEPTED,
      amountSats: bid.amountSats,
      buyerCollateralSats: bid.buyerCollateralSats,
      sellerCollateralSats: listing.sellerCollateralSats,
      invoice: content.ln_invoice,
      timeout,
      timeoutBlocks,
      refs: {
        listing: listing.id,
        bid: bid.id,
        acceptance: event.id,
        collateralDeposits: [],
        disputes: [],
        agreements: [],
      },
      history: [],
      createdAt: event.created_at,
      updatedAt: event.created_at,
    };
    this.transactions.set(tx.id, tx);
    this.roots.set(event.id, listing.id);

    bid.state = BidState.ACCEPTED;
    for (const sibling of this.getBidsForListing(listing.id)) {
      if (sibling.id !== bid.id) sibling.state = BidState.CLOSED;
    }

    const transition = this.recordListingTransition(listing, TransactionState.BID_ACCEPTED, event);
    tx.history.push(transition);
    return ok({ listingId: listing.id, transactionId: tx.id, eventId: event.id, kind: event.kind, transition });
  }

  private async applyCollateralDeposit(event: MarketEvent, content: CollateralDepositContent): Promise<ApplyResult> {
    const tx = this.findTransaction(content.acceptance_ref);
    if (!tx) return invalid(`Referenced acceptance ${short(content.acceptance_ref)} not found`);
    const rootError = this.checkRootTag(event, tx.id);
    if (rootError) return rootError;

    if (content.acceptance_ref !== tx.acceptanceId) {
      return invalid('Collateral deposits must reference the acceptance');
    }
    if (tx.state !== TransactionState.BID_ACCEPTED) {
      return invalid(`Transaction ${short(tx.id)} is ${tx.state}, expected BidAccepted`);
    }
    const party = event.pubkey === tx.seller ? 'seller' : event.pubkey === tx.buyer ? 'buyer' : undefined;
    if (!party) return invalid('Only the buyer or seller can deposit collateral');

    const recorded = await this.escrow.recordCollateral(tx.id, party, content.collateral_proof);
    if (!recorded.success) return fromEscrowError(recorded.error, recorded.message);

    tx.refs.collateralDeposits.push(event.id);
    tx.updatedAt = event.created_at;
    this.roots.set(event.id, tx.id);
    return ok({ listingId: tx.listingId, transactionId: tx.id, eventId: event.id, kind: event.kind });
  }

  private async applyPaymentConfirmation(event: MarketEvent, content: PaymentConfirmationContent): Promise<ApplyResult> {
    const tx = this.findTransaction(content.acceptance_ref);
    if (!tx) return invalid(`Referenced acceptance ${short(content.acceptance_ref)} not found`);
    const rootError = this.checkRootTag(event, tx.id);
    if (rootError) return rootError;

    if (content.acceptance_ref !== tx.acceptanceId || content.bid_ref !== tx.bidId) {
      return invalid('Payment confirmation must reference the accepted bid and its acceptance');
    }
    if (event.pubkey !== tx.buyer) {
      return invalid('Only the buyer can confirm payment');
    }
    if (tx.state !== TransactionState.BID_ACCEPTED) {
      return invalid(`Transaction ${short(tx.id)} is ${tx.state}, expected BidAccepted`);
    }
    if (content.payment_proof.amount_satoshis !== tx.amountSats) {
      return fail('AmountMismatch', `Payment of ${content.payment_proof.amount_satoshis} sats does not match the accepted ${tx.amountSats}`);
    }
    if (content.collateral_proof && content.collateral_proof.amount_satoshis !== tx.buyerCollateralSats) {
      return fail(
        'AmountMismatch',
        `Collateral of ${content.collateral_proof.amount_satoshis} sats does not match the accepted ${tx.buyerCollateralSats}`
      );
    }

    const funded = await this.escrow.fund(tx.id, content.payment_proof, content.collateral_proof);
    if (!funded.success) return fromEscrowError(funded.error, funded.message);

    tx.refs.payment = event.id;
    this.roots.set(event.id, tx.id);
    const transition = this.transition(tx, TransactionState.PAYMENT_CONFIRMED, event);
    return ok({ listingId: tx.listingId, transactionId: tx.id, eventId: event.id, kind: event.kind, transition });
  }

  private applyDispute(event: MarketEvent, content: DisputeContent): ApplyResult {
    const tx = this.findTransaction(content.payment_ref);
    if (!tx) return invalid(`Referenced payment ${short(content.payment_ref)} not found`);
    const rootError = this.checkRootTag(event, tx.id);
    if (rootError) return rootError;

    if (content.payment_ref !== tx.refs.payment) {
      return invalid('Disputes must reference the payment confirmation');
    }
    if (event.pubkey !== tx.buyer && event.pubkey !== tx.seller) {
      return invalid('Only the buyer or seller can open a dispute');
    }
    if (tx.state !== TransactionState.PAYMENT_CONFIRMED) {
      return invalid(`Transaction ${short(tx.id)} is ${tx.state}, expected PaymentConfirmed`);
    }

    tx.refs.disputes.push(event.id);
    tx.dispute = { eventId: event.id, raisedBy: event.pubkey, reason: content.reason };
    this.roots.set(event.id, tx.id);
    const transition = this.transition(tx, TransactionState.DISPUTED, event);
    return ok({ listingId: tx.listingId, transactionId: tx.id, eventId: event.id, kind: event.kind, transition });
  }

  private applyReceipt(event: MarketEvent, content: ReceiptContent): ApplyResult {
    const tx = this.findTransaction(content.payment_ref);
    if (!tx) return invalid(`Referenced payment ${short(content.payment_ref)} not found`);
    const rootError = this.checkRootTag(event, tx.id);
    if (rootError) return rootError;

    if (content.payment_ref !== tx.refs.payment) {
      return invalid('Receipt confirmations must reference the payment confirmation');
    }
    if (event.pubkey !== tx.buyer) {
      return invalid('Only the buyer can confirm receipt');
    }

    if (content.status !== 'received') {
      if (tx.state !== TransactionState.PAYMENT_CONFIRMED) {
        return invalid(`Transaction ${short(tx.id)} is ${tx.state}, expected PaymentConfirmed`);
      }
      tx.refs.disputes.push(event.id);
      tx.dispute = {
        eventId: event.id,
        raisedBy: event.pubkey,
        reason: content.dispute_reason ?? content.status,
        receiptStatus: content.status,
      };
      this.roots.set(event.id, tx.id);
      const transition = this.transition(tx, TransactionState.DISPUTED, event);
      return ok({ listingId: tx.listingId, transactionId: tx.id, eventId: event.id, kind: event.kind, transition });
    }

    if (tx.state !== TransactionState.PAYMENT_CONFIRMED && !DISPUTE_STATES.includes(tx.state)) {
      return invalid(`Transaction ${short(tx.id)} is ${tx.state}, expected PaymentConfirmed`);
    }

    const released = this.escrow.release(tx.id, content.preimage);
    if (!released.success) return fromEscrowError(released.error, released.message);

    tx.refs.receipt = event.id;
    this.roots.set(event.id, tx.id);
    const transition = this.transition(tx, TransactionState.COMPLETED, event);
    return ok({
      listingId: tx.listingId,
      transactionId: tx.id,
      eventId: event.id,
      kind: event.kind,
      transition,
      distribution: released.value,
    });
  }

  private applyRefund(event: MarketEvent, content: RefundContent): ApplyResult {
    const tx = this.transactions.get(content.transaction_ref);
    if (!tx) return invalid(`Referenced transaction ${short(content.transaction_ref)} not found`);
    const rootError = this.checkRootTag(event, tx.id);
    if (rootError) return rootError;

    if (event.pubkey !== tx.seller) {
      return invalid('Only the seller can initiate a refund');
    }
    if (!REFUNDABLE_STATES.includes(tx.state)) {
      return invalid(`Transaction ${short(tx.id)} is ${tx.state} and cannot be refunded`);
    }

    const refunded = this.escrow.refund(tx.id);
    if (!refunded.success) return fromEscrowError(refunded.error, refunded.message);

    tx.refs.refund = event.id;
    this.roots.set(event.id, tx.id);
    const transition = this.transition(tx, TransactionState.REFUNDED, event);
    return ok({
      listingId: tx.listingId,
      transactionId: tx.id,
      eventId: event.id,
      kind: event.kind,
      transition,
      distribution: refunded.value,
    });
  }

  private applyMutualAgreement(event: MarketEvent, content: MutualAgreementContent): ApplyResult {
    const tx = this.findTransaction(content.dispute_ref);
    if (!tx) return invalid(`Referenced dispute ${short(content.dispute_ref)} not found`);
    const rootError = this.checkRootTag(event, tx.id);
    if (rootError) return rootError;

    if (!tx.refs.disputes.includes(content.dispute_ref)) {
      return invalid('Mutual agreements must reference a dispute');
    }
    if (event.pubkey !== tx.buyer && event.pubkey !== tx.seller) {
      return invalid('Only the buyer or seller can agree on a resolution');
    }

    if (tx.state === TransactionState.DISPUTED) {
      tx.agreement = { eventId: event.id, proposedBy: event.pubkey, outcome: content.outcome };
      tx.refs.agreements.push(event.id);
      this.roots.set(event.id, tx.id);
      const transition = this.transition(tx, TransactionState.MUTUALLY_AGREED, event);
      return ok({ listingId: tx.listingId, transactionId: tx.id, eventId: event.id, kind: event.kind, transition });
    }

    if (tx.state !== TransactionState.MUTUALLY_AGREED || !tx.agreement) {
      return invalid(`Transaction ${short(tx.id)} is ${tx.state}, expected Disputed or MutuallyAgreed`);
    }
    if (tx.agreement.proposedBy === event.pubkey) {
      return invalid('The counterparty must confirm the agreement');
    }
    if (tx.agreement.outcome !== content.outcome) {
      return invalid(`Counterparty proposed ${content.outcome}, agreement is ${tx.agreement.outcome}`);
    }

    const resolved = this.resolveDispute(tx, content.outcome, content.preimage);
    if (!resolved.success) return resolved;

    tx.refs.agreements.push(event.id);
    this.roots.set(event.id, tx.id);
    const transition = this.transition(tx, resolved.value.state, event);
    return ok({
      listingId: tx.listingId,
      transactionId: tx.id,
      eventId: event.id,
      kind: event.kind,
      transition,
      distribution: resolved.value.distribution,
    });
  }

  private applyArbitrationOffer(event: MarketEvent, content: ArbitrationOfferContent): ApplyResult {
    const tx = this.findTransaction(content.dispute_ref);
    if (!tx) return invalid(`Referenced dispute ${short(content.dispute_ref)} not found`);
    const rootError = this.checkRootTag(event, tx.id);
    if (rootError) return rootError;

    if (!tx.refs.disputes.includes(content.dispute_ref)) {
      return invalid('Arbitration offers must reference a dispute');
    }
    if (event.pubkey === tx.buyer || event.pubkey === tx.seller) {
      return invalid('Arbitrators must be a third party');
    }
    if (tx.state !== TransactionState.DISPUTED) {
      return invalid(`Transaction ${short(tx.id)} is ${tx.state}, expected Disputed`);
    }

    tx.arbitrator = event.pubkey;
    tx.arbitrationFeeSats = content.fee_satoshis;
    tx.refs.arbitrationOffer = event.id;
    this.roots.set(event.id, tx.id);
    const transition = this.transition(tx, TransactionState.ARBITRATION_OFFERED, event);
    return ok({ listingId: tx.listingId, transactionId: tx.id, eventId: event.id, kind: event.kind, transition });
  }

  private applyArbitrationResolution(event: MarketEvent, content: ArbitrationResolutionContent): ApplyResult {
    const tx = this.findTransaction(content.offer_ref);
    if (!tx) return invalid(`Referenced arbitration offer ${short(content.offer_ref)} not found`);
    const rootError = this.checkRootTag(event, tx.id);
    if (rootError) return rootError;

    if (content.offer_ref !== tx.refs.arbitrationOffer) {
      return invalid('Resolutions must reference the arbitration offer');
    }
    if (event.pubkey !== tx.arbitrator) {
      return invalid('Only the arbitrator who made the offer can resolve');
    }
    if (tx.state !== TransactionState.ARBITRATION_OFFERED) {
      return invalid(`Transaction ${short(tx.id)} is ${tx.state}, expected ArbitrationOffered`);
    }

    const resolved = this.resolveDispute(tx, content.outcome, content.preimage);
    if (!resolved.success) return resolved;

    tx.refs.arbitrationResolution = event.id;
    this.roots.set(event.id, tx.id);
    const transition = this.transition(tx, resolved.value.state, event);
    return ok({
      listingId: tx.listingId,
      transactionId: tx.id,
      eventId: event.id,
      kind: event.kind,
      transition,
      distribution: resolved.value.distribution,
    });
  }

  private resolveDispute(
    tx: Transaction,
    outcome: ResolutionOutcome,
    preimage: string | undefined
  ): Outcome<{ state: TransactionState; distribution: FundDistribution }, TransitionError> {
    if (outcome === 'refund') {
      const refunded = this.escrow.refund(tx.id);
      if (!refunded.success) return fromEscrowError(refunded.error, refunded.message);
      return ok({ state: TransactionState.REFUNDED, distribution: refunded.value });
    }
    const released = this.escrow.release(tx.id, preimage);
    if (!released.success) return fromEscrowError(released.error, released.message);
    return ok({ state: TransactionState.COMPLETED, distribution: released.value });
  }

  // ── Timeouts ──

  /**
   * Expire the transaction if its escrow timeout has passed. Driven by the
   * clock, not by an event.
   */
  checkTimeout(transactionId: string, now: number): TimeoutResult | undefined {
    const tx = this.transactions.get(transactionId);
    if (!tx || !EXPIRABLE_STATES.includes(tx.state) || now <= tx.timeout) return undefined;

    const expired = this.escrow.expire(tx.id, now);
    if (!expired.success) {
      this.log.warn('StateMachine', 'Escrow refused to expire', { transactionId, error: expired.error, message: expired.message });
      return undefined;
    }

    const transition = this.transition(tx, TransactionState.EXPIRED, undefined, now);
    return { transactionId: tx.id, transition, distribution: expired.value };
  }

  /**
   * Ids of transactions whose timeout has passed and that are still open.
   */
  dueForTimeout(now: number): string[] {
    return [...this.transactions.values()]
      .filter(tx => EXPIRABLE_STATES.includes(tx.state) && now > tx.timeout)
      .map(tx => tx.id);
  }

  clear(): void {
    this.listings.clear();
    this.bids.clear();
    this.transactions.clear();
    this.roots.clear();
  }

  // ── Helpers ──

  private findTransaction(eventId: string): Transaction | undefined {
    const listingId = this.roots.get(eventId);
    return listingId ? this.transactions.get(listingId) : undefined;
  }

  private recordListingTransition(listing: Listing, to: TransactionState, event: MarketEvent): TransitionRecord {
    const record: TransitionRecord = { from: listing.state, to, eventId: event.id, kind: event.kind, at: event.created_at };
    listing.state = to;
    this.log.info('StateMachine', `${short(listing.id)} ${record.from} -> ${to}`, { listingId: listing.id, eventId: event.id });
    return record;
  }

  private transition(tx: Transaction, to: TransactionState, event: MarketEvent | undefined, at?: number): TransitionRecord {
    const record: TransitionRecord = {
      from: tx.state,
      to,
      eventId: event?.id,
      kind: event?.kind,
      at: event?.created_at ?? at ?? Math.floor(Date.now() / 1000),
    };
    tx.state = to;
    tx.updatedAt = record.at;
    tx.history.push(record);
    if (isTerminalState(to)) tx.closedAt = record.at;

    const listing = this.listings.get(tx.listingId);
    if (listing) listing.state = to;

    this.log.info('StateMachine', `${short(tx.id)} ${record.from} -> ${to}`, { transactionId: tx.id, eventId: event?.id });
    return record;
  }
}
