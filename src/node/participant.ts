/**
 * Participant
 *
 * Outbound side of the protocol for one key pair. Each action builds the
 * event, stamps an anti-spam proof, signs it, ingests it into the local node
 * and, once the node accepts it, hands it to the broadcast network.
 *
 * Proofs:
 * - feedback kinds spend a reference to one of our own earlier events
 * - everything else uses the configured strategy: PoW (worker pool when one
 *   is given, cooperative miner otherwise) or a fresh Lightning payment per
 *   event, paid into an invoice from the fee collector
 */

import { mineEvent, MinedEvent } from '../anti-spam/pow';
import { paymentProofTag, referenceProofTag, withProofTag } from '../anti-spam/proof-tags';
import { keyPairFromPrivateKey, sha256Hex } from '../crypto';
import { errorMessage, ProtocolError } from '../errors';
import {
  acceptanceTemplate,
  arbitrationOfferTemplate,
  arbitrationResolutionTemplate,
  arbitratorFeedbackTemplate,
  bidTemplate,
  collateralDepositTemplate,
  counterBidTemplate,
  disputeTemplate,
  listingTemplate,
  messageTemplate,
  mutualAgreementTemplate,
  paymentConfirmationTemplate,
  receiptTemplate,
  refundTemplate,
  relayFeedbackTemplate,
  userFeedbackTemplate,
} from '../events/builders';
import { signEvent } from '../events/codec';
import { ListingContent, PaymentProof, ReceiptStatus, ResolutionOutcome } from '../events/content';
import { EventTemplate, MarketEvent, UnsignedEvent } from '../events/types';
import { Transaction } from '../market/types';
import { BroadcastNetwork, Invoice, PaymentNetwork, PublishResult } from '../network/types';
import { WorkerPool } from '../scaling/worker-pool';
import { logger, StructuredLogger } from '../scaling/structured-logger';
import { IngestResult, MarketplaceNode } from './marketplace-node';

export type ProofStrategy =
  | { type: 'pow'; difficulty?: number }
  /** `requestInvoice` asks the relay or network operator for a posting-fee invoice */
  | { type: 'ln'; amountSats: number; requestInvoice: (amountSats: number) => Promise<Invoice> };

export interface ParticipantOptions {
  privateKey: string;
  node: MarketplaceNode;
  network?: BroadcastNetwork;
  /** Lightning wallet; its node id must be this participant's public key */
  wallet?: PaymentNetwork;
  proof?: ProofStrategy;
  /** Defaults to the node's pool, sized by `workerPoolSize` */
  pool?: WorkerPool;
  logger?: StructuredLogger;
}

export interface ActionResult {
  event: MarketEvent;
  result: IngestResult;
  published?: PublishResult;
}

export interface SendOptions {
  signal?: AbortSignal;
  createdAt?: number;
}

const DEFAULT_INVOICE_EXPIRY_SECONDS = 3600;

export class Participant {
  readonly publicKey: string;
  private privateKey: string;
  private node: MarketplaceNode;
  private network?: BroadcastNetwork;
  private wallet?: PaymentNetwork;
  private proof: ProofStrategy;
  private pool?: WorkerPool;
  private log: StructuredLogger;

  constructor(opts: ParticipantOptions) {
    this.privateKey = opts.privateKey;
    this.publicKey = keyPairFromPrivateKey(opts.privateKey).publicKey;
    this.node = opts.node;
    this.network = opts.network;
    this.wallet = opts.wallet;
    this.proof = opts.proof ?? { type: 'pow' };
    this.pool = opts.pool ?? opts.node.getWorkerPool();
    this.log = (opts.logger ?? logger).child({ participant: this.publicKey.slice(0, 8) });
  }

  // ── Listing and bidding ──

  list(content: ListingContent, opts?: SendOptions): Promise<ActionResult> {
    return this.send(listingTemplate(content, opts?.createdAt), opts);
  }

  /**
   * Bid on a listing. A fresh escrow secret is generated and kept by the
   * local node; only its hash goes into the bid.
   */
  async bid(
    listingId: string,
    terms: { amountSats: number; collateralSats: number; message?: string },
    opts?: SendOptions
  ): Promise<ActionResult & { paymentHash: string }> {
    const secret = this.node.getEscrowManager().generatePaymentSecret();
    const template = bidTemplate(
      listingId,
      {
        bid_amount_satoshis: terms.amountSats,
        buyer_collateral_satoshis: terms.collateralSats,
        payment_hash: secret.paymentHash,
        message: terms.message,
      },
      opts?.createdAt
    );
    const sent = await this.send(template, opts);
    return { ...sent, paymentHash: secret.paymentHash };
  }

  counter(bidId: string, amountSats: number, message?: string, opts?: SendOptions): Promise<ActionResult> {
    const bid = this.node.getStateMachine().getBid(bidId);
    if (!bid) throw new ProtocolError('NOT_FOUND', `Bid ${bidId.slice(0, 16)} not found`);
    return this.send(counterBidTemplate(bid.listingId, bidId, amountSats, message, opts?.createdAt), opts);
  }

  /**
   * Accept a bid, issuing a Lightning invoice for its amount.
   */
  async accept(
    bidId: string,
    terms: { htlcTimeoutBlocks?: number; terms?: string; shippingTimeDays?: number } = {},
    opts?: SendOptions
  ): Promise<ActionResult> {
    const bid = this.node.getStateMachine().getBid(bidId);
    if (!bid) throw new ProtocolError('NOT_FOUND', `Bid ${bidId.slice(0, 16)} not found`);

    const invoice = await this.requireWallet().createInvoice(
      bid.amountSats,
      `Purchase ${bid.listingId.slice(0, 16)}`,
      DEFAULT_INVOICE_EXPIRY_SECONDS
    );
    const template = acceptanceTemplate(
      bid.listingId,
      {
        bid_ref: bidId,
        ln_invoice: invoice.invoice,
        invoice_amount_satoshis: bid.amountSats,
        htlc_timeout_blocks: terms.htlcTimeoutBlocks,
        terms: terms.terms,
        shipping_time_days: terms.shippingTimeDays,
      },
      opts?.createdAt
    );
    return this.send(template, opts);
  }

  // ── Funding ──

  /**
   * Issue an invoice the counterparty pays a collateral deposit into.
   */
  requestPayment(amountSats: number, memo: string): Promise<Invoice> {
    return this.requireWallet().createInvoice(amountSats, memo, DEFAULT_INVOICE_EXPIRY_SECONDS);
  }

  /**
   * Pay collateral into an invoice issued by the counterparty and announce it.
   */
  async depositCollateral(listingId: string, invoice: string, amountSats: number, opts?: SendOptions): Promise<ActionResult> {
    const tx = this.requireTransaction(listingId);
    const proof = await this.payInvoice(invoice, amountSats);
    return this.send(
      collateralDepositTemplate(listingId, { acceptance_ref: tx.acceptanceId, collateral_proof: proof }, opts?.createdAt),
      opts
    );
  }

  /**
   * Pay the seller's invoice (and buyer collateral, when the bid carries any)
   * and announce both proofs.
   */
  async confirmPayment(listingId: string, collateralInvoice?: string, opts?: SendOptions): Promise<ActionResult> {
    const tx = this.requireTransaction(listingId);
    if (tx.buyerCollateralSats > 0 && !collateralInvoice) {
      throw new ProtocolError('PAYMENT_FAILED', 'Buyer collateral needs an invoice from the seller');
    }

    const paymentProof = await this.payInvoice(tx.invoice, tx.amountSats);
    const collateralProof =
      tx.buyerCollateralSats > 0 && collateralInvoice
        ? await this.payInvoice(collateralInvoice, tx.buyerCollateralSats)
        : undefined;

    const template = paymentConfirmationTemplate(
      listingId,
      {
        acceptance_ref: tx.acceptanceId,
        bid_ref: tx.bidId,
        payment_proof: paymentProof,
        payment_method: 'lightning_htlc',
        collateral_proof: collateralProof,
        payment_timestamp: this.node.now(),
      },
      opts?.createdAt
    );
    return this.send(template, opts);
  }

  // ── Delivery and disputes ──

  /**
   * Confirm receipt. A `received` receipt reveals the escrow preimage held
   * by the local node; any other status opens a dispute.
   */
  confirmReceipt(
    listingId: string,
    receipt: {
      status?: ReceiptStatus;
      disputeReason?: string;
      rating?: number;
      feedback?: string;
      shippingRating?: number;
      communicationRating?: number;
      wouldBuyAgain?: boolean;
    } = {},
    opts?: SendOptions
  ): Promise<ActionResult> {
    const tx = this.requireTransaction(listingId);
    const paymentRef = this.requireRef(tx.refs.payment, 'payment confirmation');
    const status = receipt.status ?? 'received';

    const template = receiptTemplate(
      listingId,
      {
        payment_ref: paymentRef,
        status,
        dispute_reason: receipt.disputeReason,
        preimage: status === 'received' ? this.heldPreimage(tx) : undefined,
        rating: receipt.rating,
        feedback: receipt.feedback,
        shipping_rating: receipt.shippingRating,
        communication_rating: receipt.communicationRating,
        would_buy_again: receipt.wouldBuyAgain,
      },
      opts?.createdAt
    );
    return this.send(template, opts);
  }

  dispute(listingId: string, reason: string, evidence?: string, opts?: SendOptions): Promise<ActionResult> {
    const tx = this.requireTransaction(listingId);
    const paymentRef = this.requireRef(tx.refs.payment, 'payment confirmation');
    return this.send(disputeTemplate(listingId, { payment_ref: paymentRef, reason, evidence }, opts?.createdAt), opts);
  }

  /**
   * Propose, or confirm the counterparty's proposal for, how to settle the
   * open dispute.
   */
  agree(listingId: string, outcome: ResolutionOutcome, terms?: string, opts?: SendOptions): Promise<ActionResult> {
    const tx = this.requireTransaction(listingId);
    const disputeRef = this.requireRef(tx.dispute?.eventId, 'dispute');
    const template = mutualAgreementTemplate(
      listingId,
      {
        dispute_ref: disputeRef,
        outcome,
        terms,
        preimage: outcome === 'release' ? this.heldPreimage(tx) : undefined,
      },
      opts?.createdAt
    );
    return this.send(template, opts);
  }

  offerArbitration(listingId: string, feeSats: number, terms?: string, opts?: SendOptions): Promise<ActionResult> {
    const tx = this.requireTransaction(listingId);
    const disputeRef = this.requireRef(tx.dispute?.eventId, 'dispute');
    return this.send(
      arbitrationOfferTemplate(listingId, { dispute_ref: disputeRef, fee_satoshis: feeSats, terms }, opts?.createdAt),
      opts
    );
  }

  /**
   * Rule on a dispute. A release needs the preimage, which the buyer has to
   * hand to the arbitrator.
   */
  resolveArbitration(
    listingId: string,
    outcome: ResolutionOutcome,
    details: { preimage?: string; notes?: string } = {},
    opts?: SendOptions
  ): Promise<ActionResult> {
    const tx = this.requireTransaction(listingId);
    const offerRef = this.requireRef(tx.refs.arbitrationOffer, 'arbitration offer');
    return this.send(
      arbitrationResolutionTemplate(
        listingId,
        { offer_ref: offerRef, outcome, preimage: details.preimage ?? this.heldPreimage(tx), notes: details.notes },
        opts?.createdAt
      ),
      opts
    );
  }

  refund(listingId: string, reason?: string, opts?: SendOptions): Promise<ActionResult> {
    this.requireTransaction(listingId);
    return this.send(refundTemplate(listingId, reason, opts?.createdAt), opts);
  }

  message(text: string, to: { transactionRef?: string; recipient?: string } = {}, opts?: SendOptions): Promise<ActionResult> {
    return this.send(
      messageTemplate({ message: text, transaction_ref: to.transactionRef, recipient: to.recipient }, opts?.createdAt),
      opts
    );
  }

  // ── Feedback ──

  rateUser(
    listingId: string,
    rating: number,
    details: { itemQuality?: number; shippingSpeed?: number; communication?: number; paymentReliability?: number; review?: string } = {},
    opts?: SendOptions
  ): Promise<ActionResult> {
    const tx = this.requireTransaction(listingId);
    const counterparty = tx.buyer === this.publicKey ? tx.seller : tx.buyer;
    return this.send(
      userFeedbackTemplate(
        {
          transaction_ref: listingId,
          rated_pubkey: counterparty,
          rating,
          item_quality: details.itemQuality,
          shipping_speed: details.shippingSpeed,
          communication: details.communication,
          payment_reliability: details.paymentReliability,
          review: details.review,
        },
        opts?.createdAt
      ),
      opts
    );
  }

  rateArbitrator(listingId: string, rating: number, review?: string, opts?: SendOptions): Promise<ActionResult> {
    const tx = this.requireTransaction(listingId);
    const arbitrator = this.requireRef(tx.arbitrator, 'arbitrator');
    return this.send(
      arbitratorFeedbackTemplate({ transaction_ref: listingId, rated_pubkey: arbitrator, rating, review }, opts?.createdAt),
      opts
    );
  }

  rateRelay(relayUrl: string, rating: number, review?: string, opts?: SendOptions): Promise<ActionResult> {
    return this.send(relayFeedbackTemplate({ relay_url: relayUrl, rating, review }, opts?.createdAt), opts);
  }

  // ── Sending ──

  /**
   * Stamp, sign, ingest locally, then publish if the node accepted it.
   */
  async send(template: EventTemplate, opts: SendOptions = {}): Promise<ActionResult> {
    const unsigned: UnsignedEvent = { ...template, pubkey: this.publicKey };
    const stamped = await this.stamp(unsigned, opts.signal);
    const event = signEvent(stamped, this.privateKey);

    const result = await this.node.ingest(event);
    if (result.status !== 'accepted') {
      if (result.status === 'rejected') {
        this.log.warn('Participant', `Local node rejected kind ${event.kind}: ${result.message}`, { code: result.code });
      }
      return { event, result };
    }

    if (!this.network) return { event, result };
    try {
      const published = await this.network.publish(event);
      if (!published.accepted) {
        this.log.warn('Participant', `Relay refused kind ${event.kind}`, { message: published.message });
      }
      return { event, result, published };
    } catch (err) {
      this.log.warn('Participant', 'Publish failed', { eventId: event.id, error: errorMessage(err) });
      return { event, result, published: { accepted: false, message: errorMessage(err) } };
    }
  }

  private async stamp(event: UnsignedEvent, signal?: AbortSignal): Promise<UnsignedEvent> {
    if (this.node.config.antiSpam.referenceRequiredKinds.includes(event.kind)) {
      const reference = this.findReference(event.kind);
      if (!reference) {
        throw new ProtocolError('PROOF_UNAVAILABLE', `No unspent event of ours to reference for kind ${event.kind}`);
      }
      return withProofTag(event, referenceProofTag(reference.id, reference.kind));
    }

    if (this.proof.type === 'ln') {
      const invoice = await this.proof.requestInvoice(this.proof.amountSats);
      const paid = await this.payInvoice(invoice.invoice, this.proof.amountSats);
      return withProofTag(event, paymentProofTag(paid.payment_hash, paid.amount_satoshis));
    }

    const difficulty = this.proof.difficulty ?? this.node.config.antiSpam.minPowDifficulty;
    const mined: MinedEvent = this.pool
      ? await this.pool.mine(event, difficulty, { signal })
      : await mineEvent(event, difficulty, { signal });
    this.log.debug('Participant', `Mined kind ${event.kind} at difficulty ${difficulty}`, { attempts: mined.attempts });
    return mined.event;
  }

  /**
   * Newest event of ours that has not yet paid for an event of `kind`.
   */
  private findReference(kind: number): MarketEvent | undefined {
    const validator = this.node.getValidator();
    const candidates = this.node
      .getEventStore()
      .getByAuthor(this.publicKey)
      .sort((a, b) => b.created_at - a.created_at);
    return candidates.find(
      candidate => !validator.isConsumed({ author: this.publicKey, eventId: candidate.id, spendingKind: kind })
    );
  }

  private async payInvoice(invoice: string, amountSats: number): Promise<PaymentProof> {
    const paid = await this.requireWallet().pay(invoice);
    if (paid.status !== 'succeeded') {
      throw new ProtocolError('PAYMENT_FAILED', `Payment of ${amountSats} sats failed`);
    }
    return { payment_hash: sha256Hex(paid.preimage), amount_satoshis: amountSats };
  }

  private heldPreimage(tx: Transaction): string | undefined {
    const escrow = this.node.getEscrowManager();
    const held = escrow.get(tx.id);
    return held ? escrow.getSecret(held.paymentHash) : undefined;
  }

  private requireWallet(): PaymentNetwork {
    if (!this.wallet) throw new ProtocolError('PAYMENT_FAILED', 'Participant has no Lightning wallet');
    return this.wallet;
  }

  private requireTransaction(listingId: string): Transaction {
    const tx = this.node.getStateMachine().getTransaction(listingId);
    if (!tx) throw new ProtocolError('NOT_FOUND', `No transaction for listing ${listingId.slice(0, 16)}`);
    return tx;
  }

  private requireRef(ref: string | undefined, what: string): string {
    if (!ref) throw new ProtocolError('NOT_FOUND', `Transaction has no ${what} yet`);
    return ref;
  }
}
