import { EscrowManager } from '../escrow/escrow-manager';
import {
  acceptanceTemplate,
  arbitrationOfferTemplate,
  arbitrationResolutionTemplate,
  bidTemplate,
  disputeTemplate,
  listingTemplate,
  mutualAgreementTemplate,
  paymentConfirmationTemplate,
  receiptTemplate,
  refundTemplate,
  relayFeedbackTemplate,
} from '../events/builders';
import { parseContent } from '../events/content';
import { refTag } from '../events/tags';
import { EventKind, EventTemplate, MarketEvent } from '../events/types';
import { KeyPair } from '../crypto';
import { MockLightningLedger, MockLightningNode } from '../payments/mock-lightning-node';
import { ARBITER, BUYER, OTHER, SELLER, SILENT, T0, TEST_MARKET_POLICY, signed } from '../testing/fixtures';
import { TransactionStateMachine } from './transaction-state-machine';
import { BidState, TransactionState } from './types';

const PRICE = 1_000_000;
const COLLATERAL = 100_000;
const TIMEOUT = T0 + 20 + 144 * 600;

class Harness {
  ledger = new MockLightningLedger();
  sellerWallet = new MockLightningNode(SELLER.publicKey, this.ledger, 10_000_000);
  buyerWallet = new MockLightningNode(BUYER.publicKey, this.ledger, 10_000_000);
  escrow = new EscrowManager({ payments: new MockLightningNode('observer', this.ledger, 0), logger: SILENT });
  machine = new TransactionStateMachine({ policy: TEST_MARKET_POLICY, escrow: this.escrow, logger: SILENT });
  secret = this.escrow.generatePaymentSecret();

  listing?: MarketEvent;
  bid?: MarketEvent;
  acceptance?: MarketEvent;
  payment?: MarketEvent;

  async send(keys: KeyPair, template: EventTemplate) {
    const event = signed(keys, template);
    const parsed = parseContent(template.kind, event.content);
    if (!parsed.success) throw new Error(parsed.message);
    return { event, result: await this.machine.apply(event, parsed.value) };
  }

  async list(): Promise<MarketEvent> {
    const { event } = await this.send(
      SELLER,
      listingTemplate({ product_name: 'Road bike', description: 'Steel frame', price_satoshis: PRICE }, T0)
    );
    this.listing = event;
    return event;
  }

  async bidOn(listing: MarketEvent): Promise<MarketEvent> {
    const { event } = await this.send(
      BUYER,
      bidTemplate(
        listing.id,
        { bid_amount_satoshis: PRICE, buyer_collateral_satoshis: COLLATERAL, payment_hash: this.secret.paymentHash },
        T0 + 10
      )
    );
    this.bid = event;
    return event;
  }

  async accepted(): Promise<{ listing: MarketEvent; bid: MarketEvent; acceptance: MarketEvent; invoice: string; paymentHash: string }> {
    const listing = await this.list();
    const bid = await this.bidOn(listing);
    const invoice = await this.sellerWallet.createInvoice(PRICE, 'purchase', 3600);
    const { event } = await this.send(
      SELLER,
      acceptanceTemplate(
        listing.id,
        { bid_ref: bid.id, ln_invoice: invoice.invoice, invoice_amount_satoshis: PRICE },
        T0 + 20
      )
    );
    this.acceptance = event;
    return { listing, bid, acceptance: event, invoice: invoice.invoice, paymentHash: invoice.paymentHash };
  }

  async paid(): Promise<{ listing: MarketEvent; payment: MarketEvent }> {
    const { listing, bid, acceptance, invoice, paymentHash } = await this.accepted();
    await this.buyerWallet.pay(invoice);
    const collateral = await this.sellerWallet.createInvoice(COLLATERAL, 'collateral', 3600);
    await this.buyerWallet.pay(collateral.invoice);

    const { event, result } = await this.send(
      BUYER,
      paymentConfirmationTemplate(
        listing.id,
        {
          acceptance_ref: acceptance.id,
          bid_ref: bid.id,
          payment_proof: { payment_hash: paymentHash, amount_satoshis: PRICE },
          payment_method: 'lightning_htlc',
          collateral_proof: { payment_hash: collateral.paymentHash, amount_satoshis: COLLATERAL },
        },
        T0 + 30
      )
    );
    expect(result.success).toBe(true);
    this.payment = event;
    return { listing, payment: event };
  }

  async disputed(by: KeyPair): Promise<{ listing: MarketEvent; dispute: MarketEvent }> {
    const { listing, payment } = await this.paid();
    const { event } = await this.send(
      by,
      disputeTemplate(listing.id, { payment_ref: payment.id, reason: 'Item never arrived' }, T0 + 40)
    );
    return { listing, dispute: event };
  }
}

describe('TransactionStateMachine', () => {
  it('moves Listed to BidReceived on the first bid', async () => {
    const h = new Harness();
    const listing = await h.list();
    expect(h.machine.getState(listing.id)).toBe(TransactionState.LISTED);

    await h.bidOn(listing);
    expect(h.machine.getState(listing.id)).toBe(TransactionState.BID_RECEIVED);
    expect(h.machine.getTransaction(listing.id)).toBeUndefined();
  });

  it('completes on a receipt carrying the preimage', async () => {
    const h = new Harness();
    const { listing, payment } = await h.paid();
    expect(h.machine.getState(listing.id)).toBe(TransactionState.PAYMENT_CONFIRMED);

    const { result } = await h.send(
      BUYER,
      receiptTemplate(listing.id, { payment_ref: payment.id, status: 'received', preimage: h.secret.preimage, rating: 5 }, T0 + 50)
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.distribution).toEqual({
      escrowId: listing.id,
      outcome: 'released',
      payouts: [
        { recipient: SELLER.publicKey, amountSats: PRICE, purpose: 'purchase' },
        { recipient: BUYER.publicKey, amountSats: COLLATERAL, purpose: 'buyer_collateral' },
      ],
    });

    const tx = h.machine.getTransaction(listing.id);
    expect(tx?.state).toBe(TransactionState.COMPLETED);
    expect(tx?.closedAt).toBe(T0 + 50);
    expect(tx?.history.map(record => [record.from, record.to])).toEqual([
      [TransactionState.BID_RECEIVED, TransactionState.BID_ACCEPTED],
      [TransactionState.BID_ACCEPTED, TransactionState.PAYMENT_CONFIRMED],
      [TransactionState.PAYMENT_CONFIRMED, TransactionState.COMPLETED],
    ]);
    expect(h.machine.getListing(listing.id)?.state).toBe(TransactionState.COMPLETED);
    expect(h.machine.countOpen()).toBe(0);
  });

  it('keeps PaymentConfirmed after a wrong preimage', async () => {
    const h = new Harness();
    const { listing, payment } = await h.paid();

    const { result } = await h.send(
      BUYER,
      receiptTemplate(listing.id, { payment_ref: payment.id, status: 'received', preimage: '00'.repeat(32) }, T0 + 50)
    );
    expect(result).toEqual({
      success: false,
      error: 'PreimageMismatch',
      message: 'Preimage does not hash to the escrow payment hash',
    });
    expect(h.machine.getState(listing.id)).toBe(TransactionState.PAYMENT_CONFIRMED);
  });

  it('needs the preimage in the receipt even when this node holds the secret', async () => {
    const h = new Harness();
    const { listing, payment } = await h.paid();
    expect(h.escrow.getSecret(h.secret.paymentHash)).toBe(h.secret.preimage);

    const { result } = await h.send(
      BUYER,
      receiptTemplate(listing.id, { payment_ref: payment.id, status: 'received' }, T0 + 50)
    );
    expect(result).toEqual({ success: false, error: 'PreimageMismatch', message: 'No preimage revealed' });
    expect(h.machine.getState(listing.id)).toBe(TransactionState.PAYMENT_CONFIRMED);
  });

  describe('bids', () => {
    it('rejects a seller bidding on their own listing', async () => {
      const h = new Harness();
      const listing = await h.list();
      const { result } = await h.send(
        SELLER,
        bidTemplate(listing.id, { bid_amount_satoshis: PRICE, buyer_collateral_satoshis: COLLATERAL }, T0 + 5)
      );
      expect(result).toEqual({
        success: false,
        error: 'InvalidTransition',
        message: 'Sellers cannot bid on their own listing',
      });
    });

    it('enforces the collateral ratio and the overbid cap', async () => {
      const h = new Harness();
      const listing = await h.list();

      const low = await h.send(
        BUYER,
        bidTemplate(listing.id, { bid_amount_satoshis: PRICE, buyer_collateral_satoshis: 50_000 }, T0 + 5)
      );
      expect(low.result).toEqual({
        success: false,
        error: 'InvalidTransition',
        message: 'Buyer collateral 50000 is below the required 100000 sats',
      });

      const high = await h.send(
        BUYER,
        bidTemplate(listing.id, { bid_amount_satoshis: 1_200_000, buyer_collateral_satoshis: 200_000 }, T0 + 6)
      );
      expect(high.result).toEqual({
        success: false,
        error: 'InvalidTransition',
        message: 'Bid of 1200000 sats exceeds the 1100000 sat limit for this listing',
      });
      expect(h.machine.getState(listing.id)).toBe(TransactionState.LISTED);
    });

    it('closes competing bids once one is accepted', async () => {
      const h = new Harness();
      const listing = await h.list();
      const rival = await h.send(
        OTHER,
        bidTemplate(listing.id, { bid_amount_satoshis: 900_000, buyer_collateral_satoshis: 90_000 }, T0 + 5)
      );
      expect(rival.result.success).toBe(true);
      const bid = await h.bidOn(listing);
      const invoice = await h.sellerWallet.createInvoice(PRICE, 'purchase', 3600);
      await h.send(
        SELLER,
        acceptanceTemplate(listing.id, { bid_ref: bid.id, ln_invoice: invoice.invoice, invoice_amount_satoshis: PRICE }, T0 + 20)
      );

      expect(h.machine.getBid(bid.id)?.state).toBe(BidState.ACCEPTED);
      expect(h.machine.getBid(rival.event.id)?.state).toBe(BidState.CLOSED);

      const late = await h.send(
        OTHER,
        bidTemplate(listing.id, { bid_amount_satoshis: PRICE, buyer_collateral_satoshis: COLLATERAL }, T0 + 25)
      );
      expect(late.result).toEqual({
        success: false,
        error: 'InvalidTransition',
        message: `Listing ${listing.id.slice(0, 12)} is BidAccepted and no longer takes bids`,
      });
    });
  });

  describe('acceptance', () => {
    it('only lets the seller accept', async () => {
      const h = new Harness();
      const listing = await h.list();
      const bid = await h.bidOn(listing);
      const { result } = await h.send(
        OTHER,
        acceptanceTemplate(listing.id, { bid_ref: bid.id, ln_invoice: 'lnbc1000000test', invoice_amount_satoshis: PRICE }, T0 + 20)
      );
      expect(result).toEqual({ success: false, error: 'InvalidTransition', message: 'Only the seller can accept a bid' });
    });

    it('requires the invoice to match the bid', async () => {
      const h = new Harness();
      const listing = await h.list();
      const bid = await h.bidOn(listing);
      const { result } = await h.send(
        SELLER,
        acceptanceTemplate(listing.id, { bid_ref: bid.id, ln_invoice: 'lnbc900000test', invoice_amount_satoshis: 900_000 }, T0 + 20)
      );
      expect(result).toEqual({
        success: false,
        error: 'AmountMismatch',
        message: 'Invoice of 900000 sats does not match the bid of 1000000',
      });
      expect(h.machine.getState(listing.id)).toBe(TransactionState.BID_RECEIVED);
    });

    it('sets the timeout from the acceptance time and the block interval', async () => {
      const h = new Harness();
      const { listing } = await h.accepted();
      expect(h.machine.getTransaction(listing.id)).toMatchObject({
        state: TransactionState.BID_ACCEPTED,
        timeout: TIMEOUT,
        timeoutBlocks: 144,
        buyer: BUYER.publicKey,
        seller: SELLER.publicKey,
      });
      expect(h.escrow.get(listing.id)?.paymentHash).toBe(h.secret.paymentHash);
    });
  });

  describe('ordering', () => {
    it('does not skip from BidAccepted to Completed', async () => {
      const h = new Harness();
      const { listing, acceptance } = await h.accepted();
      const { result } = await h.send(
        BUYER,
        receiptTemplate(listing.id, { payment_ref: acceptance.id, status: 'received', preimage: h.secret.preimage }, T0 + 30)
      );
      expect(result).toEqual({
        success: false,
        error: 'InvalidTransition',
        message: 'Receipt confirmations must reference the payment confirmation',
      });
      expect(h.machine.getState(listing.id)).toBe(TransactionState.BID_ACCEPTED);
    });

    it('rejects a payment confirmation without the buyer collateral', async () => {
      const h = new Harness();
      const { listing, bid, acceptance, invoice, paymentHash } = await h.accepted();
      await h.buyerWallet.pay(invoice);
      const { result } = await h.send(
        BUYER,
        paymentConfirmationTemplate(
          listing.id,
          {
            acceptance_ref: acceptance.id,
            bid_ref: bid.id,
            payment_proof: { payment_hash: paymentHash, amount_satoshis: PRICE },
            payment_method: 'lightning_htlc',
          },
          T0 + 30
        )
      );
      expect(result).toEqual({
        success: false,
        error: 'IncompleteFunding',
        message: 'Buyer collateral of 100000 sats has not been deposited',
      });
      expect(h.machine.getState(listing.id)).toBe(TransactionState.BID_ACCEPTED);
    });

    it('rejects a root tag that disagrees with the referenced listing', async () => {
      const h = new Harness();
      const listing = await h.list();
      const elsewhere = 'cd'.repeat(32);
      const template = bidTemplate(listing.id, { bid_amount_satoshis: PRICE, buyer_collateral_satoshis: COLLATERAL }, T0 + 5);
      const { result } = await h.send(BUYER, { ...template, tags: [refTag(elsewhere, 'root')] });

      expect(result).toEqual({
        success: false,
        error: 'InvalidTransition',
        message: `Root reference ${elsewhere.slice(0, 12)} does not match listing ${listing.id.slice(0, 12)}`,
      });
    });

    it('routes events by root tag, then by content, then by their own id', async () => {
      const h = new Harness();
      const listing = await h.list();
      const bid = await h.bidOn(listing);
      expect(h.machine.rootOf(bid)).toBe(listing.id);

      const untagged = signed(
        BUYER,
        { ...bidTemplate(listing.id, { bid_amount_satoshis: PRICE, buyer_collateral_satoshis: COLLATERAL }, T0 + 7), tags: [] }
      );
      const parsed = parseContent(EventKind.BID_SUBMISSION, untagged.content);
      expect(parsed.success && h.machine.rootOf(untagged, parsed.value)).toBe(listing.id);

      const relay = signed(BUYER, relayFeedbackTemplate({ relay_url: 'wss://relay.test', rating: 4 }, T0));
      expect(h.machine.rootOf(relay)).toBe(relay.id);
    });
  });

  describe('disputes', () => {
    it('refunds on a mutual agreement confirmed by the counterparty', async () => {
      const h = new Harness();
      const { listing, dispute } = await h.disputed(BUYER);
      expect(h.machine.getTransaction(listing.id)?.dispute).toEqual({
        eventId: dispute.id,
        raisedBy: BUYER.publicKey,
        reason: 'Item never arrived',
      });

      const proposal = await h.send(SELLER, mutualAgreementTemplate(listing.id, { dispute_ref: dispute.id, outcome: 'refund' }, T0 + 50));
      expect(proposal.result.success).toBe(true);
      expect(h.machine.getState(listing.id)).toBe(TransactionState.MUTUALLY_AGREED);

      const again = await h.send(SELLER, mutualAgreementTemplate(listing.id, { dispute_ref: dispute.id, outcome: 'refund' }, T0 + 51));
      expect(again.result).toEqual({
        success: false,
        error: 'InvalidTransition',
        message: 'The counterparty must confirm the agreement',
      });

      const other = await h.send(BUYER, mutualAgreementTemplate(listing.id, { dispute_ref: dispute.id, outcome: 'release' }, T0 + 52));
      expect(other.result).toEqual({
        success: false,
        error: 'InvalidTransition',
        message: 'Counterparty proposed release, agreement is refund',
      });

      const confirm = await h.send(BUYER, mutualAgreementTemplate(listing.id, { dispute_ref: dispute.id, outcome: 'refund' }, T0 + 53));
      expect(confirm.result.success).toBe(true);
      if (!confirm.result.success) return;
      expect(confirm.result.value.distribution).toEqual({
        escrowId: listing.id,
        outcome: 'refunded',
        payouts: [
          { recipient: BUYER.publicKey, amountSats: PRICE, purpose: 'purchase' },
          { recipient: BUYER.publicKey, amountSats: COLLATERAL, purpose: 'buyer_collateral' },
        ],
      });
      expect(h.machine.getState(listing.id)).toBe(TransactionState.REFUNDED);
    });

    it('lets a third-party arbitrator release the escrow', async () => {
      const h = new Harness();
      const { listing, dispute } = await h.disputed(SELLER);

      const selfOffer = await h.send(BUYER, arbitrationOfferTemplate(listing.id, { dispute_ref: dispute.id, fee_satoshis: 5000 }, T0 + 50));
      expect(selfOffer.result).toEqual({ success: false, error: 'InvalidTransition', message: 'Arbitrators must be a third party' });

      const offer = await h.send(ARBITER, arbitrationOfferTemplate(listing.id, { dispute_ref: dispute.id, fee_satoshis: 5000 }, T0 + 51));
      expect(offer.result.success).toBe(true);
      expect(h.machine.getTransaction(listing.id)).toMatchObject({
        state: TransactionState.ARBITRATION_OFFERED,
        arbitrator: ARBITER.publicKey,
        arbitrationFeeSats: 5000,
      });

      const impostor = await h.send(
        OTHER,
        arbitrationResolutionTemplate(listing.id, { offer_ref: offer.event.id, outcome: 'release', preimage: h.secret.preimage }, T0 + 52)
      );
      expect(impostor.result).toEqual({
        success: false,
        error: 'InvalidTransition',
        message: 'Only the arbitrator who made the offer can resolve',
      });

      const wrong = await h.send(
        ARBITER,
        arbitrationResolutionTemplate(listing.id, { offer_ref: offer.event.id, outcome: 'release', preimage: 'ef'.repeat(32) }, T0 + 53)
      );
      expect(wrong.result.success).toBe(false);
      if (!wrong.result.success) expect(wrong.result.error).toBe('PreimageMismatch');
      expect(h.machine.getState(listing.id)).toBe(TransactionState.ARBITRATION_OFFERED);

      const resolved = await h.send(
        ARBITER,
        arbitrationResolutionTemplate(listing.id, { offer_ref: offer.event.id, outcome: 'release', preimage: h.secret.preimage }, T0 + 54)
      );
      expect(resolved.result.success).toBe(true);
      expect(h.machine.getState(listing.id)).toBe(TransactionState.COMPLETED);
    });

    it('treats a non-received receipt as a dispute that a later receipt can settle', async () => {
      const h = new Harness();
      const { listing, payment } = await h.paid();

      const damaged = await h.send(
        BUYER,
        receiptTemplate(listing.id, { payment_ref: payment.id, status: 'damaged', dispute_reason: 'Bent wheel' }, T0 + 40)
      );
      expect(damaged.result.success).toBe(true);
      expect(h.machine.getTransaction(listing.id)?.dispute).toEqual({
        eventId: damaged.event.id,
        raisedBy: BUYER.publicKey,
        reason: 'Bent wheel',
        receiptStatus: 'damaged',
      });
      expect(h.machine.getState(listing.id)).toBe(TransactionState.DISPUTED);

      const received = await h.send(
        BUYER,
        receiptTemplate(listing.id, { payment_ref: payment.id, status: 'received', preimage: h.secret.preimage }, T0 + 60)
      );
      expect(received.result.success).toBe(true);
      expect(h.machine.getState(listing.id)).toBe(TransactionState.COMPLETED);
    });

    it('only lets a party open a dispute, and only after payment', async () => {
      const h = new Harness();
      const { listing, payment } = await h.paid();

      const outsider = await h.send(OTHER, disputeTemplate(listing.id, { payment_ref: payment.id, reason: 'Curious' }, T0 + 40));
      expect(outsider.result).toEqual({
        success: false,
        error: 'InvalidTransition',
        message: 'Only the buyer or seller can open a dispute',
      });
    });
  });

  describe('refunds', () => {
    it('lets only the seller refund a paid transaction', async () => {
      const h = new Harness();
      const { listing } = await h.paid();

      const byBuyer = await h.send(BUYER, refundTemplate(listing.id, 'Changed my mind', T0 + 40));
      expect(byBuyer.result).toEqual({ success: false, error: 'InvalidTransition', message: 'Only the seller can initiate a refund' });

      const bySeller = await h.send(SELLER, refundTemplate(listing.id, 'Out of stock', T0 + 41));
      expect(bySeller.result.success).toBe(true);
      expect(h.machine.getState(listing.id)).toBe(TransactionState.REFUNDED);
      expect(h.machine.listTransactions(TransactionState.REFUNDED)).toHaveLength(1);
    });
  });

  describe('timeouts', () => {
    it('expires an accepted transaction after its timeout', async () => {
      const h = new Harness();
      const { listing } = await h.accepted();

      expect(h.machine.checkTimeout(listing.id, TIMEOUT)).toBeUndefined();
      expect(h.machine.dueForTimeout(TIMEOUT + 1)).toEqual([listing.id]);

      expect(h.machine.checkTimeout(listing.id, TIMEOUT + 1)).toEqual({
        transactionId: listing.id,
        transition: {
          from: TransactionState.BID_ACCEPTED,
          to: TransactionState.EXPIRED,
          eventId: undefined,
          kind: undefined,
          at: TIMEOUT + 1,
        },
        distribution: { escrowId: listing.id, outcome: 'expired', payouts: [] },
      });
      expect(h.machine.getState(listing.id)).toBe(TransactionState.EXPIRED);
      expect(h.machine.dueForTimeout(TIMEOUT + 1)).toEqual([]);
    });

    it('returns funded deposits to the buyer on expiry', async () => {
      const h = new Harness();
      const { listing } = await h.paid();

      const result = h.machine.checkTimeout(listing.id, TIMEOUT + 600);
      expect(result?.distribution.payouts).toEqual([
        { recipient: BUYER.publicKey, amountSats: PRICE, purpose: 'purchase' },
        { recipient: BUYER.publicKey, amountSats: COLLATERAL, purpose: 'buyer_collateral' },
      ]);
    });

    it('leaves completed transactions alone', async () => {
      const h = new Harness();
      const { listing, payment } = await h.paid();
      await h.send(BUYER, receiptTemplate(listing.id, { payment_ref: payment.id, status: 'received', preimage: h.secret.preimage }, T0 + 50));

      expect(h.machine.checkTimeout(listing.id, TIMEOUT + 1)).toBeUndefined();
      expect(h.machine.getState(listing.id)).toBe(TransactionState.COMPLETED);
    });
  });
});
