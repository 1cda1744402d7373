import { finalizeEvent } from '../events/codec';
import { EventKind, EventTemplate, MarketEvent } from '../events/types';
import { MockLightningLedger, MockLightningNode } from '../payments/mock-lightning-node';
import { BUYER, SELLER, SILENT, T0, signed } from '../testing/fixtures';
import { meetsDifficulty, mineEvent, powTag } from './pow';
import { paymentProofTag, referenceProofTag } from './proof-tags';
import { AntiSpamPolicy } from './types';
import { AntiSpamValidator } from './validator';

const POLICY: AntiSpamPolicy = { minPowDifficulty: 8, minPaymentSats: 1000, referenceRequiredKinds: [321, 322, 323] };

function message(tags: string[][], text = 'hi'): EventTemplate {
  return { kind: EventKind.COMMUNICATION_MESSAGE, created_at: T0, tags, content: JSON.stringify({ message: text }) };
}

function setup(payments?: MockLightningNode) {
  const events = new Map<string, MarketEvent>();
  const validator = new AntiSpamValidator({
    policy: POLICY,
    events: { getEvent: id => events.get(id) },
    payments,
    logger: SILENT,
  });
  return { events, validator };
}

describe('AntiSpamValidator', () => {
  describe('proof extraction', () => {
    it('rejects an event with no proof', async () => {
      const { validator } = setup();
      const result = await validator.validate(finalizeEvent(message([]), SELLER.privateKey));
      expect(result).toEqual({ success: false, error: 'MissingProof', message: 'Event carries no anti-spam proof' });
    });

    it('rejects an event with two proofs', async () => {
      const { validator } = setup();
      const event = finalizeEvent(message([powTag(1, 8), powTag(2, 8)]), SELLER.privateKey);
      const result = await validator.validate(event);
      expect(result).toEqual({
        success: false,
        error: 'AmbiguousProof',
        message: 'Event carries 2 anti-spam proofs, expected one',
      });
    });

    it('rejects an unknown proof type', async () => {
      const { validator } = setup();
      const event = finalizeEvent(message([['anti_spam_proof', 'stake', 'x', '1']]), SELLER.privateKey);
      const result = await validator.validate(event);
      expect(result).toEqual({
        success: false,
        error: 'MissingProof',
        message: 'Unrecognized anti-spam proof: stake,x,1',
      });
    });
  });

  describe('pow', () => {
    it('rejects a declared difficulty below the policy', async () => {
      const { validator } = setup();
      const result = await validator.validate(signed(SELLER, message([])));
      expect(result).toEqual({
        success: false,
        error: 'InsufficientDifficulty',
        message: 'Declared difficulty 0 is below the required 8',
      });
    });

    it('rejects an id that does not carry the declared zero bits', async () => {
      const { validator } = setup();
      let event = finalizeEvent(message([powTag(0, 8)]), SELLER.privateKey);
      for (let nonce = 1; meetsDifficulty(event.id, 8); nonce++) {
        event = finalizeEvent(message([powTag(nonce, 8)]), SELLER.privateKey);
      }
      const result = await validator.validate(event);
      expect(result).toEqual({
        success: false,
        error: 'InsufficientDifficulty',
        message: 'Event id does not have 8 leading zero bits',
      });
    });

    it('accepts a mined event', async () => {
      const { validator } = setup();
      const mined = await mineEvent({ ...message([]), pubkey: SELLER.publicKey }, 8);
      const event = finalizeEvent(mined.event, SELLER.privateKey);

      const result = await validator.validate(event);
      expect(result).toEqual({ success: true, value: { proof: { type: 'pow', nonce: String(mined.nonce), difficulty: 8 } } });
    });
  });

  describe('ln', () => {
    it('fails without a payment network', async () => {
      const { validator } = setup();
      const event = finalizeEvent(message([paymentProofTag('ab'.repeat(32), 5000)]), SELLER.privateKey);
      const result = await validator.validate(event);
      expect(result).toEqual({
        success: false,
        error: 'UnconfirmedPayment',
        message: 'No payment network configured to confirm payment proofs',
      });
    });

    it('accepts a settled payment at or above the minimum', async () => {
      const ledger = new MockLightningLedger();
      const relay = new MockLightningNode('relay', ledger, 0);
      const author = new MockLightningNode(SELLER.publicKey, ledger, 10_000);
      const { validator } = setup(relay);

      const invoice = await relay.createInvoice(2000, 'posting fee', 600);
      const event = finalizeEvent(message([paymentProofTag(invoice.paymentHash, 2000)]), SELLER.privateKey);

      const unpaid = await validator.validate(event);
      expect(unpaid.success).toBe(false);
      if (!unpaid.success) expect(unpaid.error).toBe('UnconfirmedPayment');

      await author.pay(invoice.invoice);
      const paid = await validator.validate(event);
      expect(paid).toEqual({
        success: true,
        value: {
          proof: { type: 'ln', paymentHash: invoice.paymentHash, amountSats: 2000 },
          claim: { paymentHash: invoice.paymentHash },
        },
      });
    });

    it('rejects a proof declaring more than was paid', async () => {
      const ledger = new MockLightningLedger();
      const relay = new MockLightningNode('relay', ledger, 0);
      const author = new MockLightningNode(SELLER.publicKey, ledger, 10_000);
      const { validator } = setup(relay);

      const invoice = await relay.createInvoice(1000, 'posting fee', 600);
      await author.pay(invoice.invoice);
      const event = finalizeEvent(message([paymentProofTag(invoice.paymentHash, 999_999)]), SELLER.privateKey);

      expect(await validator.validate(event)).toEqual({
        success: false,
        error: 'UnconfirmedPayment',
        message: 'Payment of 1000 sats is below the declared 999999',
      });
    });

    it('lets one payment stamp only one event', async () => {
      const ledger = new MockLightningLedger();
      const relay = new MockLightningNode('relay', ledger, 0);
      const author = new MockLightningNode(SELLER.publicKey, ledger, 10_000);
      const { validator } = setup(relay);

      const invoice = await relay.createInvoice(1000, 'posting fee', 600);
      await author.pay(invoice.invoice);
      const first = finalizeEvent(message([paymentProofTag(invoice.paymentHash, 1000)], 'first'), SELLER.privateKey);
      const copied = finalizeEvent(message([paymentProofTag(invoice.paymentHash, 1000)], 'copied'), BUYER.privateKey);

      const validated = await validator.validate(first);
      expect(validated.success).toBe(true);
      if (!validated.success || !validated.value.claim) throw new Error('expected a payment claim');
      const claim = validated.value.claim;

      expect(validator.reserve(claim)).toBe(true);
      validator.commit(claim);
      expect(validator.isConsumed(claim)).toBe(true);

      expect(await validator.validate(copied)).toEqual({
        success: false,
        error: 'PaymentAlreadyConsumed',
        message: `Payment ${invoice.paymentHash.slice(0, 16)} already stamped another event`,
      });
    });

    it('rejects a settled payment below the minimum', async () => {
      const ledger = new MockLightningLedger();
      const relay = new MockLightningNode('relay', ledger, 0);
      const author = new MockLightningNode(SELLER.publicKey, ledger, 10_000);
      const { validator } = setup(relay);

      const invoice = await relay.createInvoice(500, 'posting fee', 600);
      await author.pay(invoice.invoice);
      const event = finalizeEvent(message([paymentProofTag(invoice.paymentHash, 500)]), SELLER.privateKey);

      const result = await validator.validate(event);
      expect(result).toEqual({
        success: false,
        error: 'UnconfirmedPayment',
        message: 'Payment of 500 sats is below the required 1000',
      });
    });
  });

  describe('ref', () => {
    function feedback(author: typeof SELLER, referenced: MarketEvent): MarketEvent {
      return finalizeEvent(
        {
          kind: EventKind.USER_REPUTATION_FEEDBACK,
          created_at: T0 + 10,
          tags: [referenceProofTag(referenced.id, referenced.kind)],
          content: '{}',
        },
        author.privateKey
      );
    }

    it('requires a reference proof on feedback kinds', async () => {
      const { validator } = setup();
      const event = signed(SELLER, { kind: EventKind.USER_REPUTATION_FEEDBACK, created_at: T0, tags: [], content: '{}' });
      const result = await validator.validate(event);
      expect(result).toEqual({
        success: false,
        error: 'MissingProof',
        message: 'Kind 321 requires an event-reference proof',
      });
    });

    it('rejects a reference to an unknown event or another author', async () => {
      const { events, validator } = setup();
      const earlier = signed(BUYER, message([], 'earlier'));

      const missing = await validator.validate(feedback(BUYER, earlier));
      expect(missing.success).toBe(false);
      if (!missing.success) expect(missing.error).toBe('ReferenceNotFound');

      events.set(earlier.id, earlier);
      const foreign = await validator.validate(feedback(SELLER, earlier));
      expect(foreign).toEqual({
        success: false,
        error: 'ReferenceNotFound',
        message: 'Referenced event was written by another author',
      });
    });

    it('spends a reference once per kind, only after commit', async () => {
      const { events, validator } = setup();
      const earlier = signed(BUYER, message([], 'earlier'));
      events.set(earlier.id, earlier);

      const first = await validator.validate(feedback(BUYER, earlier));
      expect(first.success).toBe(true);
      if (!first.success) return;
      const claim = first.value.claim;
      expect(claim).toEqual({ author: BUYER.publicKey, eventId: earlier.id, spendingKind: 321 });
      if (!claim) return;

      expect(validator.reserve(claim)).toBe(true);
      expect(validator.reserve(claim)).toBe(false);
      validator.release(claim);
      expect(validator.isConsumed(claim)).toBe(false);

      expect(validator.reserve(claim)).toBe(true);
      validator.commit(claim);
      expect(validator.isConsumed(claim)).toBe(true);

      const again = await validator.validate(feedback(BUYER, earlier));
      expect(again.success).toBe(false);
      if (!again.success) expect(again.error).toBe('ReferenceAlreadyConsumed');
    });
  });
});
