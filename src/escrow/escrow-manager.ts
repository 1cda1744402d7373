/**
 * Escrow Manager
 *
 * Owns every hash-time-locked escrow on this node. Only the transaction state
 * machine calls the mutating methods, so an escrow moves exactly when its
 * transaction does.
 *
 * Lifecycle:
 *   Pending --fund--> Active --release--> Completed
 *      |                 |---expire---> Expired
 *      |                 '---refund---> Refunded
 *      '-----expire-----> Expired
 *
 * Deposits are checked with the payment network (settled, exact amount,
 * right payee) before they count. A payment hash funds at most one deposit.
 */

import { hexEquals, isHex32, randomHex, sha256Hex } from '../crypto';
import { errorMessage, fail, ok, Outcome } from '../errors';
import { PaymentProof } from '../events/content';
import { PaymentNetwork } from '../network/types';
import { logger, StructuredLogger } from '../scaling/structured-logger';
import {
  CreateEscrowParams,
  DepositRecord,
  Escrow,
  EscrowError,
  EscrowParty,
  EscrowState,
  EscrowSummary,
  FundDistribution,
  FundPurpose,
  PaymentSecret,
  Payout,
  TERMINAL_ESCROW_STATES,
} from './types';

interface ExpectedDeposit {
  purpose: FundPurpose;
  proof: PaymentProof;
  amountSats: number;
  depositor: string;
  payee: string;
}

export class EscrowManager {
  private escrows: Map<string, Escrow> = new Map();
  private secrets: Map<string, string> = new Map(); // paymentHash -> preimage
  private spentPaymentHashes: Set<string> = new Set();
  private payments?: PaymentNetwork;
  private log: StructuredLogger;

  constructor(opts: { payments?: PaymentNetwork; logger?: StructuredLogger } = {}) {
    this.payments = opts.payments;
    this.log = opts.logger ?? logger;
  }

  /**
   * New random preimage, kept in this node's vault until an escrow uses it.
   */
  generatePaymentSecret(): PaymentSecret {
    const preimage = randomHex(32);
    const paymentHash = sha256Hex(preimage);
    this.secrets.set(paymentHash, preimage);
    return { preimage, paymentHash };
  }

  getSecret(paymentHash: string): string | undefined {
    return this.secrets.get(paymentHash);
  }

  create(params: CreateEscrowParams): Escrow {
    if (this.escrows.has(params.transactionId)) {
      throw new Error(`Escrow ${params.transactionId} already exists`);
    }

    const paymentHash = params.paymentHash ?? this.generatePaymentSecret().paymentHash;

    const escrow: Escrow = {
      escrowId: params.transactionId,
      paymentHash,
      purchaseAmountSats: params.purchaseAmountSats,
      buyerCollateralSats: params.buyerCollateralSats,
      sellerCollateralSats: params.sellerCollateralSats,
      buyer: params.buyer,
      seller: params.seller,
      timeout: params.timeout,
      timeoutBlocks: params.timeoutBlocks,
      createdAt: params.createdAt ?? Math.floor(Date.now() / 1000),
      deposits: [],
      state: EscrowState.PENDING,
    };

    this.escrows.set(escrow.escrowId, escrow);
    this.log.debug('Escrow', 'Escrow created', {
      escrowId: escrow.escrowId,
      purchaseSats: escrow.purchaseAmountSats,
      timeout: escrow.timeout,
    });
    return escrow;
  }

  get(escrowId: string): Escrow | undefined {
    return this.escrows.get(escrowId);
  }

  getSummary(escrowId: string): EscrowSummary | undefined {
    const escrow = this.escrows.get(escrowId);
    if (!escrow) return undefined;
    const { preimage, deposits, ...rest } = escrow;
    return {
      ...rest,
      hasPreimage: preimage !== undefined,
      deposits: deposits.map(deposit => ({ ...deposit })),
      totalLockedSats: deposits.reduce((sum, deposit) => sum + deposit.amountSats, 0),
    };
  }

  list(state?: EscrowState): EscrowSummary[] {
    const out: EscrowSummary[] = [];
    for (const escrow of this.escrows.values()) {
      if (state && escrow.state !== state) continue;
      const summary = this.getSummary(escrow.escrowId);
      if (summary) out.push(summary);
    }
    return out;
  }

  private async verifyDeposit(expected: ExpectedDeposit): Promise<Outcome<DepositRecord, EscrowError>> {
    const { proof, purpose } = expected;
    if (proof.amount_satoshis !== expected.amountSats) {
      return fail('AmountMismatch', `${purpose} proof is ${proof.amount_satoshis} sats, expected ${expected.amountSats}`);
    }
    if (this.spentPaymentHashes.has(proof.payment_hash)) {
      return fail('IncompleteFunding', `Payment ${proof.payment_hash.slice(0, 16)} already funded an escrow`);
    }
    if (!this.payments) {
      return fail('IncompleteFunding', 'No payment network configured to verify deposits');
    }

    try {
      const record = await this.payments.lookupPayment(proof.payment_hash);
      if (!record || !record.settled) {
        return fail('IncompleteFunding', `${purpose} payment ${proof.payment_hash.slice(0, 16)} is not settled`);
      }
      if (record.amountSats !== expected.amountSats) {
        return fail('IncompleteFunding', `${purpose} payment settled ${record.amountSats} sats, expected ${expected.amountSats}`);
      }
      if (record.payee !== expected.payee) {
        return fail('IncompleteFunding', `${purpose} payment went to the wrong recipient`);
      }
      return ok({
        purpose,
        depositor: expected.depositor,
        paymentHash: proof.payment_hash,
        amountSats: expected.amountSats,
        verifiedAt: record.paidAt ?? Math.floor(Date.now() / 1000),
      });
    } catch (err) {
      this.log.warn('Escrow', 'Payment lookup failed', { purpose, error: errorMessage(err) });
      return fail('IncompleteFunding', `Could not verify ${purpose} payment: ${errorMessage(err)}`);
    }
  }

  private hasDeposit(escrow: Escrow, purpose: FundPurpose): boolean {
    return escrow.deposits.some(deposit => deposit.purpose === purpose);
  }

  private addDeposit(escrow: Escrow, deposit: DepositRecord): void {
    escrow.deposits.push(deposit);
    this.spentPaymentHashes.add(deposit.paymentHash);
  }

  /**
   * Record a collateral deposit made ahead of the purchase payment.
   */
  async recordCollateral(escrowId: string, party: EscrowParty, proof: PaymentProof): Promise<Outcome<DepositRecord, EscrowError>> {
    const escrow = this.escrows.get(escrowId);
    if (!escrow) return fail('NotFound', `Escrow ${escrowId} not found`);
    if (escrow.state !== EscrowState.PENDING) {
      return fail('InvalidState', `Collateral can only be added to a pending escrow (state ${escrow.state})`);
    }

    const purpose: FundPurpose = party === 'seller' ? 'seller_collateral' : 'buyer_collateral';
    if (this.hasDeposit(escrow, purpose)) {
      return fail('InvalidState', `${purpose} already deposited`);
    }
    const amountSats = party === 'seller' ? escrow.sellerCollateralSats : escrow.buyerCollateralSats;
    if (amountSats === 0) {
      return fail('AmountMismatch', `No ${purpose} is required for this escrow`);
    }

    const verified = await this.verifyDeposit({
      purpose,
      proof,
      amountSats,
      depositor: party === 'seller' ? escrow.seller : escrow.buyer,
      payee: party === 'seller' ? escrow.buyer : escrow.seller,
    });
    if (!verified.success) return verified;

    // The lookup yielded; another deposit may have landed meanwhile
    if (escrow.state !== EscrowState.PENDING || this.hasDeposit(escrow, purpose)) {
      return fail('InvalidState', `${purpose} already deposited`);
    }
    this.addDeposit(escrow, verified.value);
    return verified;
  }

  /**
   * Pending -> Active once the purchase and every required collateral are
   * verified. Nothing is recorded unless all of them check out.
   */
  async fund(escrowId: string, paymentProof: PaymentProof, collateralProof?: PaymentProof): Promise<Outcome<Escrow, EscrowError>> {
    const escrow = this.escrows.get(escrowId);
    if (!escrow) return fail('NotFound', `Escrow ${escrowId} not found`);
    if (escrow.state !== EscrowState.PENDING) {
      return fail('InvalidState', `Escrow ${escrowId} is ${escrow.state}, expected Pending`);
    }

    const expected: ExpectedDeposit[] = [
      {
        purpose: 'purchase',
        proof: paymentProof,
        amountSats: escrow.purchaseAmountSats,
        depositor: escrow.buyer,
        payee: escrow.seller,
      },
    ];

    if (escrow.buyerCollateralSats > 0 && !this.hasDeposit(escrow, 'buyer_collateral')) {
      if (!collateralProof) {
        return fail('IncompleteFunding', `Buyer collateral of ${escrow.buyerCollateralSats} sats has not been deposited`);
      }
      expected.push({
        purpose: 'buyer_collateral',
        proof: collateralProof,
        amountSats: escrow.buyerCollateralSats,
        depositor: escrow.buyer,
        payee: escrow.seller,
      });
    }

    if (escrow.sellerCollateralSats > 0 && !this.hasDeposit(escrow, 'seller_collateral')) {
      return fail('IncompleteFunding', `Seller collateral of ${escrow.sellerCollateralSats} sats has not been deposited`);
    }

    if (new Set(expected.map(entry => entry.proof.payment_hash)).size !== expected.length) {
      return fail('IncompleteFunding', 'Purchase and collateral must be separate payments');
    }

    const verified: DepositRecord[] = [];
    for (const entry of expected) {
      const result = await this.verifyDeposit(entry);
      if (!result.success) return result;
      verified.push(result.value);
    }

    if (escrow.state !== EscrowState.PENDING) {
      return fail('InvalidState', `Escrow ${escrowId} changed state while funding`);
    }
    for (const deposit of verified) {
      this.addDeposit(escrow, deposit);
    }
    escrow.state = EscrowState.ACTIVE;
    escrow.fundedAt = Math.floor(Date.now() / 1000);
    this.log.info('Escrow', 'Escrow funded', { escrowId, lockedSats: escrow.deposits.reduce((s, d) => s + d.amountSats, 0) });
    return ok(escrow);
  }

  /**
   * Active -> Completed on the preimage matching the payment hash. Only a
   * preimage revealed by the event counts, never one held in the local vault,
   * so every node reaches the same outcome.
   */
  release(escrowId: string, preimage: string | undefined): Outcome<FundDistribution, EscrowError> {
    const escrow = this.escrows.get(escrowId);
    if (!escrow) return fail('NotFound', `Escrow ${escrowId} not found`);
    if (escrow.state !== EscrowState.ACTIVE) {
      return fail('InvalidState', `Escrow ${escrowId} is ${escrow.state}, expected Active`);
    }

    const candidate = preimage;
    if (candidate === undefined) {
      return fail('PreimageMismatch', 'No preimage revealed');
    }
    if (!isHex32(candidate) || !hexEquals(sha256Hex(candidate), escrow.paymentHash)) {
      return fail('PreimageMismatch', 'Preimage does not hash to the escrow payment hash');
    }

    escrow.preimage = candidate;
    const payouts = escrow.deposits.map(deposit => ({
      recipient: deposit.purpose === 'buyer_collateral' ? escrow.buyer : escrow.seller,
      amountSats: deposit.amountSats,
      purpose: deposit.purpose,
    }));
    return ok(this.close(escrow, EscrowState.COMPLETED, 'released', payouts));
  }

  /**
   * Pending/Active -> Expired once `now` is past the timeout. Every deposit
   * goes back to whoever made it.
   */
  expire(escrowId: string, now: number): Outcome<FundDistribution, EscrowError> {
    const escrow = this.escrows.get(escrowId);
    if (!escrow) return fail('NotFound', `Escrow ${escrowId} not found`);
    if (escrow.state !== EscrowState.ACTIVE && escrow.state !== EscrowState.PENDING) {
      return fail('InvalidState', `Escrow ${escrowId} is ${escrow.state}`);
    }
    if (now <= escrow.timeout) {
      return fail('NotExpired', `Escrow ${escrowId} expires at ${escrow.timeout}, now ${now}`);
    }
    return ok(this.close(escrow, EscrowState.EXPIRED, 'expired', this.returnDeposits(escrow)));
  }

  /**
   * Active -> Refunded; same payouts as expiry, before the timeout.
   */
  refund(escrowId: string): Outcome<FundDistribution, EscrowError> {
    const escrow = this.escrows.get(escrowId);
    if (!escrow) return fail('NotFound', `Escrow ${escrowId} not found`);
    if (escrow.state !== EscrowState.ACTIVE) {
      return fail('InvalidState', `Escrow ${escrowId} is ${escrow.state}, expected Active`);
    }
    return ok(this.close(escrow, EscrowState.REFUNDED, 'refunded', this.returnDeposits(escrow)));
  }

  /**
   * Ids of open escrows whose timeout has passed.
   */
  dueForExpiry(now: number): string[] {
    const due: string[] = [];
    for (const escrow of this.escrows.values()) {
      if ((escrow.state === EscrowState.ACTIVE || escrow.state === EscrowState.PENDING) && now > escrow.timeout) {
        due.push(escrow.escrowId);
      }
    }
    return due;
  }

  countActive(): number {
    let count = 0;
    for (const escrow of this.escrows.values()) {
      if (escrow.state === EscrowState.ACTIVE) count++;
    }
    return count;
  }

  isTerminal(escrowId: string): boolean {
    const escrow = this.escrows.get(escrowId);
    return escrow !== undefined && TERMINAL_ESCROW_STATES.includes(escrow.state);
  }

  clear(): void {
    this.escrows.clear();
    this.spentPaymentHashes.clear();
  }

  private returnDeposits(escrow: Escrow): Payout[] {
    return escrow.deposits.map(deposit => ({
      recipient: deposit.depositor,
      amountSats: deposit.amountSats,
      purpose: deposit.purpose,
    }));
  }

  private close(
    escrow: Escrow,
    state: EscrowState,
    outcome: FundDistribution['outcome'],
    payouts: Payout[]
  ): FundDistribution {
    escrow.state = state;
    escrow.closedAt = Math.floor(Date.now() / 1000);
    const distribution: FundDistribution = {
      escrowId: escrow.escrowId,
      outcome,
      payouts: payouts.filter(payout => payout.amountSats > 0),
    };
    this.log.info('Escrow', `Escrow ${outcome}`, {
      escrowId: escrow.escrowId,
      payouts: distribution.payouts.length,
    });
    return distribution;
  }
}
