/**
 * Mock Lightning Node
 *
 * In-process stand-in for the payment network, used by tests and local demos.
 * Several nodes share one MockLightningLedger so a payment made by one
 * participant is visible to every other participant's lookups.
 */

import { EventEmitter } from 'events';
import { randomHex, sha256Hex } from '../crypto';
import { ProtocolError } from '../errors';
import { logger } from '../scaling/structured-logger';
import { Invoice, PaymentNetwork, PaymentReceipt, PaymentRecord, PaymentResult } from '../network/types';

interface InvoiceEntry {
  invoice: string;
  amountSats: number;
  memo: string;
  paymentHash: string;
  preimage: string;
  payee: string;
  expiresAt: number;
  paidAt?: number;
}

const DEFAULT_BALANCE_SATS = 1_000_000_000;

export class MockLightningLedger {
  private invoices: Map<string, InvoiceEntry> = new Map();
  private byHash: Map<string, InvoiceEntry> = new Map();
  private balances: Map<string, number> = new Map();
  private settled = new EventEmitter();

  openAccount(nodeId: string, balanceSats: number): void {
    if (!this.balances.has(nodeId)) {
      this.balances.set(nodeId, balanceSats);
    }
  }

  balanceOf(nodeId: string): number {
    return this.balances.get(nodeId) ?? 0;
  }

  addInvoice(entry: InvoiceEntry): void {
    this.invoices.set(entry.invoice, entry);
    this.byHash.set(entry.paymentHash, entry);
  }

  getInvoice(invoice: string): InvoiceEntry | undefined {
    return this.invoices.get(invoice);
  }

  getByHash(paymentHash: string): InvoiceEntry | undefined {
    return this.byHash.get(paymentHash);
  }

  settle(payer: string, entry: InvoiceEntry, now: number): void {
    this.balances.set(payer, this.balanceOf(payer) - entry.amountSats);
    this.balances.set(entry.payee, this.balanceOf(entry.payee) + entry.amountSats);
    entry.paidAt = now;
    this.settled.emit(entry.paymentHash, entry);
  }

  onSettled(paymentHash: string, listener: (entry: InvoiceEntry) => void): () => void {
    this.settled.once(paymentHash, listener);
    return () => {
      this.settled.off(paymentHash, listener);
    };
  }
}

export class MockLightningNode implements PaymentNetwork {
  readonly nodeId: string;
  private ledger: MockLightningLedger;

  constructor(nodeId: string, ledger: MockLightningLedger = new MockLightningLedger(), balanceSats = DEFAULT_BALANCE_SATS) {
    this.nodeId = nodeId;
    this.ledger = ledger;
    this.ledger.openAccount(nodeId, balanceSats);
  }

  async createInvoice(amountSats: number, memo: string, expirySeconds: number): Promise<Invoice> {
    if (!Number.isSafeInteger(amountSats) || amountSats <= 0) {
      throw new Error(`Invoice amount must be a positive integer, got ${amountSats}`);
    }
    const preimage = randomHex(32);
    const paymentHash = sha256Hex(preimage);
    const invoice = `lnbc${amountSats}1p${randomHex(20)}`;

    this.ledger.addInvoice({
      invoice,
      amountSats,
      memo,
      paymentHash,
      preimage,
      payee: this.nodeId,
      expiresAt: Math.floor(Date.now() / 1000) + expirySeconds,
    });

    return { invoice, paymentHash };
  }

  async pay(invoice: string): Promise<PaymentResult> {
    const entry = this.ledger.getInvoice(invoice);
    if (!entry) {
      logger.warn('MockLightning', 'Tried to pay an unknown invoice', { node: this.nodeId.slice(0, 8) });
      return { preimage: '', status: 'failed' };
    }
    const now = Math.floor(Date.now() / 1000);
    if (entry.paidAt !== undefined || now > entry.expiresAt) {
      return { preimage: '', status: 'failed' };
    }
    if (this.ledger.balanceOf(this.nodeId) < entry.amountSats) {
      return { preimage: '', status: 'failed' };
    }

    this.ledger.settle(this.nodeId, entry, now);
    return { preimage: entry.preimage, status: 'succeeded' };
  }

  awaitPayment(paymentHash: string, signal?: AbortSignal): Promise<PaymentReceipt> {
    const entry = this.ledger.getByHash(paymentHash);
    if (!entry) {
      return Promise.reject(new Error(`Unknown payment hash ${paymentHash.slice(0, 16)}`));
    }
    if (entry.paidAt !== undefined) {
      return Promise.resolve({ preimage: entry.preimage, paidAt: entry.paidAt });
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        unsubscribe();
        reject(new ProtocolError('ABORTED', 'Stopped waiting for payment'));
      };
      const unsubscribe = this.ledger.onSettled(paymentHash, settled => {
        signal?.removeEventListener('abort', onAbort);
        resolve({ preimage: settled.preimage, paidAt: settled.paidAt ?? Math.floor(Date.now() / 1000) });
      });
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  async lookupPayment(paymentHash: string): Promise<PaymentRecord | undefined> {
    const entry = this.ledger.getByHash(paymentHash);
    if (!entry) return undefined;
    return {
      paymentHash: entry.paymentHash,
      amountSats: entry.amountSats,
      payee: entry.payee,
      settled: entry.paidAt !== undefined,
      paidAt: entry.paidAt,
    };
  }

  getBalance(): number {
    return this.ledger.balanceOf(this.nodeId);
  }
}
