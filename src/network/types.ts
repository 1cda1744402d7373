/**
 * External Collaborators
 *
 * The node talks to two outside systems: the broadcast network that relays
 * signed events, and the payment network that settles Lightning payments.
 * Only their boundaries live here; concrete clients are supplied by the host.
 */

import { MarketEvent } from '../events/types';

export interface PublishResult {
  accepted: boolean;
  message?: string;
}

export interface SubscriptionFilter {
  kinds?: number[];
  /** Only events with created_at >= since */
  since?: number;
  limit?: number;
}

export interface BroadcastNetwork {
  publish(event: MarketEvent): Promise<PublishResult>;
  /**
   * Lazy, unbounded stream of matching events. Ends when the signal aborts.
   * Calling it again with a later `since` resumes a broken subscription.
   */
  subscribe(filter: SubscriptionFilter, signal?: AbortSignal): AsyncIterable<MarketEvent>;
}

export interface Invoice {
  invoice: string;
  paymentHash: string;
}

export interface PaymentReceipt {
  preimage: string;
  paidAt: number;
}

export interface PaymentResult {
  preimage: string;
  status: 'succeeded' | 'failed';
}

export interface PaymentRecord {
  paymentHash: string;
  amountSats: number;
  /** Key of the node that issued the invoice */
  payee: string;
  settled: boolean;
  paidAt?: number;
}

export interface PaymentNetwork {
  createInvoice(amountSats: number, memo: string, expirySeconds: number): Promise<Invoice>;
  awaitPayment(paymentHash: string, signal?: AbortSignal): Promise<PaymentReceipt>;
  pay(invoice: string): Promise<PaymentResult>;
  lookupPayment(paymentHash: string): Promise<PaymentRecord | undefined>;
}
