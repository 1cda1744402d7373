/**
 * Notification fan-out
 *
 * Sinks hear about state changes after they are committed. Delivery is
 * at-least-once per sink with bounded retries; a sink that keeps failing is
 * logged and counted, never allowed to block or undo ingestion.
 */

import { errorMessage } from '../errors';
import { FundDistribution } from '../escrow/types';
import { TransitionRecord } from '../market/types';
import { SubjectKind } from '../reputation/types';
import { METRIC, MetricsCollector } from '../scaling/metrics';
import { logger, StructuredLogger } from '../scaling/structured-logger';

export type RejectionCategory = 'Malformed' | 'PolicyRejected' | 'SequenceRejected' | 'EscrowViolation';

export type Notification =
  | { type: 'transition'; listingId: string; transactionId?: string; transition: TransitionRecord }
  | { type: 'escrow'; distribution: FundDistribution }
  | { type: 'reputation'; subject: string; subjectKind: SubjectKind; rating: number; eventId: string }
  | { type: 'rejected'; eventId: string; category: RejectionCategory; code: string; message: string };

export interface NotificationSink {
  name: string;
  notify(notification: Notification): Promise<void>;
}

export interface NotifierOptions {
  maxAttempts?: number;
  /** Delay before the first retry; doubles on each attempt */
  retryDelayMs?: number;
  metrics?: MetricsCollector;
  logger?: StructuredLogger;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class Notifier {
  private sinks: Map<string, NotificationSink> = new Map();
  private inFlight: Set<Promise<void>> = new Set();
  private maxAttempts: number;
  private retryDelayMs: number;
  private metrics?: MetricsCollector;
  private log: StructuredLogger;

  constructor(opts: NotifierOptions = {}) {
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
    this.retryDelayMs = opts.retryDelayMs ?? 100;
    this.metrics = opts.metrics;
    this.log = opts.logger ?? logger;
  }

  addSink(sink: NotificationSink): void {
    this.sinks.set(sink.name, sink);
  }

  removeSink(name: string): boolean {
    return this.sinks.delete(name);
  }

  /**
   * Queue delivery to every sink and return immediately.
   */
  dispatch(notification: Notification): void {
    for (const sink of this.sinks.values()) {
      const delivery = this.deliver(sink, notification);
      this.inFlight.add(delivery);
      void delivery.finally(() => this.inFlight.delete(delivery));
    }
  }

  /**
   * Resolves when every queued delivery has either succeeded or given up.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  pendingCount(): number {
    return this.inFlight.size;
  }

  // Never rejects
  private async deliver(sink: NotificationSink, notification: Notification): Promise<void> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await sink.notify(notification);
        return;
      } catch (err) {
        if (attempt === this.maxAttempts) {
          this.metrics?.incCounter(METRIC.notificationsFailed);
          this.log.error('Notifier', `Sink ${sink.name} failed after ${attempt} attempts`, {
            type: notification.type,
            error: errorMessage(err),
          });
          return;
        }
        this.log.debug('Notifier', `Sink ${sink.name} failed, retrying`, { attempt, error: errorMessage(err) });
        await sleep(this.retryDelayMs * 2 ** (attempt - 1));
      }
    }
  }
}
