/**
 * Marketplace Node
 *
 * Ingestion pipeline for marketplace events:
 *
 *   parse -> verify id/signature -> clock skew -> content -> anti-spam
 *     -> per-listing lane -> state machine / reputation -> event store
 *     -> metrics -> notifications
 *
 * Every failure comes back as a value with a category:
 * - Malformed:        structure, id, signature, content, clock skew
 * - PolicyRejected:   anti-spam proof
 * - SequenceRejected: not legal for the transaction's current state
 * - EscrowViolation:  AmountMismatch, PreimageMismatch, IncompleteFunding
 *
 * Rejected events are never stored. Duplicates are recognised by id and
 * change nothing; concurrent deliveries of one id share a single result.
 */

import { EventEmitter } from 'events';
import { AntiSpamValidator } from '../anti-spam/validator';
import { ProofClaim } from '../anti-spam/types';
import { DEFAULT_CONFIG, NodeConfig } from '../config';
import { errorMessage, fail, ok, Outcome } from '../errors';
import { EscrowManager } from '../escrow/escrow-manager';
import { EventStore } from '../event-store/event-store';
import { verifyEvent, parseEvent } from '../events/codec';
import { EventContent, parseContent } from '../events/content';
import { EventKind, isEventKind, MarketEvent, REPUTATION_KINDS } from '../events/types';
import { TransactionStateMachine } from '../market/transaction-state-machine';
import { AppliedEvent, TimeoutResult, Transaction, TransitionError } from '../market/types';
import { BroadcastNetwork, PaymentNetwork, SubscriptionFilter } from '../network/types';
import { ReputationEngine } from '../reputation/reputation-engine';
import { ReputationStore } from '../reputation/reputation-store';
import { ReputationError, ReputationRecord } from '../reputation/types';
import { KeyedExecutor } from '../scaling/keyed-executor';
import { METRIC, MetricsCollector } from '../scaling/metrics';
import { WorkerPool } from '../scaling/worker-pool';
import { logger, StructuredLogger } from '../scaling/structured-logger';
import { Notification, NotificationSink, Notifier, RejectionCategory } from './notifier';

export type IngestResult =
  | { status: 'accepted'; eventId: string; applied: AppliedEvent }
  | { status: 'duplicate'; eventId: string }
  | { status: 'rejected'; eventId?: string; category: RejectionCategory; code: string; message: string };

type Rejection = Extract<IngestResult, { status: 'rejected' }>;

export interface MarketplaceNodeOptions {
  config?: Partial<NodeConfig>;
  /** Used to confirm payment proofs and escrow deposits */
  payments?: PaymentNetwork;
  /** Defaults to a fresh in-memory store */
  reputationStore?: ReputationStore;
  sinks?: NotificationSink[];
  logger?: StructuredLogger;
  metrics?: MetricsCollector;
  /** Unix seconds */
  clock?: () => number;
  notifyRetryDelayMs?: number;
  /** Delay before resubscribing after a broken subscription */
  resubscribeDelayMs?: number;
}

export interface ReplayReport {
  replayed: number;
  failed: number;
}

export interface FollowReport {
  received: number;
  accepted: number;
  resubscribes: number;
}

const ESCROW_ERRORS: readonly string[] = ['AmountMismatch', 'PreimageMismatch', 'IncompleteFunding'];

function systemClock(): number {
  return Math.floor(Date.now() / 1000);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function categoryOf(error: TransitionError | ReputationError): RejectionCategory {
  return ESCROW_ERRORS.includes(error) ? 'EscrowViolation' : 'SequenceRejected';
}

function transactionRefOf(parsed: EventContent): string | undefined {
  switch (parsed.kind) {
    case EventKind.USER_REPUTATION_FEEDBACK:
    case EventKind.ARBITRATOR_REPUTATION_FEEDBACK:
      return parsed.content.transaction_ref;
    default:
      return undefined;
  }
}

export class MarketplaceNode extends EventEmitter {
  readonly config: NodeConfig;
  private store: EventStore;
  private validator: AntiSpamValidator;
  private escrow: EscrowManager;
  private machine: TransactionStateMachine;
  private reputation: ReputationEngine;
  private executor: KeyedExecutor = new KeyedExecutor();
  private notifier: Notifier;
  private pool?: WorkerPool;
  private metrics: MetricsCollector;
  private log: StructuredLogger;
  private clock: () => number;
  private resubscribeDelayMs: number;
  private inFlight: Map<string, Promise<IngestResult>> = new Map();

  constructor(opts: MarketplaceNodeOptions = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...opts.config };
    this.log = (opts.logger ?? logger).child({ node: 'marketplace' });
    this.log.setLevel(this.config.logLevel);
    this.metrics = opts.metrics ?? new MetricsCollector();
    this.clock = opts.clock ?? systemClock;
    this.resubscribeDelayMs = opts.resubscribeDelayMs ?? 1000;

    this.store = new EventStore({ dataDir: this.config.dataDir }, this.log);
    this.validator = new AntiSpamValidator({
      policy: this.config.antiSpam,
      events: this.store,
      payments: opts.payments,
      logger: this.log,
    });
    this.escrow = new EscrowManager({ payments: opts.payments, logger: this.log });
    this.machine = new TransactionStateMachine({ policy: this.config.market, escrow: this.escrow, logger: this.log });
    this.reputation = new ReputationEngine({ store: opts.reputationStore ?? new ReputationStore(), logger: this.log });
    this.notifier = new Notifier({
      maxAttempts: this.config.notifyMaxAttempts,
      retryDelayMs: opts.notifyRetryDelayMs,
      metrics: this.metrics,
      logger: this.log,
    });
    for (const sink of opts.sinks ?? []) {
      this.notifier.addSink(sink);
    }
    // Threads start on the first mining job
    if (this.config.workerPoolSize > 0) {
      this.pool = new WorkerPool({
        size: this.config.workerPoolSize,
        taskTimeoutMs: this.config.workerTimeoutMs,
        logger: this.log,
      });
    }
  }

  // ── Accessors ──

  getEventStore(): EventStore {
    return this.store;
  }

  getStateMachine(): TransactionStateMachine {
    return this.machine;
  }

  getEscrowManager(): EscrowManager {
    return this.escrow;
  }

  getReputation(): ReputationEngine {
    return this.reputation;
  }

  getValidator(): AntiSpamValidator {
    return this.validator;
  }

  getMetrics(): MetricsCollector {
    return this.metrics;
  }

  /** Undefined when `workerPoolSize` is 0 */
  getWorkerPool(): WorkerPool | undefined {
    return this.pool;
  }

  addSink(sink: NotificationSink): void {
    this.notifier.addSink(sink);
  }

  now(): number {
    return this.clock();
  }

  // ── Ingestion ──

  /**
   * Ingest one event from the network or a local participant. Never throws
   * for a bad event; the result says what happened.
   */
  ingest(raw: unknown): Promise<IngestResult> {
    const parsed = parseEvent(raw);
    if (!parsed.success) {
      return Promise.resolve(this.reject(undefined, 'Malformed', parsed.error, parsed.message));
    }
    const event = parsed.value;

    if (this.store.has(event.id)) {
      this.metrics.incCounter(METRIC.eventsDuplicate);
      return Promise.resolve<IngestResult>({ status: 'duplicate', eventId: event.id });
    }

    // A copy with a forged signature must not share the genuine event's result
    const verified = verifyEvent(event);
    if (!verified.success) {
      return Promise.resolve(this.reject(event.id, 'Malformed', verified.error, verified.message));
    }

    const pending = this.inFlight.get(event.id);
    if (pending) return pending;

    const started = Date.now();
    const processing = this.process(event).finally(() => {
      this.inFlight.delete(event.id);
      this.metrics.observeHistogram(METRIC.ingestDuration, (Date.now() - started) / 1000);
    });
    this.inFlight.set(event.id, processing);
    return processing;
  }

  private async process(event: MarketEvent): Promise<IngestResult> {
    const kind = event.kind;
    if (!isEventKind(kind)) {
      return this.reject(event.id, 'Malformed', 'UnknownKind', `Unknown event kind ${kind}`);
    }

    const maxCreatedAt = this.clock() + this.config.maxFutureSkewSeconds;
    if (event.created_at > maxCreatedAt) {
      return this.reject(event.id, 'Malformed', 'FutureTimestamp', `created_at ${event.created_at} is ahead of the local clock`);
    }

    const content = parseContent(kind, event.content);
    if (!content.success) {
      return this.reject(event.id, 'Malformed', content.error, content.message);
    }

    const proof = await this.validator.validate(event);
    if (!proof.success) {
      return this.reject(event.id, 'PolicyRejected', proof.error, proof.message);
    }

    const lane = this.machine.rootOf(event, content.value);
    return this.executor.submit(lane, { createdAt: event.created_at, id: event.id }, () =>
      this.applyInLane(lane, event, content.value, proof.value.claim)
    );
  }

  private async applyInLane(
    lane: string,
    event: MarketEvent,
    parsed: EventContent,
    claim: ProofClaim | undefined
  ): Promise<IngestResult> {
    if (this.store.has(event.id)) {
      this.metrics.incCounter(METRIC.eventsDuplicate);
      return { status: 'duplicate', eventId: event.id };
    }

    // A timeout that has passed wins over any event that arrives after it
    const expired = this.machine.checkTimeout(lane, Math.max(this.clock(), event.created_at));
    if (expired) {
      this.recordExpired([expired]);
      this.refreshGauges();
    }
    if (claim && !this.validator.reserve(claim)) {
      return 'paymentHash' in claim
        ? this.reject(event.id, 'PolicyRejected', 'PaymentAlreadyConsumed', 'Payment proof is already spent')
        : this.reject(event.id, 'PolicyRejected', 'ReferenceAlreadyConsumed', 'Reference proof is already spent');
    }

    let applied: Outcome<AppliedEvent, TransitionError | ReputationError>;
    try {
      applied = await this.applyDerived(event, parsed);
    } catch (err) {
      if (claim) this.validator.release(claim);
      throw err;
    }

    if (!applied.success) {
      if (claim) this.validator.release(claim);
      return this.reject(event.id, categoryOf(applied.error), applied.error, applied.message);
    }

    this.store.append(event);
    if (claim) this.validator.commit(claim);
    this.recordAccepted(applied.value);
    return { status: 'accepted', eventId: event.id, applied: applied.value };
  }

  /**
   * Fold one verified event into the derived state.
   */
  private async applyDerived(
    event: MarketEvent,
    parsed: EventContent
  ): Promise<Outcome<AppliedEvent, TransitionError | ReputationError>> {
    const applied = await this.machine.apply(event, parsed);
    if (!applied.success) return applied;

    if (REPUTATION_KINDS.includes(parsed.kind)) {
      const ref = transactionRefOf(parsed);
      const tx = ref ? this.machine.getTransaction(ref) : undefined;
      const rated = this.reputation.apply(event, parsed, tx);
      if (!rated.success) return rated;
      if (rated.value) this.emitNotification(this.reputationNotification(event.id, rated.value));
      return applied;
    }

    if (parsed.kind === EventKind.RECEIPT_CONFIRMATION && applied.value.transactionId) {
      this.rateFromReceipt(event, parsed, this.machine.getTransaction(applied.value.transactionId));
    }
    return applied;
  }

  // A receipt that completed a transaction already moved state; its rating is extra
  private rateFromReceipt(event: MarketEvent, parsed: EventContent, tx: Transaction | undefined, notify = true): void {
    const rated = this.reputation.apply(event, parsed, tx);
    if (!rated.success) {
      this.log.warn('Node', 'Receipt rating not recorded', { eventId: event.id, error: rated.error, message: rated.message });
      return;
    }
    if (rated.value && notify) this.emitNotification(this.reputationNotification(event.id, rated.value));
  }

  private reputationNotification(eventId: string, record: ReputationRecord): Notification {
    return { type: 'reputation', subject: record.subject, subjectKind: record.subjectKind, rating: record.rating, eventId };
  }

  private recordAccepted(applied: AppliedEvent): void {
    this.metrics.incCounter(METRIC.eventsAccepted);
    this.refreshGauges();
    this.emit('accepted', applied);

    if (applied.transition) {
      this.metrics.incCounter(METRIC.transitions);
      this.emitNotification({
        type: 'transition',
        listingId: applied.listingId,
        transactionId: applied.transactionId,
        transition: applied.transition,
      });
    }
    if (applied.distribution) {
      this.emitNotification({ type: 'escrow', distribution: applied.distribution });
    }
  }

  private reject(eventId: string | undefined, category: RejectionCategory, code: string, message: string): Rejection {
    switch (category) {
      case 'Malformed':
        this.metrics.incCounter(METRIC.rejectedMalformed);
        this.log.debug('Node', `Dropped malformed event: ${message}`, { eventId, code });
        break;
      case 'PolicyRejected':
        this.metrics.incCounter(METRIC.rejectedPolicy);
        this.log.debug('Node', `Anti-spam rejected event: ${message}`, { eventId, code });
        break;
      case 'SequenceRejected':
        this.metrics.incCounter(METRIC.rejectedSequence);
        this.log.warn('Node', `Rejected out-of-sequence event: ${message}`, { eventId, code });
        break;
      case 'EscrowViolation':
        this.metrics.incCounter(METRIC.rejectedEscrow);
        this.log.warn('Node', `Escrow rejected event: ${message}`, { eventId, code });
        break;
    }

    const rejection: Rejection = { status: 'rejected', eventId, category, code, message };
    if (eventId) {
      this.emitNotification({ type: 'rejected', eventId, category, code, message });
    }
    return rejection;
  }

  private emitNotification(notification: Notification): void {
    this.emit(notification.type, notification);
    this.notifier.dispatch(notification);
  }

  private refreshGauges(): void {
    this.metrics.setGauge(METRIC.storedEvents, this.store.size());
    this.metrics.setGauge(METRIC.escrowsActive, this.escrow.countActive());
    this.metrics.setGauge(METRIC.transactionsOpen, this.machine.countOpen());
  }

  // ── Timeouts ──

  /**
   * Expire every open transaction whose escrow timeout has passed. Runs in
   * each transaction's lane so it cannot interleave with an event.
   */
  async checkTimeouts(now: number = this.clock()): Promise<TimeoutResult[]> {
    const due = this.machine.dueForTimeout(now);
    const results = await Promise.all(
      due.map(id => this.executor.submit(id, { createdAt: now, id: '' }, async () => this.machine.checkTimeout(id, now)))
    );

    const expired = results.filter((r): r is TimeoutResult => r !== undefined);
    this.recordExpired(expired);
    if (expired.length > 0) {
      this.log.info('Node', `Expired ${expired.length} transactions`);
      this.refreshGauges();
    }
    return expired;
  }

  private recordExpired(expired: TimeoutResult[]): void {
    for (const result of expired) {
      this.metrics.incCounter(METRIC.transitions);
      this.emitNotification({
        type: 'transition',
        listingId: result.transactionId,
        transactionId: result.transactionId,
        transition: result.transition,
      });
      this.emitNotification({ type: 'escrow', distribution: result.distribution });
    }
  }

  // ── Replay ──

  /**
   * Rebuild listings, transactions, escrows, reputation and spent reference
   * proofs from the stored events, in the order they were accepted.
   */
  async replay(): Promise<ReplayReport> {
    await this.executor.onIdle();
    this.machine.clear();
    this.escrow.clear();
    this.validator.clear();
    this.reputation.clear();

    let replayed = 0;
    let failed = 0;
    for (const event of this.store.getAll()) {
      const result = await this.replayEvent(event);
      if (result.success) {
        replayed++;
      } else {
        failed++;
        this.log.warn('Node', `Stored event did not replay: ${result.message}`, { eventId: event.id, error: result.error });
      }
    }

    this.refreshGauges();
    this.log.info('Node', `Replayed ${replayed} events`, { failed });
    return { replayed, failed };
  }

  private async replayEvent(event: MarketEvent): Promise<Outcome<void, string>> {
    if (!isEventKind(event.kind)) return fail('UnknownKind', `Unknown event kind ${event.kind}`);
    const content = parseContent(event.kind, event.content);
    if (!content.success) return content;

    const proof = this.validator.extractProof(event);
    if (proof.success && proof.value.type === 'ref') {
      this.validator.commit({ author: event.pubkey, eventId: proof.value.eventId, spendingKind: event.kind });
    } else if (proof.success && proof.value.type === 'ln') {
      this.validator.commit({ paymentHash: proof.value.paymentHash });
    }

    // Stored events were accepted before their transaction timed out; only
    // the event's own time can expire it here
    this.machine.checkTimeout(this.machine.rootOf(event, content.value), event.created_at);

    const applied = await this.machine.apply(event, content.value);
    if (!applied.success) return applied;

    if (REPUTATION_KINDS.includes(content.value.kind)) {
      const ref = transactionRefOf(content.value);
      const rated = this.reputation.apply(event, content.value, ref ? this.machine.getTransaction(ref) : undefined);
      if (!rated.success) return rated;
    } else if (content.value.kind === EventKind.RECEIPT_CONFIRMATION && applied.value.transactionId) {
      this.rateFromReceipt(event, content.value, this.machine.getTransaction(applied.value.transactionId), false);
    }
    return ok(undefined);
  }

  // ── Network ──

  /**
   * Ingest a subscription until the signal aborts or the stream ends. A
   * subscription that throws is reopened from the newest created_at seen.
   */
  async follow(network: BroadcastNetwork, filter: SubscriptionFilter = {}, signal?: AbortSignal): Promise<FollowReport> {
    const report: FollowReport = { received: 0, accepted: 0, resubscribes: 0 };
    let since = filter.since;

    while (!signal?.aborted) {
      try {
        for await (const event of network.subscribe({ ...filter, since }, signal)) {
          report.received++;
          since = Math.max(since ?? 0, event.created_at);
          const result = await this.ingest(event);
          if (result.status === 'accepted') report.accepted++;
          if (signal?.aborted) break;
        }
        return report;
      } catch (err) {
        if (signal?.aborted) break;
        report.resubscribes++;
        this.log.warn('Node', 'Subscription failed, resubscribing', { since, error: errorMessage(err) });
        await sleep(this.resubscribeDelayMs);
      }
    }
    return report;
  }

  // ── Lifecycle ──

  /**
   * Wait for queued events and notifications to finish, flush the event
   * store and stop the mining threads.
   */
  async close(): Promise<void> {
    await this.executor.onIdle();
    await this.notifier.drain();
    this.store.flush();
    await this.pool?.destroy();
  }

  getStats(): {
    events: number;
    listings: number;
    transactions: number;
    openTransactions: number;
    activeEscrows: number;
    reputationRecords: number;
    lanes: number;
  } {
    return {
      events: this.store.size(),
      listings: this.machine.listListings().length,
      transactions: this.machine.listTransactions().length,
      openTransactions: this.machine.countOpen(),
      activeEscrows: this.escrow.countActive(),
      reputationRecords: this.reputation.getStore().size(),
      lanes: this.executor.getStats().lanes,
    };
  }
}
