/**
 * Prometheus-compatible metrics with no external dependencies
 *
 * Tracks ingestion throughput for a marketplace node:
 * - Accepted / duplicate events
 * - Rejections per error category
 * - Transaction transitions and escrow lifecycle gauges
 * - Ingest latency histogram
 *
 * render() produces the Prometheus text exposition format.
 */

export const METRIC = {
  eventsAccepted: 'bazaar_events_accepted_total',
  eventsDuplicate: 'bazaar_events_duplicate_total',
  rejectedMalformed: 'bazaar_events_rejected_malformed_total',
  rejectedPolicy: 'bazaar_events_rejected_policy_total',
  rejectedSequence: 'bazaar_events_rejected_sequence_total',
  rejectedEscrow: 'bazaar_events_rejected_escrow_total',
  transitions: 'bazaar_transaction_transitions_total',
  notificationsFailed: 'bazaar_notifications_failed_total',
  escrowsActive: 'bazaar_escrows_active',
  transactionsOpen: 'bazaar_transactions_open',
  storedEvents: 'bazaar_stored_events',
  ingestDuration: 'bazaar_ingest_duration_seconds',
} as const;

interface Sample {
  value: number;
  help: string;
}

interface Histogram {
  help: string;
  buckets: number[];
  counts: number[]; // One per bucket + 1 for +Inf
  sum: number;
  count: number;
}

export class MetricsCollector {
  private counters: Map<string, Sample> = new Map();
  private gauges: Map<string, Sample> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor() {
    this.registerCounter(METRIC.eventsAccepted, 'Events accepted into the event store');
    this.registerCounter(METRIC.eventsDuplicate, 'Events dropped as duplicate deliveries');
    this.registerCounter(METRIC.rejectedMalformed, 'Events rejected for structure, id or signature');
    this.registerCounter(METRIC.rejectedPolicy, 'Events rejected by the anti-spam policy');
    this.registerCounter(METRIC.rejectedSequence, 'Events rejected as illegal transitions');
    this.registerCounter(METRIC.rejectedEscrow, 'Events rejected by escrow checks');
    this.registerCounter(METRIC.transitions, 'Transaction state transitions applied');
    this.registerCounter(METRIC.notificationsFailed, 'Notifications that exhausted their retries');

    this.registerGauge(METRIC.escrowsActive, 'Escrows currently funded and active');
    this.registerGauge(METRIC.transactionsOpen, 'Transactions not yet in a terminal state');
    this.registerGauge(METRIC.storedEvents, 'Events held in the event store');

    this.registerHistogram(METRIC.ingestDuration, 'Time spent ingesting one event', [
      0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5,
    ]);
  }

  registerCounter(name: string, help: string): void {
    if (!this.counters.has(name)) {
      this.counters.set(name, { value: 0, help });
    }
  }

  registerGauge(name: string, help: string): void {
    if (!this.gauges.has(name)) {
      this.gauges.set(name, { value: 0, help });
    }
  }

  registerHistogram(name: string, help: string, buckets: number[]): void {
    if (!this.histograms.has(name)) {
      this.histograms.set(name, {
        help,
        buckets: [...buckets].sort((a, b) => a - b),
        counts: new Array<number>(buckets.length + 1).fill(0),
        sum: 0,
        count: 0,
      });
    }
  }

  incCounter(name: string, amount: number = 1): void {
    const counter = this.counters.get(name);
    if (counter) counter.value += amount;
  }

  setGauge(name: string, value: number): void {
    const gauge = this.gauges.get(name);
    if (gauge) gauge.value = value;
  }

  observeHistogram(name: string, value: number): void {
    const hist = this.histograms.get(name);
    if (!hist) return;
    hist.sum += value;
    hist.count++;
    for (let i = 0; i < hist.buckets.length; i++) {
      if (value <= hist.buckets[i]) {
        hist.counts[i]++;
      }
    }
    hist.counts[hist.buckets.length]++;
  }

  getCounter(name: string): number {
    return this.counters.get(name)?.value ?? 0;
  }

  getGauge(name: string): number {
    return this.gauges.get(name)?.value ?? 0;
  }

  render(): string {
    const lines: string[] = [];

    for (const [name, c] of this.counters) {
      lines.push(`# HELP ${name} ${c.help}`);
      lines.push(`# TYPE ${name} counter`);
      lines.push(`${name} ${c.value}`);
    }

    for (const [name, g] of this.gauges) {
      lines.push(`# HELP ${name} ${g.help}`);
      lines.push(`# TYPE ${name} gauge`);
      lines.push(`${name} ${g.value}`);
    }

    for (const [name, h] of this.histograms) {
      lines.push(`# HELP ${name} ${h.help}`);
      lines.push(`# TYPE ${name} histogram`);
      // counts[i] already holds every observation <= bucket i
      for (let i = 0; i < h.buckets.length; i++) {
        lines.push(`${name}_bucket{le="${h.buckets[i]}"} ${h.counts[i]}`);
      }
      lines.push(`${name}_bucket{le="+Inf"} ${h.count}`);
      lines.push(`${name}_sum ${h.sum}`);
      lines.push(`${name}_count ${h.count}`);
    }

    return lines.join('\n') + '\n';
  }
}
