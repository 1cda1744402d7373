import { METRIC, MetricsCollector } from '../scaling/metrics';
import { SILENT } from '../testing/fixtures';
import { Notification, NotificationSink, Notifier } from './notifier';

const REJECTED: Notification = {
  type: 'rejected',
  eventId: 'ab'.repeat(32),
  category: 'Malformed',
  code: 'BadSignature',
  message: 'Signature does not verify',
};

function flakySink(name: string, failures: number): NotificationSink & { calls: number; received: Notification[] } {
  return {
    name,
    calls: 0,
    received: [],
    async notify(notification: Notification) {
      this.calls++;
      if (this.calls <= failures) throw new Error(`sink down (${this.calls})`);
      this.received.push(notification);
    },
  };
}

describe('Notifier', () => {
  it('retries a failing sink until it succeeds', async () => {
    const metrics = new MetricsCollector();
    const notifier = new Notifier({ maxAttempts: 3, retryDelayMs: 1, metrics, logger: SILENT });
    const sink = flakySink('audit', 2);
    notifier.addSink(sink);

    notifier.dispatch(REJECTED);
    expect(notifier.pendingCount()).toBe(1);
    await notifier.drain();

    expect(sink.calls).toBe(3);
    expect(sink.received).toEqual([REJECTED]);
    expect(metrics.getCounter(METRIC.notificationsFailed)).toBe(0);
    expect(notifier.pendingCount()).toBe(0);
  });

  it('counts a sink that exhausts its attempts without affecting the others', async () => {
    const metrics = new MetricsCollector();
    const notifier = new Notifier({ maxAttempts: 2, retryDelayMs: 1, metrics, logger: SILENT });
    const broken = flakySink('broken', 10);
    const healthy = flakySink('healthy', 0);
    notifier.addSink(broken);
    notifier.addSink(healthy);

    notifier.dispatch(REJECTED);
    await notifier.drain();

    expect(broken.calls).toBe(2);
    expect(broken.received).toEqual([]);
    expect(healthy.received).toEqual([REJECTED]);
    expect(metrics.getCounter(METRIC.notificationsFailed)).toBe(1);
  });

  it('stops delivering to a removed sink', async () => {
    const notifier = new Notifier({ logger: SILENT });
    const sink = flakySink('audit', 0);
    notifier.addSink(sink);

    expect(notifier.removeSink('audit')).toBe(true);
    expect(notifier.removeSink('audit')).toBe(false);
    notifier.dispatch(REJECTED);
    await notifier.drain();

    expect(sink.calls).toBe(0);
  });
});
