import { METRIC, MetricsCollector } from './metrics';

describe('MetricsCollector', () => {
  it('counts and sets gauges', () => {
    const metrics = new MetricsCollector();
    metrics.incCounter(METRIC.eventsAccepted);
    metrics.incCounter(METRIC.eventsAccepted, 2);
    metrics.setGauge(METRIC.escrowsActive, 4);

    expect(metrics.getCounter(METRIC.eventsAccepted)).toBe(3);
    expect(metrics.getGauge(METRIC.escrowsActive)).toBe(4);
    expect(metrics.getCounter('unknown_total')).toBe(0);
  });

  it('renders cumulative histogram buckets', () => {
    const metrics = new MetricsCollector();
    metrics.registerHistogram('test_latency_seconds', 'Latency', [0.1, 1]);
    metrics.observeHistogram('test_latency_seconds', 0.0625);
    metrics.observeHistogram('test_latency_seconds', 0.5);
    metrics.observeHistogram('test_latency_seconds', 3);

    const lines = metrics.render().split('\n');
    expect(lines).toContain('test_latency_seconds_bucket{le="0.1"} 1');
    expect(lines).toContain('test_latency_seconds_bucket{le="1"} 2');
    expect(lines).toContain('test_latency_seconds_bucket{le="+Inf"} 3');
    expect(lines).toContain('test_latency_seconds_sum 3.5625');
    expect(lines).toContain('test_latency_seconds_count 3');
  });

  it('writes HELP and TYPE lines for every counter', () => {
    const output = new MetricsCollector().render();
    expect(output).toContain(
      '# HELP bazaar_events_accepted_total Events accepted into the event store\n' +
        '# TYPE bazaar_events_accepted_total counter\n' +
        'bazaar_events_accepted_total 0\n'
    );
  });
});
