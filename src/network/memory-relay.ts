/**
 * In-process broadcast network for tests and local demos. Keeps every
 * published event and streams matches to subscribers.
 */

import { EventEmitter } from 'events';
import { MarketEvent } from '../events/types';
import { BroadcastNetwork, PublishResult, SubscriptionFilter } from './types';

function matches(event: MarketEvent, filter: SubscriptionFilter): boolean {
  if (filter.kinds && !filter.kinds.includes(event.kind)) return false;
  if (filter.since !== undefined && event.created_at < filter.since) return false;
  return true;
}

export class MemoryRelay implements BroadcastNetwork {
  private events: MarketEvent[] = [];
  private ids: Set<string> = new Set();
  private feed = new EventEmitter();

  constructor() {
    this.feed.setMaxListeners(0);
  }

  async publish(event: MarketEvent): Promise<PublishResult> {
    if (this.ids.has(event.id)) {
      return { accepted: true, message: 'duplicate: already have this event' };
    }
    this.ids.add(event.id);
    this.events.push(event);
    this.feed.emit('event', event);
    return { accepted: true };
  }

  /**
   * Stored matches first (the newest `limit` of them, oldest first), then
   * live events until the signal aborts.
   */
  async *subscribe(filter: SubscriptionFilter, signal?: AbortSignal): AsyncIterable<MarketEvent> {
    const stored = this.events.filter(event => matches(event, filter));
    const queue = filter.limit !== undefined ? stored.slice(-filter.limit) : stored;
    let wake: (() => void) | undefined;

    const onEvent = (event: MarketEvent) => {
      if (!matches(event, filter)) return;
      queue.push(event);
      wake?.();
    };
    const onAbort = () => wake?.();
    this.feed.on('event', onEvent);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      while (!signal?.aborted) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        await new Promise<void>(resolve => {
          wake = resolve;
        });
        wake = undefined;
      }
    } finally {
      this.feed.off('event', onEvent);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  getEvents(): MarketEvent[] {
    return [...this.events];
  }

  size(): number {
    return this.events.length;
  }
}
