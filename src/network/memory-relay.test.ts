import { listingTemplate, messageTemplate } from '../events/builders';
import { MarketEvent } from '../events/types';
import { BUYER, SELLER, T0, signed } from '../testing/fixtures';
import { MemoryRelay } from './memory-relay';

const listing = signed(SELLER, listingTemplate({ product_name: 'Lamp', description: 'Brass', price_satoshis: 50_000 }, T0));
const note = signed(BUYER, messageTemplate({ message: 'Still available?' }, T0 + 5));

async function take(iterable: AsyncIterable<MarketEvent>, count: number): Promise<MarketEvent[]> {
  const out: MarketEvent[] = [];
  for await (const event of iterable) {
    out.push(event);
    if (out.length === count) break;
  }
  return out;
}

describe('MemoryRelay', () => {
  it('stores each event once', async () => {
    const relay = new MemoryRelay();
    expect(await relay.publish(listing)).toEqual({ accepted: true });
    expect(await relay.publish(listing)).toEqual({ accepted: true, message: 'duplicate: already have this event' });
    expect(relay.size()).toBe(1);
  });

  it('replays stored matches before live events', async () => {
    const relay = new MemoryRelay();
    await relay.publish(listing);

    const controller = new AbortController();
    const received = take(relay.subscribe({}, controller.signal), 2);
    await relay.publish(note);

    expect((await received).map(e => e.id)).toEqual([listing.id, note.id]);
    controller.abort();
  });

  it('applies kind and since filters', async () => {
    const relay = new MemoryRelay();
    await relay.publish(listing);
    await relay.publish(note);

    expect((await take(relay.subscribe({ kinds: [note.kind] }), 1)).map(e => e.id)).toEqual([note.id]);
    expect((await take(relay.subscribe({ since: T0 + 1 }), 1)).map(e => e.id)).toEqual([note.id]);
    expect((await take(relay.subscribe({ limit: 1 }), 1)).map(e => e.id)).toEqual([note.id]);
  });

  it('ends the stream when the signal aborts', async () => {
    const relay = new MemoryRelay();
    const controller = new AbortController();
    const received = take(relay.subscribe({}, controller.signal), 5);

    controller.abort();
    expect(await received).toEqual([]);
  });
});
