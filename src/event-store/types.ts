/**
 * Event Store Types
 */

import { MarketEvent } from '../events/types';

export interface StoredEvent {
  sequence: number;
  event: MarketEvent;
}

export interface EventQuery {
  kinds?: number[];
  authors?: string[];
  /** Events that reference this id in a `ref` tag */
  referencing?: string;
  since?: number;
  until?: number;
  limit?: number;
}

/**
 * Segment Index - where appends go next, and how many events the segments hold.
 * Written atomically with a checksum after every segment rotation and
 * periodically in between; rebuilt from the segments if it disagrees.
 */
export interface SegmentIndex {
  version: number;
  currentSegment: number;
  currentSegmentEvents: number;
  eventCount: number;
  lastUpdated: number;
}

export interface EventStoreStats {
  events: number;
  sequence: number;
  kinds: Record<number, number>;
  persistent: boolean;
  segments: number;
}

export interface EventStoreOptions {
  /** Directory for segment files; omit for an in-memory store */
  dataDir?: string;
  /** Events per segment file */
  segmentMaxEvents?: number;
}
