/**
 * Event Store Implementation
 *
 * Events-by-id for every accepted event, with secondary indexes by kind,
 * author and referenced id. With a data directory, each accepted event is
 * also appended to a segment file (NDJSON, one `{ seq, event }` per line)
 * so the node can replay its history after a restart.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ProtocolError } from '../errors';
import { parseEvent, verifyEvent } from '../events/codec';
import { getReferences } from '../events/tags';
import { MarketEvent } from '../events/types';
import { AtomicStorage } from '../storage/atomic-storage';
import { logger, StructuredLogger } from '../scaling/structured-logger';
import { EventQuery, EventStoreOptions, EventStoreStats, SegmentIndex, StoredEvent } from './types';

const SEGMENT_INDEX_VERSION = 1;
const DEFAULT_SEGMENT_MAX_EVENTS = 1000;
const INDEX_SAVE_INTERVAL = 50;

function isSegmentIndex(value: unknown): value is SegmentIndex {
  if (typeof value !== 'object' || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    v.version === SEGMENT_INDEX_VERSION &&
    typeof v.currentSegment === 'number' &&
    typeof v.currentSegmentEvents === 'number' &&
    typeof v.eventCount === 'number'
  );
}

function pushIndex(index: Map<string, string[]>, key: string, id: string): void {
  const ids = index.get(key);
  if (ids) ids.push(id);
  else index.set(key, [id]);
}

export class EventStore {
  private events: Map<string, StoredEvent> = new Map();
  private byKind: Map<string, string[]> = new Map();
  private byAuthor: Map<string, string[]> = new Map();
  private byReference: Map<string, string[]> = new Map();
  private sequence = 0;

  private readonly dataDir?: string;
  private readonly segmentsDir?: string;
  private readonly segmentIndexFile?: string;
  private readonly segmentMaxEvents: number;
  private segmentIndex: SegmentIndex;
  private log: StructuredLogger;

  constructor(opts: EventStoreOptions = {}, log: StructuredLogger = logger) {
    this.log = log;
    this.dataDir = opts.dataDir;
    this.segmentMaxEvents = opts.segmentMaxEvents ?? DEFAULT_SEGMENT_MAX_EVENTS;
    this.segmentIndex = {
      version: SEGMENT_INDEX_VERSION,
      currentSegment: 0,
      currentSegmentEvents: 0,
      eventCount: 0,
      lastUpdated: Date.now(),
    };

    if (this.dataDir) {
      this.segmentsDir = path.join(this.dataDir, 'segments');
      this.segmentIndexFile = path.join(this.dataDir, 'segment-index.json');
      fs.mkdirSync(this.segmentsDir, { recursive: true });
      AtomicStorage.cleanupTempFiles(this.dataDir);
      this.loadFromDisk();
    }
  }

  has(id: string): boolean {
    return this.events.has(id);
  }

  getEvent(id: string): MarketEvent | undefined {
    return this.events.get(id)?.event;
  }

  /**
   * Store an accepted event. Returns false if it was already stored.
   */
  append(event: MarketEvent): boolean {
    if (this.events.has(event.id)) return false;

    const stored: StoredEvent = { sequence: this.sequence + 1, event };
    if (this.segmentsDir) {
      this.persistToSegment(stored);
    }
    this.index(stored);
    return true;
  }

  private index(stored: StoredEvent): void {
    const { event } = stored;
    this.sequence = stored.sequence;
    this.events.set(event.id, stored);
    pushIndex(this.byKind, String(event.kind), event.id);
    pushIndex(this.byAuthor, event.pubkey, event.id);
    for (const ref of getReferences(event.tags)) {
      pushIndex(this.byReference, ref.eventId, event.id);
    }
  }

  private resolve(ids: string[] | undefined): MarketEvent[] {
    const out: MarketEvent[] = [];
    for (const id of ids ?? []) {
      const stored = this.events.get(id);
      if (stored) out.push(stored.event);
    }
    return out;
  }

  getByKind(kind: number): MarketEvent[] {
    return this.resolve(this.byKind.get(String(kind)));
  }

  getByAuthor(pubkey: string): MarketEvent[] {
    return this.resolve(this.byAuthor.get(pubkey));
  }

  getReferencing(eventId: string): MarketEvent[] {
    return this.resolve(this.byReference.get(eventId));
  }

  /**
   * Filtered read, newest first.
   */
  query(filter: EventQuery = {}): MarketEvent[] {
    let candidates: MarketEvent[];
    if (filter.referencing) {
      candidates = this.getReferencing(filter.referencing);
    } else if (filter.authors && filter.authors.length === 1) {
      candidates = this.getByAuthor(filter.authors[0]);
    } else {
      candidates = this.getAll();
    }

    const matches = candidates.filter(event => {
      if (filter.kinds && !filter.kinds.includes(event.kind)) return false;
      if (filter.authors && !filter.authors.includes(event.pubkey)) return false;
      if (filter.since !== undefined && event.created_at < filter.since) return false;
      if (filter.until !== undefined && event.created_at > filter.until) return false;
      return true;
    });

    matches.sort((a, b) => b.created_at - a.created_at || (a.id < b.id ? -1 : 1));
    return filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
  }

  /**
   * Every stored event in the order it was accepted.
   */
  getAll(): MarketEvent[] {
    return [...this.events.values()].sort((a, b) => a.sequence - b.sequence).map(stored => stored.event);
  }

  size(): number {
    return this.events.size;
  }

  getStats(): EventStoreStats {
    const kinds: Record<number, number> = {};
    for (const [kind, ids] of this.byKind) {
      kinds[Number(kind)] = ids.length;
    }
    return {
      events: this.events.size,
      sequence: this.sequence,
      kinds,
      persistent: this.dataDir !== undefined,
      segments: this.segmentsDir ? this.segmentIndex.currentSegment + 1 : 0,
    };
  }

  /**
   * Drop the in-memory view. Segment files are left untouched.
   */
  clear(): void {
    this.events.clear();
    this.byKind.clear();
    this.byAuthor.clear();
    this.byReference.clear();
    this.sequence = 0;
  }

  /**
   * Force the segment index to disk (normally written every few appends).
   */
  flush(): void {
    if (this.segmentIndexFile) {
      this.saveSegmentIndex();
    }
  }

  // ── Segment persistence ──

  private segmentPath(segment: number): string {
    if (!this.segmentsDir) {
      throw new ProtocolError('STORAGE_CORRUPT', 'Event store has no data directory');
    }
    return path.join(this.segmentsDir, `seg-${String(segment).padStart(6, '0')}.ndjson`);
  }

  private persistToSegment(stored: StoredEvent): void {
    if (this.segmentIndex.currentSegmentEvents >= this.segmentMaxEvents) {
      this.segmentIndex.currentSegment++;
      this.segmentIndex.currentSegmentEvents = 0;
    }

    const line = JSON.stringify({ seq: stored.sequence, event: stored.event }) + '\n';
    fs.appendFileSync(this.segmentPath(this.segmentIndex.currentSegment), line, 'utf-8');

    this.segmentIndex.currentSegmentEvents++;
    this.segmentIndex.eventCount++;
    this.segmentIndex.lastUpdated = Date.now();

    if (this.segmentIndex.currentSegmentEvents === 1 || this.segmentIndex.eventCount % INDEX_SAVE_INTERVAL === 0) {
      this.saveSegmentIndex();
    }
  }

  private saveSegmentIndex(): void {
    if (this.segmentIndexFile) {
      AtomicStorage.writeFileAtomic(this.segmentIndexFile, this.segmentIndex);
    }
  }

  private listSegments(): number[] {
    if (!this.segmentsDir) return [];
    return fs
      .readdirSync(this.segmentsDir)
      .map(file => /^seg-(\d{6})\.ndjson$/.exec(file))
      .filter((match): match is RegExpExecArray => match !== null)
      .map(match => Number(match[1]))
      .sort((a, b) => a - b);
  }

  /**
   * Read every segment back into memory. Lines that fail to parse or verify
   * (a torn final append) are skipped and logged.
   */
  private loadFromDisk(): void {
    const segments = this.listSegments();
    let lastSegmentEvents = 0;
    let skipped = 0;

    for (const segment of segments) {
      const text = fs.readFileSync(this.segmentPath(segment), 'utf-8');
      const lines = text.split('\n');
      lastSegmentEvents = 0;

      // Terminate a torn final append so the next line starts clean
      if (text.length > 0 && !text.endsWith('\n')) {
        fs.appendFileSync(this.segmentPath(segment), '\n', 'utf-8');
      }

      for (const line of lines) {
        if (line.trim() === '') continue;
        const stored = this.parseLine(line);
        if (!stored) {
          skipped++;
          continue;
        }
        lastSegmentEvents++;
        if (!this.events.has(stored.event.id)) {
          this.index(stored);
        }
      }
    }

    const rebuilt: SegmentIndex = {
      version: SEGMENT_INDEX_VERSION,
      currentSegment: segments.length > 0 ? segments[segments.length - 1] : 0,
      currentSegmentEvents: lastSegmentEvents,
      eventCount: this.events.size,
      lastUpdated: Date.now(),
    };

    if (this.segmentIndexFile && AtomicStorage.exists(this.segmentIndexFile)) {
      const result = AtomicStorage.readFileAtomic(this.segmentIndexFile, isSegmentIndex);
      if (!result.success || result.data.eventCount !== rebuilt.eventCount) {
        this.log.warn('EventStore', 'Segment index disagrees with segments, rebuilding', {
          indexed: result.success ? result.data.eventCount : undefined,
          found: rebuilt.eventCount,
        });
      }
    }

    this.segmentIndex = rebuilt;
    this.saveSegmentIndex();

    if (skipped > 0) {
      this.log.warn('EventStore', `Skipped ${skipped} unreadable segment lines`);
    }
    if (this.events.size > 0) {
      this.log.info('EventStore', `Loaded ${this.events.size} events from ${segments.length} segments`);
    }
  }

  private parseLine(line: string): StoredEvent | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return undefined;
    }
    if (typeof raw !== 'object' || raw === null || !('seq' in raw) || !('event' in raw)) return undefined;
    if (typeof raw.seq !== 'number') return undefined;

    const parsed = parseEvent(raw.event);
    if (!parsed.success || !verifyEvent(parsed.value).success) return undefined;
    return { sequence: raw.seq, event: parsed.value };
  }
}
