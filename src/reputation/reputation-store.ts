/**
 * Reputation Store
 *
 * Holds every accepted rating, indexed by subject. A rater can rate a given
 * transaction once; the (rater, referenced id) pair is the dedup key.
 */

import { fail, ok, Outcome } from '../errors';
import { ReputationError, ReputationRecord } from './types';

const RATING_FIELDS = ['rating', 'itemQuality', 'shippingSpeed', 'communication', 'paymentReliability'] as const;

function isValidRating(value: number | undefined): boolean {
  return value === undefined || (Number.isInteger(value) && value >= 1 && value <= 5);
}

export function dedupKey(rater: string, referencedEventId: string): string {
  return `${rater}:${referencedEventId}`;
}

export class ReputationStore {
  private records: ReputationRecord[] = [];
  private bySubject: Map<string, ReputationRecord[]> = new Map();
  private seen: Set<string> = new Set();

  record(record: ReputationRecord): Outcome<void, ReputationError> {
    for (const field of RATING_FIELDS) {
      if (!isValidRating(record[field])) {
        return fail('InvalidRating', `${field} must be an integer from 1 to 5`);
      }
    }
    if (!Number.isFinite(record.amountSats) || record.amountSats < 0) {
      return fail('InvalidRating', 'Transaction amount must be non-negative');
    }

    const key = dedupKey(record.rater, record.referencedEventId);
    if (this.seen.has(key)) {
      return fail('DuplicateReference', `Rater already reviewed ${record.referencedEventId.slice(0, 16)}`);
    }

    this.seen.add(key);
    this.records.push(record);
    const forSubject = this.bySubject.get(record.subject);
    if (forSubject) forSubject.push(record);
    else this.bySubject.set(record.subject, [record]);
    return ok(undefined);
  }

  has(rater: string, referencedEventId: string): boolean {
    return this.seen.has(dedupKey(rater, referencedEventId));
  }

  getRecords(subject: string): ReputationRecord[] {
    return [...(this.bySubject.get(subject) ?? [])];
  }

  getAll(): ReputationRecord[] {
    return [...this.records];
  }

  subjects(): string[] {
    return [...this.bySubject.keys()];
  }

  size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records = [];
    this.bySubject.clear();
    this.seen.clear();
  }
}
