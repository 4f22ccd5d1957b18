// src/core/pagination/Accumulator.ts

import { DedupeKeyField, dedupeKeyOf, RedditRecord } from '../sanitizer/types';

/**
 * Ordered, deduplicated, capacity-bounded collection of records.
 */
export class Accumulator<T extends RedditRecord> {
  private readonly items: T[] = [];
  private readonly keys = new Set<string>();

  constructor(
    readonly limit: number,
    private readonly field: DedupeKeyField = 'fullname'
  ) {}

  get size(): number {
    return this.items.length;
  }

  get remaining(): number {
    return Math.max(0, this.limit - this.items.length);
  }

  get full(): boolean {
    return this.remaining === 0;
  }

  /**
   * Appends unseen records in order until capacity runs out.
   * Returns how many were kept.
   */
  add(records: readonly T[]): number {
    let added = 0;
    for (const record of records) {
      if (this.full) break;

      const key = dedupeKeyOf(record, this.field);
      if (key === undefined || this.keys.has(key)) continue;

      this.keys.add(key);
      this.items.push(record);
      added++;
    }
    return added;
  }

  toArray(): T[] {
    return this.items.slice(0, this.limit);
  }
}
