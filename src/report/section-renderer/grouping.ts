/**
 * Discriminator Grouping
 *
 * Folds a category's records into groups keyed by their discriminator.
 * Groups come out in order of first occurrence and keep the records'
 * input order. Inputs are expected to keep each discriminator's records
 * contiguous; records that are not still land in their discriminator's
 * single group.
 */

import type { StatRecord } from '../types/index.js';

export interface RecordGroup<T> {
  discriminator: string;
  records: T[];
}

export function discriminatorOf(record: StatRecord): string {
  return record.key[0] ?? '';
}

export function groupBy<T>(items: Iterable<T>, keyOf: (item: T) => string): RecordGroup<T>[] {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const existing = groups.get(key);
    if (existing) {
      existing.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return Array.from(groups, ([discriminator, records]) => ({ discriminator, records }));
}

export function groupByDiscriminator(records: Iterable<StatRecord>): RecordGroup<StatRecord>[] {
  return groupBy(records, discriminatorOf);
}

/**
 * Number of contiguous discriminator runs in a record sequence
 */
export function countDiscriminatorRuns(records: Iterable<StatRecord>): number {
  let runs = 0;
  let previous: string | undefined;
  for (const record of records) {
    const discriminator = discriminatorOf(record);
    if (discriminator !== previous) {
      runs++;
      previous = discriminator;
    }
  }
  return runs;
}
