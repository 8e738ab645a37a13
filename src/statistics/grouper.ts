/**
 * Grouper
 *
 * Partitions records into named groups. All groups of one pass must have the
 * same size; anything else means the experiment matrix is malformed.
 */

import { UnequalGroupSizesError } from '../errors.js';

export function compareGroupNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Group records by a caller-chosen projection.
 * Groups iterate in ascending name order; records keep their input order.
 */
export function groupRecords<T>(
  records: readonly T[],
  groupKey: (record: T) => string
): Map<string, T[]> {
  const byName = new Map<string, T[]>();
  for (const record of records) {
    const name = groupKey(record);
    const existing = byName.get(name) || [];
    existing.push(record);
    byName.set(name, existing);
  }

  const sorted = new Map<string, T[]>(
    [...byName.entries()].sort(([a], [b]) => compareGroupNames(a, b))
  );

  assertEqualGroupSizes(sorted);
  return sorted;
}

export function assertEqualGroupSizes<T>(groups: ReadonlyMap<string, readonly T[]>): void {
  const sizes = [...groups.entries()].map(([name, members]) => ({ name, size: members.length }));
  if (sizes.some(s => s.size !== sizes[0].size)) {
    throw new UnequalGroupSizesError(sizes);
  }
}

/**
 * Apply a record filter to every group, dropping groups it empties.
 * Used after grouping, where an emptied group is valid and simply absent.
 */
export function filterGroups<T>(
  groups: ReadonlyMap<string, readonly T[]>,
  keep: (record: T) => boolean
): { groups: Map<string, T[]>; skipped: string[] } {
  const kept = new Map<string, T[]>();
  const skipped: string[] = [];

  for (const [name, members] of groups) {
    const remaining = members.filter(keep);
    if (remaining.length === 0) {
      skipped.push(name);
    } else {
      kept.set(name, remaining);
    }
  }

  return { groups: kept, skipped };
}
