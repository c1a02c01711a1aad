/**
 * Grouping and aggregate folds over Z-sets
 *
 * GROUP BY partitions a Z-set into one sub-bag per key. Aggregates then fold
 * each sub-bag with weights, so a row of weight 2 counts twice.
 */

import { ZSet, type KeyFn, type Weight } from './zset';

export interface Group<K, T> {
  key: K;
  rows: ZSet<T>;
}

/**
 * Partition a Z-set by key. Only keys that carry at least one row appear,
 * so a key with no rows never produces a group.
 */
export function groupBy<T, K>(
  zset: ZSet<T>,
  keyFn: (value: T) => K,
  keyToString: (key: K) => string = JSON.stringify,
  rowKeyFn: KeyFn<T> = JSON.stringify
): Group<K, T>[] {
  const groups = new Map<string, Group<K, T>>();
  for (const [value, weight] of zset.entries()) {
    const key = keyFn(value);
    const groupKey = keyToString(key);
    let group = groups.get(groupKey);
    if (!group) {
      group = { key, rows: new ZSet<T>(rowKeyFn) };
      groups.set(groupKey, group);
    }
    group.rows.insert(value, weight);
  }
  return Array.from(groups.values()).filter((group) => !group.rows.isZero());
}

// ============ AGGREGATE FOLDS ============

/** SUM(expr) over a bag */
export function sumOf<T>(rows: ZSet<T>, getValue: (value: T) => number): number {
  return rows.sum(getValue);
}

/** AVG(expr) over a bag; null for an empty bag */
export function averageOf<T>(rows: ZSet<T>, getValue: (value: T) => number): number | null {
  const count: Weight = rows.count();
  if (count <= 0) return null;
  return rows.sum(getValue) / count;
}

/**
 * DISTINCT labels of a bag, each once, sorted ascending so the result does
 * not depend on row order.
 */
export function distinctOf<T>(rows: ZSet<T>, getLabel: (value: T) => string): string[] {
  const labels = new Set<string>();
  for (const [value, weight] of rows.entries()) {
    if (weight > 0) labels.add(getLabel(value));
  }
  return Array.from(labels).sort();
}
