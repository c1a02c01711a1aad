/**
 * Z-Set: a bag of rows with integer weights
 *
 * Source tables are bags, not sets: two identical payment rows are two
 * payments. A Z-set stores each distinct row once together with its
 * multiplicity, so duplicates survive deduplication by key and every
 * aggregate can honour them.
 * - Positive weights represent multiplicity
 * - Zero weights are not stored
 */

/** Weight type - integers from ℤ */
export type Weight = number;

export type KeyFn<T> = (value: T) => string;

export class ZSet<T> {
  private readonly data = new Map<string, { value: T; weight: Weight }>();

  constructor(private readonly keyFn: KeyFn<T> = JSON.stringify) {}

  /** Create a ZSet from (value, weight) pairs */
  static fromEntries<T>(entries: Iterable<[T, Weight]>, keyFn: KeyFn<T> = JSON.stringify): ZSet<T> {
    const zset = new ZSet<T>(keyFn);
    for (const [value, weight] of entries) {
      zset.insert(value, weight);
    }
    return zset;
  }

  /** Create a ZSet from rows, each with weight 1 (repeated rows accumulate) */
  static fromValues<T>(values: Iterable<T>, keyFn: KeyFn<T> = JSON.stringify): ZSet<T> {
    const zset = new ZSet<T>(keyFn);
    for (const value of values) {
      zset.insert(value, 1);
    }
    return zset;
  }

  static zero<T>(keyFn: KeyFn<T> = JSON.stringify): ZSet<T> {
    return new ZSet<T>(keyFn);
  }

  insert(value: T, weight: Weight = 1): void {
    if (weight === 0) return;
    const key = this.keyFn(value);
    const newWeight = (this.data.get(key)?.weight ?? 0) + weight;

    if (newWeight === 0) {
      this.data.delete(key);
    } else {
      this.data.set(key, { value, weight: newWeight });
    }
  }

  /** Weight of an element (0 if not present) */
  getWeight(value: T): Weight {
    return this.data.get(this.keyFn(value))?.weight ?? 0;
  }

  has(value: T): boolean {
    return this.getWeight(value) !== 0;
  }

  entries(): [T, Weight][] {
    return Array.from(this.data.values(), ({ value, weight }) => [value, weight]);
  }

  /** Distinct rows, ignoring weights */
  values(): T[] {
    return Array.from(this.data.values(), ({ value }) => value);
  }

  /** Rows expanded by multiplicity (a row of weight 2 appears twice) */
  toArray(): T[] {
    const rows: T[] = [];
    for (const { value, weight } of this.data.values()) {
      for (let i = 0; i < weight; i++) rows.push(value);
    }
    return rows;
  }

  /** Number of distinct elements */
  size(): number {
    return this.data.size;
  }

  isZero(): boolean {
    return this.data.size === 0;
  }

  // ============ LINEAR OPERATORS ============

  /**
   * Filter: keep only elements satisfying a predicate
   * LINEAR: filter(a + b) = filter(a) + filter(b)
   */
  filter(predicate: (value: T) => boolean): ZSet<T> {
    const result = new ZSet<T>(this.keyFn);
    for (const [value, weight] of this.entries()) {
      if (predicate(value)) {
        result.insert(value, weight);
      }
    }
    return result;
  }

  /** Filter with a type guard, narrowing the element type */
  narrow<S extends T>(guard: (value: T) => value is S): ZSet<S> {
    const result = new ZSet<S>(this.keyFn);
    for (const [value, weight] of this.entries()) {
      if (guard(value)) {
        result.insert(value, weight);
      }
    }
    return result;
  }

  /**
   * Map: transform each element, carrying its weight
   * LINEAR: map(a + b) = map(a) + map(b)
   */
  map<U>(fn: (value: T) => U, keyFn: KeyFn<U> = JSON.stringify): ZSet<U> {
    const result = new ZSet<U>(keyFn);
    for (const [value, weight] of this.entries()) {
      result.insert(fn(value), weight);
    }
    return result;
  }

  // ============ AGGREGATION ============

  reduce<U>(fn: (acc: U, value: T, weight: Weight) => U, initial: U): U {
    let result = initial;
    for (const [value, weight] of this.entries()) {
      result = fn(result, value, weight);
    }
    return result;
  }

  /** Sum of all weights (row count of the bag) */
  count(): Weight {
    return this.reduce((acc, _, weight) => acc + weight, 0);
  }

  /** Weighted sum of numeric values */
  sum(getValue: (value: T) => number): number {
    return this.reduce((acc, value, weight) => acc + getValue(value) * weight, 0);
  }

  equals(other: ZSet<T>): boolean {
    if (this.size() !== other.size()) return false;
    for (const [value, weight] of this.entries()) {
      if (other.getWeight(value) !== weight) return false;
    }
    return true;
  }
}

// ============ BILINEAR OPERATIONS ============

function indexBy<U, K>(
  zset: ZSet<U>,
  keyFn: (value: U) => K,
  keyToString: (key: K) => string
): Map<string, { value: U; weight: Weight }[]> {
  const index = new Map<string, { value: U; weight: Weight }[]>();
  for (const [value, weight] of zset.entries()) {
    const key = keyToString(keyFn(value));
    const list = index.get(key);
    if (list) {
      list.push({ value, weight });
    } else {
      index.set(key, [{ value, weight }]);
    }
  }
  return index;
}

/**
 * Equi-join of two Z-sets on a key
 * BILINEAR: (a ⋈ b)[(x, y)] = a[x] × b[y]
 */
export function join<T, U, K>(
  a: ZSet<T>,
  b: ZSet<U>,
  keyA: (value: T) => K,
  keyB: (value: U) => K,
  keyToString: (key: K) => string = JSON.stringify
): ZSet<[T, U]> {
  const indexB = indexBy(b, keyB, keyToString);

  const result = new ZSet<[T, U]>(([x, y]) => JSON.stringify([x, y]));
  for (const [valueA, weightA] of a.entries()) {
    const matches = indexB.get(keyToString(keyA(valueA))) ?? [];
    for (const { value: valueB, weight: weightB } of matches) {
      result.insert([valueA, valueB], weightA * weightB);
    }
  }
  return result;
}

/**
 * Left-outer equi-join: every row of `a` appears at least once, paired with
 * `null` when `b` has no row under its key.
 *
 * Output cardinality equals |a| only when `b` holds at most one row per key;
 * pre-aggregate `b` to guarantee that.
 */
export function leftJoin<T, U, K>(
  a: ZSet<T>,
  b: ZSet<U>,
  keyA: (value: T) => K,
  keyB: (value: U) => K,
  keyToString: (key: K) => string = JSON.stringify
): ZSet<[T, U | null]> {
  const indexB = indexBy(b, keyB, keyToString);

  const result = new ZSet<[T, U | null]>(([x, y]) => JSON.stringify([x, y]));
  for (const [valueA, weightA] of a.entries()) {
    const matches = indexB.get(keyToString(keyA(valueA)));
    if (!matches) {
      result.insert([valueA, null], weightA);
      continue;
    }
    for (const { value: valueB, weight: weightB } of matches) {
      result.insert([valueA, valueB], weightA * weightB);
    }
  }
  return result;
}

/**
 * Anti-join: rows of `a` whose key has no match in `b`
 */
export function antiJoin<T, U, K>(
  a: ZSet<T>,
  b: ZSet<U>,
  keyA: (value: T) => K,
  keyB: (value: U) => K,
  keyToString: (key: K) => string = JSON.stringify
): ZSet<T> {
  const keysB = new Set(b.values().map((value) => keyToString(keyB(value))));
  return a.filter((value) => !keysB.has(keyToString(keyA(value))));
}
