import type {OptionalLogger} from '@rocicorp/logger';
import {checkedAdd, parseCount} from './count.js';
import {assert} from './error/asserts.js';
import {add, intersect, subtract, union} from './operators.js';
import type {Count, Entry, Identity, Ranked} from './types.js';
import {flatMapIter, mapIter, repeat} from './util/iterables.js';
import {printValue} from './util/print.js';

export type CounterOptions<T> = {
  /**
   * Maps an element to the key it is counted under. Without it elements are
   * keyed by themselves, so objects count by reference.
   */
  getIdentity?: ((value: T) => Identity) | undefined;
  logger?: OptionalLogger | undefined;
};

/**
 * A multiset: counts how many times each distinct element has been seen.
 *
 * Every stored element has a count of at least one. Decrementing an entry to
 * zero removes it, so `size`, `keys()` and `mostCommon()` never report
 * elements that are not present.
 *
 * ```ts
 * const c = new Counter(['a', 'b', 'a', 'c', 'a', 'b']);
 * c.get('a'); // 3
 * c.mostCommon(); // [[3, 'a'], [2, 'b'], [1, 'c']]
 * ```
 *
 * A `Counter` does no locking. Producers running concurrently should each
 * fill their own counter and merge them with `add`, or go through
 * `fromParallel`.
 */
export class Counter<T> implements Iterable<Entry<T>> {
  /**
   * Identity to `[element, count]`. The element kept is the first one seen
   * for that identity.
   */
  readonly #counts = new Map<unknown, [T, Count]>();
  readonly #options: Readonly<CounterOptions<T>>;
  readonly #logger: OptionalLogger;

  constructor(
    iterable?: Iterable<T> | undefined,
    options: CounterOptions<T> = {},
  ) {
    // Copied so later changes to the caller's object cannot rekey entries.
    this.#options = Object.freeze({...options});
    this.#logger = options.logger ?? console;
    if (iterable !== undefined) {
      this.update(iterable);
    }
  }

  /**
   * Builds a counter from `[element, count]` pairs. Zero counts are skipped
   * and repeated elements add up.
   */
  static fromEntries<T>(
    entries: Iterable<readonly [T, Count]>,
    options: CounterOptions<T> = {},
  ): Counter<T> {
    const counter = new Counter<T>(undefined, options);
    for (const [value, count] of entries) {
      counter.#increment(value, parseCount(count));
    }
    return counter;
  }

  get options(): Readonly<CounterOptions<T>> {
    return this.#options;
  }

  /** Number of distinct elements. */
  get size(): number {
    return this.#counts.size;
  }

  /**
   * Adds one to the count of every element in `iterable`.
   */
  update(iterable: Iterable<T>): this {
    for (const value of iterable) {
      this.#increment(value, 1);
    }
    return this;
  }

  /**
   * Removes one from the count of every element in `iterable`.
   *
   * Elements that are not present are skipped rather than going negative.
   * An element whose count reaches zero is removed at once, so later
   * occurrences of it in the same call are skipped too.
   */
  subtract(iterable: Iterable<T>): this {
    for (const value of iterable) {
      const id = this.#identity(value);
      const entry = this.#counts.get(id);
      if (entry === undefined) {
        this.#logger.debug?.(
          `no such element ${printValue(value)}, skipping subtract`,
        );
        continue;
      }
      entry[1]--;
      if (entry[1] <= 0) {
        this.#counts.delete(id);
      }
    }
    return this;
  }

  get(value: T): Count {
    return this.#counts.get(this.#identity(value))?.[1] ?? 0;
  }

  has(value: T): boolean {
    return this.#counts.has(this.#identity(value));
  }

  /**
   * Replaces the count of `value`. A count of zero removes the entry.
   */
  set(value: T, count: Count): this {
    const parsed = parseCount(count);
    const id = this.#identity(value);
    if (parsed === 0) {
      this.#counts.delete(id);
      return this;
    }
    const entry = this.#counts.get(id);
    if (entry === undefined) {
      this.#counts.set(id, [value, parsed]);
    } else {
      entry[1] = parsed;
    }
    return this;
  }

  delete(value: T): boolean {
    return this.#counts.delete(this.#identity(value));
  }

  clear(): void {
    this.#counts.clear();
  }

  /** Sum of all counts. */
  total(): Count {
    let sum = 0;
    for (const [, count] of this.#counts.values()) {
      sum = checkedAdd(sum, count);
    }
    return sum;
  }

  /**
   * `[count, element]` pairs, highest count first. Elements with equal counts
   * keep the order they were first inserted in. With `n`, only the first `n`
   * pairs are returned.
   */
  mostCommon(n?: number | undefined): Ranked<T>[] {
    assert(
      n === undefined || (Number.isInteger(n) && n >= 0),
      `Expected a non-negative integer, got ${n}`,
    );
    const ranked = [
      ...mapIter(
        this.#counts.values(),
        ([value, count]) => [count, value] as const,
      ),
    ].sort((a, b) => b[0] - a[0]);
    return n === undefined ? ranked : ranked.slice(0, n);
  }

  /**
   * Every element repeated as many times as it is counted, in insertion
   * order. Lazy.
   */
  elements(): Iterable<T> {
    return flatMapIter(
      () => this.#counts.values(),
      ([value, count]) => repeat(value, count),
    );
  }

  entries(): Iterable<Entry<T>> {
    return mapIter(
      this.#counts.values(),
      ([value, count]) => [value, count] as const,
    );
  }

  keys(): Iterable<T> {
    return mapIter(this.#counts.values(), ([value]) => value);
  }

  [Symbol.iterator](): Iterator<Entry<T>> {
    return this.entries()[Symbol.iterator]();
  }

  equals(other: Counter<T>): boolean {
    if (this.size !== other.size) {
      return false;
    }
    for (const [value, count] of this.#counts.values()) {
      if (other.get(value) !== count) {
        return false;
      }
    }
    return true;
  }

  /** An independent copy with the same options. */
  clone(): Counter<T> {
    const copy = new Counter<T>(undefined, this.#options);
    for (const [id, [value, count]] of this.#counts) {
      copy.#counts.set(id, [value, count]);
    }
    return copy;
  }

  add(other: Counter<T>): Counter<T> {
    return add(this, other);
  }

  difference(other: Counter<T>): Counter<T> {
    return subtract(this, other);
  }

  intersect(other: Counter<T>): Counter<T> {
    return intersect(this, other);
  }

  union(other: Counter<T>): Counter<T> {
    return union(this, other);
  }

  toString(): string {
    const body = this.mostCommon()
      .map(([count, value]) => `${printValue(value)}: ${count}`)
      .join(', ');
    return `Counter({${body}})`;
  }

  #identity(value: T): unknown {
    const {getIdentity} = this.#options;
    return getIdentity === undefined ? value : getIdentity(value);
  }

  #increment(value: T, by: Count) {
    if (by === 0) {
      return;
    }
    const id = this.#identity(value);
    const entry = this.#counts.get(id);
    if (entry === undefined) {
      this.#counts.set(id, [value, by]);
    } else {
      entry[1] = checkedAdd(entry[1], by);
    }
  }
}
