import {checkedAdd} from './count.js';
import type {Counter} from './counter.js';

// Each operator builds a new counter from a clone of `c`, so the result keeps
// `c`'s options and key order, followed by keys only `d` has. Neither operand
// is modified.

/**
 * Multiset sum: `out[x] == c[x] + d[x]`.
 */
export function add<T>(c: Counter<T>, d: Counter<T>): Counter<T> {
  const out = c.clone();
  for (const [value, count] of d) {
    out.set(value, checkedAdd(out.get(value), count));
  }
  return out;
}

/**
 * Multiset difference keeping only positive counts:
 * `out[x] == max(c[x] - d[x], 0)`.
 */
export function subtract<T>(c: Counter<T>, d: Counter<T>): Counter<T> {
  const out = c.clone();
  for (const [value, count] of d) {
    if (out.has(value)) {
      out.set(value, Math.max(out.get(value) - count, 0));
    }
  }
  return out;
}

/**
 * Intersection: `out[x] == min(c[x], d[x])`.
 */
export function intersect<T>(c: Counter<T>, d: Counter<T>): Counter<T> {
  const out = c.clone();
  for (const [value, count] of c) {
    out.set(value, Math.min(count, d.get(value)));
  }
  return out;
}

/**
 * Union: `out[x] == max(c[x], d[x])`.
 */
export function union<T>(c: Counter<T>, d: Counter<T>): Counter<T> {
  const out = c.clone();
  for (const [value, count] of d) {
    if (count > out.get(value)) {
      out.set(value, count);
    }
  }
  return out;
}
