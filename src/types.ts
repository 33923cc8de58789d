/**
 * Number of occurrences of an element. Always a positive safe integer
 * while stored in a `Counter`.
 */
export type Count = number;

/** `[element, count]`, the shape `entries()` yields. */
export type Entry<T> = readonly [T, Count];

/** `[count, element]`, the shape `mostCommon()` returns. */
export type Ranked<T> = readonly [Count, T];

/**
 * What an element is keyed by when the caller supplies `getIdentity`.
 */
export type Identity = string | number;
