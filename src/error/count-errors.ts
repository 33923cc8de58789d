/**
 * Thrown when incrementing a count would leave the range of safe integers,
 * where `number` silently loses precision.
 */
export class CountOverflowError extends Error {
  readonly name = 'CountOverflowError';
  readonly current: number;
  readonly increment: number;

  constructor(current: number, increment: number) {
    super(
      `Count overflow: ${current} + ${increment} exceeds ${Number.MAX_SAFE_INTEGER}`,
    );
    this.current = current;
    this.increment = increment;
  }
}

/**
 * Thrown when a count handed to `set` or `fromEntries` is not a
 * non-negative safe integer.
 */
export class InvalidCountError extends Error {
  readonly name = 'InvalidCountError';
  readonly count: unknown;

  constructor(count: unknown, reason: string) {
    super(`Invalid count ${String(count)}: ${reason}`);
    this.count = count;
  }
}
