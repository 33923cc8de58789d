export class InvariantViolation extends Error {}

export function assert(b: unknown, msg = 'Assertion failed'): asserts b {
  if (!b) {
    throw new InvariantViolation(msg);
  }
}
