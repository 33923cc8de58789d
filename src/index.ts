export {countSchema} from './count.js';
export {Counter, type CounterOptions} from './counter.js';
export {InvariantViolation} from './error/asserts.js';
export {CountOverflowError, InvalidCountError} from './error/count-errors.js';
export {add, intersect, subtract, union} from './operators.js';
export {fromParallel, type Producer} from './parallel.js';
export type {Count, Entry, Identity, Ranked} from './types.js';
