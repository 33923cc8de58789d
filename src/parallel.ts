import {Counter, type CounterOptions} from './counter.js';
import {flatMapIter} from './util/iterables.js';

/**
 * One source of elements for `fromParallel`. Async sources are drained
 * concurrently with each other.
 */
export type Producer<T> = Iterable<T> | AsyncIterable<T>;

/**
 * Counts the elements of several producers that run concurrently.
 *
 * Every producer is drained into its own buffer first. Once all of them have
 * finished the buffers are fed, in the order the producers were given, through
 * a single `update`, so the counter itself is only ever touched from one
 * place. Counts do not depend on how the producers interleave.
 *
 * Rejects with the first error a producer throws. The remaining async
 * producers are closed (their `return()` is called) as soon as their pending
 * value arrives.
 */
export async function fromParallel<T>(
  sources: Iterable<Producer<T>>,
  options: CounterOptions<T> = {},
): Promise<Counter<T>> {
  const logger = options.logger ?? console;
  const producers = [...sources];
  logger.debug?.(`collecting from ${producers.length} producers`);

  const buffers = await drainAll(producers);

  const counter = new Counter(
    flatMapIter(
      () => buffers,
      buffer => buffer,
    ),
    options,
  );
  const elements = buffers.reduce((n, buffer) => n + buffer.length, 0);
  logger.debug?.(`counted ${elements} elements, ${counter.size} distinct`);
  return counter;
}

function isAsyncIterable<T>(p: Producer<T>): p is AsyncIterable<T> {
  return typeof (p as AsyncIterable<T>)[Symbol.asyncIterator] === 'function';
}

function drainAll<T>(producers: Producer<T>[]): Promise<T[][]> {
  let failed = false;

  async function drain(producer: Producer<T>): Promise<T[]> {
    const buffer: T[] = [];
    try {
      if (!isAsyncIterable(producer)) {
        return [...producer];
      }
      for await (const value of producer) {
        if (failed) {
          // Leaving the loop calls `return()` on the iterator.
          break;
        }
        buffer.push(value);
      }
      return buffer;
    } catch (e) {
      failed = true;
      throw e;
    }
  }

  return Promise.all(producers.map(drain));
}
