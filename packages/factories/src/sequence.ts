/**
 * Atomic counter used to mint unique values in factories.
 *
 * The counter lives in a `SharedArrayBuffer` and is only ever touched through
 * `Atomics`, so counters built over the same buffer (for example in worker
 * threads that received `counter.buffer`) never hand out the same number twice.
 * Which caller receives which number is not ordered across threads.
 *
 * @example
 * ```typescript
 * const counter = new SequenceCounter();
 * counter.next(); // 1
 * counter.sequence((n) => `user${n}@example.com`); // 'user2@example.com'
 *
 * // In a worker thread
 * const shared = new SequenceCounter(workerData.sequenceBuffer);
 * ```
 */
export class SequenceCounter {
  private readonly cell: BigInt64Array;

  /**
   * @param buffer - Buffer holding the counter. Pass another counter's `buffer`
   *   to share its state; omit it for a fresh counter starting at 0.
   */
  constructor(
    readonly buffer: SharedArrayBuffer = new SharedArrayBuffer(
      BigInt64Array.BYTES_PER_ELEMENT,
    ),
  ) {
    this.cell = new BigInt64Array(buffer, 0, 1);
  }

  /**
   * Increments the counter and returns the new value.
   */
  next(): number {
    return Number(Atomics.add(this.cell, 0, 1n) + 1n);
  }

  /**
   * Last value handed out, 0 if none.
   */
  current(): number {
    return Number(Atomics.load(this.cell, 0));
  }

  /**
   * Increments the counter and passes the new value to `format`.
   */
  sequence<T>(format: (value: number) => T): T {
    return format(this.next());
  }
}

/**
 * Default counter of the current thread. Never reset.
 *
 * Every worker thread loads this module again and starts its own counter at 0.
 * To share one counter, pass `defaultSequence.buffer` to the worker and build a
 * `SequenceCounter` over it there.
 */
export const defaultSequence = new SequenceCounter();

/**
 * Returns the next value of `defaultSequence`, optionally transformed by
 * `format`.
 *
 * @example
 * ```typescript
 * const email = sequence((n) => `user${n}@example.com`);
 * const id = sequence();
 * ```
 */
export function sequence(): number;
export function sequence<T>(format: (value: number) => T): T;
export function sequence<T>(format?: (value: number) => T): T | number {
  const value = defaultSequence.next();
  return format ? format(value) : value;
}

/**
 * Function handed to factory defaults for minting unique values.
 */
export type SequenceFn = <T>(format: (value: number) => T) => T;
