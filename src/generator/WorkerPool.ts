import os from 'os'

export interface PoolOptions {
  /** Maximum number of mapper calls in flight */
  concurrency?: number
  /** Once aborted, no further items are admitted */
  signal?: AbortSignal
}

// Same sizing as a thread pool for mixed I/O and hashing work
export const DEFAULT_CONCURRENCY = Math.min(32, os.availableParallelism() + 4)

interface Settled<R> {
  index: number
  result: R
}

/**
 * Map over items with bounded concurrency, yielding results as they complete.
 *
 * Items are admitted in order; completion order is whatever the mapper
 * produces. A mapper rejection propagates to the consumer, so mappers that
 * must not stop the run should resolve with an error value instead.
 */
export async function* mapCompleted<T, R>(
  items: readonly T[],
  mapper: (item: T, index: number) => Promise<R>,
  options: PoolOptions = {}
): AsyncGenerator<R> {
  const { concurrency = DEFAULT_CONCURRENCY, signal } = options

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`)
  }

  const inFlight = new Map<number, Promise<Settled<R>>>()
  let next = 0

  const admit = () => {
    while (next < items.length && inFlight.size < concurrency && !signal?.aborted) {
      const index = next++
      inFlight.set(
        index,
        mapper(items[index], index).then((result) => ({ index, result }))
      )
    }
  }

  admit()

  while (inFlight.size > 0) {
    const { index, result } = await Promise.race(inFlight.values())
    inFlight.delete(index)
    admit()
    yield result
  }
}
