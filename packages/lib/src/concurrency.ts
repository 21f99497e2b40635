/**
 * Concurrency Helpers
 *
 * Bounded fan-out and timeouts for batch work that calls external services.
 */

// ===========================================
// Bounded Map
// ===========================================

export type Settled<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: Error };

/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 *
 * Results come back in input order. A rejected call does not stop the
 * others; it shows up as a `rejected` entry.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<Settled<R>[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results: Settled<R>[] = new Array(items.length);
  const executing = new Set<Promise<void>>();

  for (let index = 0; index < items.length; index++) {
    const item = items[index];
    const p: Promise<void> = fn(item, index)
      .then(
        (value) => {
          results[index] = { status: 'fulfilled', value };
        },
        (reason: unknown) => {
          results[index] = { status: 'rejected', reason: toError(reason) };
        },
      )
      .finally(() => {
        executing.delete(p);
      });

    executing.add(p);
    if (executing.size >= limit) {
      await Promise.race(executing);
    }
  }

  await Promise.all(executing);
  return results;
}

// ===========================================
// Timeouts
// ===========================================

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Reject with TimeoutError if `promise` has not settled within `timeoutMs`.
 * The underlying work is not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => {
    clearTimeout(timer);
  });
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
