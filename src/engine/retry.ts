/**
 * Timeout and backoff primitives shared by the execution engine.
 */

export type BackoffStrategy = 'fixed' | 'exponential';

export const BACKOFF_STRATEGIES: readonly BackoffStrategy[] = ['fixed', 'exponential'];

/** Raised when an operation does not settle within its budget. */
export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Execute a function with a timeout. The underlying operation is not
 * cancelled; its late result is ignored.
 */
export async function executeWithTimeout<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
    fn()
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

/** Compute the delay before retry number `attempt` (1-based), capped at maxMs. */
export function computeBackoff(
  strategy: BackoffStrategy,
  baseMs: number,
  attempt: number,
  maxMs: number = Number.POSITIVE_INFINITY,
): number {
  const delay = strategy === 'fixed' ? baseMs : baseMs * Math.pow(2, attempt - 1);
  return Math.min(delay, maxMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
