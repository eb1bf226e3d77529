import { setTimeout as delay } from "node:timers/promises";

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

export function abortReason(signal: AbortSignal): unknown {
  if (signal.reason !== undefined) return signal.reason;
  const err = new Error("This operation was aborted");
  err.name = "AbortError";
  return err;
}

export function isAbortError(err: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Rejects with a TimeoutError when `work` has not settled after `ms`
 * milliseconds, or with the abort reason once `signal` fires. A non-positive
 * `ms` disables the timeout.
 */
export function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  label: string,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) return Promise.reject(abortReason(signal));

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;
    const onAbort = (): void => {
      cleanup();
      if (signal) reject(abortReason(signal));
    };
    const cleanup = (): void => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };

    if (Number.isFinite(ms) && ms > 0) {
      timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError(label, ms));
      }, ms);
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}

export type RetryOptions = {
  retries: number;
  baseDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  signal?: AbortSignal;
  onRetry?: (err: unknown, attempt: number) => void;
};

/** Exponential backoff: baseDelayMs, 2x, 4x ... between attempts. */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const retries = Math.max(0, options.retries);
  for (let attempt = 0; ; attempt += 1) {
    options.signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (err: unknown) {
      if (isAbortError(err, options.signal)) throw err;
      if (attempt >= retries || !options.isRetryable(err)) throw err;
      options.onRetry?.(err, attempt + 1);
      const wait = options.baseDelayMs * 2 ** attempt;
      if (wait > 0) {
        await delay(wait, undefined, { signal: options.signal });
      }
    }
  }
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight and returns
 * the settled outcomes in input order.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  const queue = items.entries();

  const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    for (const [index, item] of queue) {
      try {
        results[index] = { status: "fulfilled", value: await worker(item, index) };
      } catch (reason: unknown) {
        results[index] = { status: "rejected", reason };
      }
    }
  });

  await Promise.all(lanes);
  return results;
}
