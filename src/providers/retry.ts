import { logProvider } from "../logging.js";

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Wrap a promise with a timeout.
 * @param label Label for error message
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string = "operation",
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  label?: string;
  /** Return false to fail fast (bad symbol, invalid params) */
  shouldRetry?: (err: Error) => boolean;
}

/**
 * Retry an async operation with linear backoff (delayMs, 2×delayMs, ...).
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const { retries = 2, delayMs = 500, label = "operation", shouldRetry = () => true } = opts;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (e: unknown) {
      const err = e instanceof Error ? e : new Error(String(e));
      if (attempt >= retries || !shouldRetry(err)) throw err;
      const wait = delayMs * (attempt + 1);
      logProvider.warn(`${label} attempt ${attempt + 1} failed, retrying in ${wait}ms: ${err.message}`);
      await new Promise((r) => setTimeout(r, wait));
    }
  }
}
