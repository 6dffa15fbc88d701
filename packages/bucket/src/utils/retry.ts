import { setTimeout as delay } from "node:timers/promises";

export interface RetryOptions {
  attempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: boolean;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, nextAttempt: number) => void;
}

export function backoffDelay(attempt: number, options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "jitter">): number {
  const { baseDelayMs = 100, maxDelayMs = 2_000, jitter = true } = options;
  const backoff = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
  return jitter ? Math.random() * backoff : backoff;
}

/** `fn` receives the 1-based attempt number. */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { attempts, shouldRetry, onRetry } = options;
  if (attempts < 1) {
    throw new RangeError("retry requires at least one attempt");
  }

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      const canRetry = shouldRetry ? shouldRetry(error) : true;
      if (!canRetry || attempt === attempts - 1) {
        throw error;
      }
      onRetry?.(error, attempt + 2);
      await delay(backoffDelay(attempt, options));
    }
  }
}
