import { DEFAULT_RETRY_OPTIONS, type RetryOptions } from "./retryOptions.js";

/**
 * Result of a retried operation.
 * `exhausted` means every attempt failed with a retryable error;
 * `rejected` means an attempt failed with an error the policy does not retry.
 */
export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: "exhausted" | "rejected"; error: Error; attempts: number };

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Retries an asynchronous operation with exponential backoff and jitter.
 * Never throws for a failing operation; the failure is reported in the outcome.
 * @template T The return type of the async operation.
 * @param operation The asynchronous function to retry. Receives the 1-based attempt number.
 * @param options Optional retry configuration overrides.
 */
export async function retry<T>(
    operation: (attempt: number) => Promise<T>,
    options: Partial<RetryOptions> = {}
  ): Promise<RetryOutcome<T>> {
    const config: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
    const maxAttempts = Math.max(1, config.maxAttempts);

    let delay = config.initialDelay;

    for (let attempt = 1; ; attempt++) {
      try {
        return { ok: true, value: await operation(attempt), attempts: attempt };
      } catch (caught) {
        const error = toError(caught);

        if (!config.isRetryable(error)) {
          return { ok: false, reason: "rejected", error, attempts: attempt };
        }
        if (attempt >= maxAttempts) {
          return { ok: false, reason: "exhausted", error, attempts: attempt };
        }

        const jitter = delay * 0.2 * (Math.random() - 0.5);
        const waitTime = Math.max(0, delay + jitter);

        config.onRetry?.(error, attempt, waitTime);

        await new Promise(resolve => setTimeout(resolve, waitTime));
        delay = Math.min(delay * config.factor, config.maxDelay);
      }
    }
  }
