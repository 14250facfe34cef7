/**
 * Configuration options for the retry mechanism.
 */
export interface RetryOptions {
  /** Maximum number of attempts, the first call included. */
  maxAttempts: number;
  /** Delay in milliseconds before the second attempt. */
  initialDelay: number;
  /** Maximum delay in milliseconds between attempts. */
  maxDelay: number;
  /** Multiplier for exponential backoff (e.g., 2 means delay doubles each time). */
  factor: number;
  /** Decides whether a failed attempt may be repeated. Errors it rejects end the loop at once. */
  isRetryable: (error: Error) => boolean;
  /** Optional callback executed before each retry attempt. */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

/**
 * Default configuration values for the retry mechanism.
 */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 5000,
  factor: 2,
  isRetryable: () => true,
};
