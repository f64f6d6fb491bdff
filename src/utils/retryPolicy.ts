// src/utils/retryPolicy.ts

export const MAX_ATTEMPTS = 5;
const BASE_DELAY_MS = 60000; // 1 minute base delay

/**
 * Delay before a failed job runs again: exponential backoff with up to 10% jitter.
 * Formula: BASE_DELAY * (2 ^ (attempt - 1)) + Jitter
 * @param attempt - The attempt that just failed (1-indexed).
 * @returns The delay in milliseconds, or -1 once MAX_ATTEMPTS is reached.
 */
export function getExponentialBackoffDelay(attempt: number): number {
  if (attempt >= MAX_ATTEMPTS) {
    return -1;
  }

  const delay = BASE_DELAY_MS * Math.pow(2, attempt - 1);
  const jitter = Math.floor(Math.random() * (delay * 0.1));

  return delay + jitter;
}

/** Whether a job that just failed its `attempt`-th run may run again under its own cap. */
export function isRetryAllowed(attempt: number, maxAttempts: number = MAX_ATTEMPTS): boolean {
  return attempt < Math.min(maxAttempts, MAX_ATTEMPTS);
}

// Notification delivery: 3 attempts, retried after 5, then 10 minutes
export const MAX_DELIVERY_ATTEMPTS = 3;
const DELIVERY_RETRY_STEP_MS = 5 * 60 * 1000;

/**
 * @param deliveryAttempts - Attempts made so far, including the one that just failed.
 * @returns Delay before the next delivery attempt, or -1 when attempts are exhausted.
 */
export function getDeliveryRetryDelay(deliveryAttempts: number): number {
  if (deliveryAttempts >= MAX_DELIVERY_ATTEMPTS) {
    return -1;
  }
  return DELIVERY_RETRY_STEP_MS * deliveryAttempts;
}
