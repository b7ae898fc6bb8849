/**
 * Retry wrapper for provider HTTP calls.
 *
 * Network failures and 5xx responses are retried with exponential backoff
 * (base, 2x base, 4x base ... capped at 16x base, +/-25% jitter). 4xx
 * responses and aborted calls are not.
 */

import { ProviderError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("retry");

const MAX_FACTOR = 16;
const JITTER = 0.25;

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
}

/** Delay before retry number `attempt` (0 for the first retry). */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
  const raw = Math.min(policy.baseDelayMs * 2 ** attempt, policy.baseDelayMs * MAX_FACTOR);
  return raw + (Math.random() * 2 - 1) * raw * JITTER;
}

function isRetryable(err: unknown): boolean {
  if (err instanceof ProviderError) return err.retryable;
  // ECONNRESET, ECONNREFUSED, socket timeout
  return err instanceof Error;
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error("aborted");
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error("aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run `fn`, retrying retryable failures up to policy.maxRetries times.
 * Once `signal` is aborted no further attempt starts and the pending wait is cut short.
 */
export async function withRetry<T>(
  label: string,
  policy: RetryPolicy,
  fn: () => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) throw abortReason(signal);
    try {
      return await fn();
    } catch (err) {
      if (signal?.aborted) throw abortReason(signal);
      if (!isRetryable(err) || attempt >= policy.maxRetries) {
        throw err;
      }
      log.warn(`${label} failed (attempt ${attempt + 1}/${policy.maxRetries + 1}):`, errorMessage(err), "(retrying)");
      await sleep(retryDelay(policy, attempt), signal);
    }
  }
}
