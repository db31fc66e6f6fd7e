/**
 * Retry Handler Module
 *
 * Retry primitives for transient failures with exponential backoff and jitter.
 * The batch ingestor retries each embedding batch through `withRetry()`.
 *
 * ## Exponential Backoff Formula
 *
 * ```
 * baseDelay = min(initialDelayMs * multiplier^retry, maxDelayMs)
 * actualDelay = baseDelay + (baseDelay * random * jitterPercent / 100)
 * ```
 *
 * Jitter keeps parallel batches that failed together from retrying in lockstep.
 */

import { AppError, TransientProviderError } from "./errors.js";

/**
 * Configuration options for retry behavior
 */
export interface RetryOptions {
	/** Total attempts including the first one (1 = no retries) */
	maxAttempts: number;
	/** Delay before the first retry in milliseconds */
	initialDelayMs: number;
	/** Upper bound for any single delay in milliseconds */
	maxDelayMs: number;
	/** Exponential backoff multiplier (e.g., 2 = double each attempt) */
	multiplier: number;
	/** Jitter percentage (0-100) to add randomness to delays. Default: 10% */
	jitterPercent?: number;
	/** Optional predicate to determine if an error should be retried */
	shouldRetry?: (error: unknown) => boolean;
	/** Called before sleeping ahead of retry number `attempt + 1` */
	onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
	/** Stops further attempts once aborted */
	signal?: AbortSignal;
}

/**
 * Outcome of an operation run through `withRetry()`
 */
export interface RetryResult<T> {
	value: T;
	attempts: number;
}

/**
 * Error thrown once every attempt has failed. Keeps the attempt count for
 * accounting and the last underlying error as `cause`.
 */
export class RetryExhaustedError extends AppError {
	constructor(
		message: string,
		public readonly attempts: number,
		options: { cause: unknown },
	) {
		super(message, "RETRY_EXHAUSTED");
		this.name = "RetryExhaustedError";
		this.cause = options.cause;
		Object.setPrototypeOf(this, RetryExhaustedError.prototype);
	}
}

// =============================================================================
// Retry Constants
// =============================================================================

/** Default attempts per embedding batch */
export const DEFAULT_MAX_ATTEMPTS = 5;

/** Default delay before the first retry (ms) */
export const DEFAULT_INITIAL_DELAY_MS = 1000;

/** Default cap on a single backoff delay (ms) */
export const DEFAULT_MAX_DELAY_MS = 30000;

/** Default backoff multiplier */
export const DEFAULT_MULTIPLIER = 2;

// =============================================================================
// Sleep Utilities
// =============================================================================

/**
 * Asynchronous sleep utility.
 *
 * Resolves early (without throwing) when `signal` aborts, so callers can check
 * the signal and wind down.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	if (ms <= 0 || signal?.aborted) {
		return Promise.resolve();
	}
	return new Promise((resolve) => {
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve();
		};
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

// =============================================================================
// Backoff Calculation
// =============================================================================

/**
 * Calculate exponential backoff delay with configurable jitter.
 *
 * @param retry - Zero-based retry number (0 = delay before the second attempt)
 *
 * @example
 * ```typescript
 * // initialDelayMs 1000, multiplier 2, maxDelayMs 30000, no jitter:
 * // retry 0: 1000ms, retry 1: 2000ms, retry 2: 4000ms, retry 3: 8000ms, retry 5: 30000ms (capped)
 * ```
 */
export function calculateBackoffDelay(retry: number, options: RetryOptions): number {
	const { initialDelayMs, maxDelayMs, multiplier, jitterPercent = 10 } = options;

	const exponentialDelay = initialDelayMs * multiplier ** retry;
	const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

	const jitter = cappedDelay * (jitterPercent / 100) * Math.random();

	return Math.floor(cappedDelay + jitter);
}

// =============================================================================
// Error Detection
// =============================================================================

/**
 * Check if an error is transient and should be retried.
 *
 * `TransientProviderError` always is. Other errors are judged by message:
 * timeouts, connection resets and rate limits.
 */
export function isTransientError(error: unknown): boolean {
	if (error instanceof TransientProviderError) {
		return true;
	}

	// Our own classified errors other than the transient one are final
	if (error instanceof AppError) {
		return false;
	}

	if (error instanceof Error) {
		const message = error.message.toLowerCase();

		if (message.includes("timeout") || message.includes("etimedout")) {
			return true;
		}

		if (message.includes("econnreset") || message.includes("econnrefused") || message.includes("enetunreach")) {
			return true;
		}

		if (message.includes("rate limit") || message.includes("too many requests") || message.includes("429")) {
			return true;
		}
	}

	return false;
}

// =============================================================================
// Async Retry Wrapper
// =============================================================================

/**
 * Execute an async operation with retry logic.
 *
 * Non-retryable errors are rethrown as-is on the attempt that raised them.
 * Exhausting `maxAttempts` throws `RetryExhaustedError` carrying the attempt
 * count and the last error.
 *
 * @example
 * ```typescript
 * const { attempts } = await withRetry(() => store.add(batch), {
 *   maxAttempts: 5,
 *   initialDelayMs: 1000,
 *   maxDelayMs: 30000,
 *   multiplier: 2,
 * });
 * ```
 */
export async function withRetry<T>(
	operation: (attempt: number) => Promise<T> | T,
	options: RetryOptions,
): Promise<RetryResult<T>> {
	const { shouldRetry = isTransientError, onRetry, signal } = options;
	const maxAttempts = Math.max(1, options.maxAttempts);
	let lastError: unknown;

	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		try {
			const value = await operation(attempt);
			return { value, attempts: attempt };
		} catch (error: unknown) {
			lastError = error;

			if (!shouldRetry(error)) {
				throw error;
			}

			if (attempt >= maxAttempts || signal?.aborted) {
				throw new RetryExhaustedError(`Operation failed after ${attempt} attempt(s)`, attempt, { cause: error });
			}

			const delayMs = calculateBackoffDelay(attempt - 1, options);
			onRetry?.(error, attempt, delayMs);
			await sleep(delayMs, signal);

			if (signal?.aborted) {
				throw new RetryExhaustedError(`Operation aborted after ${attempt} attempt(s)`, attempt, { cause: error });
			}
		}
	}

	throw new RetryExhaustedError(`Operation failed after ${maxAttempts} attempt(s)`, maxAttempts, { cause: lastError });
}
