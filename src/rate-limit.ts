/**
 * Rate Limiting
 *
 * Rolling-window request limiter for the embedding provider.
 * Each instance owns its window, so separate services (and tests) never share quota.
 */

import { ingestionLogger } from "./logger.js";
import { sleep } from "./retry-handler.js";

const logger = ingestionLogger.child({ component: "rate-limiter" });

/** Default provider quota */
export const DEFAULT_REQUESTS_PER_MINUTE = 50;

/** Default window length */
export const DEFAULT_WINDOW_MS = 60_000;

export interface RateLimiterOptions {
	/** Requests allowed inside one window */
	maxRequests?: number;
	/** Window length in milliseconds */
	windowMs?: number;
	/** Clock override, for tests */
	now?: () => number;
	/** Sleep override, for tests */
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Rolling-window rate limiter
 *
 * Keeps the timestamps of granted requests. A request is granted while fewer
 * than `maxRequests` timestamps fall inside the last `windowMs`.
 */
export class RateLimiter {
	readonly maxRequests: number;
	readonly windowMs: number;
	private readonly now: () => number;
	private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;
	private granted: number[] = [];

	constructor(options: RateLimiterOptions = {}) {
		this.maxRequests = Math.max(1, options.maxRequests ?? DEFAULT_REQUESTS_PER_MINUTE);
		this.windowMs = Math.max(1, options.windowMs ?? DEFAULT_WINDOW_MS);
		this.now = options.now ?? Date.now;
		this.sleepFn = options.sleep ?? sleep;
	}

	/**
	 * Check and record in one step. Returns false when the window is full.
	 */
	tryAcquire(): boolean {
		const now = this.now();
		this.evictExpired(now);

		if (this.granted.length >= this.maxRequests) {
			return false;
		}

		this.granted.push(now);
		return true;
	}

	/**
	 * Requests still available in the current window
	 */
	getRemainingRequests(): number {
		this.evictExpired(this.now());
		return Math.max(0, this.maxRequests - this.granted.length);
	}

	/**
	 * Milliseconds until the oldest granted request leaves the window.
	 * Zero when a request would be granted right now.
	 */
	getWaitTimeMs(): number {
		const now = this.now();
		this.evictExpired(now);

		if (this.granted.length < this.maxRequests) {
			return 0;
		}

		const oldest = this.granted[0] ?? now;
		return Math.max(0, oldest + this.windowMs - now);
	}

	/**
	 * Wait until a request is granted.
	 *
	 * @returns Total milliseconds spent waiting
	 */
	async acquire(signal?: AbortSignal): Promise<number> {
		let waited = 0;

		while (!this.tryAcquire()) {
			if (signal?.aborted) {
				throw signal.reason instanceof Error ? signal.reason : new Error("Rate limiter wait aborted");
			}
			// At least 1ms so a clock that has not moved cannot spin
			const waitMs = Math.max(1, this.getWaitTimeMs());
			logger.debug({ waitMs, maxRequests: this.maxRequests }, "Rate limit reached, waiting");
			await this.sleepFn(waitMs, signal);
			waited += waitMs;
		}

		return waited;
	}

	/**
	 * Forget all granted requests
	 */
	reset(): void {
		this.granted = [];
	}

	private evictExpired(now: number): void {
		const cutoff = now - this.windowMs;
		let expired = 0;
		while (expired < this.granted.length && this.granted[expired] <= cutoff) {
			expired++;
		}
		if (expired > 0) {
			this.granted = this.granted.slice(expired);
		}
	}
}
