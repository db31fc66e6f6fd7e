/**
 * Concurrency Utilities
 *
 * - WorkerPool: bounded async worker pool with drain and bounded shutdown
 * - withTimeout: per-stage deadline for async work
 * - Mutex: promise-chained mutual exclusion for single-writer sections
 *
 * Used by:
 * - Batch embedding ingestion (WorkerPool)
 * - Hybrid retrieval legs and rerank stage (withTimeout)
 * - BM25 index writer (Mutex)
 */

import { PoolShutdownError, TimeoutError } from "./errors.js";

/**
 * A unit of pool work. The signal aborts when the pool is force-cancelled.
 */
export type PoolTask<T> = (signal: AbortSignal) => Promise<T>;

export interface WorkerPoolOptions {
	/** Maximum number of tasks running at once */
	concurrency: number;
	/** How long shutdown() waits for in-flight work before cancelling (default: 60s) */
	shutdownTimeoutMs?: number;
}

export interface ShutdownResult {
	/** True when the drain timed out and remaining work was cancelled */
	forced: boolean;
	/** Queued tasks rejected with PoolShutdownError */
	cancelledTasks: number;
}

interface QueuedJob {
	start: () => Promise<void>;
	cancel: (error: PoolShutdownError) => void;
}

type PoolState = "running" | "draining" | "closed";

/**
 * Bounded worker pool.
 *
 * At most `concurrency` tasks run at once; the rest wait in FIFO order.
 * Lifecycle: submit while running, then `shutdown()` drains in-flight and
 * queued work for up to `shutdownTimeoutMs` before force-cancelling.
 */
export class WorkerPool {
	readonly concurrency: number;
	private readonly shutdownTimeoutMs: number;
	private readonly queue: QueuedJob[] = [];
	private readonly controller = new AbortController();
	private idleWaiters: Array<() => void> = [];
	private active = 0;
	private state: PoolState = "running";

	constructor(options: WorkerPoolOptions) {
		this.concurrency = Math.max(1, Math.floor(options.concurrency));
		this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 60_000;
	}

	/**
	 * Number of tasks currently executing
	 */
	get activeCount(): number {
		return this.active;
	}

	/**
	 * Number of tasks waiting for a free worker
	 */
	get pendingCount(): number {
		return this.queue.length;
	}

	get isClosed(): boolean {
		return this.state !== "running";
	}

	/**
	 * Queue a task. Rejects with PoolShutdownError once shutdown has begun.
	 */
	submit<T>(task: PoolTask<T>): Promise<T> {
		if (this.state !== "running") {
			return Promise.reject(new PoolShutdownError("Worker pool is shut down; task rejected"));
		}

		return new Promise<T>((resolve, reject) => {
			this.queue.push({
				start: () => task(this.controller.signal).then(resolve, reject),
				cancel: reject,
			});
			this.pump();
		});
	}

	/**
	 * Resolve once no task is running or queued.
	 */
	drain(): Promise<void> {
		if (this.isIdle()) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.idleWaiters.push(resolve);
		});
	}

	/**
	 * Stop accepting work, wait for the backlog up to the shutdown timeout, then
	 * reject anything still queued and abort the running tasks' signal.
	 */
	async shutdown(): Promise<ShutdownResult> {
		if (this.state === "closed") {
			return { forced: false, cancelledTasks: 0 };
		}
		this.state = "draining";

		let timer: NodeJS.Timeout | undefined;
		const timedOut = new Promise<"timeout">((resolve) => {
			timer = setTimeout(() => resolve("timeout"), this.shutdownTimeoutMs);
		});

		const outcome = await Promise.race([this.drain().then(() => "drained" as const), timedOut]);
		clearTimeout(timer);
		this.state = "closed";

		if (outcome === "drained") {
			return { forced: false, cancelledTasks: 0 };
		}

		const cancelled = this.queue.splice(0);
		for (const job of cancelled) {
			job.cancel(new PoolShutdownError("Worker pool shut down before task started"));
		}
		this.controller.abort();
		this.notifyIfIdle();

		return { forced: true, cancelledTasks: cancelled.length };
	}

	private pump(): void {
		while (this.active < this.concurrency && this.queue.length > 0) {
			const job = this.queue.shift();
			if (!job) break;
			this.active++;
			// start() routes task failures to the submitter, so it never rejects
			void job.start().then(() => {
				this.active--;
				this.pump();
				this.notifyIfIdle();
			});
		}
	}

	private isIdle(): boolean {
		return this.active === 0 && this.queue.length === 0;
	}

	private notifyIfIdle(): void {
		if (!this.isIdle() && this.state !== "closed") return;
		const waiters = this.idleWaiters;
		this.idleWaiters = [];
		for (const resolve of waiters) {
			resolve();
		}
	}
}

/**
 * Run an async operation under a deadline.
 *
 * The operation receives a signal that aborts when the deadline passes; the
 * returned promise rejects with TimeoutError at that moment either way.
 * A non-positive or non-finite timeout disables the deadline.
 */
export async function withTimeout<T>(
	operation: (signal: AbortSignal) => Promise<T> | T,
	timeoutMs: number,
	operationName: string,
): Promise<T> {
	const controller = new AbortController();

	if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
		return operation(controller.signal);
	}

	let timer: NodeJS.Timeout | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			controller.abort();
			reject(new TimeoutError(`${operationName} exceeded ${timeoutMs}ms`, operationName, timeoutMs));
		}, timeoutMs);
	});

	try {
		return await Promise.race([Promise.resolve().then(() => operation(controller.signal)), deadline]);
	} finally {
		clearTimeout(timer);
	}
}

/**
 * Promise-chained mutex. Callers run one at a time in arrival order; a failed
 * section does not block the next one.
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();
	private held = false;

	get isLocked(): boolean {
		return this.held;
	}

	runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
		const result = this.tail.then(async () => {
			this.held = true;
			try {
				return await section();
			} finally {
				this.held = false;
			}
		});
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}
}
