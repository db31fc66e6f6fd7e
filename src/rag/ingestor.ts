/**
 * Batch Embedding Ingestor
 *
 * Pushes chunks into the vector store in parallel batches, then into the BM25
 * index.
 *
 * Flow:
 * 1. Group chunks into batches (fixed count or cumulative token budget)
 * 2. Submit each batch to a bounded worker pool, staggered by
 *    `delayBetweenBatchesMs`
 * 3. Each attempt waits on the shared rate limiter, then embeds and stores
 * 4. Transient failures retry with exponential backoff; an exhausted batch is
 *    recorded and the others carry on
 * 5. Wait for every batch to settle, then close the pool. Only a caller abort
 *    triggers the bounded drain and force-cancel
 * 6. Index the same chunks for BM25; a failure there is logged, never thrown
 */

import type { RagConfig } from "../config.js";
import { WorkerPool } from "../concurrency.js";
import { ingestionLogger } from "../logger.js";
import type { RateLimiter } from "../rate-limit.js";
import { isTransientError, sleep, withRetry } from "../retry-handler.js";
import type { Chunk, SparseIndex, VectorStore } from "./types.js";

const logger = ingestionLogger.child({ module: "rag-ingestor" });

export type BatchStrategy = RagConfig["batchStrategy"];

export type IngestorSettings = Pick<
	RagConfig,
	| "batchStrategy"
	| "batchSize"
	| "maxTokensPerBatch"
	| "parallelism"
	| "delayBetweenBatchesMs"
	| "retry"
	| "poolShutdownTimeoutMs"
>;

export interface IngestorDependencies {
	vectorStore: VectorStore;
	sparseIndex: SparseIndex;
	rateLimiter: RateLimiter;
	/** Sleep used for the submission stagger; injectable for tests */
	sleep?: (ms: number) => Promise<void>;
}

export interface IngestOptions {
	/** Aborting stops submission and shuts the pool down within poolShutdownTimeoutMs */
	signal?: AbortSignal;
}

export interface BatchOutcome {
	index: number;
	size: number;
	/** Provider attempts made; 0 when the batch never started */
	attempts: number;
	ok: boolean;
	error?: string;
}

export interface IngestionReport {
	totalChunks: number;
	batches: number;
	succeededBatches: number;
	failedBatches: number;
	succeededChunks: number;
	failedChunks: number;
	outcomes: BatchOutcome[];
	/** Chunks newly added to the BM25 index */
	sparseIndexed: number;
	sparseIndexError?: string;
	durationMs: number;
}

/**
 * Group chunks for embedding calls.
 *
 * - `fixed`: `batchSize` chunks per batch
 * - `token`: flush before a chunk that would push the running token total past
 *   `maxTokensPerBatch`; an oversize chunk travels alone
 */
export function createBatches(
	chunks: readonly Chunk[],
	strategy: BatchStrategy,
	batchSize: number,
	maxTokensPerBatch: number,
): Chunk[][] {
	const batches: Chunk[][] = [];

	if (strategy === "fixed") {
		const size = Math.max(1, batchSize);
		for (let i = 0; i < chunks.length; i += size) {
			batches.push(chunks.slice(i, i + size));
		}
		return batches;
	}

	let current: Chunk[] = [];
	let currentTokens = 0;
	for (const chunk of chunks) {
		if (current.length > 0 && currentTokens + chunk.tokenCount > maxTokensPerBatch) {
			batches.push(current);
			current = [];
			currentTokens = 0;
		}
		current.push(chunk);
		currentTokens += chunk.tokenCount;
	}
	if (current.length > 0) {
		batches.push(current);
	}

	return batches;
}

function abortedPromise(signal: AbortSignal): Promise<"aborted"> {
	return new Promise((resolve) => {
		if (signal.aborted) {
			resolve("aborted");
			return;
		}
		signal.addEventListener("abort", () => resolve("aborted"), { once: true });
	});
}

function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
	}
	return String(error);
}

export class BatchIngestor {
	private readonly vectorStore: VectorStore;
	private readonly sparseIndex: SparseIndex;
	private readonly rateLimiter: RateLimiter;
	private readonly sleep: (ms: number) => Promise<void>;

	constructor(
		deps: IngestorDependencies,
		private readonly settings: IngestorSettings,
	) {
		this.vectorStore = deps.vectorStore;
		this.sparseIndex = deps.sparseIndex;
		this.rateLimiter = deps.rateLimiter;
		this.sleep = deps.sleep ?? sleep;
	}

	/**
	 * Embed, store and index chunks. Resolves once every batch has settled,
	 * however long the rate-limited backlog takes.
	 */
	async ingest(chunks: readonly Chunk[], options: IngestOptions = {}): Promise<IngestionReport> {
		const { signal } = options;
		const startedAt = Date.now();
		const { batchStrategy, batchSize, maxTokensPerBatch, parallelism, delayBetweenBatchesMs } = this.settings;

		const batches = createBatches(chunks, batchStrategy, batchSize, maxTokensPerBatch);
		logger.info(
			{ chunks: chunks.length, batches: batches.length, strategy: batchStrategy, parallelism },
			"Starting batch ingestion",
		);

		const pool = new WorkerPool({ concurrency: parallelism, shutdownTimeoutMs: this.settings.poolShutdownTimeoutMs });
		const outcomes = new Map<number, BatchOutcome>();
		const settled: Array<Promise<void>> = [];

		for (const [index, batch] of batches.entries()) {
			if (signal?.aborted) {
				break;
			}
			if (index > 0 && delayBetweenBatchesMs > 0) {
				await this.sleep(delayBetweenBatchesMs);
			}
			settled.push(
				pool
					.submit((poolSignal) => this.processBatch(index, batch, poolSignal))
					.then(
						(outcome) => {
							outcomes.set(index, outcome);
						},
						(error: unknown) => {
							outcomes.set(index, { index, size: batch.length, attempts: 0, ok: false, error: errorMessage(error) });
						},
					),
			);
		}

		// Each settled promise handles its own rejection, so this never rejects
		const allSettled = Promise.all(settled).then(() => "settled" as const);
		const outcome = signal ? await Promise.race([allSettled, abortedPromise(signal)]) : await allSettled;

		if (outcome === "aborted") {
			logger.warn({ pending: pool.pendingCount, active: pool.activeCount }, "Ingestion aborted, shutting down pool");
			const shutdown = await pool.shutdown();
			if (shutdown.forced) {
				logger.error(
					{ cancelledTasks: shutdown.cancelledTasks, timeoutMs: this.settings.poolShutdownTimeoutMs },
					"Ingestion pool did not drain in time; remaining batches cancelled",
				);
			} else {
				await allSettled;
			}
		} else {
			await pool.shutdown();
		}

		const report: BatchOutcome[] = batches.map(
			(batch, index) =>
				outcomes.get(index) ?? { index, size: batch.length, attempts: 0, ok: false, error: "Cancelled before completion" },
		);

		let sparseIndexed = 0;
		let sparseIndexError: string | undefined;
		if (chunks.length > 0) {
			try {
				sparseIndexed = await this.sparseIndex.indexDocuments(chunks);
			} catch (error) {
				sparseIndexError = errorMessage(error);
				logger.warn({ chunks: chunks.length, error: sparseIndexError }, "BM25 indexing failed; dense results unaffected");
			}
		}

		const succeeded = report.filter((o) => o.ok);
		const failed = report.filter((o) => !o.ok);
		const result: IngestionReport = {
			totalChunks: chunks.length,
			batches: batches.length,
			succeededBatches: succeeded.length,
			failedBatches: failed.length,
			succeededChunks: succeeded.reduce((sum, o) => sum + o.size, 0),
			failedChunks: failed.reduce((sum, o) => sum + o.size, 0),
			outcomes: report,
			sparseIndexed,
			sparseIndexError,
			durationMs: Date.now() - startedAt,
		};

		logger.info(
			{
				batches: result.batches,
				succeededBatches: result.succeededBatches,
				failedBatches: result.failedBatches,
				sparseIndexed,
				durationMs: result.durationMs,
			},
			"Batch ingestion complete",
		);

		return result;
	}

	private async processBatch(index: number, batch: Chunk[], signal: AbortSignal): Promise<BatchOutcome> {
		let attempts = 0;

		try {
			await withRetry(
				async (attempt) => {
					attempts = attempt;
					await this.rateLimiter.acquire(signal);
					await this.vectorStore.add(batch, signal);
				},
				{
					...this.settings.retry,
					shouldRetry: isTransientError,
					signal,
					onRetry: (error, attempt, delayMs) => {
						logger.warn(
							{ batch: index, attempt, delayMs, error: errorMessage(error) },
							"Transient embedding failure, retrying batch",
						);
					},
				},
			);
			logger.debug({ batch: index, size: batch.length, attempts }, "Batch stored");
			return { index, size: batch.length, attempts, ok: true };
		} catch (error) {
			const message = errorMessage(error);
			logger.error({ batch: index, size: batch.length, attempts, error: message }, "Batch failed");
			return { index, size: batch.length, attempts, ok: false, error: message };
		}
	}
}
