/**
 * ragweave - Centralized Export Module
 *
 * Single entry point for the library:
 * - RAG engine, ingestion and hybrid retrieval (./rag)
 * - Configuration loading and validation
 * - Error taxonomy
 * - Concurrency, retry and rate-limit primitives
 */

// Concurrency primitives
export { Mutex, type PoolTask, type ShutdownResult, WorkerPool, type WorkerPoolOptions, withTimeout } from "./concurrency.js";
// Configuration
export {
	clearConfigCache,
	defaultParallelism,
	getConfigSource,
	getDefaultConfig,
	loadConfig,
	type RagConfig,
	type RagConfigInput,
	RagConfigSchema,
	type RerankWeights,
	type RetrySettings,
	resolveConfig,
} from "./config.js";
// Errors
export {
	AppError,
	EmbeddingError,
	IndexWriteError,
	PermanentIngestionError,
	PoolShutdownError,
	QueryParseError,
	type RetrievalLeg,
	RetrievalLegError,
	TimeoutError,
	TransientProviderError,
	ValidationError,
} from "./errors.js";
// Logging
export { logger } from "./logger.js";
// RAG
export * from "./rag/index.js";
// Rate limiting
export { DEFAULT_REQUESTS_PER_MINUTE, DEFAULT_WINDOW_MS, RateLimiter, type RateLimiterOptions } from "./rate-limit.js";
// Retry
export {
	calculateBackoffDelay,
	isTransientError,
	RetryExhaustedError,
	type RetryOptions,
	type RetryResult,
	sleep,
	withRetry,
} from "./retry-handler.js";
