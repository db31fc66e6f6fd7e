/**
 * Custom Error Classes
 *
 * Domain-specific error types with proper Error subclassing and context properties.
 * All custom error classes extend the base AppError class.
 */

/**
 * Base application error class
 *
 * Uses Object.setPrototypeOf() so instanceof checks survive transpilation.
 *
 * @example
 * ```typescript
 * throw new AppError('Something went wrong', 'GENERIC_ERROR');
 * ```
 */
export class AppError extends Error {
	constructor(
		message: string,
		public readonly code: string,
	) {
		super(message);
		this.name = "AppError";
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

/**
 * Validation error for invalid configuration or input
 *
 * @example
 * ```typescript
 * if (chunkOverlap >= chunkSize) {
 *   throw new ValidationError('Overlap must be smaller than chunk size', 'chunkOverlap');
 * }
 * ```
 */
export class ValidationError extends AppError {
	constructor(
		message: string,
		public readonly field: string,
		public readonly validationErrors?: string[],
	) {
		super(message, "VALIDATION_ERROR");
		this.name = "ValidationError";
		Object.setPrototypeOf(this, ValidationError.prototype);
	}
}

/**
 * Transient failure from the embedding provider (rate limit, network blip, 5xx).
 * Retried with exponential backoff at batch granularity.
 */
export class TransientProviderError extends AppError {
	constructor(
		message: string,
		public readonly statusCode?: number,
		options?: { cause?: unknown },
	) {
		super(message, "TRANSIENT_PROVIDER_ERROR");
		this.name = "TransientProviderError";
		if (options?.cause !== undefined) {
			this.cause = options.cause;
		}
		Object.setPrototypeOf(this, TransientProviderError.prototype);
	}
}

/**
 * Non-transient embedding failure (bad request, auth, malformed response).
 * The batch fails on its first attempt.
 */
export class EmbeddingError extends AppError {
	constructor(
		message: string,
		public readonly model: string,
		options?: { cause?: unknown },
	) {
		super(message, "EMBEDDING_ERROR");
		this.name = "EmbeddingError";
		if (options?.cause !== undefined) {
			this.cause = options.cause;
		}
		Object.setPrototypeOf(this, EmbeddingError.prototype);
	}
}

/**
 * Document that can never be ingested (empty, unreadable, unsupported type).
 * Logged and skipped; never retried.
 */
export class PermanentIngestionError extends AppError {
	constructor(
		message: string,
		public readonly source: string,
	) {
		super(message, "PERMANENT_INGESTION_ERROR");
		this.name = "PermanentIngestionError";
		Object.setPrototypeOf(this, PermanentIngestionError.prototype);
	}
}

/**
 * BM25 commit failure. The sparse index is best-effort, so ingestion logs this
 * and still reports the embedding outcome.
 */
export class IndexWriteError extends AppError {
	constructor(
		message: string,
		public readonly documentCount: number,
		options?: { cause?: unknown },
	) {
		super(message, "INDEX_WRITE_ERROR");
		this.name = "IndexWriteError";
		if (options?.cause !== undefined) {
			this.cause = options.cause;
		}
		Object.setPrototypeOf(this, IndexWriteError.prototype);
	}
}

/**
 * Query the BM25 analyzer could not turn into terms. Never leaves the index:
 * search() answers it with an empty result list.
 */
export class QueryParseError extends AppError {
	constructor(
		message: string,
		public readonly query: string,
	) {
		super(message, "QUERY_PARSE_ERROR");
		this.name = "QueryParseError";
		Object.setPrototypeOf(this, QueryParseError.prototype);
	}
}

export type RetrievalLeg = "dense" | "sparse";

/**
 * A dense or sparse retrieval leg failed during a hybrid query.
 */
export class RetrievalLegError extends AppError {
	constructor(
		message: string,
		public readonly leg: RetrievalLeg,
		options?: { cause?: unknown },
	) {
		super(message, "RETRIEVAL_LEG_ERROR");
		this.name = "RetrievalLegError";
		if (options?.cause !== undefined) {
			this.cause = options.cause;
		}
		Object.setPrototypeOf(this, RetrievalLegError.prototype);
	}
}

/**
 * Timeout error for operations that exceed time limits
 *
 * @example
 * ```typescript
 * throw new TimeoutError('Dense retrieval timed out', 'dense-leg', 10000);
 * ```
 */
export class TimeoutError extends AppError {
	constructor(
		message: string,
		public readonly operation: string,
		public readonly timeoutMs: number,
	) {
		super(message, "TIMEOUT_ERROR");
		this.name = "TimeoutError";
		Object.setPrototypeOf(this, TimeoutError.prototype);
	}
}

/**
 * Task rejected because its worker pool was shut down before it could finish.
 */
export class PoolShutdownError extends AppError {
	constructor(message: string) {
		super(message, "POOL_SHUTDOWN_ERROR");
		this.name = "PoolShutdownError";
		Object.setPrototypeOf(this, PoolShutdownError.prototype);
	}
}
