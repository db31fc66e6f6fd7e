/**
 * Embedder Module
 *
 * Embedding provider seam plus the default OpenAI implementation (via the AI SDK).
 *
 * Key points:
 * - The SDK's built-in retries are turned off; the batch ingestor owns retry
 * - Provider failures are classified: rate limits, 5xx and network errors become
 *   TransientProviderError, everything else EmbeddingError
 */

import { createOpenAI } from "@ai-sdk/openai";
import { APICallError, embedMany, type EmbeddingModel } from "ai";
import { EmbeddingError, TransientProviderError } from "../errors.js";
import { ingestionLogger } from "../logger.js";
import { isTransientError } from "../retry-handler.js";

const logger = ingestionLogger.child({ module: "rag-embedder" });

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;

/**
 * Anything that turns text into fixed-length vectors
 */
export interface Embedder {
	readonly modelId: string;
	readonly dimensions: number;
	embed(text: string, signal?: AbortSignal): Promise<number[]>;
	embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface OpenAIEmbedderOptions {
	/** Defaults to OPENAI_API_KEY */
	apiKey?: string;
	baseURL?: string;
	model?: string;
	dimensions?: number;
}

/**
 * Map a provider failure onto the ingestion error taxonomy
 */
export function classifyEmbeddingError(error: unknown, model: string): TransientProviderError | EmbeddingError {
	if (error instanceof TransientProviderError || error instanceof EmbeddingError) {
		return error;
	}

	const message = error instanceof Error ? error.message : String(error);

	if (APICallError.isInstance(error)) {
		const status = error.statusCode;
		if (error.isRetryable || status === 429 || (status !== undefined && status >= 500)) {
			return new TransientProviderError(`Embedding provider unavailable: ${message}`, status, { cause: error });
		}
		return new EmbeddingError(`Embedding request rejected (${status ?? "no status"}): ${message}`, model, {
			cause: error,
		});
	}

	if (isTransientError(error) || message.toLowerCase().includes("fetch failed")) {
		return new TransientProviderError(`Embedding provider unreachable: ${message}`, undefined, { cause: error });
	}

	return new EmbeddingError(`Failed to generate embeddings using ${model}: ${message}`, model, { cause: error });
}

/**
 * OpenAI embedder
 */
export class OpenAIEmbedder implements Embedder {
	readonly dimensions: number;
	readonly modelId: string;
	private readonly model: EmbeddingModel<string>;

	constructor(opts: OpenAIEmbedderOptions = {}) {
		this.modelId = opts.model ?? DEFAULT_EMBEDDING_MODEL;
		this.dimensions = opts.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS;

		const openai = createOpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
		this.model = openai.embedding(this.modelId, {
			dimensions: this.dimensions !== DEFAULT_EMBEDDING_DIMENSIONS ? this.dimensions : undefined,
		});
	}

	async embed(text: string, signal?: AbortSignal): Promise<number[]> {
		const [embedding] = await this.embedBatch([text], signal);
		if (!embedding) {
			throw new EmbeddingError("Provider returned no embedding", this.modelId);
		}
		return embedding;
	}

	/**
	 * Embed texts in one provider call
	 *
	 * @throws {TransientProviderError} Rate limit, server or network failure
	 * @throws {EmbeddingError} Any other failure, or a malformed response
	 */
	async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}

		let embeddings: number[][];
		try {
			const result = await embedMany({
				model: this.model,
				values: [...texts],
				maxRetries: 0,
				abortSignal: signal,
			});
			embeddings = result.embeddings;
		} catch (error) {
			const classified = classifyEmbeddingError(error, this.modelId);
			logger.warn(
				{ model: this.modelId, count: texts.length, code: classified.code, error: classified.message },
				"Embedding call failed",
			);
			throw classified;
		}

		if (embeddings.length !== texts.length) {
			throw new EmbeddingError(
				`Provider returned ${embeddings.length} embeddings for ${texts.length} inputs`,
				this.modelId,
			);
		}

		const wrongSize = embeddings.find((e) => e.length !== this.dimensions);
		if (wrongSize) {
			throw new EmbeddingError(
				`Expected ${this.dimensions}-dimensional embeddings, got ${wrongSize.length}`,
				this.modelId,
			);
		}

		return embeddings;
	}
}
