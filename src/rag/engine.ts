/**
 * RAG Engine
 *
 * Main orchestrator. Wires configuration, storage, the BM25 index, the
 * ingestion pipeline and hybrid retrieval behind a small API:
 * - Ingesting documents, files and directories
 * - Hybrid search, optionally restricted to a date
 * - Stats and reset
 */

import { readFile, stat } from "node:fs/promises";
import { basename, dirname, extname, resolve } from "node:path";
import { glob } from "glob";
import { loadConfig, type RagConfig, type RagConfigInput } from "../config.js";
import { PermanentIngestionError } from "../errors.js";
import { ingestionLogger } from "../logger.js";
import { RateLimiter } from "../rate-limit.js";
import { Bm25Index } from "./bm25.js";
import { type Chunker, createChunker, type SourceDocument } from "./chunker.js";
import { type Embedder, OpenAIEmbedder } from "./embedder.js";
import { HybridSearcher, type RetrievalResult, type RetrieveOptions } from "./hybrid-search.js";
import { BatchIngestor, type IngestionReport } from "./ingestor.js";
import { type MetricsSummary, RetrievalMetrics } from "./metrics.js";
import { type Reranker, WeightedReranker } from "./reranker.js";
import { overlapsRange, parseFlexibleDate } from "./temporal.js";
import type { SparseIndex, SparseIndexStats, VectorStore, VectorStoreStats } from "./types.js";
import { SqliteVectorStore } from "./vector-store.js";

const logger = ingestionLogger.child({ module: "rag-engine" });

/**
 * Supported file extensions for ingestion
 */
export const SUPPORTED_EXTENSIONS = new Set([".txt", ".md", ".markdown", ".csv", ".json", ".html", ".xml", ".log"]);

export type IngestDocumentResult =
	| { status: "ingested"; source: string; fileName: string; chunks: number; report: IngestionReport }
	| { status: "skipped"; source: string; fileName: string; existingChunks: number }
	| { status: "empty"; source: string; fileName: string };

export type IngestFileResult = IngestDocumentResult | { status: "unsupported"; source: string; fileName: string };

export interface IngestDirectoryOptions {
	recursive?: boolean;
	/** Overrides the per-file parent directory category */
	category?: string;
}

export interface DirectoryIngestionResult {
	files: number;
	ingested: number;
	skipped: number;
	empty: number;
	unsupported: number;
	failed: Array<{ path: string; error: string }>;
	results: IngestFileResult[];
}

export interface RagStats {
	vectorStore: VectorStoreStats;
	sparseIndex: SparseIndexStats;
	metrics: MetricsSummary;
}

export interface RagEngineOptions {
	config?: RagConfig;
	/** Used for the default vector store */
	embedder?: Embedder;
	vectorStore?: VectorStore;
	sparseIndex?: SparseIndex;
	reranker?: Reranker;
	chunker?: Chunker;
	rateLimiter?: RateLimiter;
	/** Clock for open-ended date ranges */
	now?: () => Date;
}

/**
 * RAG Engine - main orchestrator
 */
export class RagEngine {
	readonly config: RagConfig;
	readonly metrics = new RetrievalMetrics();
	private readonly vectorStore: VectorStore;
	private readonly ownedStore: SqliteVectorStore | null;
	private readonly sparseIndex: SparseIndex;
	private readonly chunker: Chunker;
	private readonly ingestor: BatchIngestor;
	private readonly searcher: HybridSearcher;
	private sparseRestore: Promise<void> | null = null;
	/** Ingestions in progress, keyed by file name */
	private readonly inFlight = new Map<string, Promise<IngestDocumentResult>>();

	constructor(options: RagEngineOptions = {}) {
		const config = options.config ?? loadConfig();
		this.config = config;

		if (options.vectorStore) {
			this.vectorStore = options.vectorStore;
			this.ownedStore = null;
		} else {
			const embedder =
				options.embedder ??
				new OpenAIEmbedder({
					apiKey: config.apiKey,
					model: config.embeddingModel,
					dimensions: config.embeddingDimensions,
				});
			this.ownedStore = new SqliteVectorStore({ stateDir: config.stateDir, embedder });
			this.vectorStore = this.ownedStore;
		}

		this.sparseIndex = options.sparseIndex ?? new Bm25Index({ k1: config.bm25K1, b: config.bm25B });
		this.chunker =
			options.chunker ??
			createChunker({
				chunkSize: config.chunkSize,
				chunkOverlap: config.chunkOverlap,
				minChunk: config.minChunk,
				maxChunk: config.maxChunk,
				now: options.now,
			});

		const rateLimiter = options.rateLimiter ?? new RateLimiter({ maxRequests: config.rateLimitPerMinute });
		this.ingestor = new BatchIngestor(
			{ vectorStore: this.vectorStore, sparseIndex: this.sparseIndex, rateLimiter },
			config,
		);
		this.searcher = new HybridSearcher(
			{
				vectorStore: this.vectorStore,
				sparseIndex: this.sparseIndex,
				reranker: options.reranker ?? new WeightedReranker(config.rerankWeights),
				metrics: this.metrics,
			},
			config,
		);
	}

	/**
	 * Chunk and ingest one document. A document whose file name is already
	 * stored is skipped; one without text is reported as empty. Concurrent calls
	 * for the same file name run one at a time, so only the first is ingested.
	 */
	async ingestDocument(document: SourceDocument): Promise<IngestDocumentResult> {
		await this.ensureSparseIndex();

		const fileName = basename(document.source);
		let pending = this.inFlight.get(fileName);
		while (pending) {
			logger.debug({ fileName }, "Waiting for in-flight ingestion of the same file name");
			await Promise.allSettled([pending]);
			pending = this.inFlight.get(fileName);
		}

		const task = this.ingestUnclaimed(document, fileName);
		this.inFlight.set(fileName, task);
		try {
			return await task;
		} finally {
			this.inFlight.delete(fileName);
		}
	}

	private async ingestUnclaimed(document: SourceDocument, fileName: string): Promise<IngestDocumentResult> {
		const { source } = document;

		if (await this.vectorStore.hasFileName(fileName)) {
			const existingChunks = await this.vectorStore.countByFileName(fileName);
			logger.info({ fileName, existingChunks }, "Document already ingested, skipping");
			return { status: "skipped", source, fileName, existingChunks };
		}

		const chunks = this.chunker.chunk(document);
		if (chunks.length === 0) {
			const error = new PermanentIngestionError("Document has no extractable text", source);
			logger.warn({ source, code: error.code }, error.message);
			return { status: "empty", source, fileName };
		}

		const report = await this.ingestor.ingest(chunks);
		logger.info(
			{ source, chunks: chunks.length, failedBatches: report.failedBatches, durationMs: report.durationMs },
			"Document ingested",
		);

		return { status: "ingested", source, fileName, chunks: chunks.length, report };
	}

	/**
	 * Ingest a text file. The category defaults to the parent directory name.
	 *
	 * @throws {PermanentIngestionError} If the file cannot be read
	 */
	async ingestFile(filePath: string, category?: string): Promise<IngestFileResult> {
		const source = resolve(filePath);
		const fileName = basename(source);
		const ext = extname(source).toLowerCase();

		if (!SUPPORTED_EXTENSIONS.has(ext)) {
			logger.debug({ filePath: source, ext }, "Skipping unsupported file type");
			return { status: "unsupported", source, fileName };
		}

		let content: string;
		try {
			content = await readFile(source, "utf-8");
		} catch (error) {
			throw new PermanentIngestionError(`Failed to read file: ${String(error)}`, source);
		}

		return this.ingestDocument({
			content,
			source,
			category: category ?? basename(dirname(source)),
		});
	}

	/**
	 * Ingest every file in a directory. A file that fails is recorded and the
	 * rest carry on.
	 */
	async ingestDirectory(dirPath: string, options: IngestDirectoryOptions = {}): Promise<DirectoryIngestionResult> {
		const { recursive = false, category } = options;

		const dirStat = await stat(dirPath);
		if (!dirStat.isDirectory()) {
			throw new PermanentIngestionError("Not a directory", dirPath);
		}

		const files = (
			await glob(recursive ? "**/*" : "*", {
				cwd: dirPath,
				nodir: true,
				absolute: true,
			})
		).sort();

		const result: DirectoryIngestionResult = {
			files: files.length,
			ingested: 0,
			skipped: 0,
			empty: 0,
			unsupported: 0,
			failed: [],
			results: [],
		};

		for (const file of files) {
			try {
				const fileResult = await this.ingestFile(file, category);
				result.results.push(fileResult);
				result[fileResult.status]++;
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				logger.warn({ filePath: file, error: message }, "Failed to ingest file");
				result.failed.push({ path: file, error: message });
			}
		}

		logger.info(
			{ dirPath, files: files.length, ingested: result.ingested, skipped: result.skipped, recursive },
			"Directory ingested",
		);

		return result;
	}

	/**
	 * Hybrid search over everything ingested
	 */
	async search(query: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
		await this.ensureSparseIndex();
		return this.searcher.retrieve(query, options);
	}

	/**
	 * Hybrid search restricted to chunks whose date range overlaps the given date.
	 *
	 * @param date - `YYYY`, `MM-DD-YYYY` or `YYYY-MM-DD`
	 * @throws {ValidationError} If the date cannot be parsed
	 */
	async searchByDate(query: string, date: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
		const range = parseFlexibleDate(date);
		const { filter } = options;
		return this.search(query, {
			...options,
			filter: (candidate) => overlapsRange(candidate.metadata, range) && (filter ? filter(candidate) : true),
		});
	}

	async stats(): Promise<RagStats> {
		await this.ensureSparseIndex();
		return {
			vectorStore: await this.vectorStore.stats(),
			sparseIndex: this.sparseIndex.stats(),
			metrics: this.metrics.getSummary(),
		};
	}

	/**
	 * Clear all stored chunks, the BM25 index and metrics
	 */
	async clear(): Promise<void> {
		await this.ensureSparseIndex();
		await this.vectorStore.clear();
		await this.sparseIndex.clearIndex();
		this.metrics.reset();
		logger.info("RAG index cleared");
	}

	/**
	 * Release the database connection when the engine opened it
	 */
	close(): void {
		this.ownedStore?.close();
	}

	/**
	 * Rebuild the in-memory BM25 index from the persisted chunks, once
	 */
	private ensureSparseIndex(): Promise<void> {
		this.sparseRestore ??= this.restoreSparseIndex();
		return this.sparseRestore;
	}

	private async restoreSparseIndex(): Promise<void> {
		try {
			const stored = await this.vectorStore.listChunks();
			if (stored.length === 0) {
				return;
			}
			const added = await this.sparseIndex.indexDocuments(stored);
			logger.info({ stored: stored.length, added }, "BM25 index restored from vector store");
		} catch (error) {
			logger.warn({ error: String(error) }, "Failed to restore BM25 index; keyword results limited to new documents");
		}
	}
}

/**
 * Create an engine from .ragweaverc files merged with overrides
 */
export function createRagEngine(
	overrides: RagConfigInput = {},
	options: Omit<RagEngineOptions, "config"> = {},
): RagEngine {
	return new RagEngine({ ...options, config: loadConfig(overrides) });
}
