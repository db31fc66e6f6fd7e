/**
 * RAG Module
 *
 * Hybrid retrieval and ingestion using:
 * - OpenAI embeddings through the AI SDK
 * - sqlite-vec for vector similarity search
 * - an in-memory segment-based BM25 index for keyword search
 * - Reciprocal Rank Fusion plus weighted reranking
 */

// BM25
export { Bm25Index, type Bm25Options, DEFAULT_B, DEFAULT_K1, tokenize } from "./bm25.js";
// Chunker
export {
	CHARS_PER_TOKEN,
	type Chunker,
	type ChunkingOptions,
	cleanText,
	createChunker,
	estimateTokens,
	generateDocumentId,
	SlidingWindowChunker,
	type SourceDocument,
} from "./chunker.js";
// Embedder
export {
	classifyEmbeddingError,
	DEFAULT_EMBEDDING_DIMENSIONS,
	DEFAULT_EMBEDDING_MODEL,
	type Embedder,
	OpenAIEmbedder,
	type OpenAIEmbedderOptions,
} from "./embedder.js";
// Engine (main entry point)
export {
	createRagEngine,
	type DirectoryIngestionResult,
	type IngestDirectoryOptions,
	type IngestDocumentResult,
	type IngestFileResult,
	RagEngine,
	type RagEngineOptions,
	type RagStats,
	SUPPORTED_EXTENSIONS,
} from "./engine.js";
// Hybrid Search
export {
	type FusedScore,
	HybridSearcher,
	type HybridSettings,
	type RetrievalResult,
	type RetrieveOptions,
	reciprocalRankFusion,
	type StageTimings,
} from "./hybrid-search.js";
// Ingestion
export {
	type BatchOutcome,
	BatchIngestor,
	type BatchStrategy,
	createBatches,
	type IngestionReport,
	type IngestOptions,
	type IngestorSettings,
} from "./ingestor.js";
// Metrics
export { type MetricsSummary, type RetrievalRecord, RetrievalMetrics } from "./metrics.js";
// Reranking
export {
	DEFAULT_RERANK_WEIGHTS,
	extractPhrases,
	extractQueryTerms,
	keywordScore,
	metadataScore,
	type Reranker,
	WeightedReranker,
} from "./reranker.js";
// Temporal
export { extractDateRange, overlapsRange, parseFlexibleDate } from "./temporal.js";
// Types
export type {
	Candidate,
	CandidateMetadata,
	Chunk,
	ChunkMetadata,
	DateRange,
	RankedCandidate,
	SparseEntry,
	SparseHit,
	SparseIndex,
	SparseIndexStats,
	VectorStore,
	VectorStoreStats,
} from "./types.js";
// Vector store
export { distanceToSimilarity, normalizeVector, SqliteVectorStore, type SqliteVectorStoreOptions } from "./vector-store.js";
