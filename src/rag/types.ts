/**
 * RAG Module Types
 *
 * Core type definitions for ingestion and hybrid retrieval.
 */

/**
 * Provenance metadata attached to every chunk of a document.
 * Dates are ISO `YYYY-MM-DD` strings.
 */
export type ChunkMetadata = {
	category: string;
	file_name: string;
	source: string;
	start_date: string | null;
	end_date: string | null;
	chunk_index: number;
};

/**
 * A token-bounded slice of a source document; the atomic retrieval unit.
 * The id identifies the same chunk in the vector store and the BM25 index.
 */
export interface Chunk {
	readonly id: string;
	readonly content: string;
	readonly tokenCount: number;
	readonly metadata: Readonly<ChunkMetadata>;
}

/**
 * Metadata as seen at retrieval time. Chunks carry ChunkMetadata, but payloads
 * coming back from a store may hold extra or missing keys.
 */
export type CandidateMetadata = Readonly<Record<string, unknown>>;

/**
 * A chunk considered for one query, with whichever scores it has collected
 */
export interface Candidate {
	id: string;
	content: string;
	metadata: CandidateMetadata;
	/** Cosine similarity from the dense leg */
	similarity?: number;
	/** BM25 score from the sparse leg */
	bm25Score?: number;
	/** Reciprocal rank fusion score */
	rrfScore?: number;
}

/**
 * A candidate after reranking, with its score components
 */
export interface RankedCandidate extends Candidate {
	rerankScore: number;
	vectorScore: number;
	keywordScore: number;
	metadataScore: number;
}

/**
 * One hit from the sparse index
 */
export interface SparseHit {
	id: string;
	score: number;
}

/**
 * What the sparse index stores per entry. Chunks and stored candidates both fit.
 */
export interface SparseEntry {
	id: string;
	content: string;
	metadata: CandidateMetadata;
}

/**
 * Sparse index statistics
 */
export interface SparseIndexStats {
	totalDocuments: number;
	totalSegments: number;
	totalTerms: number;
	averageDocumentLength: number;
	k1: number;
	b: number;
}

/**
 * Keyword-rankable index over chunk text
 */
export interface SparseIndex {
	indexDocuments(documents: readonly SparseEntry[]): Promise<number>;
	search(query: string, topK: number): SparseHit[] | Promise<SparseHit[]>;
	getEntry(id: string): SparseEntry | null;
	clearIndex(): Promise<void>;
	stats(): SparseIndexStats;
}

/**
 * Vector store statistics
 */
export interface VectorStoreStats {
	chunkCount: number;
	fileCount: number;
	embeddingDimensions: number;
	categories: Array<{ category: string; chunkCount: number }>;
}

/**
 * Dense retrieval backend. Embedding happens inside add() and similaritySearch().
 */
export interface VectorStore {
	/** Embed and store chunks. Re-adding an id replaces it. */
	add(chunks: readonly Chunk[], signal?: AbortSignal): Promise<void>;
	/** Candidates with similarity >= threshold, best first */
	similaritySearch(query: string, topK: number, threshold: number): Promise<Candidate[]>;
	/** Stored payloads for the given ids; unknown ids are absent from the result */
	getByIds(ids: readonly string[]): Promise<Candidate[]>;
	/** Every stored chunk payload, in insertion order */
	listChunks(): Promise<Candidate[]>;
	/** Whether any chunk tagged with this file_name exists */
	hasFileName(fileName: string): Promise<boolean>;
	countByFileName(fileName: string): Promise<number>;
	clear(): Promise<void>;
	stats(): Promise<VectorStoreStats>;
}

/**
 * Inclusive date range, ISO `YYYY-MM-DD` bounds
 */
export interface DateRange {
	start: string;
	end: string;
}
