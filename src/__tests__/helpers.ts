/**
 * Test Helpers
 *
 * Deterministic in-process stand-ins for the embedding provider and the vector
 * store, plus chunk factories.
 */

import type { Embedder } from "../rag/embedder.js";
import type { Candidate, Chunk, ChunkMetadata, VectorStore, VectorStoreStats } from "../rag/types.js";

/**
 * Create a mock Chunk with sensible defaults
 */
export const createMockChunk = (
	id: string,
	content: string,
	metadata: Partial<ChunkMetadata> = {},
	tokenCount = Math.ceil(content.length / 4),
): Chunk => ({
	id,
	content,
	tokenCount,
	metadata: {
		category: "general",
		file_name: "test.txt",
		source: "/docs/general/test.txt",
		start_date: null,
		end_date: null,
		chunk_index: 0,
		...metadata,
	},
});

function fnv1a(text: string): number {
	let hash = 0x811c9dc5;
	for (let i = 0; i < text.length; i++) {
		hash ^= text.charCodeAt(i);
		hash = Math.imul(hash, 0x01000193) >>> 0;
	}
	return hash;
}

/**
 * Hashed bag-of-words embedder. Texts sharing words get similar vectors; the
 * same text always gets the same vector.
 */
export class FakeEmbedder implements Embedder {
	readonly modelId = "fake-hash";
	readonly batchSizes: number[] = [];
	/** Thrown, in order, by the next embedBatch calls */
	readonly failures: unknown[] = [];

	constructor(readonly dimensions = 64) {}

	vector(text: string): number[] {
		const vector = new Array<number>(this.dimensions).fill(0);
		for (const word of text.toLowerCase().split(/[^a-z0-9]+/)) {
			if (word) {
				vector[fnv1a(word) % this.dimensions] += 1;
			}
		}
		const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
		return norm > 0 ? vector.map((x) => x / norm) : vector;
	}

	async embed(text: string): Promise<number[]> {
		const [vector] = await this.embedBatch([text]);
		return vector;
	}

	async embedBatch(texts: readonly string[]): Promise<number[][]> {
		this.batchSizes.push(texts.length);
		if (this.failures.length > 0) {
			throw this.failures.shift();
		}
		return texts.map((t) => this.vector(t));
	}
}

function cosine(a: readonly number[], b: readonly number[]): number {
	let dot = 0;
	let na = 0;
	let nb = 0;
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i];
		na += a[i] * a[i];
		nb += b[i] * b[i];
	}
	return na > 0 && nb > 0 ? dot / Math.sqrt(na * nb) : 0;
}

/**
 * VectorStore kept in a Map, with hooks for failure injection
 */
export class InMemoryVectorStore implements VectorStore {
	readonly entries = new Map<string, { chunk: Chunk; vector: number[] }>();
	/** Thrown, in order, by the next add() calls */
	readonly addFailures: unknown[] = [];
	/** When set, similaritySearch rejects with it */
	searchError: Error | null = null;
	/** When set, similaritySearch waits this long first */
	searchDelayMs = 0;
	addCalls = 0;

	constructor(private readonly embedder: Embedder = new FakeEmbedder()) {}

	async add(chunks: readonly Chunk[], signal?: AbortSignal): Promise<void> {
		this.addCalls++;
		if (this.addFailures.length > 0) {
			throw this.addFailures.shift();
		}
		const vectors = await this.embedder.embedBatch(
			chunks.map((c) => c.content),
			signal,
		);
		chunks.forEach((chunk, i) => {
			this.entries.delete(chunk.id);
			this.entries.set(chunk.id, { chunk, vector: vectors[i] });
		});
	}

	async similaritySearch(query: string, topK: number, threshold: number): Promise<Candidate[]> {
		if (this.searchDelayMs > 0) {
			await new Promise((resolve) => setTimeout(resolve, this.searchDelayMs));
		}
		if (this.searchError) {
			throw this.searchError;
		}
		const queryVector = await this.embedder.embed(query);
		return [...this.entries.values()]
			.map(({ chunk, vector }) => ({ chunk, similarity: cosine(queryVector, vector) }))
			.filter((e) => e.similarity >= threshold)
			.sort((a, b) => b.similarity - a.similarity)
			.slice(0, topK)
			.map(({ chunk, similarity }) => ({
				id: chunk.id,
				content: chunk.content,
				metadata: { ...chunk.metadata },
				similarity,
			}));
	}

	async getByIds(ids: readonly string[]): Promise<Candidate[]> {
		const result: Candidate[] = [];
		for (const id of ids) {
			const entry = this.entries.get(id);
			if (entry) {
				result.push({ id, content: entry.chunk.content, metadata: { ...entry.chunk.metadata } });
			}
		}
		return result;
	}

	async listChunks(): Promise<Candidate[]> {
		return this.getByIds([...this.entries.keys()]);
	}

	async hasFileName(fileName: string): Promise<boolean> {
		return (await this.countByFileName(fileName)) > 0;
	}

	async countByFileName(fileName: string): Promise<number> {
		return [...this.entries.values()].filter((e) => e.chunk.metadata.file_name === fileName).length;
	}

	async clear(): Promise<void> {
		this.entries.clear();
	}

	async stats(): Promise<VectorStoreStats> {
		const chunks = [...this.entries.values()].map((e) => e.chunk);
		const categories = new Map<string, number>();
		for (const chunk of chunks) {
			categories.set(chunk.metadata.category, (categories.get(chunk.metadata.category) ?? 0) + 1);
		}
		return {
			chunkCount: chunks.length,
			fileCount: new Set(chunks.map((c) => c.metadata.file_name)).size,
			embeddingDimensions: this.embedder.dimensions,
			categories: [...categories.entries()].map(([category, chunkCount]) => ({ category, chunkCount })),
		};
	}
}

/**
 * Sleep stand-in that records requested delays and resolves immediately
 */
export const createRecordingSleep = () => {
	const delays: number[] = [];
	const fn = async (ms: number): Promise<void> => {
		delays.push(ms);
	};
	return { delays, fn };
};
