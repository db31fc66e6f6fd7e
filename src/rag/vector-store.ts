/**
 * Vector Store
 *
 * SQLite storage for chunks and their embeddings using:
 * - sqlite-vec (vec0) for KNN search
 * - better-sqlite3 as the base driver
 *
 * Vectors are L2-normalised before storage, so the L2 distance returned by
 * vec0 maps onto cosine similarity: cos = 1 - d^2 / 2.
 */

import { existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import Database from "better-sqlite3";
import { load as loadSqliteVec } from "sqlite-vec";
import { EmbeddingError } from "../errors.js";
import { storageLogger } from "../logger.js";
import type { Embedder } from "./embedder.js";
import type { Candidate, Chunk, VectorStore, VectorStoreStats } from "./types.js";

const logger = storageLogger.child({ module: "rag-vector-store" });

const RAG_DB_FILENAME = "rag.db";

interface ChunkRow {
	id: string;
	content: string;
	metadata: string;
}

export interface SqliteVectorStoreOptions {
	stateDir: string;
	embedder: Embedder;
	/** Defaults to rag.db */
	fileName?: string;
}

/**
 * Scale a vector to unit length. Zero vectors are returned unchanged.
 */
export function normalizeVector(vector: readonly number[]): number[] {
	const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
	return norm > 0 ? vector.map((x) => x / norm) : [...vector];
}

/**
 * Cosine similarity of two unit vectors from their L2 distance
 */
export function distanceToSimilarity(distance: number): number {
	return 1 - (distance * distance) / 2;
}

function rowToCandidate(row: ChunkRow): Candidate {
	return {
		id: row.id,
		content: row.content,
		metadata: JSON.parse(row.metadata) as Record<string, unknown>,
	};
}

/**
 * VectorStore backed by SQLite + sqlite-vec
 */
export class SqliteVectorStore implements VectorStore {
	readonly dbPath: string;
	private readonly db: Database.Database;
	private readonly embedder: Embedder;

	constructor(options: SqliteVectorStoreOptions) {
		const { stateDir, embedder } = options;
		this.embedder = embedder;
		this.dbPath = join(stateDir, options.fileName ?? RAG_DB_FILENAME);

		if (!existsSync(stateDir)) {
			mkdirSync(stateDir, { recursive: true });
		}

		this.db = new Database(this.dbPath);
		this.db.pragma("journal_mode = WAL");
		this.db.pragma("busy_timeout = 5000");
		this.db.pragma("synchronous = NORMAL");

		loadSqliteVec(this.db);
		this.initializeSchema();

		logger.info({ path: this.dbPath, dimensions: embedder.dimensions }, "Vector store initialized");
	}

	private initializeSchema(): void {
		this.db.exec(`
			CREATE TABLE IF NOT EXISTS rag_chunks (
				id TEXT PRIMARY KEY,
				content TEXT NOT NULL,
				token_count INTEGER NOT NULL,
				file_name TEXT NOT NULL,
				category TEXT NOT NULL,
				metadata TEXT NOT NULL DEFAULT '{}',
				created_at TEXT DEFAULT CURRENT_TIMESTAMP
			);

			CREATE INDEX IF NOT EXISTS idx_rag_chunks_file_name ON rag_chunks(file_name);

			CREATE VIRTUAL TABLE IF NOT EXISTS rag_embeddings USING vec0(
				chunk_id TEXT PRIMARY KEY,
				embedding FLOAT[${this.embedder.dimensions}]
			);
		`);
	}

	/**
	 * Embed and upsert chunks. Embedding happens before the transaction, so a
	 * provider failure leaves the store untouched.
	 */
	async add(chunks: readonly Chunk[], signal?: AbortSignal): Promise<void> {
		if (chunks.length === 0) {
			return;
		}

		const embeddings = await this.embedder.embedBatch(
			chunks.map((c) => c.content),
			signal,
		);
		if (embeddings.length !== chunks.length) {
			throw new EmbeddingError(`Expected ${chunks.length} embeddings, got ${embeddings.length}`, this.embedder.modelId);
		}

		const deleteChunk = this.db.prepare("DELETE FROM rag_chunks WHERE id = ?");
		const deleteEmbedding = this.db.prepare("DELETE FROM rag_embeddings WHERE chunk_id = ?");
		const insertChunk = this.db.prepare(`
			INSERT INTO rag_chunks (id, content, token_count, file_name, category, metadata, created_at)
			VALUES (?, ?, ?, ?, ?, ?, ?)
		`);
		const insertEmbedding = this.db.prepare("INSERT INTO rag_embeddings (chunk_id, embedding) VALUES (?, ?)");

		const upsert = this.db.transaction(() => {
			const createdAt = new Date().toISOString();
			chunks.forEach((chunk, i) => {
				deleteChunk.run(chunk.id);
				deleteEmbedding.run(chunk.id);
				insertChunk.run(
					chunk.id,
					chunk.content,
					chunk.tokenCount,
					chunk.metadata.file_name,
					chunk.metadata.category,
					JSON.stringify(chunk.metadata),
					createdAt,
				);
				// sqlite-vec takes vectors as JSON text
				insertEmbedding.run(chunk.id, JSON.stringify(normalizeVector(embeddings[i])));
			});
		});
		upsert();

		logger.debug({ count: chunks.length }, "Chunks stored");
	}

	async similaritySearch(query: string, topK: number, threshold: number): Promise<Candidate[]> {
		if (topK <= 0) {
			return [];
		}

		const queryEmbedding = normalizeVector(await this.embedder.embed(query));

		const rows = this.db
			.prepare(
				`
			SELECT chunk_id, distance
			FROM rag_embeddings
			WHERE embedding MATCH ?
			ORDER BY distance
			LIMIT ?
		`,
			)
			.all(JSON.stringify(queryEmbedding), topK) as Array<{ chunk_id: string; distance: number }>;

		const similarities = new Map<string, number>();
		for (const row of rows) {
			const similarity = distanceToSimilarity(row.distance);
			if (similarity >= threshold) {
				similarities.set(row.chunk_id, similarity);
			}
		}

		const payloads = await this.getByIds([...similarities.keys()]);
		return payloads.map((candidate) => ({ ...candidate, similarity: similarities.get(candidate.id) }));
	}

	/**
	 * Payloads in the order the IDs were given
	 */
	async getByIds(ids: readonly string[]): Promise<Candidate[]> {
		if (ids.length === 0) {
			return [];
		}

		const placeholders = ids.map(() => "?").join(", ");
		const rows = this.db
			.prepare(`SELECT id, content, metadata FROM rag_chunks WHERE id IN (${placeholders})`)
			.all(...ids) as ChunkRow[];

		const byId = new Map(rows.map((row) => [row.id, row]));
		const result: Candidate[] = [];
		for (const id of ids) {
			const row = byId.get(id);
			if (row) {
				result.push(rowToCandidate(row));
			}
		}
		return result;
	}

	async listChunks(): Promise<Candidate[]> {
		const rows = this.db.prepare("SELECT id, content, metadata FROM rag_chunks ORDER BY rowid").all() as ChunkRow[];
		return rows.map(rowToCandidate);
	}

	async hasFileName(fileName: string): Promise<boolean> {
		const row = this.db.prepare("SELECT 1 FROM rag_chunks WHERE file_name = ? LIMIT 1").get(fileName);
		return row !== undefined;
	}

	async countByFileName(fileName: string): Promise<number> {
		const row = this.db.prepare("SELECT COUNT(*) as count FROM rag_chunks WHERE file_name = ?").get(fileName) as {
			count: number;
		};
		return row.count;
	}

	async clear(): Promise<void> {
		this.db.exec(`
			DELETE FROM rag_embeddings;
			DELETE FROM rag_chunks;
		`);
		logger.info("Vector store cleared");
	}

	async stats(): Promise<VectorStoreStats> {
		const chunkCount = (this.db.prepare("SELECT COUNT(*) as count FROM rag_chunks").get() as { count: number }).count;
		const fileCount = (
			this.db.prepare("SELECT COUNT(DISTINCT file_name) as count FROM rag_chunks").get() as { count: number }
		).count;

		const categories = this.db
			.prepare(
				`
			SELECT category, COUNT(*) as chunk_count
			FROM rag_chunks
			GROUP BY category
			ORDER BY category
		`,
			)
			.all() as Array<{ category: string; chunk_count: number }>;

		return {
			chunkCount,
			fileCount,
			embeddingDimensions: this.embedder.dimensions,
			categories: categories.map((c) => ({ category: c.category, chunkCount: c.chunk_count })),
		};
	}

	/**
	 * Close the database connection
	 */
	close(): void {
		if (this.db.open) {
			this.db.close();
			logger.debug("Vector store connection closed");
		}
	}
}
