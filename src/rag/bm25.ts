/**
 * BM25 Sparse Index
 *
 * In-memory keyword index with near-real-time reads.
 *
 * Each `indexDocuments()` call commits one immutable segment. Searches run
 * against a frozen snapshot (segment list + collection statistics) that is
 * swapped in after every commit, so readers never block on the writer and
 * always see a consistent view. Writers are serialised through a mutex.
 *
 * Scoring:
 * ```
 * idf(t) = ln(1 + (N - n(t) + 0.5) / (n(t) + 0.5))
 * tf'(t) = tf * (k1 + 1) / (tf + k1 * (1 - b + b * dl / avgdl))
 * score  = sum over distinct query terms of idf(t) * tf'(t)
 * ```
 */

import { Mutex } from "../concurrency.js";
import { IndexWriteError, QueryParseError } from "../errors.js";
import { storageLogger } from "../logger.js";
import type { CandidateMetadata, SparseEntry, SparseHit, SparseIndex, SparseIndexStats } from "./types.js";

const logger = storageLogger.child({ module: "rag-bm25" });

export const DEFAULT_K1 = 1.2;
export const DEFAULT_B = 0.75;

export interface Bm25Options {
	k1?: number;
	b?: number;
}

/**
 * Lowercase and split on anything that is not a letter or digit
 */
export function tokenize(text: string): string[] {
	return text
		.toLowerCase()
		.split(/[^\p{L}\p{N}]+/u)
		.filter((token) => token.length > 0);
}

interface IndexedDocument {
	/** Global insertion order, used to break score ties */
	readonly ordinal: number;
	readonly id: string;
	readonly length: number;
	readonly termFrequencies: ReadonlyMap<string, number>;
	readonly content: string;
	readonly metadata: CandidateMetadata;
}

interface Segment {
	readonly documents: readonly IndexedDocument[];
	/** term -> positions in `documents` */
	readonly postings: ReadonlyMap<string, readonly number[]>;
}

interface Snapshot {
	readonly segments: readonly Segment[];
	readonly totalDocuments: number;
	readonly totalLength: number;
	readonly byId: ReadonlyMap<string, IndexedDocument>;
}

const EMPTY_SNAPSHOT: Snapshot = Object.freeze({
	segments: [],
	totalDocuments: 0,
	totalLength: 0,
	byId: new Map<string, IndexedDocument>(),
});

function buildSegment(documents: IndexedDocument[]): Segment {
	const postings = new Map<string, number[]>();
	documents.forEach((doc, position) => {
		for (const term of doc.termFrequencies.keys()) {
			const list = postings.get(term);
			if (list) {
				list.push(position);
			} else {
				postings.set(term, [position]);
			}
		}
	});
	return Object.freeze({ documents: Object.freeze(documents), postings });
}

/**
 * BM25 index over chunk content
 */
export class Bm25Index implements SparseIndex {
	readonly k1: number;
	readonly b: number;
	private readonly writeLock = new Mutex();
	private snapshot: Snapshot = EMPTY_SNAPSHOT;
	private nextOrdinal = 0;

	constructor(options: Bm25Options = {}) {
		this.k1 = options.k1 ?? DEFAULT_K1;
		this.b = options.b ?? DEFAULT_B;
	}

	/**
	 * Add chunks to the index as one committed segment.
	 * IDs already present (or repeated within the batch) are skipped.
	 *
	 * @returns Number of chunks actually added
	 * @throws {IndexWriteError} If the segment cannot be built
	 */
	indexDocuments(chunks: readonly SparseEntry[]): Promise<number> {
		return this.writeLock.runExclusive(() => {
			const current = this.snapshot;
			const seen = new Set<string>();
			const documents: IndexedDocument[] = [];
			let addedLength = 0;

			try {
				for (const chunk of chunks) {
					if (current.byId.has(chunk.id) || seen.has(chunk.id)) {
						continue;
					}
					seen.add(chunk.id);

					const tokens = tokenize(chunk.content);
					const termFrequencies = new Map<string, number>();
					for (const token of tokens) {
						termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
					}

					documents.push(
						Object.freeze({
							ordinal: this.nextOrdinal + documents.length,
							id: chunk.id,
							length: tokens.length,
							termFrequencies,
							content: chunk.content,
							metadata: Object.freeze({ ...chunk.metadata }),
						}),
					);
					addedLength += tokens.length;
				}
			} catch (error) {
				throw new IndexWriteError(`Failed to build BM25 segment: ${String(error)}`, chunks.length, {
					cause: error,
				});
			}

			if (documents.length === 0) {
				logger.debug({ requested: chunks.length }, "No new documents to index");
				return 0;
			}

			const byId = new Map(current.byId);
			for (const doc of documents) {
				byId.set(doc.id, doc);
			}

			// Commit: publish the new snapshot in one assignment
			this.nextOrdinal += documents.length;
			this.snapshot = Object.freeze({
				segments: Object.freeze([...current.segments, buildSegment(documents)]),
				totalDocuments: current.totalDocuments + documents.length,
				totalLength: current.totalLength + addedLength,
				byId,
			});

			logger.debug(
				{
					added: documents.length,
					skipped: chunks.length - documents.length,
					totalDocuments: this.snapshot.totalDocuments,
					segments: this.snapshot.segments.length,
				},
				"BM25 segment committed",
			);

			return documents.length;
		});
	}

	/**
	 * Rank indexed chunks for a keyword query.
	 * A query with no indexable terms yields no results.
	 */
	search(query: string, topK: number): SparseHit[] {
		const snapshot = this.snapshot;

		let terms: string[];
		try {
			terms = this.parseQuery(query);
		} catch (error) {
			if (error instanceof QueryParseError) {
				logger.debug({ query: error.query }, error.message);
				return [];
			}
			throw error;
		}

		if (snapshot.totalDocuments === 0 || topK <= 0) {
			return [];
		}

		const n = snapshot.totalDocuments;
		const avgLength = snapshot.totalLength / n || 1;
		const idf = new Map<string, number>();
		for (const term of terms) {
			let df = 0;
			for (const segment of snapshot.segments) {
				df += segment.postings.get(term)?.length ?? 0;
			}
			if (df > 0) {
				idf.set(term, Math.log(1 + (n - df + 0.5) / (df + 0.5)));
			}
		}

		const scores = new Map<IndexedDocument, number>();
		for (const [term, termIdf] of idf) {
			for (const segment of snapshot.segments) {
				for (const position of segment.postings.get(term) ?? []) {
					const doc = segment.documents[position];
					const tf = doc.termFrequencies.get(term) ?? 0;
					const norm = tf + this.k1 * (1 - this.b + (this.b * doc.length) / avgLength);
					scores.set(doc, (scores.get(doc) ?? 0) + (termIdf * tf * (this.k1 + 1)) / norm);
				}
			}
		}

		return [...scores.entries()]
			.sort(([docA, a], [docB, b]) => b - a || docA.ordinal - docB.ordinal)
			.slice(0, topK)
			.map(([doc, score]) => ({ id: doc.id, score }));
	}

	/**
	 * Stored content and metadata of an indexed chunk
	 */
	getEntry(id: string): SparseEntry | null {
		const doc = this.snapshot.byId.get(id);
		return doc ? { id: doc.id, content: doc.content, metadata: doc.metadata } : null;
	}

	has(id: string): boolean {
		return this.snapshot.byId.has(id);
	}

	/**
	 * Drop every segment and forget all indexed IDs
	 */
	clearIndex(): Promise<void> {
		return this.writeLock.runExclusive(() => {
			this.snapshot = EMPTY_SNAPSHOT;
			this.nextOrdinal = 0;
			logger.info("BM25 index cleared");
		});
	}

	stats(): SparseIndexStats {
		const snapshot = this.snapshot;
		const terms = new Set<string>();
		for (const segment of snapshot.segments) {
			for (const term of segment.postings.keys()) {
				terms.add(term);
			}
		}
		return {
			totalDocuments: snapshot.totalDocuments,
			totalSegments: snapshot.segments.length,
			totalTerms: terms.size,
			averageDocumentLength: snapshot.totalDocuments > 0 ? snapshot.totalLength / snapshot.totalDocuments : 0,
			k1: this.k1,
			b: this.b,
		};
	}

	private parseQuery(query: string): string[] {
		const terms = [...new Set(tokenize(query))];
		if (terms.length === 0) {
			throw new QueryParseError("Query has no searchable terms", query);
		}
		return terms;
	}
}
