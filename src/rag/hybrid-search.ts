/**
 * Hybrid Search Module
 *
 * Combines dense vector search with BM25 keyword search using Reciprocal Rank
 * Fusion (RRF), then reranks the fused candidates.
 *
 * Strategy:
 * 1. Run the dense and sparse legs concurrently, 2K candidates each, each
 *    under its own deadline
 * 2. Fuse by rank: score(d) = sum over legs of 1 / (k + rank), rank 1-based
 * 3. Keep the top 2K, resolve payloads for sparse-only hits
 * 4. Optionally filter, then rerank down to K
 */

import type { RagConfig } from "../config.js";
import { withTimeout } from "../concurrency.js";
import { type RetrievalLeg, RetrievalLegError } from "../errors.js";
import { retrievalLogger } from "../logger.js";
import type { RetrievalMetrics } from "./metrics.js";
import type { Reranker } from "./reranker.js";
import type { Candidate, RankedCandidate, SparseHit, SparseIndex, VectorStore } from "./types.js";

const logger = retrievalLogger.child({ module: "rag-hybrid-search" });

export type HybridSettings = Pick<
	RagConfig,
	"rrfK" | "topK" | "similarityThreshold" | "legFailurePolicy" | "sparseOnlyResolution" | "legTimeoutMs" | "rerankTimeoutMs"
>;

export interface RetrieveOptions {
	topK?: number;
	similarityThreshold?: number;
	/** Applied to fused candidates before reranking */
	filter?: (candidate: Candidate) => boolean;
}

export interface StageTimings {
	denseMs: number;
	sparseMs: number;
	fusionMs: number;
	rerankMs: number;
	totalMs: number;
}

export interface RetrievalResult {
	results: RankedCandidate[];
	denseCount: number;
	sparseCount: number;
	fusedCount: number;
	timings: StageTimings;
	/** The leg that failed when retrieval continued on one leg, else null */
	degraded: RetrievalLeg | null;
}

export interface FusedScore {
	id: string;
	score: number;
}

/**
 * Reciprocal Rank Fusion over ranked ID lists.
 *
 * Equal scores keep first-seen order (earlier lists, then earlier ranks).
 */
export function reciprocalRankFusion(rankings: ReadonlyArray<readonly string[]>, k = 60): FusedScore[] {
	const scores = new Map<string, number>();
	for (const ranking of rankings) {
		ranking.forEach((id, index) => {
			scores.set(id, (scores.get(id) ?? 0) + 1 / (k + index + 1));
		});
	}
	// Array.prototype.sort is stable, so Map insertion order breaks ties
	return [...scores.entries()].map(([id, score]) => ({ id, score })).sort((a, b) => b.score - a.score);
}

type LegOutcome<T> = { ok: true; value: T; ms: number } | { ok: false; error: RetrievalLegError; ms: number };

export interface HybridSearcherDependencies {
	vectorStore: VectorStore;
	sparseIndex: SparseIndex;
	reranker: Reranker;
	metrics?: RetrievalMetrics;
}

/**
 * Hybrid searcher combining vector and keyword search
 */
export class HybridSearcher {
	private readonly vectorStore: VectorStore;
	private readonly sparseIndex: SparseIndex;
	private readonly reranker: Reranker;
	private readonly metrics?: RetrievalMetrics;

	constructor(
		deps: HybridSearcherDependencies,
		private readonly settings: HybridSettings,
	) {
		this.vectorStore = deps.vectorStore;
		this.sparseIndex = deps.sparseIndex;
		this.reranker = deps.reranker;
		this.metrics = deps.metrics;
	}

	/**
	 * Execute hybrid retrieval.
	 *
	 * @throws {RetrievalLegError} When a leg fails under the "abort" policy, or both legs fail
	 * @throws {TimeoutError} When reranking exceeds its deadline
	 */
	async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
		const startedAt = Date.now();
		const topK = options.topK ?? this.settings.topK;
		const threshold = options.similarityThreshold ?? this.settings.similarityThreshold;

		if (!query.trim() || topK <= 0) {
			return {
				results: [],
				denseCount: 0,
				sparseCount: 0,
				fusedCount: 0,
				timings: { denseMs: 0, sparseMs: 0, fusionMs: 0, rerankMs: 0, totalMs: 0 },
				degraded: null,
			};
		}

		const fetchK = topK * 2;
		const [denseLeg, sparseLeg] = await Promise.all([
			this.runLeg("dense", () => this.vectorStore.similaritySearch(query, fetchK, threshold)),
			this.runLeg("sparse", () => this.sparseIndex.search(query, fetchK)),
		]);

		const degraded = this.resolveLegFailures(denseLeg, sparseLeg);
		const dense: Candidate[] = denseLeg.ok ? denseLeg.value : [];
		const sparse: SparseHit[] = sparseLeg.ok ? sparseLeg.value : [];

		// Fusion
		const fusionStart = Date.now();
		const fused = reciprocalRankFusion(
			[dense.map((c) => c.id), sparse.map((h) => h.id)],
			this.settings.rrfK,
		).slice(0, fetchK);
		const candidates = await this.buildCandidates(fused, dense, sparse);
		const filtered = options.filter ? candidates.filter(options.filter) : candidates;
		const fusionMs = Date.now() - fusionStart;

		// Rerank
		const rerankStart = Date.now();
		const results = await withTimeout(
			() => this.reranker.rerank(query, filtered, topK),
			this.settings.rerankTimeoutMs,
			"rerank",
		);
		const rerankMs = Date.now() - rerankStart;

		const timings: StageTimings = {
			denseMs: denseLeg.ms,
			sparseMs: sparseLeg.ms,
			fusionMs,
			rerankMs,
			totalMs: Date.now() - startedAt,
		};

		logger.info(
			{
				denseCount: dense.length,
				sparseCount: sparse.length,
				fusedCount: fused.length,
				candidates: filtered.length,
				returned: results.length,
				degraded,
				...timings,
			},
			"Hybrid retrieval complete",
		);

		this.metrics?.record({
			query,
			latencyMs: timings.totalMs,
			hybrid: degraded === null,
			averageScore: results.length > 0 ? results.reduce((sum, r) => sum + r.rerankScore, 0) / results.length : 0,
			retrievedIds: results.map((r) => r.id),
		});

		return {
			results,
			denseCount: dense.length,
			sparseCount: sparse.length,
			fusedCount: fused.length,
			timings,
			degraded,
		};
	}

	private async runLeg<T>(leg: RetrievalLeg, operation: () => Promise<T> | T): Promise<LegOutcome<T>> {
		const start = Date.now();
		try {
			const value = await withTimeout(operation, this.settings.legTimeoutMs, `${leg} retrieval`);
			return { ok: true, value, ms: Date.now() - start };
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			return {
				ok: false,
				error: new RetrievalLegError(`${leg} retrieval failed: ${message}`, leg, { cause: error }),
				ms: Date.now() - start,
			};
		}
	}

	/**
	 * Apply the leg failure policy. Returns the failed leg when continuing degraded.
	 */
	private resolveLegFailures(dense: LegOutcome<unknown>, sparse: LegOutcome<unknown>): RetrievalLeg | null {
		if (!dense.ok && !sparse.ok) {
			logger.error({ dense: dense.error.message, sparse: sparse.error.message }, "Both retrieval legs failed");
			throw dense.error;
		}

		const failed = !dense.ok ? dense : !sparse.ok ? sparse : null;
		if (failed === null) {
			return null;
		}

		if (this.settings.legFailurePolicy === "abort") {
			logger.error({ leg: failed.error.leg, error: failed.error.message }, "Retrieval leg failed, aborting");
			throw failed.error;
		}

		logger.warn({ leg: failed.error.leg, error: failed.error.message }, "Retrieval leg failed, continuing degraded");
		return failed.error.leg;
	}

	/**
	 * Turn fused IDs into candidates in fused order. Dense hits carry their own
	 * payload; sparse-only hits are resolved or dropped per `sparseOnlyResolution`.
	 */
	private async buildCandidates(fused: FusedScore[], dense: Candidate[], sparse: SparseHit[]): Promise<Candidate[]> {
		const denseById = new Map(dense.map((c) => [c.id, c]));
		const bm25ById = new Map(sparse.map((h) => [h.id, h.score]));
		const sparseOnly = fused.filter((f) => !denseById.has(f.id)).map((f) => f.id);

		const resolved = new Map<string, Candidate>();
		if (sparseOnly.length > 0) {
			if (this.settings.sparseOnlyResolution === "fetch") {
				for (const candidate of await this.fetchSparseOnly(sparseOnly)) {
					resolved.set(candidate.id, candidate);
				}
				const unresolved = sparseOnly.filter((id) => !resolved.has(id));
				if (unresolved.length > 0) {
					logger.warn({ ids: unresolved }, "Sparse-only candidates without payload dropped");
				}
			} else {
				logger.debug({ dropped: sparseOnly.length }, "Sparse-only candidates dropped");
			}
		}

		const candidates: Candidate[] = [];
		for (const { id, score } of fused) {
			const base = denseById.get(id) ?? resolved.get(id);
			if (base) {
				candidates.push({ ...base, bm25Score: bm25ById.get(id), rrfScore: score });
			}
		}
		return candidates;
	}

	/**
	 * Payloads for sparse-only IDs: the vector store first, then the BM25 stored fields
	 */
	private async fetchSparseOnly(ids: string[]): Promise<Candidate[]> {
		let fromStore: Candidate[] = [];
		try {
			fromStore = await this.vectorStore.getByIds(ids);
		} catch (error) {
			logger.warn({ error: String(error), count: ids.length }, "Payload lookup failed, using BM25 stored fields");
		}

		const found = new Map(fromStore.map((c) => [c.id, c]));
		const result: Candidate[] = [];
		for (const id of ids) {
			const stored = found.get(id);
			if (stored) {
				result.push({ id: stored.id, content: stored.content, metadata: stored.metadata });
				continue;
			}
			const entry = this.sparseIndex.getEntry(id);
			if (entry) {
				result.push({ id: entry.id, content: entry.content, metadata: entry.metadata });
			}
		}
		return result;
	}
}
