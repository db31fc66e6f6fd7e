/**
 * Tests for rag/hybrid-search.ts
 *
 * Fusion arithmetic, sparse-only resolution, leg failure policies, deadlines
 * and metrics. The dense leg is scripted so ranks are exact.
 */

import { beforeEach, describe, expect, it } from "vitest";
import { RetrievalLegError, TimeoutError } from "../errors.js";
import { Bm25Index } from "../rag/bm25.js";
import { HybridSearcher, type HybridSettings, reciprocalRankFusion } from "../rag/hybrid-search.js";
import { RetrievalMetrics } from "../rag/metrics.js";
import type { Reranker } from "../rag/reranker.js";
import type { Candidate, RankedCandidate, SparseIndex } from "../rag/types.js";
import { createMockChunk, InMemoryVectorStore } from "./helpers.js";

const SETTINGS: HybridSettings = {
	rrfK: 60,
	topK: 2,
	similarityThreshold: -1,
	legFailurePolicy: "abort",
	sparseOnlyResolution: "fetch",
	legTimeoutMs: 1000,
	rerankTimeoutMs: 1000,
};

/** Dense leg returns a fixed ranking; payload lookups hit the in-memory entries */
class ScriptedVectorStore extends InMemoryVectorStore {
	ranking: Candidate[] = [];
	readonly searchCalls: Array<[string, number, number]> = [];
	getByIdsError: Error | null = null;

	override async similaritySearch(query: string, topK: number, threshold: number): Promise<Candidate[]> {
		this.searchCalls.push([query, topK, threshold]);
		if (this.searchDelayMs > 0) {
			await new Promise((resolve) => setTimeout(resolve, this.searchDelayMs));
		}
		if (this.searchError) {
			throw this.searchError;
		}
		return this.ranking.slice(0, topK);
	}

	override async getByIds(ids: readonly string[]): Promise<Candidate[]> {
		if (this.getByIdsError) {
			throw this.getByIdsError;
		}
		return super.getByIds(ids);
	}
}

/** Ranks by fused score so results mirror fusion order */
class FusionOrderReranker implements Reranker {
	seen: Candidate[] = [];

	rerank(_query: string, candidates: readonly Candidate[], topK: number): RankedCandidate[] {
		this.seen = [...candidates];
		return candidates.slice(0, topK).map((c) => ({
			...c,
			rerankScore: c.rrfScore ?? 0,
			vectorScore: c.similarity ?? 0,
			keywordScore: 0,
			metadataScore: 0,
		}));
	}
}

const failingSparseIndex = (error: Error): SparseIndex => ({
	indexDocuments: async () => 0,
	search: () => {
		throw error;
	},
	getEntry: () => null,
	clearIndex: async () => undefined,
	stats: () => new Bm25Index().stats(),
});

describe("reciprocalRankFusion", () => {
	it("sums 1 / (k + rank) across rankings", () => {
		const fused = reciprocalRankFusion(
			[
				["a", "b", "c"],
				["c", "a", "d"],
			],
			60,
		);

		expect(fused.map((f) => f.id)).toEqual(["a", "c", "b", "d"]);
		expect(fused[0].score).toBeCloseTo(1 / 61 + 1 / 62, 12);
		expect(fused[1].score).toBeCloseTo(1 / 61 + 1 / 63, 12);
		expect(fused[3].score).toBeCloseTo(1 / 63, 12);
	});

	it("keeps first-seen order for ties", () => {
		expect(reciprocalRankFusion([["x"], ["y"]]).map((f) => f.id)).toEqual(["x", "y"]);
	});

	it("scores mirrored rank positions equally", () => {
		const fused = reciprocalRankFusion([
			["a", "x", "b"],
			["b", "y", "a"],
		]);
		const score = (id: string) => fused.find((f) => f.id === id)?.score;

		expect(score("a")).toBe(score("b"));
		expect(score("a")).toBeCloseTo(1 / 61 + 1 / 63, 12);
	});

	it("ranks a document first in both lists above one first in a single list", () => {
		const fused = reciprocalRankFusion([["both"], ["both"], ["solo"]]);

		expect(fused.map((f) => f.id)).toEqual(["both", "solo"]);
		expect(fused[0].score).toBeGreaterThan(fused[1].score);
	});

	it("uses the given k", () => {
		expect(reciprocalRankFusion([["a"]], 1)).toEqual([{ id: "a", score: 0.5 }]);
	});
});

describe("HybridSearcher", () => {
	let store: ScriptedVectorStore;
	let sparse: Bm25Index;
	let reranker: FusionOrderReranker;
	let metrics: RetrievalMetrics;

	const s1 = createMockChunk("s1", "kafka streaming pipelines", { file_name: "a.txt" });
	const s2 = createMockChunk("s2", "react component design", { file_name: "b.txt" });
	const s3 = createMockChunk("s3", "kafka consumer groups", { file_name: "c.txt" });
	const s6 = createMockChunk("s6", "kafka broker tuning", { file_name: "d.txt" });
	const b5 = createMockChunk("b5", "kafka kafka kafka", { file_name: "e.txt" });

	const searcher = (settings: Partial<HybridSettings> = {}, sparseIndex: SparseIndex = sparse) =>
		new HybridSearcher({ vectorStore: store, sparseIndex, reranker, metrics }, { ...SETTINGS, ...settings });

	beforeEach(async () => {
		store = new ScriptedVectorStore();
		await store.add([s1, s2, s3, createMockChunk("s6", "kafka broker tuning (stored)", { file_name: "d.txt" })]);
		store.ranking = [
			{ id: "s1", content: s1.content, metadata: s1.metadata, similarity: 0.9 },
			{ id: "s3", content: s3.content, metadata: s3.metadata, similarity: 0.8 },
			{ id: "s2", content: s2.content, metadata: s2.metadata, similarity: 0.3 },
		];

		// All documents are three tokens long; "kafka" ranks b5, s1, s3, s6
		sparse = new Bm25Index();
		await sparse.indexDocuments([s1, s2, s3, s6, b5]);

		reranker = new FusionOrderReranker();
		metrics = new RetrievalMetrics();
	});

	describe("retrieve", () => {
		it("fuses both legs, keeps the top 2K and reranks to K", async () => {
			const result = await searcher().retrieve("kafka");

			expect(store.searchCalls).toEqual([["kafka", 4, -1]]);
			expect(result.denseCount).toBe(3);
			expect(result.sparseCount).toBe(4);
			expect(result.fusedCount).toBe(4);
			expect(result.degraded).toBeNull();
			// s6 is fifth after fusion and falls outside 2K
			expect(reranker.seen.map((c) => c.id)).toEqual(["s1", "s3", "b5", "s2"]);
			expect(result.results.map((r) => r.id)).toEqual(["s1", "s3"]);
		});

		it("annotates candidates with BM25 and fused scores", async () => {
			await searcher().retrieve("kafka");
			const byId = new Map(reranker.seen.map((c) => [c.id, c]));

			expect(byId.get("s1")?.rrfScore).toBeCloseTo(1 / 61 + 1 / 62, 12);
			expect(byId.get("s1")?.similarity).toBe(0.9);
			expect(byId.get("s1")?.bm25Score).toBeGreaterThan(0);
			expect(byId.get("b5")?.similarity).toBeUndefined();
			expect(byId.get("b5")?.rrfScore).toBeCloseTo(1 / 61, 12);
			expect(byId.get("s2")?.bm25Score).toBeUndefined();
		});

		it("resolves sparse-only hits from the vector store, then from BM25 stored fields", async () => {
			await searcher({ topK: 3 }).retrieve("kafka");
			const byId = new Map(reranker.seen.map((c) => [c.id, c]));

			expect(reranker.seen.map((c) => c.id)).toEqual(["s1", "s3", "b5", "s2", "s6"]);
			expect(byId.get("s6")?.content).toBe("kafka broker tuning (stored)");
			expect(byId.get("b5")?.content).toBe("kafka kafka kafka");
		});

		it("falls back to BM25 stored fields when the payload lookup fails", async () => {
			store.getByIdsError = new Error("store busy");

			await searcher({ topK: 3 }).retrieve("kafka");

			expect(reranker.seen.find((c) => c.id === "s6")?.content).toBe("kafka broker tuning");
		});

		it("drops sparse-only hits under the drop policy", async () => {
			const result = await searcher({ sparseOnlyResolution: "drop" }).retrieve("kafka");

			expect(reranker.seen.map((c) => c.id)).toEqual(["s1", "s3", "s2"]);
			expect(result.fusedCount).toBe(4);
		});

		it("drops sparse hits that have no payload anywhere", async () => {
			const ghostIndex: SparseIndex = {
				...failingSparseIndex(new Error("unused")),
				search: () => [{ id: "ghost", score: 3 }],
			};

			await searcher({}, ghostIndex).retrieve("kafka");

			expect(reranker.seen.map((c) => c.id)).toEqual(["s1", "s3", "s2"]);
		});

		it("applies the filter before reranking", async () => {
			const result = await searcher().retrieve("kafka", { filter: (c) => c.id !== "s1" });

			expect(result.results.map((r) => r.id)).toEqual(["s3", "b5"]);
		});

		it("honours per-call topK and threshold", async () => {
			const result = await searcher().retrieve("kafka", { topK: 1, similarityThreshold: 0.5 });

			expect(store.searchCalls).toEqual([["kafka", 2, 0.5]]);
			expect(result.results).toHaveLength(1);
		});

		it("returns an empty result for a blank query or non-positive topK", async () => {
			const blank = await searcher().retrieve("   ");
			const none = await searcher().retrieve("kafka", { topK: 0 });

			for (const result of [blank, none]) {
				expect(result).toEqual({
					results: [],
					denseCount: 0,
					sparseCount: 0,
					fusedCount: 0,
					timings: { denseMs: 0, sparseMs: 0, fusionMs: 0, rerankMs: 0, totalMs: 0 },
					degraded: null,
				});
			}
			expect(store.searchCalls).toEqual([]);
		});

		it("records metrics for each retrieval", async () => {
			await searcher().retrieve("kafka");

			const summary = metrics.getSummary();
			expect(summary.totalRetrievals).toBe(1);
			expect(summary.hybridRetrievals).toBe(1);
			expect(summary.topRetrievedDocuments).toEqual([
				{ id: "s1", count: 1 },
				{ id: "s3", count: 1 },
			]);
		});
	});

	describe("leg failures", () => {
		it("aborts on a dense failure by default", async () => {
			store.searchError = new Error("store offline");

			const error = await searcher()
				.retrieve("kafka")
				.catch((e: unknown) => e);

			expect(error).toBeInstanceOf(RetrievalLegError);
			if (error instanceof RetrievalLegError) {
				expect(error.leg).toBe("dense");
				expect(error.message).toBe("dense retrieval failed: store offline");
			}
		});

		it("continues on the sparse leg under the degrade policy", async () => {
			store.searchError = new Error("store offline");

			const result = await searcher({ legFailurePolicy: "degrade" }).retrieve("kafka");

			expect(result.degraded).toBe("dense");
			expect(reranker.seen.map((c) => c.id)).toEqual(["b5", "s1", "s3", "s6"]);
			expect(result.results.map((r) => r.id)).toEqual(["b5", "s1"]);
			expect(metrics.getSummary().degradedRetrievals).toBe(1);
		});

		it("continues on the dense leg when the sparse leg fails", async () => {
			const result = await searcher(
				{ legFailurePolicy: "degrade" },
				failingSparseIndex(new Error("index corrupt")),
			).retrieve("kafka");

			expect(result.degraded).toBe("sparse");
			expect(result.results.map((r) => r.id)).toEqual(["s1", "s3"]);
		});

		it("throws when both legs fail, whatever the policy", async () => {
			store.searchError = new Error("store offline");

			await expect(
				searcher({ legFailurePolicy: "degrade" }, failingSparseIndex(new Error("index corrupt"))).retrieve("kafka"),
			).rejects.toThrow("dense retrieval failed: store offline");
		});

		it("treats a leg that misses its deadline as failed", async () => {
			store.searchDelayMs = 200;

			const result = await searcher({ legFailurePolicy: "degrade", legTimeoutMs: 20 }).retrieve("kafka");

			expect(result.degraded).toBe("dense");
			expect(result.denseCount).toBe(0);
		});
	});

	describe("rerank deadline", () => {
		it("rejects with TimeoutError when reranking is too slow", async () => {
			const slow: Reranker = { rerank: () => new Promise<RankedCandidate[]>(() => {}) };
			const hybrid = new HybridSearcher(
				{ vectorStore: store, sparseIndex: sparse, reranker: slow },
				{ ...SETTINGS, rerankTimeoutMs: 20 },
			);

			await expect(hybrid.retrieve("kafka")).rejects.toThrow(new TimeoutError("rerank exceeded 20ms", "rerank", 20));
		});
	});
});
