/**
 * Retrieval Metrics
 *
 * In-process counters for retrieval latency, result sizes, score quality and
 * which chunks get retrieved most. Instance-owned; the engine keeps one.
 */

import { retrievalLogger } from "../logger.js";

const logger = retrievalLogger.child({ module: "rag-metrics" });

/** Retrievals slower than this are logged as slow */
export const SLOW_RETRIEVAL_MS = 500;

/** Average scores below this are logged as low quality */
export const LOW_SCORE_THRESHOLD = 0.5;

export interface RetrievalRecord {
	query: string;
	latencyMs: number;
	/** False when one leg failed and retrieval ran degraded */
	hybrid: boolean;
	/** Mean final score of the returned results; 0 when there were none */
	averageScore: number;
	retrievedIds: readonly string[];
}

export interface MetricsSummary {
	totalRetrievals: number;
	totalDocumentsRetrieved: number;
	hybridRetrievals: number;
	degradedRetrievals: number;
	averageLatencyMs: number;
	maxLatencyMs: number;
	minLatencyMs: number;
	averageDocsPerQuery: number;
	averageScore: number;
	topRetrievedDocuments: Array<{ id: string; count: number }>;
}

export class RetrievalMetrics {
	private totalRetrievals = 0;
	private totalDocumentsRetrieved = 0;
	private hybridRetrievals = 0;
	private degradedRetrievals = 0;
	private totalLatencyMs = 0;
	private maxLatencyMs = 0;
	private minLatencyMs = Number.POSITIVE_INFINITY;
	private readonly queryScores = new Map<string, number>();
	private readonly retrievalCounts = new Map<string, number>();

	record(data: RetrievalRecord): void {
		this.totalRetrievals++;
		this.totalDocumentsRetrieved += data.retrievedIds.length;
		if (data.hybrid) {
			this.hybridRetrievals++;
		} else {
			this.degradedRetrievals++;
		}

		this.totalLatencyMs += data.latencyMs;
		this.maxLatencyMs = Math.max(this.maxLatencyMs, data.latencyMs);
		this.minLatencyMs = Math.min(this.minLatencyMs, data.latencyMs);

		if (data.averageScore > 0) {
			this.queryScores.set(data.query, data.averageScore);
		}

		for (const id of data.retrievedIds) {
			this.retrievalCounts.set(id, (this.retrievalCounts.get(id) ?? 0) + 1);
		}

		if (data.latencyMs > SLOW_RETRIEVAL_MS) {
			logger.warn({ latencyMs: data.latencyMs, query: data.query }, "Slow retrieval detected");
		}
		if (data.averageScore > 0 && data.averageScore < LOW_SCORE_THRESHOLD) {
			logger.warn({ averageScore: data.averageScore, query: data.query }, "Low retrieval scores");
		}
	}

	getSummary(topN = 5): MetricsSummary {
		const n = this.totalRetrievals;
		const scores = [...this.queryScores.values()];

		return {
			totalRetrievals: n,
			totalDocumentsRetrieved: this.totalDocumentsRetrieved,
			hybridRetrievals: this.hybridRetrievals,
			degradedRetrievals: this.degradedRetrievals,
			averageLatencyMs: n > 0 ? this.totalLatencyMs / n : 0,
			maxLatencyMs: this.maxLatencyMs,
			minLatencyMs: n > 0 ? this.minLatencyMs : 0,
			averageDocsPerQuery: n > 0 ? this.totalDocumentsRetrieved / n : 0,
			averageScore: scores.length > 0 ? scores.reduce((a, b) => a + b, 0) / scores.length : 0,
			topRetrievedDocuments: [...this.retrievalCounts.entries()]
				.sort((a, b) => b[1] - a[1])
				.slice(0, topN)
				.map(([id, count]) => ({ id, count })),
		};
	}

	reset(): void {
		this.totalRetrievals = 0;
		this.totalDocumentsRetrieved = 0;
		this.hybridRetrievals = 0;
		this.degradedRetrievals = 0;
		this.totalLatencyMs = 0;
		this.maxLatencyMs = 0;
		this.minLatencyMs = Number.POSITIVE_INFINITY;
		this.queryScores.clear();
		this.retrievalCounts.clear();
		logger.info("Retrieval metrics reset");
	}

	logSummary(): void {
		const summary = this.getSummary();
		logger.info(
			{
				...summary,
				hybridPercent: summary.totalRetrievals > 0 ? (summary.hybridRetrievals * 100) / summary.totalRetrievals : 0,
			},
			"Retrieval metrics summary",
		);
	}
}
