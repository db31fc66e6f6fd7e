/**
 * Reranking
 *
 * Second-stage scoring of fused candidates. `WeightedReranker` blends three
 * signals:
 *
 * | Signal   | Weight | Source                                             |
 * |----------|--------|----------------------------------------------------|
 * | vector   | 0.5    | dense similarity (0.5 when the candidate has none) |
 * | keyword  | 0.4    | query term overlap plus phrase matches             |
 * | metadata | 0.1    | presence of source and date fields                 |
 *
 * Any other scorer (a cross-encoder, say) can stand in through `Reranker`.
 */

import type { RerankWeights } from "../config.js";
import type { Candidate, CandidateMetadata, RankedCandidate } from "./types.js";

/**
 * Pluggable reranker
 */
export interface Reranker {
	rerank(query: string, candidates: readonly Candidate[], topK: number): RankedCandidate[] | Promise<RankedCandidate[]>;
}

export const DEFAULT_RERANK_WEIGHTS: RerankWeights = { vector: 0.5, keyword: 0.4, metadata: 0.1 };

/** Dense score assumed for candidates that only the sparse leg found */
const NEUTRAL_VECTOR_SCORE = 0.5;
const PHRASE_BOOST_PER_MATCH = 0.25;

const STOPWORDS = new Set(["the", "a", "an", "and", "or", "in", "on", "what", "was", "for"]);

/**
 * Lowercase, turn everything but [a-z0-9] into spaces, split
 */
function normalizeWords(text: string): string[] {
	return text
		.toLowerCase()
		.replace(/[^a-z0-9]/g, " ")
		.split(" ")
		.filter((w) => w.length > 0);
}

/**
 * Query terms that count for overlap: longer than one character, not a stopword
 */
export function extractQueryTerms(query: string): string[] {
	return [...new Set(normalizeWords(query).filter((w) => w.length > 1 && !STOPWORDS.has(w)))];
}

/**
 * Distinct 2- and 3-word phrases of the query that contain at least one query term
 */
export function extractPhrases(query: string): string[] {
	const words = normalizeWords(query);
	const terms = new Set(extractQueryTerms(query));
	const phrases = new Set<string>();

	for (const size of [2, 3]) {
		for (let i = 0; i + size <= words.length; i++) {
			const gram = words.slice(i, i + size);
			if (gram.some((w) => terms.has(w))) {
				phrases.add(gram.join(" "));
			}
		}
	}

	return [...phrases];
}

/**
 * Keyword score in [0, 1]: `min(1, 0.4 * overlap + 0.6 * min(1, phraseBoost))`
 */
export function keywordScore(query: string, content: string): number {
	const terms = extractQueryTerms(query);
	if (terms.length === 0) {
		return 0;
	}

	const docTerms = new Set(normalizeWords(content));
	const overlap = terms.filter((t) => docTerms.has(t)).length / terms.length;

	const lowered = content.toLowerCase();
	let phraseBoost = 0;
	for (const phrase of extractPhrases(query)) {
		if (lowered.includes(phrase)) {
			phraseBoost += PHRASE_BOOST_PER_MATCH;
		}
	}

	return Math.min(1, 0.4 * overlap + 0.6 * Math.min(1, phraseBoost));
}

function isDateKey(key: string): boolean {
	return key === "date" || key === "timestamp" || key.endsWith("_date");
}

/**
 * Metadata score in [0.5, 1]: +0.1 for a source, +0.2 for any non-null date field
 */
export function metadataScore(metadata: CandidateMetadata): number {
	let score = 0.5;
	if (metadata.source !== undefined && metadata.source !== null) {
		score += 0.1;
	}
	const hasDate = Object.entries(metadata).some(([key, value]) => isDateKey(key) && value !== null && value !== undefined);
	if (hasDate) {
		score += 0.2;
	}
	return Math.min(1, score);
}

/**
 * Weighted linear reranker
 */
export class WeightedReranker implements Reranker {
	private readonly weights: RerankWeights;

	constructor(weights: RerankWeights = DEFAULT_RERANK_WEIGHTS) {
		this.weights = weights;
	}

	rerank(query: string, candidates: readonly Candidate[], topK: number): RankedCandidate[] {
		return candidates
			.map((candidate, index) => {
				const vector = candidate.similarity ?? NEUTRAL_VECTOR_SCORE;
				const keyword = keywordScore(query, candidate.content);
				const meta = metadataScore(candidate.metadata);
				const ranked: RankedCandidate = {
					...candidate,
					vectorScore: vector,
					keywordScore: keyword,
					metadataScore: meta,
					rerankScore: this.weights.vector * vector + this.weights.keyword * keyword + this.weights.metadata * meta,
				};
				return { ranked, index };
			})
			.sort((a, b) => b.ranked.rerankScore - a.ranked.rerankScore || a.index - b.index)
			.slice(0, Math.max(0, topK))
			.map(({ ranked }) => ranked);
	}
}
