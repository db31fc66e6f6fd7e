/**
 * Tests for RAG chunker
 *
 * Tests chunking:
 * - Text cleaning and token estimation
 * - Sliding-window splitting at sentence and word boundaries
 * - Overlap between consecutive chunks
 * - Provenance and temporal metadata
 * - Edge cases (empty content, oversized chunk size)
 */

import { describe, expect, it } from "vitest";

import {
	cleanText,
	createChunker,
	estimateTokens,
	generateDocumentId,
	SlidingWindowChunker,
} from "../rag/chunker.js";
import { resolveConfig } from "../config.js";

/** Twelve four-letter words: word k sits at 5k..5k+3 */
const WORDS = "aaaa bbbb cccc dddd eeee ffff gggg hhhh iiii jjjj kkkk llll";

describe("rag/chunker.ts", () => {
	// ==========================================================================
	// Helpers
	// ==========================================================================

	describe("cleanText", () => {
		it("should replace non-ASCII and control characters and collapse whitespace", () => {
			expect(cleanText("  a\tb\n\ncéd  ")).toBe("a b c d");
		});
	});

	describe("estimateTokens", () => {
		it("should round up at four characters per token", () => {
			expect(estimateTokens("")).toBe(0);
			expect(estimateTokens("abcd")).toBe(1);
			expect(estimateTokens("abcde")).toBe(2);
		});
	});

	describe("generateDocumentId", () => {
		it("should be stable per source", () => {
			const id = generateDocumentId("/docs/a.txt");

			expect(id).toMatch(/^doc-[0-9a-f]{16}$/);
			expect(generateDocumentId("/docs/a.txt")).toBe(id);
			expect(generateDocumentId("/docs/b.txt")).not.toBe(id);
		});
	});

	// ==========================================================================
	// Splitting
	// ==========================================================================

	describe("SlidingWindowChunker.split", () => {
		it("should keep short text in one piece", () => {
			const chunker = new SlidingWindowChunker({ chunkSize: 10, chunkOverlap: 2, minChunk: 1 });

			expect(chunker.split("short text")).toEqual(["short text"]);
		});

		it("should cut at the last word boundary and overlap by whole words", () => {
			// 40-char window, 8-char overlap, cuts no earlier than 20 chars in
			const chunker = new SlidingWindowChunker({ chunkSize: 10, chunkOverlap: 2, minChunk: 1 });

			expect(chunker.split(WORDS)).toEqual([
				"aaaa bbbb cccc dddd eeee ffff gggg hhhh",
				"hhhh iiii jjjj kkkk llll",
			]);
		});

		it("should prefer cutting after a sentence end", () => {
			const chunker = new SlidingWindowChunker({ chunkSize: 10, chunkOverlap: 0, minChunk: 1 });
			const text = "The cat sat on the mat. A dog ran in the park. Birds sang.";

			expect(chunker.split(text)).toEqual(["The cat sat on the mat.", "A dog ran in the park. Birds sang."]);
		});

		it("should cap chunk size at maxChunk", () => {
			const chunker = new SlidingWindowChunker({ chunkSize: 1000, maxChunk: 800 });
			const text = Array.from({ length: 700 }, () => "word").join(" ");

			const pieces = chunker.split(text);

			// 800 tokens = 3200 chars; the space before char 3200 is at 3199
			expect(pieces[0].length).toBe(3199);
		});

		it("should cover every word of a long text", () => {
			const chunker = new SlidingWindowChunker({ chunkSize: 20, chunkOverlap: 5, minChunk: 5 });
			const words = Array.from({ length: 200 }, (_, i) => `w${i}`);

			const pieces = chunker.split(words.join(" "));
			const seen = new Set(pieces.flatMap((p) => p.split(" ")));

			expect(pieces.length).toBeGreaterThan(1);
			for (const word of words) {
				expect(seen.has(word)).toBe(true);
			}
			for (const piece of pieces) {
				expect(estimateTokens(piece)).toBeLessThanOrEqual(20);
			}
		});
	});

	// ==========================================================================
	// Chunks and metadata
	// ==========================================================================

	describe("SlidingWindowChunker.chunk", () => {
		const now = () => new Date("2024-05-10T00:00:00Z");

		it("should stamp provenance and temporal metadata", () => {
			const chunker = new SlidingWindowChunker({ now });
			const source = "/docs/resumes/jane.txt";

			const chunks = chunker.chunk({
				content: "Jane Doe\n\nCafé owner 03.2015 - 06.2018",
				source,
				category: "resumes",
			});

			expect(chunks).toEqual([
				{
					id: `${generateDocumentId(source)}-chunk-0000`,
					content: "Jane Doe Caf owner 03.2015 - 06.2018",
					tokenCount: 9,
					metadata: {
						category: "resumes",
						file_name: "jane.txt",
						source,
						start_date: "2015-03-01",
						end_date: "2018-06-30",
						chunk_index: 0,
					},
				},
			]);
		});

		it("should give every chunk of a document the same dates and sequential ids", () => {
			const chunker = new SlidingWindowChunker({ chunkSize: 10, chunkOverlap: 2, minChunk: 1, now });
			const source = "/docs/notes/n.md";

			const chunks = chunker.chunk({ content: `${WORDS} 2019`, source, category: "notes" });

			expect(chunks.map((c) => c.id)).toEqual([
				`${generateDocumentId(source)}-chunk-0000`,
				`${generateDocumentId(source)}-chunk-0001`,
			]);
			expect(chunks.map((c) => c.metadata.chunk_index)).toEqual([0, 1]);
			for (const chunk of chunks) {
				expect(chunk.metadata.start_date).toBe("2019-01-01");
				expect(chunk.metadata.end_date).toBe("2019-12-31");
			}
		});

		it("should leave dates null when the text has none", () => {
			const [chunk] = createChunker({ now }).chunk({ content: "No dates.", source: "a.txt", category: "misc" });

			expect(chunk.metadata.start_date).toBeNull();
			expect(chunk.metadata.end_date).toBeNull();
		});

		it("should return no chunks for empty or whitespace-only content", () => {
			const chunker = createChunker();

			expect(chunker.chunk({ content: "", source: "a.txt", category: "misc" })).toEqual([]);
			expect(chunker.chunk({ content: "  \n\t ", source: "a.txt", category: "misc" })).toEqual([]);
		});
	});
});

describe("default chunking bounds", () => {
	const { chunkSize, chunkOverlap, minChunk, maxChunk } = resolveConfig({});
	const chunker = createChunker({ chunkSize, chunkOverlap, minChunk, maxChunk });

	const content = Array.from(
		{ length: 200 },
		(_, i) => `Section ${i} explains hybrid retrieval with ranked fusion.`,
	).join(" ");
	const chunks = chunker.chunk({ content, source: "/docs/guide.txt", category: "docs" });

	/** Longest suffix of a that is also a prefix of b */
	const sharedLength = (a: string, b: string): number => {
		for (let k = Math.min(a.length, b.length); k > 0; k--) {
			if (a.endsWith(b.slice(0, k))) {
				return k;
			}
		}
		return 0;
	};

	it("keeps every chunk but the last within the minimum and maximum", () => {
		expect(chunks.length).toBeGreaterThan(3);
		for (const chunk of chunks.slice(0, -1)) {
			expect(chunk.tokenCount).toBeGreaterThanOrEqual(minChunk);
			expect(chunk.tokenCount).toBeLessThanOrEqual(maxChunk);
		}
	});

	it("overlaps adjacent chunks by about the configured overlap", () => {
		for (let i = 1; i < chunks.length; i++) {
			const previous = chunks[i - 1].content;
			const shared = estimateTokens(previous.slice(-sharedLength(previous, chunks[i].content)));
			expect(shared).toBeGreaterThanOrEqual(chunkOverlap - 8);
			expect(shared).toBeLessThanOrEqual(chunkOverlap);
		}
	});
});
