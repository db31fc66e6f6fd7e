/**
 * Chunker Module
 *
 * Splits a document into overlapping, token-bounded chunks and stamps each one
 * with provenance and temporal metadata.
 *
 * Token counts are estimated at ~4 characters per token.
 */

import { createHash } from "node:crypto";
import { basename } from "node:path";
import { extractDateRange } from "./temporal.js";
import type { Chunk } from "./types.js";

export const CHARS_PER_TOKEN = 4;

/**
 * A document as handed to the chunker
 */
export interface SourceDocument {
	content: string;
	/** Source identifier, usually a file path */
	source: string;
	category: string;
}

/**
 * Chunker interface for splitting documents into chunks
 */
export interface Chunker {
	chunk(document: SourceDocument): Chunk[];
}

/**
 * Options for chunking, in estimated tokens
 */
export interface ChunkingOptions {
	chunkSize?: number; // default 512
	chunkOverlap?: number; // default 128
	minChunk?: number; // default 100
	maxChunk?: number; // default 800
	/** Clock for open-ended date ranges */
	now?: () => Date;
}

/**
 * Estimate token count from text
 */
export function estimateTokens(text: string): number {
	return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Replace non-ASCII and control characters with spaces, collapse whitespace and trim
 */
export function cleanText(text: string): string {
	return text
		.replace(/[^\x20-\x7e]/g, " ")
		.replace(/\s+/g, " ")
		.trim();
}

/**
 * Stable document ID derived from the source identifier
 */
export function generateDocumentId(source: string): string {
	return `doc-${createHash("sha256").update(source).digest("hex").substring(0, 16)}`;
}

/**
 * Generate a chunk ID
 */
function generateChunkId(documentId: string, sequence: number): string {
	return `${documentId}-chunk-${sequence.toString().padStart(4, "0")}`;
}

/**
 * Sliding-window chunker
 *
 * Strategy:
 * 1. Clean the text
 * 2. While more than `chunkSize` tokens remain, cut at the last sentence end
 *    (or failing that the last space) between the minimum cut and `chunkSize`
 * 3. Start the next chunk `chunkOverlap` tokens before the cut, at a word start
 * 4. The remainder becomes the last chunk
 */
export class SlidingWindowChunker implements Chunker {
	private readonly targetChars: number;
	private readonly overlapChars: number;
	private readonly minCutChars: number;
	private readonly now: () => Date;

	constructor(options: ChunkingOptions = {}) {
		const chunkSize = Math.min(options.chunkSize ?? 512, options.maxChunk ?? 800);
		const overlap = Math.min(options.chunkOverlap ?? 128, chunkSize - 1);
		const minChunk = Math.min(options.minChunk ?? 100, chunkSize);

		this.targetChars = chunkSize * CHARS_PER_TOKEN;
		this.overlapChars = Math.max(0, overlap) * CHARS_PER_TOKEN;
		// A cut must leave room for the overlap plus one token of progress
		this.minCutChars = Math.max(
			minChunk * CHARS_PER_TOKEN,
			Math.floor(this.targetChars / 2),
			this.overlapChars + CHARS_PER_TOKEN,
		);
		this.now = options.now ?? (() => new Date());
	}

	chunk(document: SourceDocument): Chunk[] {
		// Dates first: cleaning would flatten the dashes
		const range = extractDateRange(document.content, this.now());
		const text = cleanText(document.content);
		if (!text) {
			return [];
		}

		const documentId = generateDocumentId(document.source);
		const fileName = basename(document.source);

		return this.split(text).map((content, index) => ({
			id: generateChunkId(documentId, index),
			content,
			tokenCount: estimateTokens(content),
			metadata: {
				category: document.category,
				file_name: fileName,
				source: document.source,
				start_date: range?.start ?? null,
				end_date: range?.end ?? null,
				chunk_index: index,
			},
		}));
	}

	/**
	 * Split cleaned text into window contents
	 */
	split(text: string): string[] {
		const pieces: string[] = [];
		let start = 0;

		while (text.length - start > this.targetChars) {
			const end = this.findCut(text, start);
			pieces.push(text.slice(start, end).trim());
			start = this.nextStart(text, start, end);
		}

		const rest = text.slice(start).trim();
		if (rest) {
			pieces.push(rest);
		}

		return pieces;
	}

	private findCut(text: string, start: number): number {
		const hi = start + this.targetChars;
		const lo = start + this.minCutChars;
		if (lo >= hi) {
			return hi;
		}

		// Sentence end: cut right after the punctuation
		for (let i = hi - 1; i >= lo - 1; i--) {
			const ch = text[i];
			if ((ch === "." || ch === "!" || ch === "?") && text[i + 1] === " ") {
				return i + 1;
			}
		}

		for (let i = hi; i >= lo; i--) {
			if (text[i] === " ") {
				return i;
			}
		}

		return hi;
	}

	private nextStart(text: string, start: number, end: number): number {
		let next = Math.max(start + 1, end - this.overlapChars);
		if (next > 0 && text[next - 1] !== " ") {
			const space = text.indexOf(" ", next);
			if (space !== -1 && space + 1 < end) {
				next = space + 1;
			}
		}
		return next;
	}
}

/**
 * Create default chunker instance
 */
export function createChunker(options?: ChunkingOptions): Chunker {
	return new SlidingWindowChunker(options);
}
