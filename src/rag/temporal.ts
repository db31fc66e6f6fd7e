/**
 * Temporal Metadata
 *
 * Pulls a coarse date range out of document text and answers date-range
 * queries against chunk metadata. Ranges are whole-document; every chunk of a
 * document carries the same start_date/end_date.
 */

import { ValidationError } from "../errors.js";
import type { CandidateMetadata, DateRange } from "./types.js";

/**
 * `MM.YYYY - MM.YYYY` or `MM.YYYY - Current|Present|Now`, any dash
 */
const MONTH_RANGE_PATTERN =
	/\b(0?[1-9]|1[0-2])\.(\d{4})\s*[-\u2010-\u2015]\s*(?:(0?[1-9]|1[0-2])\.(\d{4})|(current|present|now))\b/gi;

/** Bare years accepted by the fallback */
const YEAR_PATTERN = /\b(19[89]\d|20[0-2]\d)\b/g;

function pad(value: number, width = 2): string {
	return value.toString().padStart(width, "0");
}

function lastDayOfMonth(year: number, month: number): number {
	return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toIsoDay(date: Date): string {
	return date.toISOString().slice(0, 10);
}

/**
 * Extract the document's date range.
 *
 * Month ranges win: start is the first day of the earliest start month, end the
 * last day of the latest end month (today for open ranges). Without any month
 * range the earliest and latest bare years between 1980 and 2029 are used.
 *
 * @param today - Clock for open-ended ranges
 */
export function extractDateRange(text: string, today: Date = new Date()): DateRange | null {
	let start: string | null = null;
	let end: string | null = null;

	for (const match of text.matchAll(MONTH_RANGE_PATTERN)) {
		const [, startMonth, startYear, endMonth, endYear, openEnd] = match;
		const rangeStart = `${startYear}-${pad(Number(startMonth))}-01`;

		let rangeEnd: string;
		if (openEnd !== undefined) {
			rangeEnd = toIsoDay(today);
		} else {
			const year = Number(endYear);
			const month = Number(endMonth);
			rangeEnd = `${pad(year, 4)}-${pad(month)}-${pad(lastDayOfMonth(year, month))}`;
		}

		// ISO days compare correctly as strings
		if (start === null || rangeStart < start) start = rangeStart;
		if (end === null || rangeEnd > end) end = rangeEnd;
	}

	if (start !== null && end !== null) {
		return { start, end };
	}

	const years = [...text.matchAll(YEAR_PATTERN)].map((m) => Number(m[1]));
	if (years.length === 0) {
		return null;
	}

	return {
		start: `${Math.min(...years)}-01-01`,
		end: `${Math.max(...years)}-12-31`,
	};
}

function dayRange(year: number, month: number, day: number, input: string): DateRange {
	if (month < 1 || month > 12 || day < 1 || day > lastDayOfMonth(year, month)) {
		throw new ValidationError(`Not a calendar date: ${input}`, "date");
	}
	const iso = `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
	return { start: iso, end: iso };
}

/**
 * Parse a query date.
 *
 * - `YYYY` covers the whole year
 * - `MM-DD-YYYY` and `YYYY-MM-DD` cover one day
 *
 * @throws {ValidationError} For any other shape or an impossible date
 */
export function parseFlexibleDate(input: string): DateRange {
	const value = input.trim();

	const year = /^(\d{4})$/.exec(value);
	if (year) {
		return { start: `${year[1]}-01-01`, end: `${year[1]}-12-31` };
	}

	const usDate = /^(\d{2})-(\d{2})-(\d{4})$/.exec(value);
	if (usDate) {
		return dayRange(Number(usDate[3]), Number(usDate[1]), Number(usDate[2]), value);
	}

	const isoDate = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
	if (isoDate) {
		return dayRange(Number(isoDate[1]), Number(isoDate[2]), Number(isoDate[3]), value);
	}

	throw new ValidationError(`Unsupported date format "${input}" (expected YYYY, MM-DD-YYYY or YYYY-MM-DD)`, "date");
}

function readDate(metadata: CandidateMetadata, key: string): string | null {
	const value = metadata[key];
	return typeof value === "string" && value.length > 0 ? value : null;
}

/**
 * Whether a chunk's start_date/end_date range overlaps the given range.
 * A chunk with only one bound is treated as a single day; none means no match.
 */
export function overlapsRange(metadata: CandidateMetadata, range: DateRange): boolean {
	const start = readDate(metadata, "start_date") ?? readDate(metadata, "end_date");
	const end = readDate(metadata, "end_date") ?? start;
	if (start === null || end === null) {
		return false;
	}
	return start <= range.end && end >= range.start;
}
