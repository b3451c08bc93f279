/**
 * Offset-based page collection for scrolling endpoints (search, feed updates).
 */

import { LinkedInError } from "./errors.js";

/**
 * Upper bound on page fetches for one collection.
 * Protects against an upstream that never returns an empty page.
 */
export const MAX_REPEATED_REQUESTS = 200;

export interface CollectPagesOptions<P, T> {
	/** Fetch the page starting at `start` */
	fetchPage: (start: number) => Promise<P>;
	extract: (page: P) => T[];
	/** Offset step between pages */
	pageSize: number;
	/** Stop once this many items are collected. Unbounded when omitted. */
	limit?: number;
}

/**
 * Fetches pages until one comes back empty, the limit is reached, or the
 * request ceiling is hit. Items past the limit are dropped.
 */
export async function collectPages<P, T>(options: CollectPagesOptions<P, T>): Promise<T[]> {
	const { fetchPage, extract, pageSize } = options;
	const limit = options.limit ?? Number.POSITIVE_INFINITY;

	if (!Number.isInteger(pageSize) || pageSize < 1) {
		throw new LinkedInError("invalid_input", `Invalid page size: ${pageSize}`);
	}
	if (Number.isNaN(limit) || limit < 0) {
		throw new LinkedInError("invalid_input", `Invalid result limit: ${limit}`);
	}

	const results: T[] = [];
	let start = 0;
	let fetches = 0;

	while (results.length < limit) {
		const page = await fetchPage(start);
		fetches += 1;

		const items = extract(page);
		if (items.length === 0) {
			break;
		}

		results.push(...items.slice(0, limit - results.length));

		if (
			results.length >= limit ||
			Math.floor(results.length / pageSize) >= MAX_REPEATED_REQUESTS ||
			fetches >= MAX_REPEATED_REQUESTS
		) {
			break;
		}

		start += pageSize;
	}

	return results;
}
