/**
 * Shared session setup for commands.
 */

import { LinkedIn } from "../linkedin.js";
import type { Identity } from "../lib/session.js";

export interface SessionOptions {
	/** Log in again instead of reusing the cookie record */
	refresh?: boolean;
	cookiePath?: string;
}

export interface OutputOptions {
	json?: boolean;
}

export async function openSession(
	identity: Identity,
	options: SessionOptions = {},
): Promise<LinkedIn> {
	return LinkedIn.create(identity, {
		refreshCookies: options.refresh,
		cookiePath: options.cookiePath,
	});
}

/**
 * Parses a --count style option, falling back when it is missing or not a positive integer.
 */
export function parseCount(value: number | undefined, fallback: number): number {
	if (value === undefined || !Number.isFinite(value)) {
		return fallback;
	}
	const count = Math.floor(value);
	return count > 0 ? count : fallback;
}
