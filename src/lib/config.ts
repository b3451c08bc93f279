/**
 * Runtime configuration for the Voyager client.
 * Explicit options win over environment variables, which win over defaults.
 */

import { DEFAULT_COOKIE_PATH } from "./constants.js";

/**
 * Evasion delay bounds. Every dispatched request waits a random 2-5 seconds;
 * configuration can narrow the range but not leave it.
 */
export const DEFAULT_DELAY_MIN_MS = 2000;
export const DEFAULT_DELAY_MAX_MS = 5000;

export interface VoyagerConfigOptions {
	cookiePath?: string;
	delayMinMs?: number;
	delayMaxMs?: number;
}

export interface VoyagerConfig {
	cookiePath: string;
	delayMinMs: number;
	delayMaxMs: number;
}

function parseDelayEnv(value: string | undefined): number | null {
	if (!value) {
		return null;
	}
	const parsed = Number(value);
	if (!Number.isFinite(parsed) || parsed < 0) {
		return null;
	}
	return Math.round(parsed);
}

function normalizeDelay(value: number | undefined): number | null {
	if (value === undefined) {
		return null;
	}
	if (!Number.isFinite(value) || value < 0) {
		return null;
	}
	return Math.round(value);
}

function clampDelay(value: number): number {
	return Math.min(Math.max(value, DEFAULT_DELAY_MIN_MS), DEFAULT_DELAY_MAX_MS);
}

export function resolveConfig(
	options: VoyagerConfigOptions = {},
	env: NodeJS.ProcessEnv = process.env,
): VoyagerConfig {
	const min = clampDelay(
		normalizeDelay(options.delayMinMs) ??
			parseDelayEnv(env.LI_REQUEST_DELAY_MIN_MS) ??
			DEFAULT_DELAY_MIN_MS,
	);
	const max = clampDelay(
		normalizeDelay(options.delayMaxMs) ??
			parseDelayEnv(env.LI_REQUEST_DELAY_MAX_MS) ??
			DEFAULT_DELAY_MAX_MS,
	);
	const cookiePath = options.cookiePath || env.LI_COOKIE_PATH || DEFAULT_COOKIE_PATH;

	return {
		cookiePath,
		delayMinMs: min,
		delayMaxMs: max >= min ? max : min,
	};
}
