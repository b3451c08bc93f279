/**
 * Identity resolution for the Voyager client.
 * Collects login credentials and session tokens from CLI flags, environment variables,
 * or browser cookies.
 */

import { type Cookie, getCookies } from "@steipete/sweet-cookie";
import { JSESSIONID_COOKIE, LI_AT_COOKIE, LINKEDIN_URL } from "./constants.js";
import { createDebug } from "./debug.js";
import { describeError } from "./errors.js";
import type { Identity } from "./session.js";

const debugAuth = createDebug("auth", "LI_DEBUG_AUTH");

export type BrowserSource = "chrome" | "safari";

export interface IdentityOptions {
	username?: string;
	password?: string;
	liAt?: string;
	jsessionId?: string;
	cookieSource?: BrowserSource[];
	chromeProfileDir?: string;
}

export interface ResolvedIdentity extends Identity {
	/** Where the values came from, e.g. "cli", "env", "cli+chrome" */
	source: string;
}

export interface IdentityResult {
	identity: ResolvedIdentity;
	warnings: string[];
}

function stripQuotes(value: string): string {
	if (value.startsWith('"') && value.endsWith('"')) {
		return value.slice(1, -1);
	}
	return value;
}

function findCookieValue(cookies: Cookie[], name: string): string | undefined {
	const cookie = cookies.find((c) => c.name === name);
	return cookie?.value;
}

interface BrowserCookieResult {
	liAt?: string;
	jsessionId?: string;
	warnings: string[];
}

async function extractBrowserCookies(
	browsers: BrowserSource[],
	profileDir?: string,
): Promise<BrowserCookieResult> {
	const warnings: string[] = [];
	const browserList = browsers.join(", ");
	debugAuth(`cookie-extract sources=${browserList} profile=${profileDir ? profileDir : "default"}`);

	try {
		const result = await getCookies({
			url: LINKEDIN_URL,
			browsers,
			profile: profileDir,
			timeoutMs: 30000,
		});

		if (result.warnings) {
			warnings.push(...result.warnings);
		}

		const liAt = findCookieValue(result.cookies, LI_AT_COOKIE);
		const jsessionId = findCookieValue(result.cookies, JSESSIONID_COOKIE);

		debugAuth(
			`cookie-result sources=${browserList} cookies=${result.cookies.length} li_at=${Boolean(
				liAt,
			)} jsessionid=${Boolean(jsessionId)}`,
		);

		return { liAt, jsessionId: jsessionId ? stripQuotes(jsessionId) : undefined, warnings };
	} catch (error) {
		const errorMessage = describeError(error);
		const suffix = errorMessage ? ` (${errorMessage})` : "";
		debugAuth(`cookie-error sources=${browserList} message=${errorMessage}`);
		return { warnings: [`Failed to extract cookies from: ${browserList}${suffix}`] };
	}
}

function joinSources(sources: string[]): string {
	return sources.length > 0 ? sources.join("+") : "none";
}

/**
 * Resolve an {@link Identity}. Each value is taken from the first place that has it:
 * CLI flags, then LINKEDIN_* environment variables, then browser cookies (tokens only).
 *
 * Missing values stay empty; whether they are needed depends on whether a cookie record
 * can be reused, which the authenticator decides.
 */
export async function resolveIdentity(options: IdentityOptions = {}): Promise<IdentityResult> {
	const warnings: string[] = [];
	const sources = new Set<string>();

	const pick = (cliValue: string | undefined, envValue: string | undefined): string => {
		if (cliValue) {
			sources.add("cli");
			return cliValue;
		}
		if (envValue) {
			sources.add("env");
			return envValue;
		}
		return "";
	};

	const username = pick(options.username, process.env.LINKEDIN_USERNAME);
	const password = pick(options.password, process.env.LINKEDIN_PASSWORD);
	let liAt = pick(options.liAt, process.env.LINKEDIN_LI_AT);
	let jsessionId = stripQuotes(pick(options.jsessionId, process.env.LINKEDIN_JSESSIONID));

	debugAuth(
		`resolve-start login=${Boolean(username && password)} tokens=${Boolean(
			liAt && jsessionId,
		)} cookieSource=${options.cookieSource?.join(",") ?? "none"}`,
	);

	if (options.cookieSource?.length && (!liAt || !jsessionId)) {
		const browserResult = await extractBrowserCookies(
			options.cookieSource,
			options.chromeProfileDir,
		);
		warnings.push(...browserResult.warnings);

		if (!liAt && browserResult.liAt) {
			liAt = browserResult.liAt;
			sources.add(options.cookieSource.join("+"));
		}
		if (!jsessionId && browserResult.jsessionId) {
			jsessionId = browserResult.jsessionId;
			sources.add(options.cookieSource.join("+"));
		}
	}

	return {
		identity: {
			username,
			password,
			authenticationToken: liAt,
			sessionCookie: jsessionId,
			source: joinSources([...sources]),
		},
		warnings,
	};
}
