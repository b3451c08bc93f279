/**
 * LinkedIn Voyager API client.
 * Owns the session, paces every request, and attaches the CSRF header.
 */

import { resolveConfig, type VoyagerConfig, type VoyagerConfigOptions } from "./config.js";
import { VOYAGER_API_BASE_URL } from "./constants.js";
import { CookieStore } from "./cookie-store.js";
import { createDebug } from "./debug.js";
import { buildDefaultHeaders } from "./headers.js";
import { fetchWithCookies } from "./http.js";
import {
	type AuthenticateOptions,
	type AuthenticationMode,
	type Identity,
	SessionAuthenticator,
} from "./session.js";

const debugHttp = createDebug("http", "LI_DEBUG_HTTP");

/**
 * Sleep for the specified duration.
 */
function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export type VoyagerClientOptions = VoyagerConfigOptions;

/**
 * Waits out the evasion delay. Tests swap in one that resolves at once.
 */
export type DelayFn = (ms: number) => Promise<void>;

/**
 * LinkedIn Voyager API client.
 *
 * Handles:
 * - Session setup via cookie replay or login, run once by the owner
 * - A randomized 2-5s pause before every request
 * - csrf-token derived from the session's JSESSIONID
 *
 * Responses come back raw. Status codes are for the caller to interpret, and nothing is retried.
 */
export class VoyagerClient {
	readonly cookies: CookieStore;
	private readonly config: VoyagerConfig;
	private readonly authenticator: SessionAuthenticator;
	private readonly headers: Record<string, string>;
	private readonly wait: DelayFn;

	constructor(options: VoyagerClientOptions = {}, store?: CookieStore, wait: DelayFn = sleep) {
		this.config = resolveConfig(options);
		this.wait = wait;
		this.cookies = store ?? new CookieStore(this.config.cookiePath);
		this.authenticator = new SessionAuthenticator(this.cookies);
		this.headers = buildDefaultHeaders();
	}

	get isAuthenticated(): boolean {
		return this.authenticator.currentState === "authenticated";
	}

	async authenticate(
		identity: Identity,
		options: AuthenticateOptions = {},
	): Promise<AuthenticationMode> {
		return this.authenticator.authenticate(identity, options);
	}

	/**
	 * GET a Voyager path, e.g. "/me" or "/identity/profiles/{id}/profileView".
	 */
	async get(path: string): Promise<Response> {
		return this.dispatch(path, { method: "GET" });
	}

	/**
	 * POST a JSON body to a Voyager path.
	 */
	async post(path: string, body: unknown): Promise<Response> {
		return this.dispatch(path, {
			method: "POST",
			contentType: "application/json",
			body: JSON.stringify(body),
		});
	}

	/**
	 * Validates the current session by calling GET /me.
	 */
	async validateSession(): Promise<boolean> {
		const response = await this.get("/me");
		return response.ok;
	}

	private async dispatch(
		path: string,
		request: { method: "GET" | "POST"; contentType?: string; body?: string },
	): Promise<Response> {
		const url = `${VOYAGER_API_BASE_URL}${path}`;

		// Every request waits, the first one included.
		const delayMs = this.getRequestDelay();
		debugHttp(`delay=${delayMs}ms method=${request.method} url=${url}`);
		await this.wait(delayMs);

		const headers: Record<string, string> = {
			...this.headers,
			"csrf-token": await this.cookies.currentSessionId(),
		};
		if (request.contentType) {
			headers["Content-Type"] = request.contentType;
		}

		return fetchWithCookies(this.cookies, url, {
			method: request.method,
			headers,
			body: request.body,
		});
	}

	private getRequestDelay(): number {
		const range = this.config.delayMaxMs - this.config.delayMinMs;
		return this.config.delayMinMs + Math.floor(Math.random() * (range + 1));
	}
}
