/**
 * Session establishment for the Voyager API.
 *
 * Either replays the persisted cookie record or performs the mobile-client login
 * handshake against /uas/authenticate. Runs once per client; an expired session later
 * surfaces as an ordinary request error.
 */

import { JSESSIONID_COOKIE, LI_AT_COOKIE, LINKEDIN_URL, LOGIN_PATH } from "./constants.js";
import type { CookieStore } from "./cookie-store.js";
import { createDebug } from "./debug.js";
import { describeError, LinkedInError } from "./errors.js";
import { buildLoginHeaders } from "./headers.js";
import { fetchWithCookies } from "./http.js";
import { getPath, isJsonObject } from "./json.js";

const debugAuth = createDebug("auth", "LI_DEBUG_AUTH");

const LOGIN_PASS = "PASS";

/**
 * Long-lived credential material.
 * The token pair seeds the jar; username and password are posted on fresh login.
 */
export interface Identity {
	readonly username: string;
	readonly password: string;
	/** Value for the li_at cookie */
	readonly authenticationToken: string;
	/** Value for the JSESSIONID cookie */
	readonly sessionCookie: string;
}

export interface AuthenticateOptions {
	/** Skip the cookie record and always log in fresh */
	forceRefresh?: boolean;
}

/**
 * How the session was established: the persisted record, the login handshake, or
 * the identity's token pair replayed without a login.
 */
export type AuthenticationMode = "reused" | "login" | "tokens";

export type SessionState = "unauthenticated" | "authenticated";

export class SessionAuthenticator {
	private readonly store: CookieStore;
	private state: SessionState = "unauthenticated";

	constructor(store: CookieStore) {
		this.store = store;
	}

	get currentState(): SessionState {
		return this.state;
	}

	/**
	 * Establishes the session.
	 *
	 * @throws LinkedInError `unauthorized` on 401, `request_failed` on any other non-200,
	 * `challenge` when LinkedIn asks for a verification step, `invalid_input` when the
	 * identity holds neither a username/password nor a token pair
	 */
	async authenticate(
		identity: Identity,
		options: AuthenticateOptions = {},
	): Promise<AuthenticationMode> {
		if (!options.forceRefresh && (await this.tryReuseCookies())) {
			this.state = "authenticated";
			return "reused";
		}

		const hasLogin = Boolean(identity.username && identity.password);
		const hasTokens = Boolean(identity.authenticationToken && identity.sessionCookie);
		if (!hasLogin && !hasTokens) {
			throw new LinkedInError(
				"invalid_input",
				"No LinkedIn credentials: provide a username and password, or li_at and JSESSIONID.",
			);
		}

		if (!hasLogin) {
			await this.seedTokens(identity);
			await this.store.save();
			this.state = "authenticated";
			return "tokens";
		}

		await this.requestSessionCookies();
		await this.seedTokens(identity);

		const form = new URLSearchParams({
			session_key: identity.username,
			session_password: identity.password,
			JSESSIONID: await this.store.currentSessionId(),
		});

		const response = await fetchWithCookies(this.store, `${LINKEDIN_URL}${LOGIN_PATH}`, {
			method: "POST",
			headers: {
				...buildLoginHeaders(),
				"Content-Type": "application/x-www-form-urlencoded",
			},
			body: form.toString(),
		});

		debugAuth(`login status=${response.status}`);

		if (response.status === 401) {
			throw new LinkedInError("unauthorized", "Authentication failed: invalid credentials.", {
				status: 401,
			});
		}
		if (response.status !== 200) {
			throw new LinkedInError(
				"request_failed",
				`Authentication request failed with status ${response.status}.`,
				{ status: response.status },
			);
		}

		const body = await readJson(response);
		if (isJsonObject(body) && Object.hasOwn(body, "login_result")) {
			const loginResult = getPath(body, "login_result");
			if (loginResult !== LOGIN_PASS) {
				const challenge = typeof loginResult === "string" ? loginResult : "Unknown";
				debugAuth(`login challenge=${challenge}`);
				throw new LinkedInError(
					"challenge",
					`LinkedIn requires a verification step this client cannot complete: ${challenge}.`,
					{ status: response.status, detail: challenge },
				);
			}
		}

		await this.store.save();
		this.state = "authenticated";
		return "login";
	}

	private async seedTokens(identity: Identity): Promise<void> {
		// An empty value would overwrite the JSESSIONID issued by the priming request.
		if (identity.authenticationToken) {
			await this.store.setCookie(LI_AT_COOKIE, identity.authenticationToken);
		}
		if (identity.sessionCookie) {
			await this.store.setCookie(JSESSIONID_COOKIE, identity.sessionCookie);
		}
	}

	private async tryReuseCookies(): Promise<boolean> {
		try {
			await this.store.load();
			return true;
		} catch (error) {
			// Any unusable record means a fresh login.
			debugAuth(`cookie-reuse skipped reason=${describeError(error)}`);
			return false;
		}
	}

	/**
	 * Priming GET so LinkedIn issues a JSESSIONID before the credentials are posted.
	 */
	private async requestSessionCookies(): Promise<void> {
		const response = await fetchWithCookies(this.store, `${LINKEDIN_URL}${LOGIN_PATH}`, {
			method: "GET",
			headers: buildLoginHeaders(),
		});
		debugAuth(`priming status=${response.status}`);
	}
}

async function readJson(response: Response): Promise<unknown> {
	try {
		return await response.json();
	} catch (error) {
		throw new LinkedInError("json", "Login response was not valid JSON.", {
			status: response.status,
			cause: error,
		});
	}
}
