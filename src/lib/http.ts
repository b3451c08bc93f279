/**
 * Cookie-aware fetch shared by the authenticator and the dispatcher.
 * Sends the jar's cookies for the target URL and keeps whatever the response sets.
 */

import type { CookieStore } from "./cookie-store.js";
import { createDebug } from "./debug.js";
import { describeError, LinkedInError } from "./errors.js";

const debugHttp = createDebug("http", "LI_DEBUG_HTTP");

export interface HttpRequest {
	method: "GET" | "POST";
	headers: Record<string, string>;
	body?: string;
}

function readSetCookies(response: Response): string[] {
	const headerBag = response.headers;
	if (!headerBag) {
		return [];
	}
	if (typeof headerBag.getSetCookie === "function") {
		return headerBag.getSetCookie();
	}
	const single = headerBag.get("set-cookie");
	return single ? [single] : [];
}

/**
 * Issues one request with the session's cookies attached.
 *
 * @throws LinkedInError (http) when the transport fails; status codes are not interpreted
 */
export async function fetchWithCookies(
	store: CookieStore,
	url: string,
	request: HttpRequest,
): Promise<Response> {
	const cookieHeader = await store.cookieHeader(url);
	const headers: Record<string, string> = { ...request.headers };
	if (cookieHeader) {
		headers.Cookie = cookieHeader;
	}

	let response: Response;
	try {
		response = await fetch(url, {
			method: request.method,
			headers,
			body: request.body,
		});
	} catch (error) {
		const cause = error instanceof Error ? error.cause : undefined;
		const causeMessage = cause === undefined ? undefined : describeError(cause);
		debugHttp(
			[
				`error=${describeError(error)}`,
				causeMessage ? `cause=${causeMessage}` : null,
				`method=${request.method}`,
				`url=${url}`,
			]
				.filter(Boolean)
				.join(" "),
		);
		throw new LinkedInError("http", `Network error: ${describeError(error)}`, { cause: error });
	}

	const setCookies = readSetCookies(response);
	await store.storeSetCookies(url, setCookies);

	debugHttp(
		`status=${response.status} method=${request.method} url=${url} setCookie=${setCookies.length}`,
	);
	return response;
}
