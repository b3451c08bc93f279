import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import { VoyagerClient } from "../../src/lib/client.js";
import { CookieStore } from "../../src/lib/cookie-store.js";

/**
 * JSON response with optional Set-Cookie headers.
 */
export function jsonResponse(body: unknown, status = 200, setCookies: string[] = []): Response {
	const headers = new Headers({ "Content-Type": "application/json" });
	for (const cookie of setCookies) {
		headers.append("Set-Cookie", cookie);
	}
	return new Response(JSON.stringify(body), { status, headers });
}

export function textResponse(body: string, status = 200): Response {
	return new Response(body, { status });
}

export async function createTempDir(): Promise<string> {
	return mkdtemp(path.join(os.tmpdir(), "voyager-test-"));
}

export async function removeTempDir(dir: string): Promise<void> {
	await rm(dir, { recursive: true, force: true });
}

/**
 * Stubs the global fetch. Callers queue responses with mockResolvedValueOnce
 * or route them with mockImplementation.
 */
export function stubFetch() {
	const fetchMock = vi.fn<typeof fetch>();
	vi.stubGlobal("fetch", fetchMock);
	return fetchMock;
}

/**
 * Client with no request delay over a cookie file in `dir`.
 */
export function createTestClient(dir: string): VoyagerClient {
	const cookiePath = path.join(dir, "cookies.json");
	return new VoyagerClient({ cookiePath }, new CookieStore(cookiePath), async () => undefined);
}

/**
 * URL and init of the nth fetch call.
 */
export function fetchCall(fetchMock: ReturnType<typeof stubFetch>, index: number) {
	const call = fetchMock.mock.calls[index];
	if (!call) {
		throw new Error(`fetch was not called ${index + 1} times`);
	}
	const [input, init] = call;
	return { url: String(input), init: init ?? {} };
}

/**
 * Header value from a fetch init built as a plain record.
 */
export function headerOf(init: RequestInit, name: string): string | undefined {
	const headers = init.headers;
	if (!headers || Array.isArray(headers) || headers instanceof Headers) {
		return undefined;
	}
	const value = headers[name];
	return typeof value === "string" ? value : undefined;
}

/**
 * Answers every fetch through `handler`, which sees the parsed request URL.
 */
export function routeFetch(
	fetchMock: ReturnType<typeof stubFetch>,
	handler: (url: URL, init: RequestInit) => Response,
): void {
	fetchMock.mockImplementation(async (input, init) => handler(new URL(String(input)), init ?? {}));
}

/**
 * Voyager path of a request URL, without the API prefix or the query.
 */
export function voyagerPath(url: URL): string {
	return url.pathname.replace(/^\/voyager\/api/, "");
}
