/**
 * Session cookie jar and its on-disk record.
 *
 * The jar is the only mutable state a client shares across calls. All access goes
 * through one serial lock so a save never observes a half-applied login.
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { CookieJar } from "tough-cookie";
import { JSESSIONID_COOKIE, LINKEDIN_URL } from "./constants.js";
import { createDebug } from "./debug.js";
import { describeError, LinkedInError } from "./errors.js";

const debugCookies = createDebug("cookies", "LI_DEBUG_AUTH");

function stripQuotes(value: string): string {
	if (value.startsWith('"') && value.endsWith('"') && value.length >= 2) {
		return value.slice(1, -1);
	}
	return value;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}

function parseCookieRecord(raw: string, filePath: string): string[] {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new LinkedInError("json", `Cookie file ${filePath} is not valid JSON.`, {
			cause: error,
		});
	}
	if (!Array.isArray(parsed) || !parsed.every((entry) => typeof entry === "string")) {
		throw new LinkedInError("json", `Cookie file ${filePath} must be a JSON array of strings.`);
	}
	return parsed;
}

export class CookieStore {
	readonly filePath: string;
	private readonly jar: CookieJar;
	private readonly url: string;
	private queue: Promise<unknown> = Promise.resolve();

	constructor(filePath: string, jar: CookieJar = new CookieJar(), url = LINKEDIN_URL) {
		this.filePath = filePath;
		this.jar = jar;
		this.url = url;
	}

	/**
	 * Reads the cookie record and injects each cookie into the jar.
	 *
	 * @throws LinkedInError (not_found) when there is no record; callers log in fresh
	 */
	async load(): Promise<void> {
		let raw: string;
		try {
			raw = await readFile(this.filePath, "utf8");
		} catch (error) {
			if (isErrnoException(error) && error.code === "ENOENT") {
				throw new LinkedInError("not_found", `Cookie file not found: ${this.filePath}`, {
					cause: error,
				});
			}
			throw new LinkedInError("io", `Could not read cookie file: ${describeError(error)}`, {
				cause: error,
			});
		}

		const cookies = parseCookieRecord(raw, this.filePath);
		await this.exclusive(async () => {
			for (const cookie of cookies) {
				await this.jar.setCookie(cookie, this.url, { ignoreError: true });
			}
		});
		debugCookies(`load path=${this.filePath} cookies=${cookies.length}`);
	}

	/**
	 * Writes the jar's cookies for the domain to the record.
	 * The file is written beside the target and renamed over it.
	 */
	async save(): Promise<void> {
		const cookies = await this.exclusive(async () => {
			const header = await this.jar.getCookieString(this.url);
			return header
				.split(";")
				.map((fragment) => fragment.trim())
				.filter((fragment) => fragment.length > 0);
		});

		const tempPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;
		try {
			await mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
			await writeFile(tempPath, JSON.stringify(cookies), "utf8");
			await rename(tempPath, this.filePath);
		} catch (error) {
			await unlink(tempPath).catch(() => undefined);
			throw new LinkedInError("io", `Could not write cookie file: ${describeError(error)}`, {
				cause: error,
			});
		}
		debugCookies(`save path=${this.filePath} cookies=${cookies.length}`);
	}

	/**
	 * Current JSESSIONID without its quotes, or "" when there is no session.
	 * The Voyager API takes this value verbatim as the csrf-token header.
	 */
	async currentSessionId(): Promise<string> {
		const header = await this.cookieHeader();
		for (const fragment of header.split(";")) {
			const cookie = fragment.trim();
			if (cookie.startsWith(`${JSESSIONID_COOKIE}=`)) {
				return stripQuotes(cookie.slice(JSESSIONID_COOKIE.length + 1));
			}
		}
		return "";
	}

	/**
	 * Injects a cookie valid for every linkedin.com host, replacing any cookie of that name
	 * the server set for this URL.
	 */
	async setCookie(name: string, value: string): Promise<void> {
		await this.exclusive(async () => {
			for (const cookie of await this.jar.getCookies(this.url)) {
				if (cookie.key === name) {
					await this.jar.store.removeCookie(cookie.domain, cookie.path, cookie.key);
				}
			}
			await this.jar.setCookie(
				`${name}=${value}; Domain=.linkedin.com; Path=/; Secure; HttpOnly`,
				this.url,
			);
		});
	}

	async cookieHeader(url: string = this.url): Promise<string> {
		return this.exclusive(() => this.jar.getCookieString(url));
	}

	/**
	 * Stores every Set-Cookie header of a response.
	 */
	async storeSetCookies(url: string, setCookies: string[]): Promise<void> {
		if (setCookies.length === 0) {
			return;
		}
		await this.exclusive(async () => {
			for (const setCookie of setCookies) {
				await this.jar.setCookie(setCookie, url, { ignoreError: true });
			}
		});
	}

	private exclusive<T>(task: () => Promise<T>): Promise<T> {
		const run = this.queue.then(task, task);
		this.queue = run.catch(() => undefined);
		return run;
	}
}
