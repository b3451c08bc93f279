import { readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CookieStore } from "../../src/lib/cookie-store.js";
import { isLinkedInError } from "../../src/lib/errors.js";
import { createTempDir, removeTempDir } from "../helpers/voyager.js";

async function captureError(task: () => Promise<unknown>): Promise<unknown> {
	try {
		await task();
	} catch (error) {
		return error;
	}
	throw new Error("expected the task to throw");
}

describe("CookieStore", () => {
	let dir: string;
	let filePath: string;

	beforeEach(async () => {
		dir = await createTempDir();
		filePath = path.join(dir, "cookies.json");
	});

	afterEach(async () => {
		await removeTempDir(dir);
	});

	describe("save and load", () => {
		it("restores the same cookies in a new store", async () => {
			const first = new CookieStore(filePath);
			await first.setCookie("li_at", "test-li-at");
			await first.setCookie("JSESSIONID", "ajax:123");
			await first.save();

			const saved: unknown = JSON.parse(await readFile(filePath, "utf8"));
			expect(new Set(Array.isArray(saved) ? saved : [])).toEqual(
				new Set(["li_at=test-li-at", "JSESSIONID=ajax:123"]),
			);

			const second = new CookieStore(filePath);
			await second.load();
			const header = await second.cookieHeader();
			expect(new Set(header.split("; "))).toEqual(
				new Set(["li_at=test-li-at", "JSESSIONID=ajax:123"]),
			);
		});

		it("leaves no temporary file behind", async () => {
			const store = new CookieStore(filePath);
			await store.setCookie("li_at", "test-li-at");
			await store.save();

			expect(await readdir(dir)).toEqual(["cookies.json"]);
		});

		it("creates missing parent directories", async () => {
			const nested = path.join(dir, "a", "b", "cookies.json");
			const store = new CookieStore(nested);
			await store.setCookie("li_at", "test-li-at");
			await store.save();

			expect(JSON.parse(await readFile(nested, "utf8"))).toEqual(["li_at=test-li-at"]);
		});

		it("saves an empty jar as an empty array", async () => {
			await new CookieStore(filePath).save();
			expect(await readFile(filePath, "utf8")).toBe("[]");
		});

		it("skips unparseable entries when loading", async () => {
			await writeFile(filePath, JSON.stringify(["li_at=test-li-at", ""]), "utf8");
			const store = new CookieStore(filePath);
			await store.load();
			expect(await store.cookieHeader()).toBe("li_at=test-li-at");
		});
	});

	describe("load errors", () => {
		it("reports a missing record as not_found", async () => {
			const error = await captureError(() => new CookieStore(filePath).load());
			expect(isLinkedInError(error, "not_found")).toBe(true);
		});

		it("reports invalid JSON as json", async () => {
			await writeFile(filePath, "{not json", "utf8");
			const error = await captureError(() => new CookieStore(filePath).load());
			expect(isLinkedInError(error, "json")).toBe(true);
		});

		it("reports a record that is not an array of strings as json", async () => {
			await writeFile(filePath, JSON.stringify({ li_at: "test-li-at" }), "utf8");
			const error = await captureError(() => new CookieStore(filePath).load());
			expect(isLinkedInError(error, "json")).toBe(true);
		});

		it("reports other read failures as io", async () => {
			const error = await captureError(() => new CookieStore(dir).load());
			expect(isLinkedInError(error, "io")).toBe(true);
		});
	});

	describe("save errors", () => {
		it("reports write failures as io", async () => {
			const blocker = path.join(dir, "blocker");
			await writeFile(blocker, "", "utf8");
			const store = new CookieStore(path.join(blocker, "cookies.json"));

			const error = await captureError(() => store.save());
			expect(isLinkedInError(error, "io")).toBe(true);
		});

		it("lets two stores save the same path at once", async () => {
			const first = new CookieStore(filePath);
			const second = new CookieStore(filePath);
			await first.setCookie("li_at", "test-li-at");
			await second.setCookie("li_at", "test-li-at");

			await Promise.all([first.save(), second.save(), first.save(), second.save()]);

			const saved: unknown = JSON.parse(await readFile(filePath, "utf8"));
			expect(saved).toEqual(["li_at=test-li-at"]);
			expect(await readdir(dir)).toEqual(["cookies.json"]);
		});
	});

	describe("currentSessionId", () => {
		it("returns the JSESSIONID without quotes", async () => {
			const store = new CookieStore(filePath);
			await store.setCookie("JSESSIONID", '"ajax:123"');
			expect(await store.currentSessionId()).toBe("ajax:123");
		});

		it("returns an empty string without a session", async () => {
			expect(await new CookieStore(filePath).currentSessionId()).toBe("");
		});
	});

	describe("storeSetCookies", () => {
		it("keeps cookies from response headers", async () => {
			const store = new CookieStore(filePath);
			await store.storeSetCookies("https://www.linkedin.com/uas/authenticate", [
				"JSESSIONID=ajax:987; Path=/; Secure",
				"bcookie=v=2&abc; Domain=.linkedin.com; Path=/",
			]);

			expect(await store.currentSessionId()).toBe("ajax:987");
			expect(await store.cookieHeader()).toContain("bcookie=v=2&abc");
		});

		it("serializes concurrent writers", async () => {
			const store = new CookieStore(filePath);
			await Promise.all([
				store.setCookie("li_at", "test-li-at"),
				store.setCookie("JSESSIONID", "ajax:1"),
				store.save(),
			]);

			const saved: unknown = JSON.parse(await readFile(filePath, "utf8"));
			expect(Array.isArray(saved) ? saved.length : 0).toBe(2);
		});
	});
});

describe("CookieStore.setCookie", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await createTempDir();
	});

	afterEach(async () => {
		await removeTempDir(dir);
	});

	it("replaces a cookie of the same name set by the server", async () => {
		const store = new CookieStore(path.join(dir, "cookies.json"));
		await store.storeSetCookies("https://www.linkedin.com/uas/authenticate", [
			'JSESSIONID="ajax:server"; Path=/; Secure',
		]);
		await store.setCookie("JSESSIONID", "ajax:seeded");

		expect(await store.cookieHeader()).toBe("JSESSIONID=ajax:seeded");
	});
});
