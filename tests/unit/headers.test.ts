import { describe, expect, it } from "vitest";
import { buildDefaultHeaders, buildLoginHeaders } from "../../src/lib/headers.js";

describe("buildDefaultHeaders", () => {
	it("carries the desktop browser signature", () => {
		expect(buildDefaultHeaders()).toEqual({
			"User-Agent":
				"Mozilla/5.0 (Macintosh; Intel Mac OS X 10_13_5) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/66.0.3359.181 Safari/537.36",
			"Accept-Language": "en-AU,en-GB;q=0.9,en-US;q=0.8,en;q=0.7",
			"X-Li-Lang": "en_US",
			"X-Restli-Protocol-Version": "2.0.0",
		});
	});
});

describe("buildLoginHeaders", () => {
	it("carries the mobile app signature", () => {
		expect(buildLoginHeaders()).toEqual({
			"X-Li-User-Agent": "LIAuthLibrary:3.2.4 com.linkedin.LinkedIn:8.8.1 iPhone:8.3",
			"User-Agent": "LinkedIn/8.8.1 CFNetwork/711.3.18 Darwin/14.0.0",
			"X-User-Language": "en",
			"X-User-Locale": "en_US",
			"Accept-Language": "en-us",
		});
	});
});
