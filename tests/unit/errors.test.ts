import { describe, expect, it } from "vitest";
import {
	describeError,
	getErrorMessage,
	isLinkedInError,
	LinkedInError,
	statusError,
} from "../../src/lib/errors.js";

describe("LinkedInError", () => {
	it("carries kind, status, detail, and cause", () => {
		const cause = new Error("socket hang up");
		const error = new LinkedInError("challenge", "Verification needed", {
			status: 200,
			detail: "CHALLENGE",
			cause,
		});

		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe("LinkedInError");
		expect(error.kind).toBe("challenge");
		expect(error.status).toBe(200);
		expect(error.detail).toBe("CHALLENGE");
		expect(error.cause).toBe(cause);
	});

	it("matches by kind", () => {
		const error = new LinkedInError("io", "disk full");
		expect(isLinkedInError(error)).toBe(true);
		expect(isLinkedInError(error, "io")).toBe(true);
		expect(isLinkedInError(error, "json")).toBe(false);
		expect(isLinkedInError(new Error("plain"))).toBe(false);
	});
});

describe("statusError", () => {
	it("maps 401 to unauthorized", () => {
		const error = statusError(401);
		expect(error.kind).toBe("unauthorized");
		expect(error.status).toBe(401);
		expect(error.message).toBe("Session expired. Run with --refresh to log in again.");
	});

	it("maps 429 to rate_limit", () => {
		expect(statusError(429).kind).toBe("rate_limit");
	});

	it("maps other statuses to request_failed with details", () => {
		const error = statusError(500, "Internal");
		expect(error.kind).toBe("request_failed");
		expect(error.detail).toBe("Internal");
		expect(error.message).toBe("Request failed with status 500: Internal.");
	});
});

describe("getErrorMessage", () => {
	it("includes details for 404 and 400", () => {
		expect(getErrorMessage(404, "profile")).toBe("Resource not found: profile.");
		expect(getErrorMessage(400)).toBe("Invalid request.");
	});

	it("explains LinkedIn's 999 block", () => {
		expect(getErrorMessage(999)).toBe(
			"LinkedIn is blocking requests. Try again later or rotate your session.",
		);
	});
});

describe("describeError", () => {
	it("uses the message of an Error and stringifies anything else", () => {
		expect(describeError(new Error("boom"))).toBe("boom");
		expect(describeError(42)).toBe("42");
	});
});
