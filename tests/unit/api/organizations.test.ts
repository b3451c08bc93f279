import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getCompany, getSchool, parseOrganization } from "../../../src/api/organizations.js";
import type { VoyagerClient } from "../../../src/lib/client.js";
import { isLinkedInError } from "../../../src/lib/errors.js";
import {
	createTempDir,
	createTestClient,
	fetchCall,
	jsonResponse,
	removeTempDir,
	routeFetch,
	stubFetch,
} from "../../helpers/voyager.js";

function captureSync(task: () => unknown): unknown {
	try {
		task();
	} catch (error) {
		return error;
	}
	throw new Error("expected the task to throw");
}

describe("parseOrganization", () => {
	it("maps the first element", () => {
		expect(
			parseOrganization(
				{
					elements: [
						{ name: "Acme", universalName: "acme-corp", description: "Widgets", staffCount: 1200 },
					],
				},
				"company",
			),
		).toEqual({ name: "Acme", universalName: "acme-corp", description: "Widgets", staffCount: 1200 });
	});

	it("raises the status the body reports", () => {
		const error = captureSync(() =>
			parseOrganization({ status: 404, message: "No such company" }, "company"),
		);
		expect(isLinkedInError(error, "request_failed") && error.status).toBe(404);
		expect(isLinkedInError(error) && error.detail).toBe("No such company");
	});

	it("fails without an element or a name", () => {
		expect(captureSync(() => parseOrganization({ elements: [] }, "school"))).toMatchObject({
			kind: "request_failed",
			message: "No school data found.",
		});
		expect(captureSync(() => parseOrganization({ elements: [{}] }, "company"))).toMatchObject({
			kind: "request_failed",
			message: "No company name found.",
		});
	});
});

describe("organization lookups", () => {
	let dir: string;
	let client: VoyagerClient;
	let fetchMock: ReturnType<typeof stubFetch>;

	beforeEach(async () => {
		dir = await createTempDir();
		client = createTestClient(dir);
		fetchMock = stubFetch();
	});

	afterEach(async () => {
		vi.unstubAllGlobals();
		await removeTempDir(dir);
	});

	it("looks a company up by universal name", async () => {
		routeFetch(fetchMock, () => jsonResponse({ elements: [{ name: "Acme" }] }));

		expect(await getCompany(client, "acme-corp")).toEqual({
			name: "Acme",
			universalName: "",
			description: "",
		});
		const url = new URL(fetchCall(fetchMock, 0).url);
		expect(url.pathname).toBe("/voyager/api/organization/companies");
		expect(url.searchParams.get("q")).toBe("universalName");
		expect(url.searchParams.get("universalName")).toBe("acme-corp");
		expect(url.searchParams.get("decorationId")).toBe(
			"com.linkedin.voyager.deco.organization.web.WebFullCompanyMain-12",
		);
	});

	it("looks a school up through the same endpoint", async () => {
		routeFetch(fetchMock, () => jsonResponse({ elements: [{ name: "State University" }] }));

		expect((await getSchool(client, "state-university")).name).toBe("State University");
	});

	it("rejects an empty id without a request", async () => {
		await expect(getCompany(client, "")).rejects.toSatisfy((error: unknown) =>
			isLinkedInError(error, "invalid_input"),
		);
		expect(fetchMock).not.toHaveBeenCalled();
	});
});
