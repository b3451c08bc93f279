import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	getCurrentProfileViews,
	getProfile,
	getProfileMemberBadges,
	getProfileNetworkInfo,
	getProfilePrivacySettings,
	getUserProfile,
	parseContactInfo,
	profileRefId,
	removeConnection,
} from "../../../src/api/profile.js";
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
	voyagerPath,
} from "../../helpers/voyager.js";

const profileView = {
	profile: {
		miniProfile: {
			entityUrn: "urn:li:fs_miniProfile:ACoAAB1234",
			publicIdentifier: "jane-doe",
		},
		firstName: "Jane",
		lastName: "Doe",
		headline: "Engineer",
		summary: "Builds things",
		industryName: "Software",
		locationName: "Sydney",
	},
	positionView: { elements: [{ title: "Engineer", companyName: "Acme" }] },
	educationView: { elements: [{ schoolName: "State University", degreeName: "BSc" }] },
};

describe("profile endpoints", () => {
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

	it("addresses a profile by public id or URN id", () => {
		expect(profileRefId({ publicId: "jane doe" })).toBe("jane%20doe");
		expect(profileRefId({ urn: { namespace: "fs_miniProfile", id: "ACoAAB1234" } })).toBe(
			"ACoAAB1234",
		);
	});

	it("parses contact info", () => {
		expect(
			parseContactInfo({
				emailAddress: "jane@example.com",
				websites: [
					{
						url: "https://jane.example.com",
						type: {
							"com.linkedin.voyager.identity.profile.StandardWebsite": { category: "PERSONAL" },
						},
					},
					{
						url: "https://blog.example.com",
						type: { "com.linkedin.voyager.identity.profile.CustomWebsite": { label: "Blog" } },
					},
				],
				twitterHandles: [{ name: "janedoe" }],
				phoneNumbers: [{ number: "+61 400 000 000" }],
			}),
		).toEqual({
			emailAddress: "jane@example.com",
			websites: [
				{ url: "https://jane.example.com", label: "PERSONAL" },
				{ url: "https://blog.example.com", label: "Blog" },
			],
			twitter: ["janedoe"],
			phoneNumbers: ["+61 400 000 000"],
		});
	});

	describe("getProfile", () => {
		it("combines the profile view, skills, and contact info", async () => {
			const paths: string[] = [];
			routeFetch(fetchMock, (url) => {
				const path = voyagerPath(url);
				paths.push(path);
				if (path.endsWith("/profileView")) {
					return jsonResponse(profileView);
				}
				if (path.endsWith("/skills")) {
					return jsonResponse({ elements: [{ name: "TypeScript" }, { name: "Go" }] });
				}
				return jsonResponse({ emailAddress: "jane@example.com" });
			});

			const profile = await getProfile(client, { publicId: "jane-doe" });

			expect(paths).toEqual([
				"/identity/profiles/jane-doe/profileView",
				"/identity/profiles/jane-doe/skills",
				"/identity/profiles/jane-doe/profileContactInfo",
			]);
			expect(profile).toEqual({
				profileId: "ACoAAB1234",
				publicId: "jane-doe",
				firstName: "Jane",
				lastName: "Doe",
				headline: "Engineer",
				summary: "Builds things",
				industryName: "Software",
				locationName: "Sydney",
				experience: [{ title: "Engineer", companyName: "Acme" }],
				education: [{ schoolName: "State University", degreeName: "BSc" }],
				skills: [{ name: "TypeScript" }, { name: "Go" }],
				contact: {
					emailAddress: "jane@example.com",
					websites: [],
					twitter: [],
					phoneNumbers: [],
				},
			});
		});

		it("fails on a non-200 profile view without further requests", async () => {
			routeFetch(fetchMock, () => jsonResponse({ message: "Profile hidden" }, 403));

			await expect(getProfile(client, { publicId: "jane-doe" })).rejects.toSatisfy(
				(error: unknown) =>
					isLinkedInError(error, "request_failed") &&
					error.status === 403 &&
					error.detail === "Profile hidden",
			);
			expect(fetchMock).toHaveBeenCalledTimes(1);
		});

		it("maps 401 to unauthorized", async () => {
			routeFetch(fetchMock, () => jsonResponse({}, 401));

			await expect(getProfile(client, { publicId: "jane-doe" })).rejects.toSatisfy(
				(error: unknown) => isLinkedInError(error, "unauthorized"),
			);
		});
	});

	describe("optional sub-resources", () => {
		it("reads network info", async () => {
			routeFetch(fetchMock, () => jsonResponse({ data: { followersCount: 1234 } }));

			expect(await getProfileNetworkInfo(client, "jane-doe")).toEqual({ followersCount: 1234 });
			expect(voyagerPath(new URL(fetchCall(fetchMock, 0).url))).toBe(
				"/identity/profiles/jane-doe/networkinfo",
			);
		});

		it("degrades to defaults on non-200 responses", async () => {
			routeFetch(fetchMock, () => jsonResponse({}, 404));

			expect(await getProfileNetworkInfo(client, "jane-doe")).toEqual({ followersCount: 0 });
			expect(await getProfilePrivacySettings(client, "jane-doe")).toEqual({});
			expect(await getProfileMemberBadges(client, "jane-doe")).toEqual({
				premium: false,
				openLink: false,
				influencer: false,
				jobSeeker: false,
			});
		});

		it("reads member badges", async () => {
			routeFetch(fetchMock, () => jsonResponse({ data: { premium: true, influencer: true } }));

			expect(await getProfileMemberBadges(client, "jane-doe")).toEqual({
				premium: true,
				openLink: false,
				influencer: true,
				jobSeeker: false,
			});
		});
	});

	it("reads the profile view count", async () => {
		routeFetch(fetchMock, () =>
			jsonResponse({
				elements: [
					{
						value: {
							"com.linkedin.voyager.identity.me.wvmpOverview.WvmpViewersCard": {
								insightCards: [
									{
										value: {
											"com.linkedin.voyager.identity.me.wvmpOverview.WvmpSummaryInsightCard":
												{ numViews: 42 },
										},
									},
								],
							},
						},
					},
				],
			}),
		);

		expect(await getCurrentProfileViews(client)).toBe(42);
	});

	it("counts zero views when the card is missing", async () => {
		routeFetch(fetchMock, () => jsonResponse({ elements: [] }));
		expect(await getCurrentProfileViews(client)).toBe(0);
	});

	it("returns the raw /me payload", async () => {
		routeFetch(fetchMock, () => jsonResponse({ miniProfile: { publicIdentifier: "jane-doe" } }));
		expect(await getUserProfile(client)).toEqual({ miniProfile: { publicIdentifier: "jane-doe" } });
	});

	it("reports whether a connection was removed", async () => {
		routeFetch(fetchMock, () => jsonResponse({}, 200));

		expect(await removeConnection(client, "jane-doe")).toEqual({ ok: true, status: 200 });
		const { url, init } = fetchCall(fetchMock, 0);
		expect(init.method).toBe("POST");
		expect(url).toBe(
			"https://www.linkedin.com/voyager/api/identity/profiles/jane-doe/profileActions?action=disconnect",
		);
	});
});
