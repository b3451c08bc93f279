/**
 * Profile endpoints: profile view, contact info, skills, badges, network info.
 *
 * Optional sub-resources (privacy settings, badges, network info) degrade to empty
 * defaults on a non-200 response; the main profile view does not.
 */

import type { VoyagerClient } from "../lib/client.js";
import {
	getArray,
	getBoolean,
	getNumber,
	getObject,
	getString,
	type JsonObject,
} from "../lib/json.js";
import type {
	ActionResult,
	ContactInfo,
	Education,
	Experience,
	MemberBadges,
	NetworkInfo,
	Profile,
	ProfileRef,
	Skill,
	Website,
} from "../lib/types.js";
import { extractUrnId } from "../lib/urn.js";
import { expectStatus, readJsonBody } from "./response.js";

const STANDARD_WEBSITE = "com.linkedin.voyager.identity.profile.StandardWebsite";
const CUSTOM_WEBSITE = "com.linkedin.voyager.identity.profile.CustomWebsite";
const VIEWERS_CARD = "com.linkedin.voyager.identity.me.wvmpOverview.WvmpViewersCard";
const SUMMARY_INSIGHT_CARD = "com.linkedin.voyager.identity.me.wvmpOverview.WvmpSummaryInsightCard";

/**
 * Path segment for a profile reference: the public id as-is, or the URN's id.
 */
export function profileRefId(ref: ProfileRef): string {
	const id = "publicId" in ref ? ref.publicId : ref.urn.id;
	return encodeURIComponent(id);
}

export function parseContactInfo(data: unknown): ContactInfo {
	const websites: Website[] = getArray(data, "websites").map((website) => {
		const label =
			getString(website, "type", STANDARD_WEBSITE, "category") ??
			getString(website, "type", CUSTOM_WEBSITE, "label");
		return {
			url: getString(website, "url") ?? "",
			...(label ? { label } : {}),
		};
	});

	const twitter = getArray(data, "twitterHandles")
		.map((handle) => getString(handle, "name"))
		.filter((name): name is string => Boolean(name));

	const phoneNumbers = getArray(data, "phoneNumbers")
		.map((phone) => getString(phone, "number"))
		.filter((number): number is string => Boolean(number));

	const emailAddress = getString(data, "emailAddress");
	const birthdate = getString(data, "birthDateOn");

	return {
		...(emailAddress ? { emailAddress } : {}),
		websites,
		twitter,
		phoneNumbers,
		...(birthdate ? { birthdate } : {}),
	};
}

export function parseSkills(data: unknown): Skill[] {
	return getArray(data, "elements")
		.map((element) => getString(element, "name"))
		.filter((name): name is string => Boolean(name))
		.map((name) => ({ name }));
}

function parseExperience(element: unknown): Experience {
	const title = getString(element, "title");
	const companyName = getString(element, "companyName");
	const locationName = getString(element, "locationName");
	return {
		...(title ? { title } : {}),
		...(companyName ? { companyName } : {}),
		...(locationName ? { locationName } : {}),
	};
}

function parseEducation(element: unknown): Education {
	const schoolName = getString(element, "schoolName");
	const degreeName = getString(element, "degreeName");
	const fieldOfStudy = getString(element, "fieldOfStudy");
	return {
		...(schoolName ? { schoolName } : {}),
		...(degreeName ? { degreeName } : {}),
		...(fieldOfStudy ? { fieldOfStudy } : {}),
	};
}

/**
 * Maps a /profileView payload. Skills and contact info come from their own endpoints.
 */
export function parseProfileView(data: unknown): Omit<Profile, "skills" | "contact"> {
	const profile = getObject(data, "profile");
	return {
		profileId: extractUrnId(getString(profile, "miniProfile", "entityUrn")),
		publicId: getString(profile, "miniProfile", "publicIdentifier") ?? "",
		firstName: getString(profile, "firstName") ?? "",
		lastName: getString(profile, "lastName") ?? "",
		headline: getString(profile, "headline") ?? "",
		summary: getString(profile, "summary") ?? "",
		industryName: getString(profile, "industryName") ?? "",
		locationName: getString(profile, "locationName") ?? "",
		experience: getArray(data, "positionView", "elements").map(parseExperience),
		education: getArray(data, "educationView", "elements").map(parseEducation),
	};
}

export async function getProfileContactInfo(
	client: VoyagerClient,
	ref: ProfileRef,
): Promise<ContactInfo> {
	const response = await client.get(`/identity/profiles/${profileRefId(ref)}/profileContactInfo`);
	return parseContactInfo(await readJsonBody(response));
}

export async function getProfileSkills(client: VoyagerClient, ref: ProfileRef): Promise<Skill[]> {
	const response = await client.get(
		`/identity/profiles/${profileRefId(ref)}/skills?count=100&start=0`,
	);
	return parseSkills(await readJsonBody(response));
}

/**
 * Full profile: the profile view plus skills and contact info (three requests).
 */
export async function getProfile(client: VoyagerClient, ref: ProfileRef): Promise<Profile> {
	const response = await client.get(`/identity/profiles/${profileRefId(ref)}/profileView`);
	await expectStatus(response, 200);
	const view = parseProfileView(await readJsonBody(response));

	const skills = await getProfileSkills(client, ref);
	const contact = await getProfileContactInfo(client, ref);

	return { ...view, skills, contact };
}

export async function getProfilePrivacySettings(
	client: VoyagerClient,
	publicId: string,
): Promise<JsonObject> {
	const response = await client.get(
		`/identity/profiles/${encodeURIComponent(publicId)}/privacySettings`,
	);
	if (response.status !== 200) {
		return {};
	}
	return getObject(await readJsonBody(response), "data") ?? {};
}

export async function getProfileMemberBadges(
	client: VoyagerClient,
	publicId: string,
): Promise<MemberBadges> {
	const response = await client.get(
		`/identity/profiles/${encodeURIComponent(publicId)}/memberBadges`,
	);
	if (response.status !== 200) {
		return { premium: false, openLink: false, influencer: false, jobSeeker: false };
	}
	const data = await readJsonBody(response);
	return {
		premium: getBoolean(data, "data", "premium") ?? false,
		openLink: getBoolean(data, "data", "openLink") ?? false,
		influencer: getBoolean(data, "data", "influencer") ?? false,
		jobSeeker: getBoolean(data, "data", "jobSeeker") ?? false,
	};
}

export async function getProfileNetworkInfo(
	client: VoyagerClient,
	publicId: string,
): Promise<NetworkInfo> {
	const response = await client.get(
		`/identity/profiles/${encodeURIComponent(publicId)}/networkinfo`,
	);
	if (response.status !== 200) {
		return { followersCount: 0 };
	}
	const data = await readJsonBody(response);
	return { followersCount: getNumber(data, "data", "followersCount") ?? 0 };
}

/**
 * Number of profile views shown on the "who viewed your profile" card.
 */
export async function getCurrentProfileViews(client: VoyagerClient): Promise<number> {
	const response = await client.get("/identity/wvmpCards");
	const data = await readJsonBody(response);
	return (
		getNumber(
			data,
			"elements",
			0,
			"value",
			VIEWERS_CARD,
			"insightCards",
			0,
			"value",
			SUMMARY_INSIGHT_CARD,
			"numViews",
		) ?? 0
	);
}

/**
 * Raw /me payload for the logged-in member.
 */
export async function getUserProfile(client: VoyagerClient): Promise<unknown> {
	const response = await client.get("/me");
	await expectStatus(response, 200);
	return readJsonBody(response);
}

/**
 * Removes a first-degree connection.
 */
export async function removeConnection(
	client: VoyagerClient,
	publicId: string,
): Promise<ActionResult> {
	const response = await client.post(
		`/identity/profiles/${encodeURIComponent(publicId)}/profileActions?action=disconnect`,
		{},
	);
	return { ok: response.status === 200, status: response.status };
}
