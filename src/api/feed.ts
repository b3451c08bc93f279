/**
 * Feed updates for companies and members, scrolled 100 at a time.
 */

import type { VoyagerClient } from "../lib/client.js";
import { LinkedInError } from "../lib/errors.js";
import { getArray } from "../lib/json.js";
import { collectPages } from "../lib/paginate.js";
import type { ProfileRef } from "../lib/types.js";
import { buildQueryString, type SearchParams } from "./search.js";
import { expectStatus, readJsonBody } from "./response.js";

export const MAX_UPDATE_COUNT = 100;

/**
 * A company by universal name ("acme-corp") or by URN id.
 */
export type CompanyRef = { publicId: string } | { urnId: string };

function companyRefId(ref: CompanyRef): string {
	const id = "publicId" in ref ? ref.publicId : ref.urnId;
	if (!id) {
		throw new LinkedInError("invalid_input", "A company public id or URN id is required.");
	}
	return id;
}

function profileRefIdentifier(ref: ProfileRef): string {
	const id = "publicId" in ref ? ref.publicId : ref.urn.id;
	if (!id) {
		throw new LinkedInError("invalid_input", "A profile public id or URN is required.");
	}
	return id;
}

async function collectUpdates(
	client: VoyagerClient,
	params: SearchParams,
	maxResults?: number,
): Promise<unknown[]> {
	return collectPages({
		pageSize: MAX_UPDATE_COUNT,
		limit: maxResults,
		fetchPage: async (start) => {
			const query = buildQueryString({
				...params,
				moduleKey: "member-share",
				count: String(MAX_UPDATE_COUNT),
				start: String(start),
			});
			const response = await client.get(`/feed/updates?${query}`);
			await expectStatus(response);
			return readJsonBody(response);
		},
		extract: (page) => getArray(page, "elements"),
	});
}

export async function getCompanyUpdates(
	client: VoyagerClient,
	ref: CompanyRef,
	maxResults?: number,
): Promise<unknown[]> {
	return collectUpdates(
		client,
		{ companyUniversalName: companyRefId(ref), q: "companyFeedByUniversalName" },
		maxResults,
	);
}

export async function getProfileUpdates(
	client: VoyagerClient,
	ref: ProfileRef,
	maxResults?: number,
): Promise<unknown[]> {
	return collectUpdates(
		client,
		{ profileId: profileRefIdentifier(ref), q: "memberShareFeed" },
		maxResults,
	);
}
