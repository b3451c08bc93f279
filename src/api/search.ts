/**
 * Blended search and the people-search filters built on top of it.
 * Results are scrolled with the paginated collector, 49 hits per request at most.
 */

import type { VoyagerClient } from "../lib/client.js";
import { getArray, getString } from "../lib/json.js";
import { collectPages } from "../lib/paginate.js";
import type { Connection, PersonSearchResult, SearchPeopleParams } from "../lib/types.js";
import { extractUrnId } from "../lib/urn.js";
import { expectStatus, readJsonBody } from "./response.js";

export const MAX_SEARCH_COUNT = 49;

export type SearchParams = Record<string, string>;

const DEFAULT_SEARCH_PARAMS: SearchParams = {
	filters: "List()",
	origin: "GLOBAL_SEARCH_HEADER",
	q: "all",
	queryContext:
		"List(spellCorrectionEnabled->true,relatedSearchesEnabled->true,kcardTypes->PROFILE|COMPANY)",
};

export function buildQueryString(params: SearchParams): string {
	return Object.entries(params)
		.map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
		.join("&");
}

/**
 * Hits of a /search/blended page: the inner elements of every cluster.
 */
export function extractSearchHits(data: unknown): unknown[] {
	return getArray(data, "data", "elements").flatMap((cluster) => getArray(cluster, "elements"));
}

/**
 * Raw blended search. `params` override the defaults; `count` and `start` are managed here.
 *
 * @param limit - Maximum hits to return; unbounded when omitted
 */
export async function search(
	client: VoyagerClient,
	params: SearchParams,
	limit?: number,
): Promise<unknown[]> {
	if (limit === 0) {
		return [];
	}
	const count = Math.min(limit ?? MAX_SEARCH_COUNT, MAX_SEARCH_COUNT);
	const merged: SearchParams = { ...DEFAULT_SEARCH_PARAMS, ...params, count: String(count) };

	return collectPages({
		pageSize: count,
		limit,
		fetchPage: async (start) => {
			const query = buildQueryString({ ...merged, start: String(start) });
			const response = await client.get(`/search/blended?${query}`);
			await expectStatus(response);
			return readJsonBody(response);
		},
		extract: extractSearchHits,
	});
}

/**
 * The `filters` value for a people search, e.g. `List(resultType->PEOPLE,network->F)`.
 */
export function buildPeopleFilters(params: SearchPeopleParams): string {
	const filters = ["resultType->PEOPLE"];
	const lists: Array<[string, string[] | undefined]> = [
		["geoRegion", params.regions],
		["industry", params.industries],
		["currentCompany", params.currentCompany],
		["pastCompany", params.pastCompanies],
		["profileLanguage", params.profileLanguages],
		["nonprofitInterest", params.nonprofitInterests],
		["schools", params.schools],
	];

	if (params.connectionOf) {
		filters.push(`connectionOf->${params.connectionOf}`);
	}
	if (params.networkDepth) {
		filters.push(`network->${params.networkDepth}`);
	}
	for (const [name, values] of lists) {
		if (values && values.length > 0) {
			filters.push(`${name}->${values.join("|")}`);
		}
	}
	return `List(${filters.join(",")})`;
}

/**
 * Maps a search hit to a person, or null for hits that are not profiles.
 */
export function parsePersonHit(hit: unknown): PersonSearchResult | null {
	const publicId = getString(hit, "publicIdentifier");
	if (!publicId) {
		return null;
	}
	return {
		urnId: extractUrnId(getString(hit, "targetUrn")),
		publicId,
		distance: getString(hit, "memberDistance", "value") ?? "",
	};
}

export async function searchPeople(
	client: VoyagerClient,
	params: SearchPeopleParams,
): Promise<PersonSearchResult[]> {
	const searchParams: SearchParams = { filters: buildPeopleFilters(params) };
	if (params.keywords) {
		searchParams.keywords = params.keywords;
	}

	const hits = await search(client, searchParams, params.limit);
	return hits
		.map(parsePersonHit)
		.filter((person): person is PersonSearchResult => person !== null);
}

/**
 * First-degree connections of a profile, by its URN id.
 */
export async function getProfileConnections(
	client: VoyagerClient,
	urnId: string,
): Promise<Connection[]> {
	return searchPeople(client, { connectionOf: urnId, networkDepth: "F" });
}

/**
 * One page of the guided people vertical (`/search/hits`), returned raw.
 * A non-200 response yields `{}`.
 */
export async function guidedPeopleSearch(
	client: VoyagerClient,
	keywords: string,
	count: number,
	start = 0,
): Promise<unknown> {
	let path = `/search/hits?count=${count}&guides=List%28v-%253EPEOPLE%29&keywords=${encodeURIComponent(keywords)}&origin=SWITCH_SEARCH_VERTICAL&q=guided`;
	if (start > 0) {
		path += `&start=${start}`;
	}

	const response = await client.get(path);
	if (response.status !== 200) {
		return {};
	}
	return readJsonBody(response);
}
