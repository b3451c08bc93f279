/**
 * Company and school lookups. Both are organizations behind the same endpoint.
 */

import type { VoyagerClient } from "../lib/client.js";
import { ORGANIZATION_DECORATION_ID } from "../lib/constants.js";
import { LinkedInError, statusError } from "../lib/errors.js";
import { getNumber, getObject, getPath, getString } from "../lib/json.js";
import type { Organization } from "../lib/types.js";
import { buildQueryString } from "./search.js";
import { readJsonBody } from "./response.js";

/**
 * Maps an organization lookup payload.
 *
 * @throws LinkedInError when the body reports a non-200 status or has no named element
 */
export function parseOrganization(data: unknown, kind: "company" | "school"): Organization {
	const status = getPath(data, "status");
	if (status !== undefined && status !== 200) {
		const code = typeof status === "number" ? status : 0;
		throw statusError(code, getString(data, "message") ?? `${kind} lookup failed`);
	}

	const element = getObject(data, "elements", 0);
	if (!element) {
		throw new LinkedInError("request_failed", `No ${kind} data found.`);
	}
	const name = getString(element, "name");
	if (!name) {
		throw new LinkedInError("request_failed", `No ${kind} name found.`);
	}

	const staffCount = getNumber(element, "staffCount");
	return {
		name,
		universalName: getString(element, "universalName") ?? "",
		description: getString(element, "description") ?? "",
		...(staffCount === undefined ? {} : { staffCount }),
	};
}

async function getOrganization(
	client: VoyagerClient,
	publicId: string,
	kind: "company" | "school",
): Promise<Organization> {
	if (!publicId) {
		throw new LinkedInError("invalid_input", `A ${kind} public id is required.`);
	}
	const query = buildQueryString({
		decorationId: ORGANIZATION_DECORATION_ID,
		q: "universalName",
		universalName: publicId,
	});
	const response = await client.get(`/organization/companies?${query}`);
	return parseOrganization(await readJsonBody(response), kind);
}

export async function getCompany(client: VoyagerClient, publicId: string): Promise<Organization> {
	return getOrganization(client, publicId, "company");
}

export async function getSchool(client: VoyagerClient, publicId: string): Promise<Organization> {
	return getOrganization(client, publicId, "school");
}
