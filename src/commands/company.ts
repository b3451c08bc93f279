/**
 * Company command - look up a company or school by universal name.
 */

import { LinkedInError } from "../lib/errors.js";
import type { Identity } from "../lib/session.js";
import { parseLinkedInUrl } from "../lib/url-parser.js";
import { formatOrganization } from "../output/human.js";
import { formatJson } from "../output/json.js";
import { openSession, type OutputOptions, type SessionOptions } from "./session.js";

export interface CompanyOptions extends SessionOptions, OutputOptions {
	school?: boolean;
}

/**
 * Universal name from a slug or a /company/ or /school/ URL. URNs are not accepted:
 * the lookup is by universal name only.
 */
export function toUniversalName(input: string): string {
	const parsed = parseLinkedInUrl(input, "company");
	if (parsed?.type !== "company" || parsed.identifier.startsWith("urn:")) {
		throw new LinkedInError(
			"invalid_input",
			"Invalid company identifier. Provide a company slug or URL.",
		);
	}
	return parsed.identifier;
}

export async function company(
	identity: Identity,
	identifier: string,
	options: CompanyOptions = {},
): Promise<string> {
	const universalName = toUniversalName(identifier);

	const linkedin = await openSession(identity, options);
	const organization = options.school
		? await linkedin.getSchool(universalName)
		: await linkedin.getCompany(universalName);

	if (options.json) {
		return formatJson(organization);
	}
	return formatOrganization(organization);
}
