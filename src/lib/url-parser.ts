/**
 * LinkedIn URL and URN parser
 *
 * Turns what a user types (a profile or company URL, a URN, or a bare slug) into an
 * identifier the endpoint layer can address.
 */

import { LinkedInError } from "./errors.js";
import type { ProfileRef } from "./types.js";
import { parseUrn, type UniformResourceName } from "./urn.js";

export type ParsedLinkedInUrl = {
	type: "profile" | "company";
	identifier: string;
};

/** URN namespaces that address a member profile */
const PROFILE_URN_TYPES = new Set(["member", "fsd_profile", "fs_miniProfile", "fs_profile"]);

/** URN namespaces that address an organization */
const COMPANY_URN_TYPES = new Set(["company", "fsd_company", "fs_miniCompany", "organization"]);

/**
 * Parse a LinkedIn URL, URN, or slug.
 *
 * @param input - A LinkedIn URL, URN, or plain public identifier
 * @param fallback - Type assumed for a plain slug
 * @returns Parsed result, or null if the input is not recognized
 *
 * @example
 * parseLinkedInUrl("https://www.linkedin.com/in/jane-doe")
 * // { type: "profile", identifier: "jane-doe" }
 *
 * @example
 * parseLinkedInUrl("urn:li:fs_miniProfile:ACoAAB1234")
 * // { type: "profile", identifier: "urn:li:fs_miniProfile:ACoAAB1234" }
 */
export function parseLinkedInUrl(
	input: string,
	fallback: ParsedLinkedInUrl["type"] = "profile",
): ParsedLinkedInUrl | null {
	const trimmed = input.trim();

	if (!trimmed) {
		return null;
	}

	if (trimmed.startsWith("urn:")) {
		return parseUrnInput(trimmed);
	}

	if (trimmed.startsWith("http://") || trimmed.startsWith("https://")) {
		return parseUrl(trimmed);
	}

	if (trimmed.includes("/") || /\s/.test(trimmed)) {
		return null;
	}

	return { type: fallback, identifier: trimmed };
}

function parseUrnInput(urn: string): ParsedLinkedInUrl | null {
	let parsed: UniformResourceName;
	try {
		parsed = parseUrn(urn);
	} catch {
		return null;
	}
	const { namespace, id } = parsed;

	if (!id) {
		return null;
	}
	if (PROFILE_URN_TYPES.has(namespace)) {
		return { type: "profile", identifier: urn };
	}
	if (COMPANY_URN_TYPES.has(namespace)) {
		return { type: "company", identifier: urn };
	}
	return null;
}

function parseUrl(urlString: string): ParsedLinkedInUrl | null {
	let url: URL;

	try {
		url = new URL(urlString);
	} catch {
		return null;
	}

	const hostname = url.hostname.toLowerCase();
	if (hostname !== "linkedin.com" && !hostname.endsWith(".linkedin.com")) {
		return null;
	}

	const pathname = decodeURIComponent(url.pathname);

	// Profile: /in/<username>
	const profileMatch = pathname.match(/^\/in\/([^/?#]+)/);
	if (profileMatch) {
		return { type: "profile", identifier: profileMatch[1] };
	}

	// Company or school: /company/<slug>, /school/<slug>
	const companyMatch = pathname.match(/^\/(?:company|school)\/([^/?#]+)/);
	if (companyMatch) {
		return { type: "company", identifier: companyMatch[1] };
	}

	return null;
}

/**
 * Resolve user input to a {@link ProfileRef}.
 *
 * @throws LinkedInError (invalid_input) when the input does not name a profile
 */
export function toProfileRef(input: string): ProfileRef {
	const parsed = parseLinkedInUrl(input, "profile");
	if (parsed?.type !== "profile") {
		throw new LinkedInError(
			"invalid_input",
			"Invalid profile identifier. Provide a username, profile URL, or URN.",
		);
	}
	if (parsed.identifier.startsWith("urn:")) {
		return { urn: parseUrn(parsed.identifier) };
	}
	return { publicId: parsed.identifier };
}
