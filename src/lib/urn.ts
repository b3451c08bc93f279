/**
 * Identifier codec for LinkedIn URNs.
 *
 * Voyager responses reference entities as `urn:<qualifier>:<namespace>:<id>`.
 * Only the namespace and id are kept; formatting always writes the `li` qualifier back,
 * so a parse/format round trip preserves the id but not necessarily the original string.
 */

import { LinkedInError } from "./errors.js";

export interface UniformResourceName {
	/** The entity type, e.g. "fs_miniProfile" or "conversation" */
	namespace: string;
	id: string;
}

const URN_QUALIFIER = "li";

/**
 * Parse a raw URN string.
 *
 * @example
 * parseUrn("urn:li:fs_miniProfile:ACoAAB1234")
 * // { namespace: "fs_miniProfile", id: "ACoAAB1234" }
 *
 * @throws LinkedInError (invalid_input) when there are fewer than four colon-separated parts
 */
export function parseUrn(raw: string): UniformResourceName {
	const parts = raw.split(":");
	if (parts.length < 4) {
		throw new LinkedInError("invalid_input", `Invalid URN: "${raw}"`, { detail: raw });
	}
	return { namespace: parts[2], id: parts[3] };
}

export function formatUrn(urn: UniformResourceName): string {
	return `urn:${URN_QUALIFIER}:${urn.namespace}:${urn.id}`;
}

export function urnId(urn: UniformResourceName): string {
	return urn.id;
}

/**
 * Id of a raw URN, or an empty string when it does not parse.
 * For response mappers that should degrade rather than fail.
 */
export function extractUrnId(raw: string | undefined): string {
	if (!raw) {
		return "";
	}
	try {
		return parseUrn(raw).id;
	} catch {
		return "";
	}
}
