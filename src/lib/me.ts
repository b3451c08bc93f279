/**
 * Helpers for parsing /me responses.
 */

import { LinkedInError } from "./errors.js";
import { getArray, getObject, getString, isJsonObject, type JsonObject } from "./json.js";
import type { Me } from "./types.js";
import { extractUrnId } from "./urn.js";

/**
 * Parse a /me payload.
 * Handles both the legacy shape (`miniProfile`) and the normalized one (`included[0]`).
 *
 * @throws LinkedInError (request_failed) when neither shape is present
 */
export function parseMeResponse(data: unknown): Me {
	const included = getArray(data, "included").find(
		(entry): entry is JsonObject =>
			isJsonObject(entry) && getString(entry, "publicIdentifier") !== undefined,
	);
	const mini = getObject(data, "miniProfile") ?? included;

	if (!mini) {
		throw new LinkedInError("request_failed", "Could not parse profile from /me response.");
	}

	const urn =
		getString(mini, "entityUrn") ?? getString(mini, "dashEntityUrn") ?? getString(mini, "objectUrn");
	return {
		urnId: extractUrnId(urn),
		publicId: getString(mini, "publicIdentifier") ?? "",
		firstName: getString(mini, "firstName") ?? "",
		lastName: getString(mini, "lastName") ?? "",
		occupation: getString(mini, "occupation") ?? "",
	};
}
