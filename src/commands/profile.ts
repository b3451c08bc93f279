/**
 * Profile command - view a LinkedIn profile.
 *
 * Supports various input formats:
 * - Plain public identifier: "jane-doe"
 * - Profile URL: "https://linkedin.com/in/jane-doe"
 * - Profile URN: "urn:li:fs_miniProfile:ACoAAB1234"
 */

import type { Identity } from "../lib/session.js";
import { toProfileRef } from "../lib/url-parser.js";
import { formatProfile } from "../output/human.js";
import { formatJson } from "../output/json.js";
import { openSession, type OutputOptions, type SessionOptions } from "./session.js";

export interface ProfileOptions extends SessionOptions, OutputOptions {}

export async function profile(
	identity: Identity,
	identifier: string,
	options: ProfileOptions = {},
): Promise<string> {
	// Validate before any network traffic
	const ref = toProfileRef(identifier);

	const linkedin = await openSession(identity, options);
	const result = await linkedin.getProfile(ref);

	if (options.json) {
		return formatJson(result);
	}
	return formatProfile(result);
}
