/**
 * Updates command - recent feed updates of a member or company.
 */

import type { Identity } from "../lib/session.js";
import type { ProfileRef } from "../lib/types.js";
import { toProfileRef } from "../lib/url-parser.js";
import { formatCount } from "../output/human.js";
import { formatJson } from "../output/json.js";
import { toUniversalName } from "./company.js";
import { openSession, parseCount, type OutputOptions, type SessionOptions } from "./session.js";

export interface UpdatesOptions extends SessionOptions, OutputOptions {
	company?: boolean;
	count?: number;
}

const DEFAULT_COUNT = 20;

export async function updates(
	identity: Identity,
	identifier: string,
	options: UpdatesOptions = {},
): Promise<string> {
	const count = parseCount(options.count, DEFAULT_COUNT);
	// Validate before any network traffic
	const target: { company: string } | { profile: ProfileRef } = options.company
		? { company: toUniversalName(identifier) }
		: { profile: toProfileRef(identifier) };

	const linkedin = await openSession(identity, options);
	const items =
		"company" in target
			? await linkedin.getCompanyUpdates({ publicId: target.company }, count)
			: await linkedin.getProfileUpdates(target.profile, count);

	if (options.json) {
		return formatJson({ identifier, updates: items });
	}
	return formatCount(items.length, "updates");
}
