/**
 * Invites command - list pending connection invitations.
 */

import type { Identity } from "../lib/session.js";
import { formatCount, formatInvitation, formatList } from "../output/human.js";
import { formatJson } from "../output/json.js";
import { openSession, parseCount, type OutputOptions, type SessionOptions } from "./session.js";

export interface InvitesOptions extends SessionOptions, OutputOptions {
	start?: number;
	count?: number;
	/** Include shared secrets in JSON output */
	includeSecrets?: boolean;
}

const DEFAULT_COUNT = 10;

export async function listInvites(
	identity: Identity,
	options: InvitesOptions = {},
): Promise<string> {
	const start = options.start !== undefined && options.start > 0 ? Math.floor(options.start) : 0;
	const count = parseCount(options.count, DEFAULT_COUNT);

	const linkedin = await openSession(identity, options);
	const invitations = await linkedin.getInvitations(start, count);

	if (options.json) {
		const visible = options.includeSecrets
			? invitations
			: invitations.map(({ entityUrn }) => ({ entityUrn }));
		return formatJson({ start, invitations: visible });
	}
	return [
		formatList(invitations, formatInvitation, "No pending invitations."),
		"",
		formatCount(invitations.length, "invitations"),
	].join("\n");
}
