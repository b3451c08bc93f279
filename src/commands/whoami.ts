/**
 * Whoami command - shows the logged-in member with follower and profile view counts.
 */

import { parseMeResponse } from "../lib/me.js";
import type { Identity } from "../lib/session.js";
import { formatWhoami } from "../output/human.js";
import { formatJson } from "../output/json.js";
import { openSession, type OutputOptions, type SessionOptions } from "./session.js";

export interface WhoamiOptions extends SessionOptions, OutputOptions {}

export async function whoami(identity: Identity, options: WhoamiOptions = {}): Promise<string> {
	const linkedin = await openSession(identity, options);

	const me = parseMeResponse(await linkedin.getUserProfile());
	const networkInfo = me.publicId
		? await linkedin.getProfileNetworkInfo(me.publicId)
		: { followersCount: 0 };
	const profileViews = await linkedin.getCurrentProfileViews();

	if (options.json) {
		return formatJson({ ...me, networkInfo, profileViews });
	}
	return formatWhoami(me, networkInfo, profileViews);
}
