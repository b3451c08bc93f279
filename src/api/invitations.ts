/**
 * Received connection invitations.
 */

import type { VoyagerClient } from "../lib/client.js";
import { getArray, getString } from "../lib/json.js";
import type { ActionResult, Invitation, InvitationAction } from "../lib/types.js";
import { parseUrn } from "../lib/urn.js";
import { readJsonBody } from "./response.js";

export function parseInvitations(data: unknown): Invitation[] {
	const invitations: Invitation[] = [];
	for (const element of getArray(data, "elements")) {
		const entityUrn = getString(element, "invitation", "entityUrn");
		const sharedSecret = getString(element, "invitation", "sharedSecret");
		if (entityUrn && sharedSecret) {
			invitations.push({ entityUrn, sharedSecret });
		}
	}
	return invitations;
}

/**
 * One page of pending invitations. A non-200 response yields an empty list.
 */
export async function getInvitations(
	client: VoyagerClient,
	start = 0,
	limit = 3,
): Promise<Invitation[]> {
	const response = await client.get(
		`/relationships/invitationViews?start=${start}&count=${limit}&includeInsights=true&q=receivedInvitation`,
	);
	if (response.status !== 200) {
		return [];
	}
	return parseInvitations(await readJsonBody(response));
}

/**
 * Accepts or ignores an invitation.
 *
 * @throws LinkedInError (invalid_input) when the entity URN does not parse
 */
export async function replyInvitation(
	client: VoyagerClient,
	invitation: Invitation,
	action: InvitationAction = "accept",
): Promise<ActionResult> {
	const invitationId = parseUrn(invitation.entityUrn).id;
	const response = await client.post(
		`/relationships/invitations/${encodeURIComponent(invitationId)}?action=${action}`,
		{
			invitationId,
			invitationSharedSecret: invitation.sharedSecret,
			isGenericInvitation: false,
		},
	);
	return { ok: response.status === 200, status: response.status };
}
