/**
 * Messaging endpoints on the legacy inbox.
 */

import type { VoyagerClient } from "../lib/client.js";
import { LinkedInError } from "../lib/errors.js";
import { getArray, getString } from "../lib/json.js";
import type {
	ActionResult,
	Conversation,
	ConversationEvents,
	MessageTarget,
} from "../lib/types.js";
import { extractUrnId, parseUrn } from "../lib/urn.js";
import { readJsonBody } from "./response.js";

const MESSAGE_CREATE = "com.linkedin.voyager.messaging.create.MessageCreate";

/**
 * Conversation ids from a conversations payload. Elements without a parseable URN are skipped.
 */
export function parseConversations(data: unknown): Conversation[] {
	return getArray(data, "elements")
		.map((element) => extractUrnId(getString(element, "entityUrn")))
		.filter((id) => id.length > 0)
		.map((id) => ({ id }));
}

export async function getConversations(client: VoyagerClient): Promise<Conversation[]> {
	const response = await client.get("/messaging/conversations?keyVersion=LEGACY_INBOX");
	return parseConversations(await readJsonBody(response));
}

/**
 * The conversation held with one member, by their profile URN id.
 *
 * @throws LinkedInError (request_failed) when there is no conversation with them
 */
export async function getConversationDetails(
	client: VoyagerClient,
	profileUrnId: string,
): Promise<Conversation> {
	const response = await client.get(
		`/messaging/conversations?keyVersion=LEGACY_INBOX&q=participants&recipients=List(${encodeURIComponent(
			profileUrnId,
		)})`,
	);
	const data = await readJsonBody(response);
	const entityUrn = getString(data, "elements", 0, "entityUrn");
	if (!entityUrn) {
		throw new LinkedInError("request_failed", `No conversation found with ${profileUrnId}.`);
	}
	return { id: parseUrn(entityUrn).id };
}

export async function getConversation(
	client: VoyagerClient,
	conversationId: string,
): Promise<ConversationEvents> {
	const response = await client.get(
		`/messaging/conversations/${encodeURIComponent(conversationId)}/events`,
	);
	const data = await readJsonBody(response);
	return { id: conversationId, events: getArray(data, "elements") };
}

export function buildMessageEvent(body: string): Record<string, unknown> {
	return {
		eventCreate: {
			value: {
				[MESSAGE_CREATE]: {
					body,
					attachments: [],
					attributedBody: { text: body, attributes: [] },
					mediaAttachments: [],
				},
			},
		},
	};
}

/**
 * Sends a message into an existing conversation, or opens a new one with `recipients`.
 * `ok` is true when LinkedIn answers 201 Created.
 *
 * @throws LinkedInError (invalid_input) for an empty body or a target with no recipients
 */
export async function sendMessage(
	client: VoyagerClient,
	target: MessageTarget,
	body: string,
): Promise<ActionResult> {
	if (!body) {
		throw new LinkedInError("invalid_input", "Message body must not be empty.");
	}

	let response: Response;
	if ("conversationId" in target) {
		if (!target.conversationId) {
			throw new LinkedInError("invalid_input", "A conversation id is required.");
		}
		response = await client.post(
			`/messaging/conversations/${encodeURIComponent(target.conversationId)}/events?action=create`,
			buildMessageEvent(body),
		);
	} else {
		if (target.recipients.length === 0) {
			throw new LinkedInError("invalid_input", "At least one recipient is required.");
		}
		response = await client.post("/messaging/conversations?action=create", {
			keyVersion: "LEGACY_INBOX",
			conversationCreate: {
				...buildMessageEvent(body),
				recipients: target.recipients,
				subtype: "MEMBER_TO_MEMBER",
			},
		});
	}

	return { ok: response.status === 201, status: response.status };
}

export async function markConversationAsSeen(
	client: VoyagerClient,
	conversationId: string,
): Promise<ActionResult> {
	const response = await client.post(
		`/messaging/conversations/${encodeURIComponent(conversationId)}`,
		{ patch: { $set: { read: true } } },
	);
	return { ok: response.status === 200, status: response.status };
}
