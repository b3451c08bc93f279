/**
 * Messages commands - list conversations and send messages.
 */

import type { Identity } from "../lib/session.js";
import type { MessageTarget } from "../lib/types.js";
import {
	formatActionResult,
	formatConversation,
	formatCount,
	formatList,
} from "../output/human.js";
import { formatJson } from "../output/json.js";
import { openSession, type OutputOptions, type SessionOptions } from "./session.js";

export interface ListConversationsOptions extends SessionOptions, OutputOptions {}

export interface SendOptions extends SessionOptions, OutputOptions {
	/** Existing conversation id */
	conversation?: string;
	/** Profile URN ids for a new conversation */
	to?: string[];
}

export async function listConversations(
	identity: Identity,
	options: ListConversationsOptions = {},
): Promise<string> {
	const linkedin = await openSession(identity, options);
	const conversations = await linkedin.getConversations();

	if (options.json) {
		return formatJson({ conversations });
	}
	return [
		formatList(conversations, formatConversation, "No conversations."),
		"",
		formatCount(conversations.length, "conversations"),
	].join("\n");
}

function resolveTarget(options: SendOptions): MessageTarget {
	if (options.conversation && options.to?.length) {
		throw new Error("Use either --conversation or --to, not both.");
	}
	if (options.conversation) {
		return { conversationId: options.conversation };
	}
	if (options.to?.length) {
		return { recipients: options.to };
	}
	throw new Error("A message needs --conversation <id> or --to <urnId...>.");
}

export async function sendMessage(
	identity: Identity,
	text: string,
	options: SendOptions = {},
): Promise<string> {
	const target = resolveTarget(options);
	if (!text.trim()) {
		throw new Error("Message text must not be empty.");
	}

	const linkedin = await openSession(identity, options);
	const result = await linkedin.sendMessage(target, text);

	if (options.json) {
		return formatJson(result);
	}
	return formatActionResult("Send", result);
}
