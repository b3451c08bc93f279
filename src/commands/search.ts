/**
 * Search command - people search by keywords and network filters.
 */

import type { Identity } from "../lib/session.js";
import { formatCount, formatList, formatPerson } from "../output/human.js";
import { formatJson } from "../output/json.js";
import { openSession, parseCount, type OutputOptions, type SessionOptions } from "./session.js";

export interface SearchOptions extends SessionOptions, OutputOptions {
	count?: number;
	/** Network depth filter: "F", "S", "O" or a "|"-joined combination */
	network?: string;
	/** Only people connected to this profile URN id */
	connectionOf?: string;
}

const DEFAULT_COUNT = 10;

export async function search(
	identity: Identity,
	keywords: string,
	options: SearchOptions = {},
): Promise<string> {
	const query = keywords.trim();
	if (!query) {
		throw new Error("Invalid search: keywords are required.");
	}

	const linkedin = await openSession(identity, options);
	const people = await linkedin.searchPeople({
		keywords: query,
		limit: parseCount(options.count, DEFAULT_COUNT),
		...(options.network ? { networkDepth: options.network } : {}),
		...(options.connectionOf ? { connectionOf: options.connectionOf } : {}),
	});

	if (options.json) {
		return formatJson({ query, people });
	}
	return [
		formatList(people, formatPerson, "No people found."),
		"",
		formatCount(people.length, "people"),
	].join("\n");
}
