/**
 * Login command - establishes a session and persists its cookies.
 */

import type { Identity } from "../lib/session.js";
import { formatLogin } from "../output/human.js";
import { formatJson } from "../output/json.js";
import { openSession, type OutputOptions, type SessionOptions } from "./session.js";

export interface LoginOptions extends SessionOptions, OutputOptions {}

/**
 * Authenticate and report how the session was obtained.
 *
 * @returns Formatted output string
 */
export async function login(identity: Identity, options: LoginOptions = {}): Promise<string> {
	const linkedin = await openSession(identity, options);
	const cookiePath = linkedin.client.cookies.filePath;

	if (options.json) {
		return formatJson({ mode: linkedin.authentication, cookiePath });
	}
	return formatLogin(linkedin.authentication, cookiePath);
}
