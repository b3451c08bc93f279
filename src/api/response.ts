/**
 * Response helpers shared by the endpoint modules.
 */

import { LinkedInError, statusError } from "../lib/errors.js";
import { getString } from "../lib/json.js";

/**
 * Parses a JSON body.
 *
 * @throws LinkedInError (json) when the body is not JSON
 */
export async function readJsonBody(response: Response): Promise<unknown> {
	try {
		return await response.json();
	} catch (error) {
		throw new LinkedInError("json", `Expected JSON from LinkedIn (status ${response.status}).`, {
			status: response.status,
			cause: error,
		});
	}
}

/**
 * Throws the mapped status error unless the response has the expected status.
 */
export async function expectStatus(response: Response, expected = 200): Promise<void> {
	if (response.status === expected) {
		return;
	}
	let details: string | undefined;
	try {
		const body: unknown = await response.json();
		details = getString(body, "message") ?? getString(body, "error");
	} catch {
		// Non-JSON error bodies carry nothing worth reporting.
		details = undefined;
	}
	throw statusError(response.status, details);
}

