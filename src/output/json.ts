/**
 * JSON output formatting for the voyager CLI.
 * Used when --json flag is passed.
 */

/**
 * Serialize command output with 2-space indentation.
 * `undefined` becomes an empty object so the output always parses.
 */
export function formatJson(data: unknown): string {
	if (data === undefined) {
		return "{}";
	}
	return JSON.stringify(data, null, 2);
}
