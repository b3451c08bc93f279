/**
 * Error model for the Voyager client.
 * One error class with a discriminating kind, so callers can branch without instanceof chains.
 */

export type LinkedInErrorKind =
	| "unauthorized"
	| "challenge"
	| "request_failed"
	| "invalid_input"
	| "rate_limit"
	| "not_found"
	| "io"
	| "json"
	| "http";

export interface LinkedInErrorOptions {
	status?: number;
	detail?: string;
	cause?: unknown;
}

/**
 * Error raised by every layer of the client.
 *
 * `status` is set when the failure came from an HTTP response, `detail` carries the
 * upstream value worth showing (a challenge type, a body message).
 */
export class LinkedInError extends Error {
	readonly kind: LinkedInErrorKind;
	readonly status?: number;
	readonly detail?: string;

	constructor(kind: LinkedInErrorKind, message: string, options: LinkedInErrorOptions = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = "LinkedInError";
		this.kind = kind;
		this.status = options.status;
		this.detail = options.detail;
	}
}

export function isLinkedInError(error: unknown, kind?: LinkedInErrorKind): error is LinkedInError {
	if (!(error instanceof LinkedInError)) {
		return false;
	}
	return kind === undefined || error.kind === kind;
}

/**
 * Maps HTTP status codes to actionable error messages.
 */
export function getErrorMessage(status: number, details?: string): string {
	switch (status) {
		case 401:
			return "Session expired. Run with --refresh to log in again.";
		case 403:
			return "Not authorized for this action. Check your permissions.";
		case 404:
			return `Resource not found${details ? `: ${details}` : ""}.`;
		case 400:
			return `Invalid request${details ? `: ${details}` : ""}.`;
		case 429:
			return "Rate limited by LinkedIn. Slow down and try again later.";
		case 999:
			return "LinkedIn is blocking requests. Try again later or rotate your session.";
		default:
			return `Request failed with status ${status}${details ? `: ${details}` : ""}.`;
	}
}

/**
 * Builds the error for an unexpected response status.
 * 401 and 429 get their own kinds; everything else is `request_failed`.
 */
export function statusError(status: number, details?: string): LinkedInError {
	const message = getErrorMessage(status, details);
	if (status === 401) {
		return new LinkedInError("unauthorized", message, { status, detail: details });
	}
	if (status === 429) {
		return new LinkedInError("rate_limit", message, { status, detail: details });
	}
	return new LinkedInError("request_failed", message, { status, detail: details });
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
