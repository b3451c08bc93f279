/**
 * voyager-client - library exports.
 * Session handling, request pacing, and pagination for the LinkedIn Voyager API.
 */

// High-level API
export { LinkedIn, type LinkedInOptions } from "./linkedin.js";
// Endpoints
export type { CompanyRef } from "./api/feed.js";
export { MAX_SEARCH_COUNT, type SearchParams } from "./api/search.js";
// Client and session
export { VoyagerClient, type VoyagerClientOptions } from "./lib/client.js";
export { CookieStore } from "./lib/cookie-store.js";
export {
	type AuthenticateOptions,
	type AuthenticationMode,
	type Identity,
	SessionAuthenticator,
	type SessionState,
} from "./lib/session.js";
export { resolveConfig, type VoyagerConfig, type VoyagerConfigOptions } from "./lib/config.js";
// Identity resolution
export {
	type BrowserSource,
	type IdentityOptions,
	type IdentityResult,
	resolveIdentity,
} from "./lib/auth.js";
// Pagination
export { collectPages, MAX_REPEATED_REQUESTS } from "./lib/paginate.js";
// Identifiers and parsing
export { extractUrnId, formatUrn, parseUrn, type UniformResourceName, urnId } from "./lib/urn.js";
export { type ParsedLinkedInUrl, parseLinkedInUrl, toProfileRef } from "./lib/url-parser.js";
export { parseMeResponse } from "./lib/me.js";
export {
	getArray,
	getBoolean,
	getNumber,
	getObject,
	getPath,
	getString,
	isJsonObject,
	type JsonObject,
	type JsonValue,
} from "./lib/json.js";
// Errors
export { isLinkedInError, LinkedInError, type LinkedInErrorKind } from "./lib/errors.js";
// Constants
export { LINKEDIN_PROFILE_BASE_URL, VOYAGER_API_BASE_URL } from "./lib/constants.js";
export type * from "./lib/types.js";
