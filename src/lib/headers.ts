/**
 * Request header construction for LinkedIn Voyager API.
 * Data requests carry a desktop browser signature; the login handshake carries a mobile one.
 */

/**
 * User-Agent string for data requests.
 */
const DESKTOP_USER_AGENT =
	"Mozilla/5.0 (Macintosh; Intel Mac OS X 10_13_5) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/66.0.3359.181 Safari/537.36";

/**
 * Signature of the LinkedIn iOS app that the login endpoint accepts.
 * Must match byte for byte; a different client string gets the session flagged.
 */
const MOBILE_AUTH_LIBRARY = "LIAuthLibrary:3.2.4 com.linkedin.LinkedIn:8.8.1 iPhone:8.3";
const MOBILE_USER_AGENT = "LinkedIn/8.8.1 CFNetwork/711.3.18 Darwin/14.0.0";

/**
 * Headers sent with every Voyager data request.
 * Cookie and csrf-token are added per request from the current session.
 */
export function buildDefaultHeaders(): Record<string, string> {
	return {
		"User-Agent": DESKTOP_USER_AGENT,
		"Accept-Language": "en-AU,en-GB;q=0.9,en-US;q=0.8,en;q=0.7",
		"X-Li-Lang": "en_US",
		"X-Restli-Protocol-Version": "2.0.0",
	};
}

/**
 * Headers for the priming GET and the credential POST of the login handshake.
 */
export function buildLoginHeaders(): Record<string, string> {
	return {
		"X-Li-User-Agent": MOBILE_AUTH_LIBRARY,
		"User-Agent": MOBILE_USER_AGENT,
		"X-User-Language": "en",
		"X-User-Locale": "en_US",
		"Accept-Language": "en-us",
	};
}
