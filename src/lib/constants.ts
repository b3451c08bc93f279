/**
 * Shared constants for the Voyager client.
 */

/**
 * Origin the session cookies are scoped to. Login endpoints live directly under it.
 */
export const LINKEDIN_URL = "https://www.linkedin.com";

/**
 * Base URL for every data endpoint.
 */
export const VOYAGER_API_BASE_URL = `${LINKEDIN_URL}/voyager/api`;

export const LOGIN_PATH = "/uas/authenticate";

/**
 * Default location of the persisted cookie record, relative to the working directory.
 */
export const DEFAULT_COOKIE_PATH = ".cookies.json";

export const LI_AT_COOKIE = "li_at";
export const JSESSIONID_COOKIE = "JSESSIONID";

/**
 * Base URL for LinkedIn profile pages.
 *
 * @example
 * const profileUrl = `${LINKEDIN_PROFILE_BASE_URL}${username}`;
 */
export const LINKEDIN_PROFILE_BASE_URL = "https://www.linkedin.com/in/";

/**
 * Decoration used by the organization lookup for both companies and schools.
 */
export const ORGANIZATION_DECORATION_ID =
	"com.linkedin.voyager.deco.organization.web.WebFullCompanyMain-12";
