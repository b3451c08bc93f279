/**
 * Human-readable output formatting for the voyager CLI.
 * Uses emoji and colors for rich terminal output.
 */

import pc from "picocolors";
import type { AuthenticationMode } from "../lib/session.js";
import type {
	ActionResult,
	Conversation,
	Invitation,
	Me,
	NetworkInfo,
	Organization,
	PersonSearchResult,
	Profile,
} from "../lib/types.js";
import { LINKEDIN_PROFILE_BASE_URL } from "../lib/constants.js";

const MAX_PREVIEW_LENGTH = 60;

/**
 * Format a number with comma separators.
 */
function formatNumber(num: number): string {
	return num.toLocaleString("en-US");
}

/**
 * Truncate a string with ellipsis if it exceeds max length.
 */
export function truncate(text: string, maxLength: number): string {
	if (text.length <= maxLength) {
		return text;
	}
	return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Readable label for a network distance value such as "DISTANCE_2".
 */
export function formatDistance(distance: string): string {
	const match = distance.match(/^DISTANCE_(\d+)$/);
	if (match) {
		const degree = Number(match[1]);
		const suffix = degree === 1 ? "st" : degree === 2 ? "nd" : degree === 3 ? "rd" : "th";
		return `${degree}${suffix}`;
	}
	if (distance === "OUT_OF_NETWORK") {
		return "out of network";
	}
	return distance;
}

export function formatLogin(mode: AuthenticationMode, cookiePath: string): string {
	switch (mode) {
		case "reused":
			return `\u{2705} Session ${pc.green("restored")} from ${pc.cyan(cookiePath)}`;
		case "tokens":
			return `\u{2705} Session ${pc.green("seeded")} from li_at/JSESSIONID, saved to ${pc.cyan(cookiePath)}`;
		case "login":
			return `\u{2705} ${pc.green("Logged in")}, cookies saved to ${pc.cyan(cookiePath)}`;
	}
}

/**
 * Format a profile for display.
 * Shows name, headline, location, recent positions, and profile URL.
 */
export function formatProfile(profile: Profile): string {
	const lines: string[] = [];

	const fullName = `${profile.firstName} ${profile.lastName}`.trim();
	lines.push(`\u{1F464} ${pc.bold(fullName)} ${pc.dim(`@${profile.publicId}`)}`);

	if (profile.headline) {
		lines.push(`   ${profile.headline}`);
	}

	const place = [profile.locationName, profile.industryName].filter(Boolean).join(" \u{00B7} ");
	if (place) {
		lines.push(`   ${pc.dim(place)}`);
	}

	for (const position of profile.experience.slice(0, 3)) {
		const title = position.title ?? "Role";
		const company = position.companyName ? ` at ${position.companyName}` : "";
		lines.push(`   \u{1F4BC} ${title}${company}`);
	}

	if (profile.skills.length > 0) {
		const skills = profile.skills.map((skill) => skill.name).join(", ");
		lines.push(`   ${pc.gray(truncate(skills, MAX_PREVIEW_LENGTH))}`);
	}

	if (profile.publicId) {
		lines.push(`   ${pc.cyan(`${LINKEDIN_PROFILE_BASE_URL}${profile.publicId}`)}`);
	}

	return lines.join("\n");
}

/**
 * Format whoami output.
 * Shows the member with follower and profile view counts.
 */
export function formatWhoami(me: Me, networkInfo: NetworkInfo, profileViews: number): string {
	const fullName = `${me.firstName} ${me.lastName}`.trim();
	const lines: string[] = [];

	lines.push(`\u{1F464} ${pc.bold(fullName)} ${pc.dim(`@${me.publicId}`)}`);

	if (me.occupation) {
		lines.push(`   ${me.occupation}`);
	}

	const followers = formatNumber(networkInfo.followersCount);
	const views = formatNumber(profileViews);
	lines.push(`   ${pc.green(followers)} followers \u{00B7} ${pc.blue(views)} profile views`);

	lines.push(`   ${pc.cyan(`${LINKEDIN_PROFILE_BASE_URL}${me.publicId}`)}`);

	return lines.join("\n");
}

/**
 * Format a people search hit.
 */
export function formatPerson(person: PersonSearchResult): string {
	const distance = person.distance ? ` ${pc.gray(formatDistance(person.distance))}` : "";
	return [
		`\u{1F517} ${pc.bold(`@${person.publicId}`)}${distance}`,
		`   ${pc.cyan(`${LINKEDIN_PROFILE_BASE_URL}${person.publicId}`)}`,
	].join("\n");
}

export function formatOrganization(organization: Organization): string {
	const lines = [`\u{1F3E2} ${pc.bold(organization.name)} ${pc.dim(`@${organization.universalName}`)}`];
	if (organization.description) {
		lines.push(`   ${truncate(organization.description, MAX_PREVIEW_LENGTH)}`);
	}
	if (organization.staffCount !== undefined) {
		lines.push(`   ${pc.gray(`${formatNumber(organization.staffCount)} employees`)}`);
	}
	return lines.join("\n");
}

export function formatConversation(conversation: Conversation): string {
	return `\u{1F4AC} ${pc.bold(conversation.id)}`;
}

export function formatInvitation(invitation: Invitation): string {
	return `\u{1F4E8} ${pc.bold(invitation.entityUrn)}`;
}

export function formatActionResult(action: string, result: ActionResult): string {
	if (result.ok) {
		return `\u{2705} ${action} ${pc.green("succeeded")}`;
	}
	return `\u{274C} ${action} ${pc.red("failed")} ${pc.dim(`(status ${result.status})`)}`;
}

/**
 * Join formatted items, or show a placeholder when there are none.
 */
export function formatList<T>(items: T[], format: (item: T) => string, empty: string): string {
	if (items.length === 0) {
		return pc.dim(empty);
	}
	return items.map(format).join("\n\n");
}

/**
 * Footer with the number of items shown.
 */
export function formatCount(count: number, noun: string): string {
	return pc.gray(`Showing ${formatNumber(count)} ${noun}`);
}
