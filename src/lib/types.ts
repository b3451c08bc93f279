/**
 * Normalized shapes returned by the endpoint layer.
 */

import type { UniformResourceName } from "./urn.js";

/**
 * Which profile to address: a public identifier ("jane-doe") or a parsed URN.
 */
export type ProfileRef = { publicId: string } | { urn: UniformResourceName };

export interface Experience {
	title?: string;
	companyName?: string;
	locationName?: string;
}

export interface Education {
	schoolName?: string;
	degreeName?: string;
	fieldOfStudy?: string;
}

export interface Skill {
	name: string;
}

export interface Website {
	url: string;
	label?: string;
}

export interface ContactInfo {
	emailAddress?: string;
	websites: Website[];
	twitter: string[];
	phoneNumbers: string[];
	birthdate?: string;
}

export interface Profile {
	/** Id part of the mini profile URN */
	profileId: string;
	publicId: string;
	firstName: string;
	lastName: string;
	headline: string;
	summary: string;
	industryName: string;
	locationName: string;
	experience: Experience[];
	education: Education[];
	skills: Skill[];
	contact: ContactInfo;
}

export interface PersonSearchResult {
	urnId: string;
	publicId: string;
	/** Network distance, e.g. "DISTANCE_1" */
	distance: string;
}

export type Connection = PersonSearchResult;

export interface SearchPeopleParams {
	keywords?: string;
	connectionOf?: string;
	/** "F" (1st), "S" (2nd) or "O" (out of network); several joined by "|" */
	networkDepth?: string;
	currentCompany?: string[];
	pastCompanies?: string[];
	nonprofitInterests?: string[];
	profileLanguages?: string[];
	regions?: string[];
	industries?: string[];
	schools?: string[];
	limit?: number;
}

export interface MemberBadges {
	premium: boolean;
	openLink: boolean;
	influencer: boolean;
	jobSeeker: boolean;
}

export interface NetworkInfo {
	followersCount: number;
}

export interface Organization {
	name: string;
	universalName: string;
	description: string;
	staffCount?: number;
}

export interface Conversation {
	id: string;
}

export interface ConversationEvents {
	id: string;
	events: unknown[];
}

export interface Invitation {
	entityUrn: string;
	sharedSecret: string;
}

export type InvitationAction = "accept" | "ignore";

/**
 * Outcome of a mutating call. `ok` reflects the status the endpoint signals success with.
 */
export interface ActionResult {
	ok: boolean;
	status: number;
}

/**
 * Where a message goes: an existing conversation, or a new one with these profile URN ids.
 */
export type MessageTarget = { conversationId: string } | { recipients: string[] };

/**
 * The logged-in member, from /me.
 */
export interface Me {
	urnId: string;
	publicId: string;
	firstName: string;
	lastName: string;
	occupation: string;
}
