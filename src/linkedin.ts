/**
 * High-level LinkedIn API over an authenticated {@link VoyagerClient}.
 */

import { getCompanyUpdates, getProfileUpdates, type CompanyRef } from "./api/feed.js";
import { getInvitations, replyInvitation } from "./api/invitations.js";
import {
	getConversation,
	getConversationDetails,
	getConversations,
	markConversationAsSeen,
	sendMessage,
} from "./api/messaging.js";
import { getCompany, getSchool } from "./api/organizations.js";
import {
	getCurrentProfileViews,
	getProfile,
	getProfileContactInfo,
	getProfileMemberBadges,
	getProfileNetworkInfo,
	getProfilePrivacySettings,
	getProfileSkills,
	getUserProfile,
	removeConnection,
} from "./api/profile.js";
import {
	getProfileConnections,
	guidedPeopleSearch,
	search,
	searchPeople,
	type SearchParams,
} from "./api/search.js";
import { VoyagerClient, type VoyagerClientOptions } from "./lib/client.js";
import type { JsonObject } from "./lib/json.js";
import type { AuthenticationMode, Identity } from "./lib/session.js";
import type {
	ActionResult,
	Connection,
	ContactInfo,
	Conversation,
	ConversationEvents,
	Invitation,
	InvitationAction,
	MemberBadges,
	MessageTarget,
	NetworkInfo,
	Organization,
	PersonSearchResult,
	Profile,
	ProfileRef,
	SearchPeopleParams,
	Skill,
} from "./lib/types.js";

export interface LinkedInOptions extends VoyagerClientOptions {
	/** Ignore the saved cookie record and log in again */
	refreshCookies?: boolean;
}

export class LinkedIn {
	readonly client: VoyagerClient;
	readonly authentication: AuthenticationMode;

	private constructor(client: VoyagerClient, authentication: AuthenticationMode) {
		this.client = client;
		this.authentication = authentication;
	}

	/**
	 * Creates the client and authenticates it. Authentication runs exactly once here.
	 */
	static async create(identity: Identity, options: LinkedInOptions = {}): Promise<LinkedIn> {
		const client = new VoyagerClient(options);
		const mode = await client.authenticate(identity, { forceRefresh: options.refreshCookies });
		return new LinkedIn(client, mode);
	}

	getProfile(ref: ProfileRef): Promise<Profile> {
		return getProfile(this.client, ref);
	}

	getProfileContactInfo(ref: ProfileRef): Promise<ContactInfo> {
		return getProfileContactInfo(this.client, ref);
	}

	getProfileSkills(ref: ProfileRef): Promise<Skill[]> {
		return getProfileSkills(this.client, ref);
	}

	getProfileConnections(urnId: string): Promise<Connection[]> {
		return getProfileConnections(this.client, urnId);
	}

	getProfilePrivacySettings(publicId: string): Promise<JsonObject> {
		return getProfilePrivacySettings(this.client, publicId);
	}

	getProfileMemberBadges(publicId: string): Promise<MemberBadges> {
		return getProfileMemberBadges(this.client, publicId);
	}

	getProfileNetworkInfo(publicId: string): Promise<NetworkInfo> {
		return getProfileNetworkInfo(this.client, publicId);
	}

	getCurrentProfileViews(): Promise<number> {
		return getCurrentProfileViews(this.client);
	}

	getUserProfile(): Promise<unknown> {
		return getUserProfile(this.client);
	}

	removeConnection(publicId: string): Promise<ActionResult> {
		return removeConnection(this.client, publicId);
	}

	search(params: SearchParams, limit?: number): Promise<unknown[]> {
		return search(this.client, params, limit);
	}

	searchPeople(params: SearchPeopleParams): Promise<PersonSearchResult[]> {
		return searchPeople(this.client, params);
	}

	guidedPeopleSearch(keywords: string, count: number, start?: number): Promise<unknown> {
		return guidedPeopleSearch(this.client, keywords, count, start);
	}

	getCompanyUpdates(ref: CompanyRef, maxResults?: number): Promise<unknown[]> {
		return getCompanyUpdates(this.client, ref, maxResults);
	}

	getProfileUpdates(ref: ProfileRef, maxResults?: number): Promise<unknown[]> {
		return getProfileUpdates(this.client, ref, maxResults);
	}

	getCompany(publicId: string): Promise<Organization> {
		return getCompany(this.client, publicId);
	}

	getSchool(publicId: string): Promise<Organization> {
		return getSchool(this.client, publicId);
	}

	getConversations(): Promise<Conversation[]> {
		return getConversations(this.client);
	}

	getConversationDetails(profileUrnId: string): Promise<Conversation> {
		return getConversationDetails(this.client, profileUrnId);
	}

	getConversation(conversationId: string): Promise<ConversationEvents> {
		return getConversation(this.client, conversationId);
	}

	sendMessage(target: MessageTarget, body: string): Promise<ActionResult> {
		return sendMessage(this.client, target, body);
	}

	markConversationAsSeen(conversationId: string): Promise<ActionResult> {
		return markConversationAsSeen(this.client, conversationId);
	}

	getInvitations(start?: number, limit?: number): Promise<Invitation[]> {
		return getInvitations(this.client, start, limit);
	}

	replyInvitation(invitation: Invitation, action?: InvitationAction): Promise<ActionResult> {
		return replyInvitation(this.client, invitation, action);
	}
}
