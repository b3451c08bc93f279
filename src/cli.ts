#!/usr/bin/env node
/**
 * voyager CLI - LinkedIn Voyager sessions from the terminal.
 * Logs in or replays saved cookies, then calls the Voyager API at a human pace.
 */

import "dotenv/config";
import { Command } from "commander";
import pc from "picocolors";
import { company } from "./commands/company.js";
import { listInvites } from "./commands/invites.js";
import { login } from "./commands/login.js";
import { listConversations, sendMessage } from "./commands/messages.js";
import { profile } from "./commands/profile.js";
import { search } from "./commands/search.js";
import type { SessionOptions } from "./commands/session.js";
import { updates } from "./commands/updates.js";
import { whoami } from "./commands/whoami.js";
import { type BrowserSource, resolveIdentity } from "./lib/auth.js";
import type { Identity } from "./lib/session.js";

const CLI_VERSION = "0.1.0";

interface GlobalOptions {
	username?: string;
	password?: string;
	liAt?: string;
	jsessionid?: string;
	cookieSource?: string;
	cookiePath?: string;
	refresh?: boolean;
}

const program = new Command();

program
	.name("voyager")
	.description("LinkedIn Voyager API client")
	.version(CLI_VERSION)
	.option("--username <email>", "LinkedIn login email (or LINKEDIN_USERNAME)")
	.option("--password <password>", "LinkedIn password (or LINKEDIN_PASSWORD)")
	.option("--li-at <token>", "LinkedIn li_at cookie token")
	.option("--jsessionid <token>", "LinkedIn JSESSIONID cookie token")
	.option(
		"--cookie-source <source>",
		"Read tokens from a browser: chrome, safari, auto, none, or comma-separated.",
	)
	.option("--cookie-path <path>", "Cookie record file (default .cookies.json)")
	.option("--refresh", "Ignore the saved cookie record and log in again");

program.configureHelp({ showGlobalOptions: true });

program.addHelpText(
	"after",
	`
Examples:
  voyager login
  voyager whoami --json
  voyager search "platform engineer" -n 25 --network F
  voyager messages send --to ACoAAB1234 "Hello!"
`,
);

/**
 * Handle errors consistently across all commands.
 */
function handleError(error: unknown): never {
	const message = error instanceof Error ? error.message : String(error);
	console.error(pc.red(`✗ ${message}`));
	process.exit(1);
}

/**
 * Parse cookie source option into array of browser sources.
 */
function parseCookieSource(source?: string): BrowserSource[] | undefined {
	if (!source || source === "none") {
		return undefined;
	}
	if (source === "auto") {
		return ["chrome", "safari"];
	}
	const browsers = source.split(",").map((s) => s.trim().toLowerCase());
	const valid: BrowserSource[] = [];
	for (const b of browsers) {
		if (b === "chrome" || b === "safari") {
			valid.push(b);
		}
	}
	return valid.length > 0 ? valid : undefined;
}

/**
 * Identity from CLI options, environment, or browser cookies.
 */
async function getIdentity(options: GlobalOptions): Promise<Identity> {
	const result = await resolveIdentity({
		username: options.username,
		password: options.password,
		liAt: options.liAt,
		jsessionId: options.jsessionid,
		cookieSource: parseCookieSource(options.cookieSource),
	});

	for (const warning of result.warnings) {
		console.error(pc.yellow(`⚠ ${warning}`));
	}

	return result.identity;
}

function sessionOptions(options: GlobalOptions): SessionOptions {
	return { refresh: options.refresh, cookiePath: options.cookiePath };
}

/**
 * Runs a command action with the resolved identity and prints its output.
 */
async function run(action: (identity: Identity, session: SessionOptions) => Promise<string>) {
	try {
		const globalOpts = program.opts<GlobalOptions>();
		const identity = await getIdentity(globalOpts);
		const output = await action(identity, sessionOptions(globalOpts));
		console.log(output);
	} catch (error) {
		handleError(error);
	}
}

function parseNumber(value: string | undefined): number | undefined {
	if (value === undefined) {
		return undefined;
	}
	const parsed = Number.parseInt(value, 10);
	return Number.isNaN(parsed) ? undefined : parsed;
}

// ============================================================================
// login - Establish a session and save its cookies
// ============================================================================
program
	.command("login")
	.description("Authenticate and save the session cookies")
	.option("--json", "Output as JSON")
	.action(async (options: { json?: boolean }) => {
		await run((identity, session) => login(identity, { ...session, json: options.json }));
	});

// ============================================================================
// whoami - Show logged-in member
// ============================================================================
program
	.command("whoami")
	.description("Show the logged-in member, followers, and profile views")
	.option("--json", "Output as JSON")
	.action(async (options: { json?: boolean }) => {
		await run((identity, session) => whoami(identity, { ...session, json: options.json }));
	});

// ============================================================================
// profile - View a profile
// ============================================================================
program
	.command("profile <identifier>")
	.description("View a LinkedIn profile by username, URL, or URN")
	.option("--json", "Output as JSON")
	.action(async (identifier: string, options: { json?: boolean }) => {
		await run((identity, session) =>
			profile(identity, identifier, { ...session, json: options.json }),
		);
	});

// ============================================================================
// search - People search
// ============================================================================
program
	.command("search <keywords>")
	.description("Search for people")
	.option("--json", "Output as JSON")
	.option("-n, --count <number>", "Number of people to return", "10")
	.option("--network <depth>", "Network depth: F, S, O, or combined (e.g. F|S)")
	.option("--connection-of <urnId>", "Only people connected to this profile URN id")
	.action(
		async (
			keywords: string,
			options: { json?: boolean; count?: string; network?: string; connectionOf?: string },
		) => {
			await run((identity, session) =>
				search(identity, keywords, {
					...session,
					json: options.json,
					count: parseNumber(options.count),
					network: options.network,
					connectionOf: options.connectionOf,
				}),
			);
		},
	);

// ============================================================================
// company - Company or school lookup
// ============================================================================
program
	.command("company <identifier>")
	.description("Look up a company (or a school with --school) by slug or URL")
	.option("--json", "Output as JSON")
	.option("--school", "Look up a school instead of a company")
	.action(async (identifier: string, options: { json?: boolean; school?: boolean }) => {
		await run((identity, session) =>
			company(identity, identifier, { ...session, json: options.json, school: options.school }),
		);
	});

// ============================================================================
// updates - Feed updates of a member or company
// ============================================================================
program
	.command("updates <identifier>")
	.description("Show recent feed updates of a member (or a company with --company)")
	.option("--json", "Output as JSON")
	.option("--company", "Treat the identifier as a company")
	.option("-n, --count <number>", "Number of updates to return", "20")
	.action(
		async (identifier: string, options: { json?: boolean; company?: boolean; count?: string }) => {
			await run((identity, session) =>
				updates(identity, identifier, {
					...session,
					json: options.json,
					company: options.company,
					count: parseNumber(options.count),
				}),
			);
		},
	);

// ============================================================================
// messages - List conversations and send messages
// ============================================================================
const messagesCmd = program.command("messages").description("List conversations and send messages");

messagesCmd
	.command("list", { isDefault: true })
	.description("List recent conversations")
	.option("--json", "Output as JSON")
	.action(async (options: { json?: boolean }) => {
		await run((identity, session) =>
			listConversations(identity, { ...session, json: options.json }),
		);
	});

messagesCmd
	.command("send <text>")
	.description("Send a message to a conversation or to new recipients")
	.option("--json", "Output as JSON")
	.option("--conversation <id>", "Existing conversation id")
	.option("--to <urnIds...>", "Profile URN ids for a new conversation")
	.action(
		async (text: string, options: { json?: boolean; conversation?: string; to?: string[] }) => {
			await run((identity, session) =>
				sendMessage(identity, text, {
					...session,
					json: options.json,
					conversation: options.conversation,
					to: options.to,
				}),
			);
		},
	);

// ============================================================================
// invites - List invitations
// ============================================================================
const invitesCmd = program.command("invites").description("Pending connection invitations");

invitesCmd
	.command("list", { isDefault: true })
	.description("List pending invitations")
	.option("--json", "Output as JSON")
	.option("--start <number>", "Start offset", "0")
	.option("-n, --count <number>", "Number of invitations to show", "10")
	.option("--include-secrets", "Include shared secrets in JSON output (unsafe)")
	.action(
		async (options: {
			json?: boolean;
			start?: string;
			count?: string;
			includeSecrets?: boolean;
		}) => {
			await run((identity, session) =>
				listInvites(identity, {
					...session,
					json: options.json,
					start: parseNumber(options.start),
					count: parseNumber(options.count),
					includeSecrets: options.includeSecrets,
				}),
			);
		},
	);

await program.parseAsync();
