/** User resolution utilities for turning command targets into UserRefs */

import type { Context } from "telegraf";
import type { User as TelegramUser } from "telegraf/types";
import { ensureUserExists, getUser, getUserByUsername } from "../services/userService";
import type { UserRef } from "../types";

/** Build a resolved reference from a Telegram user object */
export function userRefFromTelegram(from: TelegramUser): UserRef {
	return {
		kind: "resolved",
		id: from.id,
		username: from.username ?? null,
		firstName: from.first_name,
		isBot: from.is_bot,
	};
}

/**
 * Resolve username or ID string to a UserRef
 * Supports: numeric ID, @username, username (case-insensitive)
 * Numeric IDs unknown to the database still resolve, as unresolved references.
 * Returns null for unknown usernames, since there is no id to act on.
 */
export function resolveUserRef(userIdentifier: string): UserRef | null {
	const cleanIdentifier = userIdentifier.startsWith("@")
		? userIdentifier.substring(1)
		: userIdentifier;

	if (/^\d+$/.test(cleanIdentifier)) {
		return lookupUserRef(parseInt(cleanIdentifier, 10));
	}

	const user = getUserByUsername(cleanIdentifier);
	return user
		? { kind: "resolved", id: user.id, username: user.username, isBot: false }
		: null;
}

/** Reference for a stored user id; unknown ids stay unresolved */
export function lookupUserRef(userId: number): UserRef {
	const user = getUser(userId);
	return user
		? { kind: "resolved", id: userId, username: user.username, isBot: false }
		: { kind: "unresolved", id: userId };
}

/** Format a UserRef for display: @username (123456), Name (123456) or (123456) */
export function formatUserRef(user: UserRef): string {
	if (user.kind === "unresolved") {
		return `(${user.id})`;
	}
	if (user.username) {
		return `@${user.username} (${user.id})`;
	}
	return user.firstName ? `${user.firstName} (${user.id})` : `(${user.id})`;
}

/**
 * Result of resolving a target user from command context
 */
export interface TargetUserResult {
	user: UserRef;
	source: "args" | "reply";
}

/**
 * Resolve target user from a replied-to message or the first command argument.
 * A reply wins, so `/warn <reason>` as a reply keeps the whole text as reason.
 * Users taken from a reply are recorded in the database.
 */
export function resolveTargetUser(
	ctx: Context,
	args: string[],
): TargetUserResult | null {
	const replyTo =
		ctx.message && "reply_to_message" in ctx.message
			? ctx.message.reply_to_message
			: undefined;

	if (replyTo?.from) {
		ensureUserExists(replyTo.from.id, replyTo.from.username ?? null);
		return { user: userRefFromTelegram(replyTo.from), source: "reply" };
	}

	const first = args[0];
	if (first) {
		const user = resolveUserRef(first);
		return user ? { user, source: "args" } : null;
	}

	return null;
}

/**
 * Get remaining args after removing the user identifier (if from args).
 * Use when command has format: /cmd <user> <other args...>
 */
export function getRemainingArgs(
	args: string[],
	result: TargetUserResult | null,
): string[] {
	if (!result || result.source === "reply") {
		return args;
	}
	return args.slice(1);
}
