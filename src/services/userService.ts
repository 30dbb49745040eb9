/** User management service - known users and their moderation roles */

import { execute, get } from "../database";
import type { Role, User } from "../types";
import { StructuredLogger } from "../utils/logger";

/**
 * Create new user with all required fields
 * Returns null if user already exists
 */
export const createUser = (
	userId: number,
	username: string | null,
	role: Role = "member",
	source: string = "unknown",
): User | null => {
	if (userExists(userId)) {
		return null;
	}

	const now = Math.floor(Date.now() / 1000);
	execute(
		"INSERT INTO users (id, username, role, created_at, updated_at) VALUES (?, ?, ?, ?, ?)",
		[userId, username, role, now, now],
	);

	StructuredLogger.logUserAction("User created", {
		userId,
		username: username ?? undefined,
		role,
		operation: "user_created",
		source,
	});

	return getUser(userId);
};

/**
 * Ensure user exists in database, create if missing
 *
 * Behavior:
 * - User doesn't exist: Creates with default role 'member'
 * - User exists: Updates username (Telegram usernames are mutable)
 */
export const ensureUserExists = (
	userId: number,
	username: string | null,
): void => {
	if (!userExists(userId)) {
		createUser(userId, username, "member", "ensure_exists");
		return;
	}
	execute("UPDATE users SET username = ?, updated_at = ? WHERE id = ?", [
		username,
		Math.floor(Date.now() / 1000),
		userId,
	]);
};

export const userExists = (userId: number): boolean =>
	get<{ id: number }>("SELECT id FROM users WHERE id = ?", [userId]) !==
	undefined;

export const getUser = (userId: number): User | null =>
	get<User>("SELECT * FROM users WHERE id = ?", [userId]) ?? null;

/**
 * Case-insensitive username lookup, with or without the @ prefix
 */
export const getUserByUsername = (username: string): User | null =>
	get<User>("SELECT * FROM users WHERE LOWER(username) = LOWER(?)", [
		username.replace(/^@/, ""),
	]) ?? null;

/**
 * Set a user's role, creating the user when unknown
 * Used to seed owners, admins and moderators from configuration
 */
export const setUserRole = (
	userId: number,
	role: Role,
	source: string,
): void => {
	if (!userExists(userId)) {
		createUser(userId, null, role, source);
		return;
	}
	execute("UPDATE users SET role = ?, updated_at = ? WHERE id = ?", [
		role,
		Math.floor(Date.now() / 1000),
		userId,
	]);
	StructuredLogger.logUserAction("User role updated", {
		userId,
		role,
		operation: "role_updated",
		source,
	});
};

/**
 * Writes the roles configured through OWNER_ID, ADMIN_ID and MODERATOR_ID
 * into the users table. Run at startup and by the setup script.
 */
export const seedConfiguredRoles = (ids: {
	ownerIds: number[];
	adminIds: number[];
	moderatorIds: number[];
}): void => {
	const seeds: Array<[number[], Role]> = [
		[ids.moderatorIds, "moderator"],
		[ids.adminIds, "admin"],
		[ids.ownerIds, "owner"],
	];
	for (const [userIds, role] of seeds) {
		for (const userId of userIds) {
			setUserRole(userId, role, "config_initialization");
		}
	}
};
