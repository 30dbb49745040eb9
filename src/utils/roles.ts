/** Role checking and authorization utilities for the moderation hierarchy */

import { config } from "../config";
import type { AuthorityCheck } from "../services/enforcement";
import { getUser } from "../services/userService";
import type { Role } from "../types";

/** Role hierarchy: owner > admin > moderator > member */
const ROLE_RANK: Record<Role, number> = {
	owner: 3,
	admin: 2,
	moderator: 1,
	member: 0,
};

/**
 * Effective role of a user.
 * Configured owner/admin/moderator ids win over the database role.
 */
export const getRole = (userId: number): Role => {
	if (config.ownerIds.includes(userId)) return "owner";
	if (config.adminIds.includes(userId)) return "admin";
	if (config.moderatorIds.includes(userId)) return "moderator";
	return getUser(userId)?.role ?? "member";
};

export const getRank = (userId: number): number => ROLE_RANK[getRole(userId)];

/** Check if user holds at least the given role (hierarchy-aware) */
export const hasRoleAtLeast = (userId: number, role: Role): boolean =>
	getRank(userId) >= ROLE_RANK[role];

/**
 * An actor may only act on users ranked strictly below them.
 * This also rules out acting on oneself.
 */
export const canModerate = (actorId: number, targetId: number): boolean =>
	actorId !== targetId && getRank(actorId) > getRank(targetId);

/** AuthorityCheck backed by configuration and the users table */
export const createAuthorityCheck = (): AuthorityCheck => ({
	canAct: canModerate,
});
