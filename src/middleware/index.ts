/** User management and permission control middleware */

import type { Context, MiddlewareFn } from "telegraf";
import { ensureUserExists } from "../services/userService";
import { logger } from "../utils/logger";
import { hasRoleAtLeast } from "../utils/roles";

/**
 * Records every sender in the users table so later commands can resolve
 * them by @username, and keeps their username current.
 *
 * @example
 * ```typescript
 * bot.use(userManagementMiddleware);
 * ```
 */
export const userManagementMiddleware: MiddlewareFn<Context> = async (
	ctx,
	next,
) => {
	if (!ctx.from) {
		logger.warn("Request received without user information");
		return next();
	}

	const userId = ctx.from.id;
	const username = ctx.from.username ?? null;

	try {
		ensureUserExists(userId, username);
	} catch (error) {
		logger.error("Error loading user", { userId, username, error });
	}

	return next();
};

/**
 * Restricts a command to moderators, admins and owners.
 *
 * @example
 * bot.command('warn', moderatorOrHigher, warnHandler);
 */
export const moderatorOrHigher: MiddlewareFn<Context> = async (ctx, next) => {
	const userId = ctx.from?.id;
	if (!userId) {
		await ctx.reply("User ID not found.");
		return;
	}

	if (hasRoleAtLeast(userId, "moderator")) {
		return next();
	}

	await ctx.reply("You do not have permission to use this command.");
};

/**
 * Restricts a command to admins and owners.
 *
 * @example
 * bot.command('removeinfraction', adminOrHigher, removeHandler);
 */
export const adminOrHigher: MiddlewareFn<Context> = async (ctx, next) => {
	const userId = ctx.from?.id;
	if (!userId) {
		await ctx.reply("User ID not found.");
		return;
	}

	if (hasRoleAtLeast(userId, "admin")) {
		return next();
	}

	await ctx.reply("You do not have permission to use this command.");
};
