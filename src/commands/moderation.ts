/**
 * Moderation command handlers.
 * Issue and lift infractions: notes, warnings, kicks, mutes and bans.
 *
 * @module commands/moderation
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, fmt, type FmtString } from "telegraf/format";
import { moderatorOrHigher } from "../middleware/index";
import type { InfractionService } from "../services/infractionService";
import type { InfractionType } from "../types";
import { getCommandArgs, joinReason } from "../utils/commandHelper";
import { describeApplyResult, describePardonResult } from "../utils/infractionFormat";
import { logger } from "../utils/logger";
import { DurationParseError, parseDuration } from "../utils/time";
import {
	formatUserRef,
	getRemainingArgs,
	resolveTargetUser,
} from "../utils/userResolver";

export type CommandHandler = (ctx: Context) => Promise<void>;

const USER_NOT_FOUND =
	"⚠️ User not found. Use a numeric ID, an @username the bot has seen, or reply to their message.";

/**
 * Wraps a handler so unexpected failures (database errors and the like)
 * are logged and answered instead of escaping into Telegraf.
 */
export const guarded =
	(command: string, handler: CommandHandler): CommandHandler =>
	async (ctx) => {
		try {
			await handler(ctx);
		} catch (error) {
			logger.error(`Error in /${command}`, {
				userId: ctx.from?.id,
				error,
			});
			await ctx.reply("❌ Something went wrong while processing the command.");
		}
	};

const usage = (command: string, args: string): FmtString =>
	fmt`⚠️ ${bold("Usage:")}
• Reply to a user: ${code(`/${command} ${args}`)}
• Direct: ${code(`/${command} <@username|userId> ${args}`)}`;

interface ApplyCommandOptions {
	command: string;
	type: InfractionType;
	/** Takes a duration argument before the reason */
	timed?: boolean;
	/** Reason is mandatory */
	requireReason?: boolean;
}

const applyCommand =
	(service: InfractionService, options: ApplyCommandOptions): CommandHandler =>
	async (ctx) => {
		const actorId = ctx.from?.id;
		if (!actorId) return;

		const argsText = options.timed ? "<duration> [reason]" : "[reason]";
		const help = usage(
			options.command,
			options.requireReason ? "<note>" : argsText,
		);

		const args = getCommandArgs(ctx);
		const target = resolveTargetUser(ctx, args);
		if (!target) {
			await ctx.reply(args.length > 0 ? USER_NOT_FOUND : help);
			return;
		}

		let rest = getRemainingArgs(args, target);
		let duration: number | undefined;
		if (options.timed) {
			const [durationArg, ...reasonArgs] = rest;
			if (!durationArg) {
				await ctx.reply(help);
				return;
			}
			try {
				duration = parseDuration(durationArg);
			} catch (error) {
				if (error instanceof DurationParseError) {
					await ctx.reply(`⚠️ ${error.message}`);
					return;
				}
				throw error;
			}
			rest = reasonArgs;
		}

		const reason = joinReason(rest);
		if (options.requireReason && !reason) {
			await ctx.reply(help);
			return;
		}

		const result = await service.apply({
			user: target.user,
			type: options.type,
			actorId,
			reason,
			duration,
		});
		await ctx.reply(describeApplyResult(result, target.user));
	};

const liftCommand =
	(
		service: InfractionService,
		command: string,
		type: InfractionType,
	): CommandHandler =>
	async (ctx) => {
		const actorId = ctx.from?.id;
		if (!actorId) return;

		const args = getCommandArgs(ctx);
		const target = resolveTargetUser(ctx, args);
		if (!target) {
			await ctx.reply(args.length > 0 ? USER_NOT_FOUND : usage(command, "[reason]"));
			return;
		}

		const reason = joinReason(getRemainingArgs(args, target));
		const result = await service.pardonActive(target.user.id, type, actorId, reason);
		if (result.status === "none_active") {
			await ctx.reply(
				`⚠️ ${formatUserRef(target.user)} has no active ${type}.`,
			);
			return;
		}
		await ctx.reply(describePardonResult(result));
	};

/**
 * Builds the moderation handlers without registering them.
 */
export function createModerationHandlers(
	service: InfractionService,
): Record<string, CommandHandler> {
	return {
		note: applyCommand(service, { command: "note", type: "note", requireReason: true }),
		warn: applyCommand(service, { command: "warn", type: "warn" }),
		kick: applyCommand(service, { command: "kick", type: "kick" }),
		mute: applyCommand(service, { command: "mute", type: "mute" }),
		tempmute: applyCommand(service, { command: "tempmute", type: "mute", timed: true }),
		ban: applyCommand(service, { command: "ban", type: "ban" }),
		tempban: applyCommand(service, { command: "tempban", type: "ban", timed: true }),
		unmute: liftCommand(service, "unmute", "mute"),
		unban: liftCommand(service, "unban", "ban"),
	};
}

/**
 * Registers all moderation commands with the bot.
 *
 * Commands registered (moderator or higher):
 * - /note <user> <note> - Record a note the user never sees
 * - /warn <user> [reason] - Warn a user
 * - /kick <user> [reason] - Remove a user from the group; they may rejoin
 * - /mute <user> [reason] - Mute a user permanently
 * - /tempmute <user> <duration> [reason] - Mute a user for a while
 * - /ban <user> [reason] - Ban a user permanently
 * - /tempban <user> <duration> [reason] - Ban a user for a while
 * - /unmute <user> [reason] - Lift a user's mute
 * - /unban <user> [reason] - Lift a user's ban
 *
 * Durations look like `1h30m`, `2d`, `1mo`, `1y2w`.
 *
 * @example
 * User: /tempban @alice 2d spam
 * Bot: ✅ @alice (123456) has been banned for 2 days (#12).
 *      Reason: spam
 *      DM: sent
 */
export function registerModerationCommands(
	bot: Telegraf<Context>,
	service: InfractionService,
): void {
	for (const [command, handler] of Object.entries(createModerationHandlers(service))) {
		bot.command(command, moderatorOrHigher, guarded(command, handler));
	}
}
