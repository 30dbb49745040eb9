/**
 * Infraction history commands: look up, pardon and remove recorded infractions.
 *
 * @module commands/infractions
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, fmt } from "telegraf/format";
import { adminOrHigher, moderatorOrHigher } from "../middleware/index";
import type { InfractionService } from "../services/infractionService";
import type { InfractionStore } from "../services/infractionStore";
import { getCommandArgs, joinReason, parseIdArg } from "../utils/commandHelper";
import {
	describePardonResult,
	formatInfractionDetails,
	formatInfractionLine,
} from "../utils/infractionFormat";
import {
	formatUserRef,
	lookupUserRef,
	resolveTargetUser,
} from "../utils/userResolver";
import { type CommandHandler, guarded } from "./moderation";

/** Most recent entries shown by /infractions */
const LIST_LIMIT = 20;

export interface InfractionCommandDeps {
	service: InfractionService;
	store: InfractionStore;
	now?: () => Date;
}

export function createInfractionHandlers(
	deps: InfractionCommandDeps,
): Record<string, CommandHandler> {
	const { service, store } = deps;
	const now = deps.now ?? (() => new Date());

	const list: CommandHandler = async (ctx) => {
		const args = getCommandArgs(ctx);
		const target = resolveTargetUser(ctx, args);
		if (!target) {
			await ctx.reply(
				args.length > 0
					? "⚠️ User not found."
					: fmt`⚠️ ${bold("Usage:")} ${code("/infractions <@username|userId>")}`,
			);
			return;
		}

		const infractions = store.listByUser(target.user.id);
		const member = formatUserRef(target.user);
		if (infractions.length === 0) {
			await ctx.reply(`✅ ${member} has no infractions.`);
			return;
		}

		const current = now();
		const shown = infractions.slice(-LIST_LIMIT).reverse();
		const lines = [
			`📋 Infractions for ${member}: ${infractions.length} total`,
			...shown.map((infraction) => formatInfractionLine(infraction, current)),
		];
		if (infractions.length > shown.length) {
			lines.push(`… ${infractions.length - shown.length} older not shown`);
		}
		await ctx.reply(lines.join("\n"));
	};

	const show: CommandHandler = async (ctx) => {
		const id = parseIdArg(getCommandArgs(ctx)[0]);
		if (id === null) {
			await ctx.reply(fmt`⚠️ ${bold("Usage:")} ${code("/infraction <id>")}`);
			return;
		}

		const infraction = store.getById(id);
		if (!infraction) {
			await ctx.reply(`⚠️ Infraction #${id} not found.`);
			return;
		}

		await ctx.reply(
			formatInfractionDetails(infraction, lookupUserRef(infraction.userId), now()).join(
				"\n",
			),
		);
	};

	const pardon: CommandHandler = async (ctx) => {
		const actorId = ctx.from?.id;
		if (!actorId) return;

		const [idArg, ...reasonArgs] = getCommandArgs(ctx);
		const id = parseIdArg(idArg);
		if (id === null) {
			await ctx.reply(fmt`⚠️ ${bold("Usage:")} ${code("/pardon <id> [reason]")}`);
			return;
		}

		const result = await service.pardon(id, {
			actorId,
			reason: joinReason(reasonArgs),
		});
		await ctx.reply(describePardonResult(result));
	};

	const remove: CommandHandler = async (ctx) => {
		const actorId = ctx.from?.id;
		if (!actorId) return;

		const id = parseIdArg(getCommandArgs(ctx)[0]);
		if (id === null) {
			await ctx.reply(fmt`⚠️ ${bold("Usage:")} ${code("/removeinfraction <id>")}`);
			return;
		}

		const result = await service.remove(id, actorId);
		if (result.status === "not_found") {
			await ctx.reply(`⚠️ Infraction #${id} not found.`);
			return;
		}

		const lines = [`🗑️ Infraction #${id} (${result.infraction.type}) removed.`];
		if (result.pardon?.status === "pardoned") {
			lines.push(describePardonResult(result.pardon));
		}
		await ctx.reply(lines.join("\n"));
	};

	return { infractions: list, infraction: show, pardon, removeinfraction: remove };
}

/**
 * Registers the infraction history commands.
 *
 * - /infractions <user> - List a user's infractions, newest first (moderator or higher)
 * - /infraction <id> - Show one infraction (moderator or higher)
 * - /pardon <id> [reason] - End an active infraction early (moderator or higher)
 * - /removeinfraction <id> - Pardon if active, then delete (admin or higher)
 */
export function registerInfractionCommands(
	bot: Telegraf<Context>,
	deps: InfractionCommandDeps,
): void {
	const handlers = createInfractionHandlers(deps);

	bot.command("infractions", moderatorOrHigher, guarded("infractions", handlers.infractions));
	bot.command("infraction", moderatorOrHigher, guarded("infraction", handlers.infraction));
	bot.command("pardon", moderatorOrHigher, guarded("pardon", handlers.pardon));
	bot.command(
		"removeinfraction",
		adminOrHigher,
		guarded("removeinfraction", handlers.removeinfraction),
	);
}
