/**
 * Main entry point for the infraction bot.
 * Opens the database, connects to Telegram, reschedules pending expiries and
 * registers the moderation commands. Handles graceful shutdown.
 *
 * @module bot
 */

import { Telegraf } from "telegraf";
import { registerInfractionCommands } from "./commands/infractions";
import { registerModerationCommands } from "./commands/moderation";
import { config, validateConfig } from "./config";
import { closeDatabase, initDb, openDatabase } from "./database";
import { userManagementMiddleware } from "./middleware/index";
import { InfractionScheduler } from "./services/infractionScheduler";
import { InfractionService } from "./services/infractionService";
import { SqliteInfractionStore } from "./services/infractionStore";
import { ModLog } from "./services/modLog";
import { TelegramNotifier } from "./services/notifier";
import { TelegramEnforcer } from "./services/telegramEnforcer";
import { seedConfiguredRoles } from "./services/userService";
import { setBotInstance } from "./utils/adminNotify";
import { logger, updateLogLevel } from "./utils/logger";
import { createAuthorityCheck } from "./utils/roles";
import { lookupUserRef } from "./utils/userResolver";

/**
 * Startup sequence:
 * 1. Validate configuration
 * 2. Open the database and create the schema
 * 3. Seed owners, admins and moderators from configuration
 * 4. Create the Telegraf instance and wait for getMe()
 * 5. Start the infraction service, which reschedules stored expiries
 * 6. Register middleware and commands, then launch polling
 *
 * @throws {Error} If configuration validation fails or the bot cannot start
 */
async function main(): Promise<void> {
	try {
		validateConfig();
		updateLogLevel(config.logLevel);

		openDatabase(config.databasePath);
		initDb();
		seedConfiguredRoles(config);

		const bot = new Telegraf(config.botToken);
		setBotInstance(bot);

		// Expiries must not be rescheduled before the connection works
		bot.botInfo = await bot.telegram.getMe();
		logger.info("Connected to Telegram", { username: bot.botInfo.username });

		const store = new SqliteInfractionStore();
		const scheduler = new InfractionScheduler(store);
		const service = new InfractionService({
			store,
			scheduler,
			enforcer: new TelegramEnforcer(bot.telegram, config.groupChatId),
			authority: createAuthorityCheck(),
			notifier: new TelegramNotifier(bot.telegram),
			auditLog: new ModLog(),
			botId: bot.botInfo.id,
			lookupUser: lookupUserRef,
		});

		const rescheduled = service.start();
		logger.info(`Rescheduled ${rescheduled} infraction expiries`);

		bot.use(userManagementMiddleware);
		registerModerationCommands(bot, service);
		registerInfractionCommands(bot, { service, store });

		bot.catch((err, ctx) => {
			logger.error("Bot error", { error: err, update: ctx.update });
		});

		const shutdown = (signal: string): void => {
			logger.info(`Received ${signal}, shutting down`);
			service.stop();
			bot.stop(signal);
			setBotInstance(null);
			closeDatabase();
		};
		process.once("SIGINT", () => shutdown("SIGINT"));
		process.once("SIGTERM", () => shutdown("SIGTERM"));

		// Resolves when polling stops
		await bot.launch(() => {
			logger.info("Bot started successfully");
		});
	} catch (error) {
		logger.error("Failed to start bot", { error });
		process.exit(1);
	}
}

void main();
