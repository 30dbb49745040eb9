/**
 * Configuration module for the infraction bot.
 * Loads environment variables and provides a typed configuration object.
 * Validates required configuration values on startup.
 *
 * @module config
 */

import { resolve } from "node:path";
import * as dotenv from "dotenv";
import { logger } from "./utils/logger";

// Load environment variables from .env file
dotenv.config({ path: resolve(__dirname, "../.env") });

/**
 * Configuration interface defining all bot settings.
 *
 * @interface Config
 */
export interface Config {
	/** Telegram bot API token from BotFather */
	botToken: string;

	/** Telegram group chat ID where infractions are enforced */
	groupChatId: number;

	/** Telegram chat ID for operator alerts (permission problems, failed reversals) */
	adminChatId: number;

	/** Telegram chat ID that receives the human-readable mod log (optional) */
	modLogChatId?: number;

	/** Telegram user ID(s) of the bot owner(s) - comma-separated list */
	ownerIds: number[];

	/** Telegram user ID(s) of pre-configured admin(s) - comma-separated list */
	adminIds: number[];

	/** Telegram user ID(s) of pre-configured moderator(s) - comma-separated list */
	moderatorIds: number[];

	/** File path to SQLite database */
	databasePath: string;

	/** Logging level (error, warn, info, debug) */
	logLevel: string;

	/** Format of the persisted infraction timestamp (always UTC) */
	timeFormat: string;
}

const parseIdList = (value: string | undefined): number[] =>
	(value || "")
		.split(",")
		.map((id) => parseInt(id.trim(), 10))
		.filter((id) => !Number.isNaN(id));

/**
 * Main configuration object populated from environment variables.
 * Falls back to default values where appropriate.
 */
export const config: Config = {
	botToken: process.env.BOT_TOKEN || "",
	groupChatId: parseInt(process.env.GROUP_CHAT_ID || "0", 10),
	adminChatId: parseInt(process.env.ADMIN_CHAT_ID || "0", 10),
	modLogChatId: process.env.MOD_LOG_CHAT_ID
		? parseInt(process.env.MOD_LOG_CHAT_ID, 10)
		: undefined,
	ownerIds: parseIdList(process.env.OWNER_ID),
	adminIds: parseIdList(process.env.ADMIN_ID),
	moderatorIds: parseIdList(process.env.MODERATOR_ID),
	databasePath: process.env.DATABASE_PATH || "./data/bot.db",
	logLevel: process.env.LOG_LEVEL || "info",
	timeFormat: "YYYY-MM-DD HH:mm:ss",
};

/**
 * Validates that all required configuration values are present.
 * Called at bot startup before the database or the bot are created.
 *
 * @throws {Error} If BOT_TOKEN, OWNER_ID or GROUP_CHAT_ID is not set
 */
export function validateConfig(): void {
	if (!config.botToken) {
		throw new Error("BOT_TOKEN is required in environment variables");
	}
	if (config.ownerIds.length === 0) {
		throw new Error(
			"OWNER_ID is required in environment variables (comma-separated for multiple owners)",
		);
	}
	if (!config.groupChatId) {
		throw new Error("GROUP_CHAT_ID is required in environment variables");
	}

	if (!config.adminChatId) {
		logger.warn(
			"ADMIN_CHAT_ID not set - enforcement failures will only be written to the log",
		);
	}
	if (!config.modLogChatId) {
		logger.warn("MOD_LOG_CHAT_ID not set - mod log entries stay in the log files");
	}
}
