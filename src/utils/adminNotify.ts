/**
 * @module utils/adminNotify
 * @description Operator-facing notifications.
 * Alerts go to the admin chat, mod log entries to the mod log chat.
 * Both are best effort: failures are logged, never thrown.
 */

import type { Telegraf } from "telegraf";
import { bold, fmt } from "telegraf/format";
import { config } from "../config";
import { logger } from "./logger";

let botInstance: Telegraf | null = null;

/**
 * Sets the bot instance used to send notifications.
 * Must be called during bot initialization before notifyAdmin can deliver anything.
 */
export function setBotInstance(bot: Telegraf | null): void {
	botInstance = bot;
}

/**
 * Sends an alert to the configured admin chat.
 *
 * @example
 * await notifyAdmin('Failed to apply ban #12 to (123456): not enough rights');
 */
export async function notifyAdmin(message: string): Promise<void> {
	if (!botInstance) {
		logger.warn("Bot instance not set, cannot send admin notification", {
			message,
		});
		return;
	}

	if (!config.adminChatId) {
		logger.warn("Admin chat ID not configured, cannot send notification", {
			message,
		});
		return;
	}

	try {
		await botInstance.telegram.sendMessage(
			config.adminChatId,
			fmt`⚠️ ${bold("Admin Alert")}

${message}`,
		);
	} catch (error) {
		logger.error("Failed to send admin notification", { error, message });
	}
}

/**
 * Posts a titled block of "Key: value" lines to the mod log chat.
 * Does nothing when no mod log chat is configured.
 */
export async function notifyModLog(
	title: string,
	lines: string[],
): Promise<void> {
	if (!botInstance || !config.modLogChatId) {
		return;
	}

	try {
		await botInstance.telegram.sendMessage(
			config.modLogChatId,
			fmt`${bold(title)}
${lines.join("\n")}`,
		);
	} catch (error) {
		logger.error("Failed to send mod log message", { error, title });
	}
}
