/**
 * Direct messages to infracted users.
 *
 * @module services/notifier
 */

import type { Telegram } from "telegraf";
import { StructuredLogger } from "../utils/logger";
import type { Notifier } from "./enforcement";

export class TelegramNotifier implements Notifier {
	constructor(private readonly telegram: Telegram) {}

	async notify(userId: number, message: string): Promise<boolean> {
		try {
			await this.telegram.sendMessage(userId, message);
			return true;
		} catch (error) {
			// The user never started the bot, blocked it, or left
			StructuredLogger.logDebug("Could not DM user about infraction", {
				userId,
				error: error instanceof Error ? error.message : String(error),
			});
			return false;
		}
	}
}
