/**
 * Telegram binding for infraction enforcement.
 * Bans, kicks and mutes members of the moderated group and lifts those
 * effects again, translating Bot API failures into {@link EnforcementError}.
 *
 * @module services/telegramEnforcer
 */

import { TelegramError } from "telegraf";
import type { Telegram } from "telegraf";
import type { ChatPermissions } from "telegraf/types";
import type { InfractionType, UserRef } from "../types";
import { StructuredLogger } from "../utils/logger";
import { type Enforcer, EnforcementError } from "./enforcement";

const MUTED_PERMISSIONS: ChatPermissions = {
	can_send_messages: false,
	can_send_audios: false,
	can_send_documents: false,
	can_send_photos: false,
	can_send_videos: false,
	can_send_video_notes: false,
	can_send_voice_notes: false,
	can_send_polls: false,
	can_send_other_messages: false,
	can_add_web_page_previews: false,
	can_change_info: false,
	can_invite_users: false,
	can_pin_messages: false,
	can_manage_topics: false,
};

const MEMBER_PERMISSIONS: ChatPermissions = {
	can_send_messages: true,
	can_send_audios: true,
	can_send_documents: true,
	can_send_photos: true,
	can_send_videos: true,
	can_send_video_notes: true,
	can_send_voice_notes: true,
	can_send_polls: true,
	can_send_other_messages: true,
	can_add_web_page_previews: true,
	can_change_info: false,
	can_invite_users: true,
	can_pin_messages: false,
	can_manage_topics: false,
};

const FORBIDDEN_DESCRIPTIONS = [
	"not enough rights",
	"chat_admin_required",
	"can't remove chat owner",
	"user is an administrator",
	"can't restrict self",
	"method is available only for supergroups",
];

const NOT_FOUND_DESCRIPTIONS = [
	"user not found",
	"participant_id_invalid",
	"user_id_invalid",
	"member not found",
];

/**
 * Maps a Bot API failure onto the enforcement error taxonomy.
 */
export function classifyTelegramError(error: unknown): EnforcementError {
	if (error instanceof TelegramError) {
		const description = error.description.toLowerCase();
		if (
			error.code === 403 ||
			FORBIDDEN_DESCRIPTIONS.some((text) => description.includes(text))
		) {
			return new EnforcementError("forbidden", error.description, error);
		}
		if (NOT_FOUND_DESCRIPTIONS.some((text) => description.includes(text))) {
			return new EnforcementError("not_found", error.description, error);
		}
		return new EnforcementError(
			"transport",
			`Telegram API error ${error.code}: ${error.description}`,
			error,
		);
	}
	const message = error instanceof Error ? error.message : String(error);
	return new EnforcementError("transport", message, error);
}

export class TelegramEnforcer implements Enforcer {
	constructor(
		private readonly telegram: Telegram,
		private readonly chatId: number,
	) {}

	async enforce(
		type: InfractionType,
		user: UserRef,
		reason: string | null,
	): Promise<void> {
		await this.call(type, user, "enforce", async () => {
			switch (type) {
				case "ban":
					await this.telegram.banChatMember(this.chatId, user.id);
					return;
				case "kick":
					// Telegram has no kick: ban, then lift the ban so the user may rejoin
					await this.telegram.banChatMember(this.chatId, user.id);
					await this.telegram.unbanChatMember(this.chatId, user.id, {
						only_if_banned: true,
					});
					return;
				case "mute":
					await this.telegram.restrictChatMember(this.chatId, user.id, {
						permissions: MUTED_PERMISSIONS,
					});
					return;
				case "warn":
				case "note":
					return;
			}
		});

		StructuredLogger.logSecurityEvent(`Enforced ${type} in Telegram`, {
			userId: user.id,
			operation: type,
			reason,
		});
	}

	async reverse(
		type: InfractionType,
		user: UserRef,
		reason: string | null,
	): Promise<void> {
		await this.call(type, user, "reverse", async () => {
			switch (type) {
				case "ban":
					await this.telegram.unbanChatMember(this.chatId, user.id, {
						only_if_banned: true,
					});
					return;
				case "mute":
					await this.telegram.restrictChatMember(this.chatId, user.id, {
						permissions: MEMBER_PERMISSIONS,
					});
					return;
				case "kick":
				case "warn":
				case "note":
					return;
			}
		});

		StructuredLogger.logSecurityEvent(`Reversed ${type} in Telegram`, {
			userId: user.id,
			operation: `un${type}`,
			reason,
		});
	}

	private async call(
		type: InfractionType,
		user: UserRef,
		direction: "enforce" | "reverse",
		action: () => Promise<void>,
	): Promise<void> {
		try {
			await action();
		} catch (error) {
			const classified = classifyTelegramError(error);
			StructuredLogger.logError(classified, {
				userId: user.id,
				chatId: this.chatId,
				operation: `${direction}_${type}`,
				kind: classified.kind,
			});
			throw classified;
		}
	}
}
