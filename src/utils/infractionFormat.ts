/**
 * Human-readable replies for infraction commands.
 *
 * @module utils/infractionFormat
 */

import type { Infraction } from "../services/infractionRecord";
import type { ApplyResult, PardonResult } from "../services/infractionService";
import type { InfractionType, UserRef } from "../types";
import { formatTimestamp, untilExpiration } from "./time";
import { formatUserRef } from "./userResolver";

const VERBS: Record<InfractionType, string> = {
	note: "noted",
	warn: "warned",
	kick: "kicked",
	mute: "muted",
	ban: "banned",
};

const NO_REASON = "No reason provided";

/**
 * " permanently", " for 2 hours", or "" for instant types.
 */
const durationSuffix = (infraction: Infraction): string => {
	if (!infraction.kind.lasting) {
		return "";
	}
	return infraction.isPermanent
		? " permanently"
		: ` for ${infraction.humanizedDuration()}`;
};

/**
 * Reply for an apply attempt.
 *
 * @example
 * describeApplyResult(result, user)
 * // "✅ @bob (42) has been banned for 2 hours (#7).\nReason: spam\nDM: sent"
 */
export function describeApplyResult(result: ApplyResult, user: UserRef): string {
	const target = formatUserRef(user);

	switch (result.status) {
		case "applied": {
			const { infraction } = result;
			if (infraction.type === "note") {
				return `📝 Note #${infraction.id} added for ${target}.`;
			}
			return [
				`✅ ${target} has been ${VERBS[infraction.type]}${durationSuffix(infraction)} (#${infraction.id}).`,
				`Reason: ${infraction.reason ?? NO_REASON}`,
				`DM: ${result.notified ? "sent" : "not sent"}`,
			].join("\n");
		}
		case "policy_rejected":
			return `⛔ ${result.reason}.`;
		case "conflict":
			return `⚠️ ${target} already has an active ${result.existing.type} (#${result.existing.id}, ${result.existing.humanizedDuration()}) that lasts at least as long.`;
		case "enforcement_forbidden":
			return `❌ Recorded ${result.infraction.type} #${result.infraction.id}, but the bot lacks permission to apply it. Admins have been alerted.`;
		case "transport_error":
			return `❌ Recorded ${result.infraction.type} #${result.infraction.id}, but Telegram returned an error: ${result.error.message}`;
	}
}

/**
 * Reply for a pardon attempt.
 */
export function describePardonResult(result: PardonResult): string {
	switch (result.status) {
		case "not_found":
			return `⚠️ Infraction #${result.id} not found.`;
		case "not_active":
			return `⚠️ Infraction #${result.infraction.id} is not active.`;
		case "pardoned": {
			const { infraction } = result;
			const lines = [`✅ ${infraction.type} #${infraction.id} pardoned.`];
			if (result.governedBy) {
				lines.push(
					`The ${infraction.type} stays in place: #${result.governedBy.id} lasts longer.`,
				);
			}
			if (result.failure) {
				lines.push(`Lifting it on Telegram failed: ${result.failure.message}`);
			}
			if (result.cascadedIds.length > 0) {
				lines.push(
					`Also deactivated: ${result.cascadedIds.map((id) => `#${id}`).join(", ")}`,
				);
			}
			return lines.join("\n");
		}
	}
}

/**
 * One line per infraction for listings.
 *
 * @example
 * formatInfractionLine(infraction, now)
 * // "#3 ban · 1 day · active · 2024-01-02 03:04:05 · spam"
 */
export function formatInfractionLine(infraction: Infraction, now: Date): string {
	const parts = [`#${infraction.id} ${infraction.type}`];
	if (infraction.kind.lasting) {
		parts.push(infraction.humanizedDuration());
		if (infraction.isCurrentlyActive(now)) {
			parts.push("active");
		}
	}
	parts.push(formatTimestamp(infraction.createdAt));
	parts.push(infraction.reason ?? NO_REASON);
	return parts.join(" · ");
}

/**
 * Full details of one infraction, as "Key: value" lines.
 */
export function formatInfractionDetails(
	infraction: Infraction,
	member: UserRef,
	now: Date,
): string[] {
	const lines = [
		`Infraction #${infraction.id}`,
		`Type: ${infraction.type}`,
		`Member: ${formatUserRef(member)}`,
		`Actor: ${infraction.actorId}`,
		`Reason: ${infraction.reason ?? NO_REASON}`,
		`Created: ${formatTimestamp(infraction.createdAt)} (${infraction.timeSinceCreated(now)})`,
	];

	if (infraction.kind.lasting) {
		lines.push(`Duration: ${infraction.humanizedDuration()}`);
		const expiresAt = infraction.expiresAt;
		if (expiresAt) {
			const remaining = infraction.active ? untilExpiration(expiresAt, now) : null;
			lines.push(
				remaining
					? `Expires: ${formatTimestamp(expiresAt)} (in ${remaining})`
					: `Expires: ${formatTimestamp(expiresAt)}`,
			);
		}
		lines.push(`Active: ${infraction.isCurrentlyActive(now) ? "yes" : "no"}`);
	}
	return lines;
}
