/**
 * Audit log for infraction events.
 * Every entry goes to the structured log; when a mod log chat is configured a
 * readable copy is posted there as well. Alerts go to the admin chat.
 *
 * @module services/modLog
 */

import { notifyAdmin, notifyModLog } from "../utils/adminNotify";
import { StructuredLogger } from "../utils/logger";
import { formatUserRef } from "../utils/userResolver";
import type { AuditEntry, AuditEvent, AuditLog } from "./enforcement";

const TITLES: Record<AuditEvent, string> = {
	applied: "Infraction applied",
	apply_failed: "Infraction failed to apply",
	rejected: "Infraction rejected",
	pardoned: "Infraction pardoned",
	expired: "Infraction expired",
	deactivation_failed: "Infraction expiration failed",
	removed: "Infraction removed",
};

/**
 * Renders an entry as the lines of a mod log message.
 *
 * @example
 * renderAuditLines(entry)
 * // ["Member: @alice (42)", "Actor: 7", "Reason: spam", "ID: 3"]
 */
export function renderAuditLines(entry: AuditEntry): string[] {
	const lines = [`Member: ${formatUserRef(entry.user)}`];
	if (entry.actorId !== null) {
		lines.push(`Actor: ${entry.actorId}`);
	}
	for (const [key, value] of Object.entries(entry.fields)) {
		lines.push(`${key}: ${value}`);
	}
	if (entry.failure) {
		lines.push(`Failure: ${entry.failure}`);
	}
	if (entry.infractionId !== null) {
		lines.push(`ID: ${entry.infractionId}`);
	}
	return lines;
}

export class ModLog implements AuditLog {
	async record(entry: AuditEntry): Promise<void> {
		StructuredLogger.logInfraction(
			entry.event,
			{
				infractionId: entry.infractionId ?? undefined,
				userId: entry.user.id,
				actorId: entry.actorId,
				type: entry.type,
				...entry.fields,
				failure: entry.failure,
			},
			entry.failure !== undefined,
		);

		await notifyModLog(
			`${TITLES[entry.event]}: ${entry.type}`,
			renderAuditLines(entry),
		);
	}

	async alert(message: string): Promise<void> {
		StructuredLogger.logSecurityEvent(message, { operation: "admin_alert" });
		await notifyAdmin(message);
	}
}
