/**
 * Contracts between the infraction service and the outside world:
 * platform enforcement, authority checks, user notification and the audit log.
 *
 * @module services/enforcement
 */

import type { InfractionType, UserRef } from "../types";

export type EnforcementErrorKind = "forbidden" | "not_found" | "transport";

/**
 * Failure of a platform-side enforcement or reversal call.
 * - `forbidden`: the bot lacks the rights (role hierarchy, missing admin rights)
 * - `not_found`: the target no longer exists on the platform
 * - `transport`: anything else; not retried
 */
export class EnforcementError extends Error {
	constructor(
		readonly kind: EnforcementErrorKind,
		message: string,
		cause?: unknown,
	) {
		super(message, { cause });
		this.name = "EnforcementError";
	}
}

/** Unknown errors are treated as transport failures. */
export const toEnforcementError = (error: unknown): EnforcementError => {
	if (error instanceof EnforcementError) {
		return error;
	}
	const message = error instanceof Error ? error.message : String(error);
	return new EnforcementError("transport", message, error);
};

export interface Enforcer {
	/** Applies the platform effect of an infraction type. */
	enforce(type: InfractionType, user: UserRef, reason: string | null): Promise<void>;
	/** Lifts the platform effect. Lifting an effect that is not in place succeeds. */
	reverse(type: InfractionType, user: UserRef, reason: string | null): Promise<void>;
}

export interface AuthorityCheck {
	canAct(actorId: number, targetId: number): boolean;
}

export interface Notifier {
	/** Best effort; resolves false instead of throwing. */
	notify(userId: number, message: string): Promise<boolean>;
}

export type AuditEvent =
	| "applied"
	| "apply_failed"
	| "rejected"
	| "pardoned"
	| "expired"
	| "deactivation_failed"
	| "removed";

export interface AuditEntry {
	event: AuditEvent;
	infractionId: number | null;
	type: InfractionType;
	user: UserRef;
	actorId: number | null;
	/** Ordered human-readable lines, e.g. { Reason: "spam", Duration: "2 hours" } */
	fields: Record<string, string>;
	/** Set when the entry describes a failure an operator should look at */
	failure?: string;
}

export interface AuditLog {
	record(entry: AuditEntry): Promise<void>;
	/** Operator-facing alert, kept apart from ordinary replies. */
	alert(message: string): Promise<void>;
}
