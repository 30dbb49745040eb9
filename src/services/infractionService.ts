/**
 * Infraction service: the one place that applies, pardons, expires and removes
 * infractions. It alone calls the platform enforcer and flips the active flag.
 *
 * Operations on the same (user, type) pair run one after another through an
 * in-flight chain kept per instance, so a manual pardon racing an expiry
 * deactivates the record once and the other path sees `not_active`.
 *
 * @module services/infractionService
 */

import type { InfractionType, UserRef } from "../types";
import { StructuredLogger } from "../utils/logger";
import { formatTimestamp } from "../utils/time";
import {
	type AuditEntry,
	type AuditLog,
	type AuthorityCheck,
	type EnforcementError,
	type Enforcer,
	type Notifier,
	toEnforcementError,
} from "./enforcement";
import { Infraction, InfractionValidationError } from "./infractionRecord";
import type { InfractionScheduler } from "./infractionScheduler";
import type { InfractionStore } from "./infractionStore";

export interface ApplyInput {
	user: UserRef;
	type: InfractionType;
	actorId: number;
	reason?: string | null;
	/** Seconds; lasting types default to permanent */
	duration?: number;
	/** Skip the DM to the user */
	hidden?: boolean;
}

/**
 * Outcome of {@link InfractionService.apply}. Records returned with
 * `enforcement_forbidden` or `transport_error` are kept but inactive.
 */
export type ApplyResult =
	| { status: "applied"; infraction: Infraction; notified: boolean }
	| { status: "policy_rejected"; reason: string }
	| { status: "conflict"; existing: Infraction }
	| {
			status: "enforcement_forbidden";
			infraction: Infraction;
			error: EnforcementError;
	  }
	| { status: "transport_error"; infraction: Infraction; error: EnforcementError };

export type PardonResult =
	| {
			status: "pardoned";
			infraction: Infraction;
			/** Whether the platform effect was lifted */
			reversed: boolean;
			/** Reversal failure, reported but not blocking */
			failure?: EnforcementError;
			/** Longer active record that keeps the platform effect in place */
			governedBy?: Infraction;
			/** Shorter records of the same type deactivated along with this one */
			cascadedIds: number[];
	  }
	| { status: "not_active"; infraction: Infraction }
	| { status: "not_found"; id: number };

export type RemoveResult =
	| { status: "removed"; infraction: Infraction; pardon: PardonResult | null }
	| { status: "not_found"; id: number };

export interface PardonOptions {
	actorId?: number;
	reason?: string | null;
}

type DeactivationCause = "pardoned" | "expired";

export interface InfractionServiceDeps {
	store: InfractionStore;
	scheduler: InfractionScheduler;
	enforcer: Enforcer;
	authority: AuthorityCheck;
	botId: number;
	notifier?: Notifier;
	auditLog?: AuditLog;
	/** Best available reference for a stored user id */
	lookupUser?: (userId: number) => UserRef;
	now?: () => Date;
}

const APPLIED_VERBS: Record<InfractionType, string> = {
	note: "noted",
	warn: "warned",
	kick: "kicked",
	mute: "muted",
	ban: "banned",
};

export class InfractionService {
	private readonly store: InfractionStore;
	private readonly scheduler: InfractionScheduler;
	private readonly enforcer: Enforcer;
	private readonly authority: AuthorityCheck;
	private readonly botId: number;
	private readonly notifier: Notifier | null;
	private readonly auditLog: AuditLog | null;
	private readonly lookupUser: (userId: number) => UserRef;
	private readonly now: () => Date;

	private readonly inFlight = new Map<string, Promise<void>>();
	private readonly ready: Promise<void>;
	private markReady: () => void = () => {};
	private started = false;
	private unsubscribe: (() => void) | null = null;

	constructor(deps: InfractionServiceDeps) {
		this.store = deps.store;
		this.scheduler = deps.scheduler;
		this.enforcer = deps.enforcer;
		this.authority = deps.authority;
		this.botId = deps.botId;
		this.notifier = deps.notifier ?? null;
		this.auditLog = deps.auditLog ?? null;
		this.lookupUser =
			deps.lookupUser ?? ((id: number): UserRef => ({ kind: "unresolved", id }));
		this.now = deps.now ?? (() => new Date());
		this.ready = new Promise<void>((resolve) => {
			this.markReady = resolve;
		});
	}

	/**
	 * Reschedules every stored expiry and opens the service for commands.
	 * Calls after the first do nothing.
	 *
	 * @returns Number of expiries rescheduled
	 */
	start(): number {
		if (this.started) {
			return 0;
		}
		this.started = true;

		this.unsubscribe = this.scheduler.onExpired((id) => {
			this.expire(id).catch((error: unknown) => {
				StructuredLogger.logError(error, {
					infractionId: id,
					operation: "expire",
				});
			});
		});
		const tracked = this.scheduler.reconcile();
		this.markReady();
		return tracked;
	}

	stop(): void {
		this.unsubscribe?.();
		this.unsubscribe = null;
		this.scheduler.clear();
	}

	/**
	 * Records an infraction and applies its platform effect.
	 *
	 * A lasting infraction is refused with `conflict` while an active record of
	 * the same type ends at the same time or later. A failed enforcement keeps
	 * the record for the history but leaves it inactive.
	 */
	async apply(input: ApplyInput): Promise<ApplyResult> {
		await this.ready;

		const rejection = this.rejectionReason(input);
		if (rejection) {
			await this.audit({
				event: "rejected",
				infractionId: null,
				type: input.type,
				user: input.user,
				actorId: input.actorId,
				fields: { Reason: rejection },
			});
			return { status: "policy_rejected", reason: rejection };
		}

		return this.serialize(input.user.id, input.type, () =>
			this.applyLocked(input),
		);
	}

	/**
	 * Ends an active infraction early.
	 * The platform effect is only lifted when no longer active record of the
	 * same type still justifies it.
	 */
	async pardon(
		target: Infraction | number,
		options: PardonOptions = {},
	): Promise<PardonResult> {
		await this.ready;

		const id = typeof target === "number" ? target : target.id;
		if (id === null) {
			throw new InfractionValidationError("Cannot pardon an unsaved infraction");
		}
		const found = this.store.getById(id);
		if (!found) {
			return { status: "not_found", id };
		}

		return this.serialize(found.userId, found.type, () =>
			this.deactivateLocked(id, "pardoned", options),
		);
	}

	/**
	 * Pardons the active infraction of a type that currently holds the
	 * platform effect (the one ending last). Shorter ones go with it.
	 */
	async pardonActive(
		userId: number,
		type: InfractionType,
		actorId: number,
		reason: string | null = null,
	): Promise<PardonResult | { status: "none_active" }> {
		await this.ready;

		return this.serialize(userId, type, async () => {
			const governing = this.governingRecord(userId, type);
			if (!governing || governing.id === null) {
				return { status: "none_active" as const };
			}
			return this.deactivateLocked(governing.id, "pardoned", {
				actorId,
				reason,
			});
		});
	}

	/**
	 * Pardons the infraction if it is still active, then deletes it.
	 */
	async remove(id: number, actorId: number): Promise<RemoveResult> {
		await this.ready;

		const found = this.store.getById(id);
		if (!found) {
			return { status: "not_found", id };
		}

		return this.serialize(found.userId, found.type, async () => {
			const current = this.store.getById(id);
			if (!current) {
				return { status: "not_found", id };
			}

			const pardon = current.active
				? await this.deactivateLocked(id, "pardoned", {
						actorId,
						reason: "Infraction removed",
					})
				: null;

			this.scheduler.cancel(id);
			if (!this.store.delete(id)) {
				return { status: "not_found", id };
			}

			await this.audit({
				event: "removed",
				infractionId: id,
				type: current.type,
				user: this.lookupUser(current.userId),
				actorId,
				fields: {
					Reason: current.reason ?? "No reason provided",
					Created: formatTimestamp(current.createdAt),
				},
			});
			return { status: "removed", infraction: current, pardon };
		});
	}

	private async expire(id: number): Promise<void> {
		await this.ready;

		const found = this.store.getById(id);
		if (!found) {
			return;
		}
		await this.serialize(found.userId, found.type, () =>
			this.deactivateLocked(id, "expired", {}),
		);
	}

	private rejectionReason(input: ApplyInput): string | null {
		const { user, actorId } = input;
		if (user.id === this.botId) {
			return "The bot cannot be targeted";
		}
		if (user.kind === "resolved" && user.isBot) {
			return "Bot accounts cannot be targeted";
		}
		if (user.id === actorId) {
			return "You cannot target yourself";
		}
		if (!this.authority.canAct(actorId, user.id)) {
			return "You do not have authority over this user";
		}
		return null;
	}

	private async applyLocked(input: ApplyInput): Promise<ApplyResult> {
		const now = this.now();

		let candidate: Infraction;
		try {
			candidate = Infraction.create({
				userId: input.user.id,
				actorId: input.actorId,
				type: input.type,
				reason: input.reason,
				duration: input.duration,
				createdAt: now,
			});
		} catch (error) {
			if (error instanceof InfractionValidationError) {
				return { status: "policy_rejected", reason: error.message };
			}
			throw error;
		}

		if (candidate.kind.lasting) {
			const existing = this.store
				.listByUser(input.user.id, { type: input.type, active: true })
				.filter((record) => record.isCurrentlyActive(now))
				.find((record) => record.endTime() >= candidate.endTime());
			if (existing) {
				await this.audit({
					event: "rejected",
					infractionId: existing.id,
					type: input.type,
					user: input.user,
					actorId: input.actorId,
					fields: { Reason: "An equal or longer infraction is already active" },
				});
				return { status: "conflict", existing };
			}
		}

		const infraction = candidate.withId(this.store.insert(candidate));
		const fields = this.applyFields(infraction);

		const notified =
			input.hidden || infraction.kind.hidden
				? false
				: await this.notify(infraction, this.appliedMessage(infraction));

		if (infraction.kind.enforced) {
			try {
				await this.enforcer.enforce(infraction.type, input.user, infraction.reason);
			} catch (error) {
				return this.applyFailed(infraction, input, fields, toEnforcementError(error));
			}
		}

		this.scheduler.track(infraction);
		await this.audit({
			event: "applied",
			infractionId: infraction.id,
			type: infraction.type,
			user: input.user,
			actorId: input.actorId,
			fields: { ...fields, DM: notified ? "Sent" : "Not sent" },
		});
		return { status: "applied", infraction, notified };
	}

	private async applyFailed(
		infraction: Infraction,
		input: ApplyInput,
		fields: Record<string, string>,
		error: EnforcementError,
	): Promise<ApplyResult> {
		if (infraction.id !== null && infraction.active) {
			this.store.setActive(infraction.id, false);
			infraction.deactivate();
		}

		const failure =
			error.kind === "forbidden"
				? "The bot lacks permissions to do this"
				: `Platform error: ${error.message}`;
		await this.audit({
			event: "apply_failed",
			infractionId: infraction.id,
			type: infraction.type,
			user: input.user,
			actorId: input.actorId,
			fields,
			failure,
		});
		await this.alert(
			`Failed to apply ${infraction.type} #${infraction.id} to user ${infraction.userId}: ${failure}`,
		);

		return error.kind === "forbidden"
			? { status: "enforcement_forbidden", infraction, error }
			: { status: "transport_error", infraction, error };
	}

	/**
	 * Shared deactivation path for pardons and expiries.
	 * Must run inside the (user, type) chain.
	 */
	private async deactivateLocked(
		id: number,
		cause: DeactivationCause,
		options: PardonOptions,
	): Promise<PardonResult> {
		const infraction = this.store.getById(id);
		if (!infraction) {
			this.scheduler.cancel(id);
			return { status: "not_found", id };
		}
		if (!infraction.active) {
			this.scheduler.cancel(id);
			return { status: "not_active", infraction };
		}

		const now = this.now();
		const others = this.store
			.listByUser(infraction.userId, { type: infraction.type, active: true })
			.filter((record) => record.id !== id);

		const governedBy = others.find(
			(record) =>
				record.isCurrentlyActive(now) && record.endTime() > infraction.endTime(),
		);

		const user = this.lookupUser(infraction.userId);
		let reversed = false;
		let failure: EnforcementError | undefined;
		const cascadedIds: number[] = [];

		if (!governedBy) {
			if (infraction.kind.enforced) {
				try {
					await this.enforcer.reverse(infraction.type, user, options.reason ?? null);
					reversed = true;
				} catch (error) {
					failure = toEnforcementError(error);
				}
			}

			for (const record of others) {
				if (record.id !== null && record.endTime() <= infraction.endTime()) {
					this.store.setActive(record.id, false);
					this.scheduler.cancel(record.id);
					cascadedIds.push(record.id);
				}
			}
		}

		this.store.setActive(id, false);
		infraction.deactivate();
		this.scheduler.cancel(id);

		if (!governedBy && !infraction.kind.hidden) {
			await this.notify(
				infraction,
				cause === "expired"
					? `Your ${infraction.type} has expired.`
					: `Your ${infraction.type} has been lifted.`,
			);
		}

		const fields: Record<string, string> = {};
		if (options.reason) {
			fields.Reason = options.reason;
		}
		if (governedBy) {
			fields.Note = `Platform effect kept: #${governedBy.id} ends later`;
		}
		if (cascadedIds.length > 0) {
			fields["Also deactivated"] = cascadedIds.map((n) => `#${n}`).join(", ");
		}

		const failureText = failure
			? failure.kind === "forbidden"
				? "The bot lacks permissions to do this"
				: `Platform error: ${failure.message}`
			: undefined;

		await this.audit({
			event: failure
				? "deactivation_failed"
				: cause === "expired"
					? "expired"
					: "pardoned",
			infractionId: id,
			type: infraction.type,
			user,
			actorId: options.actorId ?? null,
			fields,
			failure: failureText,
		});
		if (failureText) {
			await this.alert(
				`Failed to lift ${infraction.type} #${id} for user ${infraction.userId}: ${failureText}`,
			);
		}

		return {
			status: "pardoned",
			infraction,
			reversed,
			failure,
			governedBy,
			cascadedIds,
		};
	}

	/** The currently active record of a type that ends last, if any. */
	private governingRecord(
		userId: number,
		type: InfractionType,
	): Infraction | null {
		const now = this.now();
		let governing: Infraction | null = null;
		for (const record of this.store.listByUser(userId, { type, active: true })) {
			if (!record.isCurrentlyActive(now)) {
				continue;
			}
			if (!governing || record.endTime() > governing.endTime()) {
				governing = record;
			}
		}
		return governing;
	}

	private applyFields(infraction: Infraction): Record<string, string> {
		const fields: Record<string, string> = {
			Reason: infraction.reason ?? "No reason provided",
		};
		if (infraction.kind.lasting) {
			fields.Duration = infraction.humanizedDuration();
			const expiresAt = infraction.expiresAt;
			if (expiresAt) {
				fields.Expires = formatTimestamp(expiresAt);
			}
		}
		return fields;
	}

	private appliedMessage(infraction: Infraction): string {
		const lines = [`You have been ${APPLIED_VERBS[infraction.type]}.`];
		if (infraction.kind.lasting) {
			lines.push(`Duration: ${infraction.humanizedDuration()}`);
		}
		lines.push(`Reason: ${infraction.reason ?? "No reason provided"}`);
		return lines.join("\n");
	}

	/**
	 * Runs `operation` after every earlier operation on the same pair settles.
	 */
	private async serialize<T>(
		userId: number,
		type: InfractionType,
		operation: () => Promise<T>,
	): Promise<T> {
		const key = `${userId}:${type}`;
		const previous = this.inFlight.get(key) ?? Promise.resolve();
		const run = previous.then(operation);
		const settled = run.then(
			() => undefined,
			() => undefined,
		);
		this.inFlight.set(key, settled);

		try {
			return await run;
		} finally {
			if (this.inFlight.get(key) === settled) {
				this.inFlight.delete(key);
			}
		}
	}

	/** DMs the member; a failed delivery counts as not sent. */
	private async notify(infraction: Infraction, message: string): Promise<boolean> {
		if (!this.notifier) {
			return false;
		}
		try {
			return await this.notifier.notify(infraction.userId, message);
		} catch (error) {
			StructuredLogger.logError(error, {
				infractionId: infraction.id ?? undefined,
				userId: infraction.userId,
				operation: "notify",
			});
			return false;
		}
	}

	private async audit(entry: AuditEntry): Promise<void> {
		if (!this.auditLog) {
			StructuredLogger.logInfraction(
				entry.event,
				{ infractionId: entry.infractionId ?? undefined, userId: entry.user.id },
				entry.failure !== undefined,
			);
			return;
		}
		try {
			await this.auditLog.record(entry);
		} catch (error) {
			StructuredLogger.logError(error, {
				infractionId: entry.infractionId ?? undefined,
				operation: "audit",
			});
		}
	}

	private async alert(message: string): Promise<void> {
		if (!this.auditLog) {
			StructuredLogger.logSecurityEvent(message, { operation: "admin_alert" });
			return;
		}
		try {
			await this.auditLog.alert(message);
		} catch (error) {
			StructuredLogger.logError(error, { operation: "alert" });
		}
	}
}
