/**
 * Expiry scheduling for lasting infractions.
 *
 * Keeps one timer per pending expiry in an in-memory index. When a timer
 * fires, its entry is removed and an `expired` message carrying the
 * infraction id is published to subscribers. Cancelling removes the entry;
 * a timer whose entry is gone does nothing when it wakes.
 *
 * The index is a cache of the store's active set and is rebuilt from it by
 * {@link InfractionScheduler.reconcile} after a restart.
 *
 * @module services/infractionScheduler
 */

import { EventEmitter } from "node:events";
import { StructuredLogger } from "../utils/logger";
import type { Infraction } from "./infractionRecord";
import type { InfractionStore } from "./infractionStore";

/** Largest delay setTimeout accepts (about 24.8 days). */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

const EXPIRED_EVENT = "expired";

interface ScheduledExpiry {
	infractionId: number;
	fireAt: Date;
	timer: NodeJS.Timeout;
}

export type ExpiryListener = (infractionId: number) => void;

export class InfractionScheduler {
	private readonly pending = new Map<number, ScheduledExpiry>();
	private readonly events = new EventEmitter();

	constructor(private readonly store: InfractionStore) {}

	/**
	 * Starts tracking the infraction's expiry.
	 * Instant, permanent and unsaved infractions are ignored, as is an expiry
	 * that is not a valid instant. An expiry already
	 * in the past fires on the next timer tick. Tracking an id again replaces
	 * the previous timer.
	 *
	 * @returns true if a timer was registered
	 */
	track(infraction: Infraction): boolean {
		const fireAt = infraction.expiresAt;
		if (infraction.id === null || fireAt === null) {
			return false;
		}
		if (Number.isNaN(fireAt.getTime())) {
			StructuredLogger.logSecurityEvent("Refused to schedule an invalid expiry", {
				infractionId: infraction.id,
				userId: infraction.userId,
			});
			return false;
		}

		this.cancel(infraction.id);

		const entry: ScheduledExpiry = {
			infractionId: infraction.id,
			fireAt,
			timer: this.arm(infraction.id, fireAt),
		};
		this.pending.set(infraction.id, entry);

		StructuredLogger.logDebug("Scheduled infraction expiry", {
			infractionId: infraction.id,
			fireAt: fireAt.toISOString(),
		});
		return true;
	}

	/**
	 * Stops tracking an infraction. Unknown ids are ignored.
	 *
	 * @returns true if a pending timer was removed
	 */
	cancel(infractionId: number): boolean {
		const entry = this.pending.get(infractionId);
		if (!entry) {
			return false;
		}
		clearTimeout(entry.timer);
		this.pending.delete(infractionId);
		return true;
	}

	/**
	 * Tracks every active, finite infraction in the store.
	 * Run once at startup, before any infraction is applied.
	 *
	 * @returns Number of infractions now tracked
	 */
	reconcile(): number {
		let tracked = 0;
		for (const infraction of this.store.listAllActive()) {
			if (this.track(infraction)) {
				tracked++;
			}
		}

		StructuredLogger.logUserAction("Rescheduled infraction expiries", {
			operation: "reconcile",
			tracked,
		});
		return tracked;
	}

	/**
	 * Subscribes to expiry messages.
	 *
	 * @returns Function that removes the subscription
	 */
	onExpired(listener: ExpiryListener): () => void {
		this.events.on(EXPIRED_EVENT, listener);
		return () => {
			this.events.off(EXPIRED_EVENT, listener);
		};
	}

	isTracking(infractionId: number): boolean {
		return this.pending.has(infractionId);
	}

	get size(): number {
		return this.pending.size;
	}

	/** Drops every pending timer (shutdown). */
	clear(): void {
		for (const entry of this.pending.values()) {
			clearTimeout(entry.timer);
		}
		this.pending.clear();
	}

	private arm(infractionId: number, fireAt: Date): NodeJS.Timeout {
		const delay = Math.max(fireAt.getTime() - Date.now(), 0);
		return setTimeout(
			() => this.fire(infractionId, fireAt),
			Math.min(delay, MAX_TIMER_DELAY_MS),
		);
	}

	private fire(infractionId: number, fireAt: Date): void {
		const entry = this.pending.get(infractionId);
		// cancelled, or replaced by a newer track()
		if (!entry || entry.fireAt !== fireAt) {
			return;
		}

		// delays past the setTimeout ceiling wake early and re-arm
		if (fireAt.getTime() > Date.now()) {
			entry.timer = this.arm(infractionId, fireAt);
			return;
		}

		this.pending.delete(infractionId);
		this.events.emit(EXPIRED_EVENT, infractionId);
	}
}
