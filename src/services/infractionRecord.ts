/**
 * Infraction record: one recorded disciplinary action and the pure
 * computations derived from it. No I/O happens here.
 *
 * @module services/infractionRecord
 */

import type { InfractionRow, InfractionType } from "../types";
import {
	deltaFromSeconds,
	formatTimestamp,
	humanizeDelta,
	parseTimestamp,
	timeSince,
} from "../utils/time";

/**
 * Duration (seconds) standing in for "never expires".
 * Compared as infinity, never used in timer arithmetic.
 */
export const PERMANENT_DURATION = 1_000_000_000;

/**
 * How each infraction type behaves.
 * - `lasting`: carries an ongoing effect that can expire or be pardoned
 * - `enforced`: has a platform-side action
 * - `hidden`: the target is never notified
 */
export interface InfractionKind {
	lasting: boolean;
	enforced: boolean;
	hidden: boolean;
}

export const INFRACTION_KINDS: Record<InfractionType, InfractionKind> = {
	note: { lasting: false, enforced: false, hidden: true },
	warn: { lasting: false, enforced: false, hidden: false },
	kick: { lasting: false, enforced: true, hidden: false },
	mute: { lasting: true, enforced: true, hidden: false },
	ban: { lasting: true, enforced: true, hidden: false },
};

export const isInfractionType = (value: string): value is InfractionType =>
	Object.prototype.hasOwnProperty.call(INFRACTION_KINDS, value);

/**
 * Thrown when an infraction is built from invalid data.
 */
export class InfractionValidationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InfractionValidationError";
	}
}

export interface CreateInfractionInput {
	userId: number;
	actorId: number;
	type: string;
	reason?: string | null;
	createdAt?: Date;
	/** Seconds; ignored for instant types */
	duration?: number;
}

interface InfractionFields {
	id: number | null;
	userId: number;
	actorId: number;
	type: InfractionType;
	reason: string | null;
	createdAt: Date;
	duration: number;
	active: boolean;
}

export class Infraction {
	readonly id: number | null;
	readonly userId: number;
	readonly actorId: number;
	readonly type: InfractionType;
	readonly reason: string | null;
	readonly createdAt: Date;
	readonly duration: number;
	private activeFlag: boolean;

	private constructor(fields: InfractionFields) {
		if (!isInfractionType(fields.type)) {
			throw new InfractionValidationError(
				`Unknown infraction type "${fields.type}"`,
			);
		}
		if (!Number.isInteger(fields.duration) || fields.duration < 0) {
			throw new InfractionValidationError(
				`Duration must be a non-negative whole number of seconds, got ${fields.duration}`,
			);
		}
		if (Number.isNaN(fields.createdAt.getTime())) {
			throw new InfractionValidationError("Creation time is not a valid instant");
		}
		if (
			fields.duration < PERMANENT_DURATION &&
			Number.isNaN(new Date(fields.createdAt.getTime() + fields.duration * 1000).getTime())
		) {
			throw new InfractionValidationError("Expiry time is not a valid instant");
		}

		this.id = fields.id;
		this.userId = fields.userId;
		this.actorId = fields.actorId;
		this.type = fields.type;
		this.reason = fields.reason;
		this.createdAt = fields.createdAt;
		this.duration = fields.duration;
		this.activeFlag = fields.active;
	}

	/**
	 * Builds a new, not yet persisted infraction.
	 * Instant types (note, warn, kick) get duration 0 and start inactive;
	 * lasting types start active. A duration at or past the permanent sentinel
	 * is stored as permanent. The creation time is truncated to whole
	 * seconds, the precision of the stored timestamp.
	 *
	 * @throws {InfractionValidationError}
	 */
	static create(input: CreateInfractionInput): Infraction {
		if (!isInfractionType(input.type)) {
			throw new InfractionValidationError(
				`Unknown infraction type "${input.type}"`,
			);
		}
		const kind = INFRACTION_KINDS[input.type];
		const createdAt = input.createdAt ?? new Date();
		const duration = kind.lasting
			? Math.min(input.duration ?? PERMANENT_DURATION, PERMANENT_DURATION)
			: 0;

		if (kind.lasting && duration === 0) {
			throw new InfractionValidationError(
				`A ${input.type} needs a positive duration`,
			);
		}

		return new Infraction({
			id: null,
			userId: input.userId,
			actorId: input.actorId,
			type: input.type,
			reason: input.reason ?? null,
			createdAt: new Date(Math.floor(createdAt.getTime() / 1000) * 1000),
			duration,
			active: kind.lasting,
		});
	}

	/**
	 * Rebuilds an infraction from its table row.
	 *
	 * @throws {InfractionValidationError} If the row holds an unknown type
	 */
	static fromRow(row: InfractionRow): Infraction {
		if (!isInfractionType(row.type)) {
			throw new InfractionValidationError(
				`Infraction #${row.id} has unknown type "${row.type}"`,
			);
		}
		return new Infraction({
			id: row.id,
			userId: row.user_id,
			actorId: row.actor_id,
			type: row.type,
			reason: row.reason,
			createdAt: parseTimestamp(row.created_at),
			duration: row.duration,
			active: row.active === 1,
		});
	}

	/** Row values without the id, in table column order. */
	toRow(): Omit<InfractionRow, "id"> {
		return {
			user_id: this.userId,
			type: this.type,
			reason: this.reason,
			actor_id: this.actorId,
			created_at: formatTimestamp(this.createdAt),
			duration: this.duration,
			active: this.activeFlag ? 1 : 0,
		};
	}

	/** Copy of this infraction carrying the id the store assigned. */
	withId(id: number): Infraction {
		return new Infraction({ ...this.fields(), id });
	}

	get active(): boolean {
		return this.activeFlag;
	}

	get kind(): InfractionKind {
		return INFRACTION_KINDS[this.type];
	}

	get isPermanent(): boolean {
		return this.duration >= PERMANENT_DURATION;
	}

	get isInstant(): boolean {
		return this.duration === 0;
	}

	/** Null for permanent and instant infractions. */
	get expiresAt(): Date | null {
		if (this.isPermanent || this.isInstant) {
			return null;
		}
		return new Date(this.createdAt.getTime() + this.duration * 1000);
	}

	/** End of the infraction in epoch milliseconds; Infinity when permanent. */
	endTime(): number {
		if (this.isPermanent) {
			return Number.POSITIVE_INFINITY;
		}
		return this.createdAt.getTime() + this.duration * 1000;
	}

	/** Time-only check, ignoring the stored active flag. */
	isActiveAt(now: Date): boolean {
		if (this.isPermanent) {
			return true;
		}
		return now.getTime() < this.endTime();
	}

	isCurrentlyActive(now: Date = new Date()): boolean {
		return this.activeFlag && this.isActiveAt(now);
	}

	/** Clears the active flag. There is no way back. */
	deactivate(): void {
		this.activeFlag = false;
	}

	/**
	 * "permanent", "instant", or at most two units such as "3 days and 2 hours".
	 */
	humanizedDuration(): string {
		if (this.isPermanent) {
			return "permanent";
		}
		const humanized = humanizeDelta(deltaFromSeconds(this.duration), "seconds", 2);
		return humanized === "less than a second" ? "instant" : humanized;
	}

	timeSinceCreated(now: Date = new Date()): string {
		return timeSince(this.createdAt, now, 2);
	}

	/**
	 * Same entity when both ids are assigned and equal. Unsaved records
	 * compare by every field; the store uses this to catch duplicate inserts.
	 */
	isSameEntity(other: Infraction): boolean {
		if (this.id !== null && other.id !== null) {
			return this.id === other.id;
		}
		return this.hasSameFields(other);
	}

	hasSameFields(other: Infraction): boolean {
		return (
			this.userId === other.userId &&
			this.actorId === other.actorId &&
			this.type === other.type &&
			this.reason === other.reason &&
			this.createdAt.getTime() === other.createdAt.getTime() &&
			this.duration === other.duration &&
			this.activeFlag === other.activeFlag
		);
	}

	private fields(): InfractionFields {
		return {
			id: this.id,
			userId: this.userId,
			actorId: this.actorId,
			type: this.type,
			reason: this.reason,
			createdAt: this.createdAt,
			duration: this.duration,
			active: this.activeFlag,
		};
	}
}
