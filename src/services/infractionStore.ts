/**
 * Infraction persistence.
 * CRUD and filtered queries over the infractions table; no business rules.
 * Errors from the database propagate to the caller and are never retried here.
 *
 * @module services/infractionStore
 */

import { execute, get, query, transaction } from "../database";
import type { InfractionRow, InfractionType } from "../types";
import { StructuredLogger } from "../utils/logger";
import { Infraction } from "./infractionRecord";

export interface InfractionFilter {
	type?: InfractionType;
	active?: boolean;
}

export interface InfractionStore {
	/** Persists a new record and returns its id. */
	insert(infraction: Infraction): number;
	getById(id: number): Infraction | null;
	listByUser(userId: number, filter?: InfractionFilter): Infraction[];
	listAllActive(type?: InfractionType): Infraction[];
	/** Idempotent; returns whether a row changed. */
	setActive(id: number, active: false): boolean;
	/** Hard delete; returns whether a row was removed. */
	delete(id: number): boolean;
	countByUser(userId: number): number;
}

const COLUMNS =
	"user_id, type, reason, actor_id, created_at, duration, active";

/**
 * better-sqlite3 backed store over the shared connection in `database.ts`.
 */
export class SqliteInfractionStore implements InfractionStore {
	/**
	 * Inserts the record inside a transaction. An identical row (every column
	 * equal) is treated as the same submission and its id is returned instead
	 * of writing a duplicate.
	 *
	 * @example
	 * ```typescript
	 * const id = store.insert(Infraction.create({ userId: 42, actorId: 1, type: 'warn', reason: 'spam' }));
	 * const saved = store.getById(id);
	 * ```
	 */
	insert(infraction: Infraction): number {
		const row = infraction.toRow();
		const values = [
			row.user_id,
			row.type,
			row.reason,
			row.actor_id,
			row.created_at,
			row.duration,
			row.active,
		];

		return transaction(() => {
			const existing = query<InfractionRow>(
				"SELECT * FROM infractions WHERE user_id = ? AND type = ? AND created_at = ?",
				[row.user_id, row.type, row.created_at],
			)
				.map((candidate) => Infraction.fromRow(candidate))
				.find((candidate) => infraction.isSameEntity(candidate));
			if (existing && existing.id !== null) {
				StructuredLogger.logDebug("Duplicate infraction insert ignored", {
					infractionId: existing.id,
					userId: row.user_id,
				});
				return existing.id;
			}

			const result = execute(
				`INSERT INTO infractions (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`,
				values,
			);
			return Number(result.lastInsertRowid);
		});
	}

	getById(id: number): Infraction | null {
		const row = get<InfractionRow>("SELECT * FROM infractions WHERE id = ?", [
			id,
		]);
		return row ? Infraction.fromRow(row) : null;
	}

	listByUser(userId: number, filter: InfractionFilter = {}): Infraction[] {
		const clauses = ["user_id = ?"];
		const params: unknown[] = [userId];

		if (filter.type !== undefined) {
			clauses.push("type = ?");
			params.push(filter.type);
		}
		if (filter.active !== undefined) {
			clauses.push("active = ?");
			params.push(filter.active ? 1 : 0);
		}

		return query<InfractionRow>(
			`SELECT * FROM infractions WHERE ${clauses.join(" AND ")} ORDER BY id`,
			params,
		).map((row) => Infraction.fromRow(row));
	}

	listAllActive(type?: InfractionType): Infraction[] {
		const rows =
			type === undefined
				? query<InfractionRow>(
						"SELECT * FROM infractions WHERE active = 1 ORDER BY id",
					)
				: query<InfractionRow>(
						"SELECT * FROM infractions WHERE active = 1 AND type = ? ORDER BY id",
						[type],
					);
		return rows.map((row) => Infraction.fromRow(row));
	}

	setActive(id: number, active: false): boolean {
		const result = execute(
			"UPDATE infractions SET active = ? WHERE id = ? AND active = 1",
			[active ? 1 : 0, id],
		);
		return result.changes > 0;
	}

	delete(id: number): boolean {
		const result = execute("DELETE FROM infractions WHERE id = ?", [id]);
		return result.changes > 0;
	}

	countByUser(userId: number): number {
		const row = get<{ total: number }>(
			"SELECT COUNT(*) AS total FROM infractions WHERE user_id = ?",
			[userId],
		);
		return row?.total ?? 0;
	}
}
