/** Database entity types - snake_case matches SQLite columns */

export type Role = "owner" | "admin" | "moderator" | "member";

export interface User {
	id: number; // Telegram user ID
	username: string | null;
	role: Role;
	created_at: number;
	updated_at: number;
}

export type InfractionType = "note" | "warn" | "kick" | "mute" | "ban";

/** One row of the infractions table */
export interface InfractionRow {
	id: number;
	user_id: number;
	type: string; // validated into InfractionType when loaded
	reason: string | null;
	actor_id: number;
	created_at: string; // fixed timestamp format, UTC
	duration: number; // seconds, 1000000000 = permanent
	active: number; // 0 | 1
}

/**
 * A platform user as far as the bot knows it.
 * Lookups that fail still yield an id-only reference.
 */
export type UserRef =
	| {
			kind: "resolved";
			id: number;
			username: string | null;
			firstName?: string;
			isBot: boolean;
	  }
	| {
			kind: "unresolved";
			id: number;
	  };
