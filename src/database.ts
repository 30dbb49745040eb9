/**
 * Database module for the infraction bot.
 * Provides the SQLite connection, typed query functions, and schema initialization.
 * Uses better-sqlite3 for synchronous database operations.
 *
 * @module database
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { config } from "./config";
import { logger } from "./utils/logger";

/**
 * Current version of the schema, stored in `PRAGMA user_version`.
 * Bump together with a migration step in {@link initDb}.
 */
export const SCHEMA_VERSION = 1;

let db: Database.Database | null = null;

/**
 * Opens the SQLite database and makes it the active connection.
 * Any previously opened connection is closed first.
 *
 * @param path - File path, or `:memory:` for a throwaway database
 * @returns The opened connection
 *
 * @example
 * ```typescript
 * openDatabase();            // uses config.databasePath
 * openDatabase(':memory:');  // tests
 * ```
 */
export const openDatabase = (
	path: string = config.databasePath,
): Database.Database => {
	closeDatabase();
	if (path !== ":memory:") {
		mkdirSync(dirname(path), { recursive: true });
	}
	db = new Database(path);
	db.pragma("foreign_keys = ON");
	return db;
};

/**
 * Closes the active connection, if any.
 */
export const closeDatabase = (): void => {
	if (db) {
		db.close();
		db = null;
	}
};

const connection = (): Database.Database => {
	if (!db) {
		throw new Error("Database is not open - call openDatabase() first");
	}
	return db;
};

/**
 * Executes a SELECT query and returns all matching rows as typed objects.
 *
 * @template T - The type of objects expected in the result set
 * @param sql - The SQL query string (supports parameterized queries)
 * @param params - Array of parameters to bind to the query
 * @returns Array of typed result objects
 * @throws {Error} If the query fails to execute
 *
 * @example
 * ```typescript
 * const rows = query<InfractionRow>('SELECT * FROM infractions WHERE user_id = ?', [123]);
 * ```
 */
export const query = <T>(sql: string, params: unknown[] = []): T[] => {
	try {
		const stmt = connection().prepare(sql);
		return stmt.all(params) as T[];
	} catch (error) {
		logger.error(`Database query failed: ${sql}`, error);
		throw error;
	}
};

/**
 * Executes an INSERT, UPDATE, or DELETE statement.
 *
 * @param sql - The SQL statement string (supports parameterized statements)
 * @param params - Array of parameters to bind to the statement
 * @returns RunResult object containing changes count and lastInsertRowid
 * @throws {Error} If the statement fails to execute
 */
export const execute = (
	sql: string,
	params: unknown[] = [],
): Database.RunResult => {
	try {
		const stmt = connection().prepare(sql);
		return stmt.run(params);
	} catch (error) {
		logger.error(`Database execution failed: ${sql}`, error);
		throw error;
	}
};

/**
 * Executes a SELECT query and returns a single row as a typed object.
 * Returns undefined if no rows match.
 *
 * @template T - The type of object expected in the result
 * @throws {Error} If the query fails to execute
 */
export const get = <T>(sql: string, params: unknown[] = []): T | undefined => {
	try {
		const stmt = connection().prepare(sql);
		return stmt.get(params) as T | undefined;
	} catch (error) {
		logger.error(`Database get failed: ${sql}`, error);
		throw error;
	}
};

/**
 * Runs `fn` inside a single SQLite transaction.
 * The transaction is rolled back if `fn` throws, and the error is rethrown.
 *
 * @example
 * ```typescript
 * const id = transaction(() => {
 *   const result = execute('INSERT INTO infractions (...) VALUES (...)', params);
 *   return Number(result.lastInsertRowid);
 * });
 * ```
 */
export const transaction = <T>(fn: () => T): T => {
	try {
		return connection().transaction(fn)();
	} catch (error) {
		logger.error("Database transaction failed", error);
		throw error;
	}
};

/**
 * Initializes the database schema by creating all required tables and indexes.
 *
 * Creates the following tables:
 * - users: Known Telegram users with their moderation role
 * - infractions: Every recorded infraction, keyed by an auto-assigned id
 *
 * Safe to call multiple times - uses IF NOT EXISTS clauses.
 *
 * @throws {Error} If table creation fails
 */
export const initDb = (): void => {
	const conn = connection();

	conn.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY,
      username TEXT,
      role TEXT DEFAULT 'member',
      created_at INTEGER DEFAULT (strftime('%s', 'now')),
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

	// created_at is text in the fixed timestamp format, duration is in seconds
	// with 1000000000 standing for a permanent infraction
	conn.exec(`
    CREATE TABLE IF NOT EXISTS infractions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      type TEXT NOT NULL,
      reason TEXT,
      actor_id INTEGER NOT NULL,
      created_at TEXT NOT NULL,
      duration INTEGER NOT NULL DEFAULT 0,
      active INTEGER NOT NULL DEFAULT 0 CHECK (active IN (0, 1))
    );
  `);

	conn.exec(`
    CREATE INDEX IF NOT EXISTS idx_users_username ON users(username);
    CREATE INDEX IF NOT EXISTS idx_infractions_user ON infractions(user_id, type, active);
    CREATE INDEX IF NOT EXISTS idx_infractions_active ON infractions(active);
  `);

	const version = conn.pragma("user_version", { simple: true });
	if (version !== SCHEMA_VERSION) {
		conn.pragma(`user_version = ${SCHEMA_VERSION}`);
	}

	logger.info("Database initialized successfully", {
		schemaVersion: SCHEMA_VERSION,
	});
};
