/**
 * Test database utilities
 * Every test gets a fresh in-memory database behind the real `database` module.
 */

import { closeDatabase, execute, initDb, openDatabase } from '../../src/database';
import type { Role } from '../../src/types';

/**
 * Open a fresh in-memory database with the full schema
 */
export function initTestDatabase(): void {
  openDatabase(':memory:');
  initDb();
}

export function closeTestDatabase(): void {
  closeDatabase();
}

/**
 * Create a test user with the given role
 */
export function createTestUser(id: number, username: string | null, role: Role = 'member'): void {
  execute('INSERT INTO users (id, username, role) VALUES (?, ?, ?)', [id, username, role]);
}

/**
 * Insert an infraction row as-is, bypassing the store's checks
 */
export function insertRawInfraction(row: {
  userId: number;
  type: string;
  reason?: string | null;
  actorId?: number;
  createdAt: string;
  duration: number;
  active: boolean;
}): number {
  const result = execute(
    'INSERT INTO infractions (user_id, type, reason, actor_id, created_at, duration, active) VALUES (?, ?, ?, ?, ?, ?, ?)',
    [
      row.userId,
      row.type,
      row.reason ?? null,
      row.actorId ?? 1,
      row.createdAt,
      row.duration,
      row.active ? 1 : 0,
    ]
  );
  return Number(result.lastInsertRowid);
}
