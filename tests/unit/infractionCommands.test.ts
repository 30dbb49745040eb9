import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
/**
 * Unit tests for infraction history commands
 */

import { createInfractionHandlers } from '../../src/commands/infractions';
import type { CommandHandler } from '../../src/commands/moderation';
import { InfractionScheduler } from '../../src/services/infractionScheduler';
import { InfractionService } from '../../src/services/infractionService';
import { SqliteInfractionStore } from '../../src/services/infractionStore';
import { FakeEnforcer, RecordingAuditLog, allowAll, member } from '../helpers/fakes';
import { createModeratorContext, getReplyText } from '../helpers/mockContext';
import { closeTestDatabase, createTestUser, initTestDatabase } from '../helpers/testDatabase';

const MOD = 333333333;

describe('infraction commands', () => {
  let store: SqliteInfractionStore;
  let service: InfractionService;
  let handlers: Record<string, CommandHandler>;

  const run = async (command: string, text: string): Promise<string> => {
    const handler = handlers[command];
    if (!handler) {
      throw new Error(`no handler for /${command}`);
    }
    const { ctx, reply } = createModeratorContext(text);
    await handler(ctx);
    return getReplyText(reply);
  };

  const seed = async (): Promise<void> => {
    await service.apply({ user: member(42, 'bob'), type: 'warn', actorId: MOD, reason: 'spam' });
    await service.apply({ user: member(42, 'bob'), type: 'ban', actorId: MOD, reason: 'flood', duration: 3600 });
  };

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    vi.setSystemTime(new Date(Date.UTC(2024, 2, 1, 12, 0, 0)));
    initTestDatabase();
    createTestUser(42, 'bob');

    store = new SqliteInfractionStore();
    service = new InfractionService({
      store,
      scheduler: new InfractionScheduler(store),
      enforcer: new FakeEnforcer(),
      authority: allowAll,
      auditLog: new RecordingAuditLog(),
      botId: 999,
    });
    service.start();
    handlers = createInfractionHandlers({ service, store });
  });

  afterEach(() => {
    service.stop();
    closeTestDatabase();
    vi.useRealTimers();
  });

  describe('/infractions', () => {
    it('says when a user is clean', async () => {
      expect(await run('infractions', '/infractions @bob')).toBe('✅ @bob (42) has no infractions.');
    });

    it('lists newest first', async () => {
      await seed();

      expect(await run('infractions', '/infractions @bob')).toBe(
        [
          '📋 Infractions for @bob (42): 2 total',
          '#2 ban · 1 hour · active · 2024-03-01 12:00:00 · flood',
          '#1 warn · 2024-03-01 12:00:00 · spam',
        ].join('\n'),
      );
    });

    it('reports unknown users', async () => {
      expect(await run('infractions', '/infractions @ghost')).toBe('⚠️ User not found.');
    });
  });

  describe('/infraction', () => {
    it('shows the details of one record', async () => {
      await seed();

      expect(await run('infraction', '/infraction #2')).toBe(
        [
          'Infraction #2',
          'Type: ban',
          'Member: @bob (42)',
          'Actor: 333333333',
          'Reason: flood',
          'Created: 2024-03-01 12:00:00 (less than a second ago)',
          'Duration: 1 hour',
          'Expires: 2024-03-01 13:00:00 (in 1 hour)',
          'Active: yes',
        ].join('\n'),
      );
    });

    it('handles unknown and malformed ids', async () => {
      expect(await run('infraction', '/infraction 99')).toBe('⚠️ Infraction #99 not found.');
      expect(await run('infraction', '/infraction abc')).toBe('⚠️ Usage: /infraction <id>');
    });
  });

  describe('/pardon', () => {
    it('pardons once', async () => {
      await seed();

      expect(await run('pardon', '/pardon 2 appeal accepted')).toBe('✅ ban #2 pardoned.');
      expect(await run('pardon', '/pardon 2')).toBe('⚠️ Infraction #2 is not active.');
      expect(store.getById(2)?.active).toBe(false);
    });
  });

  describe('/removeinfraction', () => {
    it('pardons active records before deleting them', async () => {
      await seed();

      expect(await run('removeinfraction', '/removeinfraction 2')).toBe(
        '🗑️ Infraction #2 (ban) removed.\n✅ ban #2 pardoned.',
      );
      expect(await run('removeinfraction', '/removeinfraction 2')).toBe('⚠️ Infraction #2 not found.');
    });

    it('deletes inactive records directly', async () => {
      await seed();

      expect(await run('removeinfraction', '/removeinfraction 1')).toBe('🗑️ Infraction #1 (warn) removed.');
      expect(store.listByUser(42).map((infraction) => infraction.id)).toEqual([2]);
    });
  });
});
