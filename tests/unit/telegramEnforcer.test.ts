import { describe, it, expect, beforeEach, vi } from 'vitest';
/**
 * Unit tests for the Telegram enforcer
 */

import { Telegram, TelegramError } from 'telegraf';
import { EnforcementError } from '../../src/services/enforcement';
import { TelegramEnforcer, classifyTelegramError } from '../../src/services/telegramEnforcer';
import { member } from '../helpers/fakes';

const CHAT_ID = -100123456789;

const apiError = (code: number, description: string): TelegramError =>
  new TelegramError({ error_code: code, description });

describe('classifyTelegramError', () => {
  it.each([
    [apiError(403, 'Forbidden: bot was kicked from the supergroup chat'), 'forbidden'],
    [apiError(400, 'Bad Request: not enough rights to restrict/unrestrict chat member'), 'forbidden'],
    [apiError(400, "Bad Request: can't remove chat owner"), 'forbidden'],
    [apiError(400, 'Bad Request: user not found'), 'not_found'],
    [apiError(400, 'Bad Request: PARTICIPANT_ID_INVALID'), 'not_found'],
    [apiError(429, 'Too Many Requests: retry after 5'), 'transport'],
  ])('classifies %s', (error, kind) => {
    expect(classifyTelegramError(error).kind).toBe(kind);
  });

  it('keeps the Telegram code in transport messages', () => {
    expect(classifyTelegramError(apiError(502, 'Bad Gateway')).message).toBe('Telegram API error 502: Bad Gateway');
  });

  it('treats other errors as transport failures', () => {
    const classified = classifyTelegramError(new Error('ECONNRESET'));
    expect(classified.kind).toBe('transport');
    expect(classified.message).toBe('ECONNRESET');
  });
});

describe('TelegramEnforcer', () => {
  let telegram: Telegram;
  let enforcer: TelegramEnforcer;

  beforeEach(() => {
    telegram = new Telegram('test-token');
    vi.spyOn(telegram, 'banChatMember').mockResolvedValue(true);
    vi.spyOn(telegram, 'unbanChatMember').mockResolvedValue(true);
    vi.spyOn(telegram, 'restrictChatMember').mockResolvedValue(true);
    enforcer = new TelegramEnforcer(telegram, CHAT_ID);
  });

  it('bans members', async () => {
    await enforcer.enforce('ban', member(7), 'raid');
    expect(telegram.banChatMember).toHaveBeenCalledWith(CHAT_ID, 7);
  });

  it('kicks by banning and immediately unbanning', async () => {
    await enforcer.enforce('kick', member(7), null);

    expect(telegram.banChatMember).toHaveBeenCalledWith(CHAT_ID, 7);
    expect(telegram.unbanChatMember).toHaveBeenCalledWith(CHAT_ID, 7, { only_if_banned: true });
  });

  it('mutes by removing send permissions', async () => {
    await enforcer.enforce('mute', member(7), null);

    expect(telegram.restrictChatMember).toHaveBeenCalledWith(CHAT_ID, 7, {
      permissions: expect.objectContaining({ can_send_messages: false, can_send_photos: false }),
    });
  });

  it('has nothing to do for warnings and notes', async () => {
    await enforcer.enforce('warn', member(7), null);
    await enforcer.enforce('note', member(7), null);
    await enforcer.reverse('kick', member(7), null);

    expect(telegram.banChatMember).not.toHaveBeenCalled();
    expect(telegram.unbanChatMember).not.toHaveBeenCalled();
    expect(telegram.restrictChatMember).not.toHaveBeenCalled();
  });

  it('lifts bans only for banned users', async () => {
    await enforcer.reverse('ban', { kind: 'unresolved', id: 7 }, null);
    expect(telegram.unbanChatMember).toHaveBeenCalledWith(CHAT_ID, 7, { only_if_banned: true });
  });

  it('restores member permissions on unmute', async () => {
    await enforcer.reverse('mute', member(7), null);

    expect(telegram.restrictChatMember).toHaveBeenCalledWith(CHAT_ID, 7, {
      permissions: expect.objectContaining({ can_send_messages: true, can_change_info: false }),
    });
  });

  it('throws classified errors', async () => {
    vi.spyOn(telegram, 'banChatMember').mockRejectedValue(apiError(400, 'Bad Request: not enough rights to ban'));

    const failure = enforcer.enforce('ban', member(7), null);

    await expect(failure).rejects.toBeInstanceOf(EnforcementError);
    await expect(failure).rejects.toMatchObject({ kind: 'forbidden' });
  });
});
