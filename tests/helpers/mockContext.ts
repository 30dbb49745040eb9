import { vi, type Mock } from 'vitest';
/**
 * Mock Telegraf Context for testing command handlers
 */

import type { Context } from 'telegraf';
import { FmtString } from 'telegraf/format';
import type { User } from 'telegraf/types';

export interface MockContextOptions {
  userId?: number;
  username?: string;
  firstName?: string;
  chatId?: number;
  chatType?: 'private' | 'group' | 'supergroup';
  messageText?: string;
  /** Sender of the message being replied to */
  replyTo?: User;
}

export interface MockContext {
  ctx: Context;
  reply: Mock;
}

/**
 * Creates a mock context carrying a text message from the given user
 */
export function createMockContext(options: MockContextOptions = {}): MockContext {
  const {
    userId = 123456789,
    username = 'testuser',
    firstName = 'Test',
    chatId = -100123456789,
    chatType = 'supergroup',
    messageText = '/test',
    replyTo,
  } = options;

  const from: User = { id: userId, is_bot: false, first_name: firstName, username };
  const chat = { id: chatId, type: chatType };
  const message = {
    message_id: 1,
    date: Math.floor(Date.now() / 1000),
    chat,
    from,
    text: messageText,
    ...(replyTo
      ? { reply_to_message: { message_id: 0, date: 0, chat, from: replyTo, text: 'original' } }
      : {}),
  };

  const reply = vi.fn().mockResolvedValue({ message_id: 2, date: message.date, chat, text: 'Mock reply' });

  // Only the fields the handlers read are present
  const ctx = { update: { update_id: 1, message }, message, from, chat, reply, state: {} } as unknown as Context;
  return { ctx, reply };
}

export const createModeratorContext = (messageText: string, options: MockContextOptions = {}): MockContext =>
  createMockContext({ userId: 333333333, username: 'moderator', firstName: 'Mod', ...options, messageText });

/**
 * Text of the nth reply, whether sent as a string or a formatted message
 */
export function getReplyText(reply: Mock, index = 0): string {
  const call = reply.mock.calls[index];
  if (!call) {
    return '';
  }
  const [text] = call;
  if (typeof text === 'string') {
    return text;
  }
  return text instanceof FmtString ? text.text : '';
}
