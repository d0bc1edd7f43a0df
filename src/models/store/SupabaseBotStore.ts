import type { SupabaseClient } from '@supabase/supabase-js';
import { parseISO } from 'date-fns';
import { z } from 'zod';
import { AppError } from '../../middleware/error/errorHandler';
import type { Message, MessageDraft, User } from '../../types';
import type { BotStore } from './BotStore';

const USER_COLUMNS = 'id, name';
const MESSAGE_COLUMNS = 'id, user_id, origin, content, time';

const userRowSchema = z.object({
  id: z.coerce.number().int().positive(),
  name: z.string(),
});

const messageRowSchema = z.object({
  id: z.coerce.number().int().positive(),
  user_id: z.coerce.number().int().positive(),
  origin: z.enum(['user', 'bot']),
  content: z.string(),
  time: z.string(),
});

interface QueryError {
  message: string;
}

function toUser(row: unknown): User {
  return userRowSchema.parse(row);
}

function toMessage(row: unknown): Message {
  const parsed = messageRowSchema.parse(row);
  return {
    id: parsed.id,
    userId: parsed.user_id,
    origin: parsed.origin,
    content: parsed.content,
    // Postgres answers timestamptz as "+00:00"; keep the API's Z form
    time: parseISO(parsed.time).toISOString(),
  };
}

function check(error: QueryError | null, operation: string): void {
  if (error) {
    throw new AppError('Database error', 500, 'DATABASE_ERROR', {
      operation,
      reason: error.message,
    });
  }
}

/**
 * Store backed by the `users` and `messages` tables from supabase/schema.sql.
 */
export class SupabaseBotStore implements BotStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async listUsers(): Promise<User[]> {
    const { data, error } = await this.supabase
      .from('users')
      .select(USER_COLUMNS)
      .order('id', { ascending: true });

    check(error, 'listUsers');
    return (data ?? []).map(toUser);
  }

  async insertUser(name: string): Promise<User> {
    const { data, error } = await this.supabase
      .from('users')
      .insert({ name })
      .select(USER_COLUMNS)
      .single();

    check(error, 'insertUser');
    return toUser(data);
  }

  async findUser(id: number): Promise<User | null> {
    const { data, error } = await this.supabase
      .from('users')
      .select(USER_COLUMNS)
      .eq('id', id)
      .maybeSingle();

    check(error, 'findUser');
    return data ? toUser(data) : null;
  }

  async updateUserName(id: number, name: string): Promise<User | null> {
    const { data, error } = await this.supabase
      .from('users')
      .update({ name })
      .eq('id', id)
      .select(USER_COLUMNS)
      .maybeSingle();

    check(error, 'updateUserName');
    return data ? toUser(data) : null;
  }

  async listMessages(userId: number): Promise<Message[]> {
    const { data, error } = await this.supabase
      .from('messages')
      .select(MESSAGE_COLUMNS)
      .eq('user_id', userId)
      .order('id', { ascending: true });

    check(error, 'listMessages');
    return (data ?? []).map(toMessage);
  }

  async insertMessage(userId: number, draft: MessageDraft): Promise<Message> {
    const { data: last, error: lastError } = await this.supabase
      .from('messages')
      .select('id')
      .eq('user_id', userId)
      .order('id', { ascending: false })
      .limit(1)
      .maybeSingle();

    check(lastError, 'insertMessage');
    const nextId = last ? userRowSchema.shape.id.parse(last.id) + 1 : 1;

    const { data, error } = await this.supabase
      .from('messages')
      .insert({ id: nextId, user_id: userId, ...draft })
      .select(MESSAGE_COLUMNS)
      .single();

    check(error, 'insertMessage');
    return toMessage(data);
  }

  async findMessage(userId: number, messageId: number): Promise<Message | null> {
    const { data, error } = await this.supabase
      .from('messages')
      .select(MESSAGE_COLUMNS)
      .eq('user_id', userId)
      .eq('id', messageId)
      .maybeSingle();

    check(error, 'findMessage');
    return data ? toMessage(data) : null;
  }
}
