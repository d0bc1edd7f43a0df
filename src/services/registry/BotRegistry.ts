import { EventEmitter } from 'events';
import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { AppError } from '../../middleware/error/errorHandler';
import type { BotStore } from '../../models/store/BotStore';
import type {
  Message,
  MessageFilter,
  MessageOrigin,
  SendMessageResult,
  User,
  UserCreateDTO,
  UserFilter,
} from '../../types';
import { KeyedMutex } from '../../utils/KeyedMutex';
import type { BotEngine } from '../bot/BotEngine';
import { childLogger } from '../logging/logger';

export interface RegistryEvents {
  userCreated: [user: User];
  userRenamed: [user: User];
  messageStored: [message: Message];
}

export interface BotRegistryOptions {
  store: BotStore;
  engine: BotEngine;
  now?: () => Date;
}

const log = childLogger('BotRegistry');

// stored times are UTC, so a bound without an offset would depend on the host zone
const boundSchema = z.string().datetime({ offset: true });

function parseBound(value: string, field: 'after' | 'before'): number {
  const parsed = parseISO(value);
  if (!boundSchema.safeParse(value).success || !isValid(parsed)) {
    throw AppError.validation(`Invalid ${field} timestamp: ${value}`, {
      expected: 'ISO-8601 date-time with an offset, e.g. 2024-03-01T12:00:00Z',
    });
  }
  return parsed.getTime();
}

function compilePattern(pattern: string): RegExp {
  try {
    // anchored at the start of the content, not the end
    return new RegExp(`^(?:${pattern})`);
  } catch (error) {
    throw AppError.validation(`Invalid pattern: ${pattern}`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Owns the users and their conversations. Every read and write of the REST and
 * GraphQL APIs goes through here, and this is the only place the bot engine is
 * called from.
 */
export class BotRegistry extends EventEmitter<RegistryEvents> {
  private readonly store: BotStore;
  private readonly engine: BotEngine;
  private readonly now: () => Date;
  private readonly userLocks = new KeyedMutex<number>();

  constructor({ store, engine, now = () => new Date() }: BotRegistryOptions) {
    super();
    this.store = store;
    this.engine = engine;
    this.now = now;
  }

  async createUser({ name }: UserCreateDTO): Promise<User> {
    const user = await this.store.insertUser(this.requireName(name));
    log.info('User created', { userId: user.id });
    this.emit('userCreated', user);
    return user;
  }

  async getUser(id: number): Promise<User> {
    const user = await this.store.findUser(id);
    if (!user) {
      throw AppError.notFound('User not found');
    }
    return user;
  }

  async listUsers(filter: UserFilter = {}): Promise<User[]> {
    let users: User[];
    if (filter.id !== undefined) {
      const user = await this.store.findUser(filter.id);
      users = user ? [user] : [];
    } else {
      users = await this.store.listUsers();
    }

    if (filter.name !== undefined) {
      users = users.filter((user) => user.name === filter.name);
    }
    return users.sort((a, b) => a.id - b.id);
  }

  async renameUser(id: number, name: string): Promise<User> {
    const trimmed = this.requireName(name);
    return this.userLocks.runExclusive(id, async () => {
      const user = await this.store.updateUserName(id, trimmed);
      if (!user) {
        throw AppError.notFound('User not found');
      }
      log.info('User renamed', { userId: user.id });
      this.emit('userRenamed', user);
      return user;
    });
  }

  async listMessages(userId: number, filter: MessageFilter = {}): Promise<Message[]> {
    await this.getUser(userId);
    const messages = await this.store.listMessages(userId);
    return this.applyFilter(messages, filter);
  }

  async getMessage(userId: number, messageId: number): Promise<Message> {
    await this.getUser(userId);
    const message = await this.store.findMessage(userId, messageId);
    if (!message) {
      throw AppError.notFound('Message not found');
    }
    return message;
  }

  /**
   * Stores the user's message, asks the engine for a reply and stores that too.
   * Runs under the user's lock so the reply always directly follows the message
   * it answers.
   */
  async sendMessage(userId: number, content: string): Promise<SendMessageResult> {
    const trimmed = content.trim();
    if (!trimmed) {
      throw AppError.validation('Message content must not be empty');
    }

    return this.userLocks.runExclusive(userId, async () => {
      const user = await this.getUser(userId);
      const history = await this.store.listMessages(userId);
      const message = await this.store.insertMessage(userId, this.draft('user', trimmed));
      this.emit('messageStored', message);

      let reply: string;
      try {
        reply = await this.engine.respond({ userId, userName: user.name, content: trimmed, history });
      } catch (error) {
        log.error('Bot engine failed to respond', {
          userId,
          messageId: message.id,
          error: error instanceof Error ? error.message : String(error),
        });
        throw new AppError('Bot engine failed to respond', 502, 'BOT_ENGINE_ERROR');
      }

      let response: Message | null = null;
      if (reply.trim()) {
        response = await this.store.insertMessage(userId, this.draft('bot', reply.trim()));
        this.emit('messageStored', response);
      }

      log.info('Message received', {
        userId,
        messageId: message.id,
        responseId: response?.id ?? null,
      });
      return { user, message, response };
    });
  }

  private draft(origin: MessageOrigin, content: string) {
    return { origin, content, time: this.now().toISOString() };
  }

  private requireName(name: string): string {
    const trimmed = name.trim();
    if (!trimmed) {
      throw AppError.validation('User name must not be empty');
    }
    return trimmed;
  }

  private applyFilter(messages: Message[], filter: MessageFilter): Message[] {
    const after = filter.after !== undefined ? parseBound(filter.after, 'after') : undefined;
    const before = filter.before !== undefined ? parseBound(filter.before, 'before') : undefined;
    const pattern = filter.pattern !== undefined ? compilePattern(filter.pattern) : undefined;

    return messages.filter((message) => {
      if (filter.id !== undefined && message.id !== filter.id) return false;
      if (filter.origin !== undefined && message.origin !== filter.origin) return false;
      if (filter.content !== undefined && message.content !== filter.content) return false;

      const time = Date.parse(message.time);
      if (after !== undefined && time < after) return false;
      if (before !== undefined && time > before) return false;

      return pattern ? pattern.test(message.content) : true;
    });
  }
}
