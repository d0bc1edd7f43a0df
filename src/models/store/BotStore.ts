import type { Message, MessageDraft, User } from '../../types';

/**
 * Persistence behind the registry. Implementations assign ids: users from one
 * store-wide sequence, messages from a sequence per user, both starting at 1.
 * Lookups return null rather than throwing when a record is missing.
 */
export interface BotStore {
  listUsers(): Promise<User[]>;
  insertUser(name: string): Promise<User>;
  findUser(id: number): Promise<User | null>;
  updateUserName(id: number, name: string): Promise<User | null>;

  /** Messages of one user ordered by id. Callers check the user exists first. */
  listMessages(userId: number): Promise<Message[]>;
  insertMessage(userId: number, draft: MessageDraft): Promise<Message>;
  findMessage(userId: number, messageId: number): Promise<Message | null>;
}
