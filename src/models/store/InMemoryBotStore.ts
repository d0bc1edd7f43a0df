import type { Message, MessageDraft, User } from '../../types';
import type { BotStore } from './BotStore';

interface Conversation {
  nextId: number;
  messages: Message[];
}

export class InMemoryBotStore implements BotStore {
  private users = new Map<number, User>();
  private conversations = new Map<number, Conversation>();
  private nextUserId = 1;

  async listUsers(): Promise<User[]> {
    return Array.from(this.users.values(), (user) => ({ ...user }));
  }

  async insertUser(name: string): Promise<User> {
    const user: User = { id: this.nextUserId++, name };
    this.users.set(user.id, user);
    this.conversations.set(user.id, { nextId: 1, messages: [] });
    return { ...user };
  }

  async findUser(id: number): Promise<User | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async updateUserName(id: number, name: string): Promise<User | null> {
    const user = this.users.get(id);
    if (!user) return null;
    user.name = name;
    return { ...user };
  }

  async listMessages(userId: number): Promise<Message[]> {
    const conversation = this.conversations.get(userId);
    return conversation ? conversation.messages.map((message) => ({ ...message })) : [];
  }

  async insertMessage(userId: number, draft: MessageDraft): Promise<Message> {
    const conversation = this.conversations.get(userId);
    if (!conversation) {
      throw new Error(`No conversation for user ${userId}`);
    }
    const message: Message = { id: conversation.nextId++, userId, ...draft };
    conversation.messages.push(message);
    return { ...message };
  }

  async findMessage(userId: number, messageId: number): Promise<Message | null> {
    const message = this.conversations
      .get(userId)
      ?.messages.find((candidate) => candidate.id === messageId);
    return message ? { ...message } : null;
  }
}
