export type MessageOrigin = 'user' | 'bot';

export interface User {
  id: number;
  name: string;
}

export interface Message {
  id: number;
  userId: number;
  origin: MessageOrigin;
  content: string;
  // ISO-8601, UTC
  time: string;
}

export interface UserCreateDTO {
  name: string;
}

export interface MessageDraft {
  origin: MessageOrigin;
  content: string;
  time: string;
}

export interface UserFilter {
  id?: number;
  name?: string;
}

export interface MessageFilter {
  id?: number;
  origin?: MessageOrigin;
  content?: string;
  after?: string;
  before?: string;
  pattern?: string;
}

export interface SendMessageResult {
  user: User;
  message: Message;
  // null when the bot had nothing to say
  response: Message | null;
}
