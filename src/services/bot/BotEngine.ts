import type { Message } from '../../types';

export interface BotTurn {
  userId: number;
  userName: string;
  content: string;
  /** Earlier messages of this user's conversation, oldest first. */
  history: Message[];
}

/**
 * Produces the bot's reply to one user message. An empty string means the bot
 * has nothing to say and no reply message is stored.
 */
export interface BotEngine {
  respond(turn: BotTurn): Promise<string>;
}
