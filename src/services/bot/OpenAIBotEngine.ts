import type OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { BotEngine, BotTurn } from './BotEngine';

const HISTORY_WINDOW = 20;

export interface OpenAIBotEngineOptions {
  model: string;
  botName: string;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAIBotEngine implements BotEngine {
  constructor(
    private readonly openai: OpenAI,
    private readonly options: OpenAIBotEngineOptions
  ) {}

  async respond(turn: BotTurn): Promise<string> {
    const completion = await this.openai.chat.completions.create({
      model: this.options.model,
      messages: this.buildMessages(turn),
      temperature: this.options.temperature ?? 0.7,
      max_tokens: this.options.maxTokens ?? 300,
    });

    return completion.choices[0]?.message?.content?.trim() || '';
  }

  buildMessages(turn: BotTurn): ChatCompletionMessageParam[] {
    const system: ChatCompletionMessageParam = {
      role: 'system',
      content: `You are ${this.options.botName}, a friendly conversational bot chatting with ${turn.userName}. Keep replies short and conversational.`,
    };

    const history = turn.history.slice(-HISTORY_WINDOW).map(
      (message): ChatCompletionMessageParam =>
        message.origin === 'user'
          ? { role: 'user', content: message.content }
          : { role: 'assistant', content: message.content }
    );

    return [system, ...history, { role: 'user', content: turn.content }];
  }
}
