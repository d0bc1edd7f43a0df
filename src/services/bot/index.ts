import type { BotEngineConfig } from '../../config';
import { createOpenAIClient } from '../ai/openai';
import type { BotEngine } from './BotEngine';
import { OpenAIBotEngine } from './OpenAIBotEngine';
import { PatternBotEngine } from './PatternBotEngine';

export type { BotEngine, BotTurn } from './BotEngine';
export { OpenAIBotEngine } from './OpenAIBotEngine';
export { PatternBotEngine } from './PatternBotEngine';

export function createBotEngine(config: BotEngineConfig): BotEngine {
  switch (config.kind) {
    case 'openai':
      return new OpenAIBotEngine(createOpenAIClient(config.apiKey), {
        model: config.model,
        botName: config.botName,
      });
    case 'pattern':
      return new PatternBotEngine({ botName: config.botName });
  }
}
