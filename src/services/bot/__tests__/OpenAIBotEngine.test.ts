import { beforeEach, describe, expect, it, vi } from 'vitest';
import OpenAI from 'openai';
import { OpenAIBotEngine } from '../OpenAIBotEngine';
import type { Message } from '../../../types';

const create = vi.hoisted(() => vi.fn());

vi.mock('openai', () => ({
  default: vi.fn().mockImplementation(function () {
    return { chat: { completions: { create } } };
  }),
}));

const message = (id: number, origin: Message['origin'], content: string): Message => ({
  id,
  userId: 1,
  origin,
  content,
  time: '2024-03-01T12:00:00.000Z',
});

describe('OpenAIBotEngine', () => {
  let engine: OpenAIBotEngine;

  beforeEach(() => {
    vi.clearAllMocks();
    engine = new OpenAIBotEngine(new OpenAI({ apiKey: 'test-key' }), {
      model: 'gpt-4o-mini',
      botName: 'Test Bot',
    });
  });

  it('sends the conversation so far and returns the trimmed reply', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: '  Hi alice!  ' } }] });

    const reply = await engine.respond({
      userId: 1,
      userName: 'alice',
      content: 'how are you?',
      history: [message(1, 'user', 'hello'), message(2, 'bot', 'hey there')],
    });

    expect(reply).toBe('Hi alice!');
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      temperature: 0.7,
      max_tokens: 300,
      messages: [
        {
          role: 'system',
          content:
            'You are Test Bot, a friendly conversational bot chatting with alice. Keep replies short and conversational.',
        },
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'hey there' },
        { role: 'user', content: 'how are you?' },
      ],
    });
  });

  it('only sends the most recent twenty messages of history', () => {
    const history = Array.from({ length: 25 }, (_, i) => message(i + 1, 'user', `m${i + 1}`));

    const messages = engine.buildMessages({ userId: 1, userName: 'alice', content: 'now', history });

    expect(messages).toHaveLength(22);
    expect(messages[1]).toEqual({ role: 'user', content: 'm6' });
    expect(messages[21]).toEqual({ role: 'user', content: 'now' });
  });

  it('returns an empty reply when the model gives no choices', async () => {
    create.mockResolvedValue({ choices: [] });

    await expect(
      engine.respond({ userId: 1, userName: 'alice', content: 'hi', history: [] })
    ).resolves.toBe('');
  });

  it('lets API failures propagate', async () => {
    create.mockRejectedValue(new Error('rate limited'));

    await expect(
      engine.respond({ userId: 1, userName: 'alice', content: 'hi', history: [] })
    ).rejects.toThrow('rate limited');
  });
});
