import { beforeEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../app';
import { InMemoryBotStore } from '../../models/store/InMemoryBotStore';
import type { BotTurn } from '../../services/bot/BotEngine';
import { BotRegistry } from '../../services/registry/BotRegistry';

describe('REST API', () => {
  let app: Express;
  const respond = vi.fn(async (turn: BotTurn) => `echo: ${turn.content}`);

  beforeEach(() => {
    respond.mockClear();
    const registry = new BotRegistry({
      store: new InMemoryBotStore(),
      engine: { respond },
      now: () => new Date('2024-03-01T12:00:00.000Z'),
    });
    app = createApp({ registry });
  });

  const createUser = (name: string) => request(app).post('/users').send({ name });

  describe('/users', () => {
    it('creates a user', async () => {
      const res = await createUser('alice');

      expect(res.status).toBe(201);
      expect(res.headers.location).toBe('/users/1');
      expect(res.body.data).toEqual({ id: 1, name: 'alice' });
      expect(res.body.meta.version).toBe('1.0.0');
      expect(typeof res.body.meta.requestId).toBe('string');
    });

    it('lists users', async () => {
      await createUser('alice');
      await createUser('bob');

      const res = await request(app).get('/users');

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual([
        { id: 1, name: 'alice' },
        { id: 2, name: 'bob' },
      ]);
    });

    it('rejects invalid user data', async () => {
      const empty = await createUser('  ');
      expect(empty.status).toBe(400);
      expect(empty.body.error.code).toBe('VALIDATION_ERROR');

      const extra = await request(app).post('/users').send({ name: 'alice', admin: true });
      expect(extra.status).toBe(400);
      expect(extra.body.error.message).toBe('Invalid user data');
    });

    it('only accepts JSON bodies', async () => {
      const res = await request(app)
        .post('/users')
        .set('Content-Type', 'text/plain')
        .send('name=alice');

      expect(res.status).toBe(415);
      expect(res.body).toEqual({
        error: { message: 'Unsupported Media Type: text/plain', code: 'UNSUPPORTED_MEDIA_TYPE' },
      });
    });

    it('rejects malformed JSON', async () => {
      const res = await request(app)
        .post('/users')
        .set('Content-Type', 'application/json')
        .send('{"name":');

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('MALFORMED_JSON');
    });
  });

  describe('/users/:userId', () => {
    it('fetches a user', async () => {
      await createUser('alice');

      const res = await request(app).get('/users/1');

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ id: 1, name: 'alice' });
    });

    it('answers 404 for unknown and malformed ids', async () => {
      const unknown = await request(app).get('/users/99');
      expect(unknown.status).toBe(404);
      expect(unknown.body).toEqual({ error: { message: 'User not found', code: 'NOT_FOUND' } });

      const malformed = await request(app).get('/users/abc');
      expect(malformed.status).toBe(404);
      expect(malformed.body.error.code).toBe('NOT_FOUND');
    });

    it('renames a user', async () => {
      await createUser('alice');

      const res = await request(app).put('/users/1').send({ id: 1, name: 'Alicia' });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ id: 1, name: 'Alicia' });
      expect((await request(app).get('/users/1')).body.data.name).toBe('Alicia');
    });

    it('refuses to rename through a mismatched id', async () => {
      await createUser('alice');

      const res = await request(app).put('/users/1').send({ id: 2, name: 'Mallory' });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('User id in body does not match the path');
    });

    it('answers 404 when renaming an unknown user', async () => {
      const res = await request(app).put('/users/5').send({ name: 'ghost' });
      expect(res.status).toBe(404);
    });
  });

  describe('/users/:userId/messages', () => {
    beforeEach(async () => {
      await createUser('alice');
    });

    it('runs a conversation exchange', async () => {
      const sent = await request(app).post('/users/1/messages').send({ content: 'hello' });

      expect(sent.status).toBe(201);
      expect(sent.headers.location).toBe('/users/1/messages/1');
      expect(sent.body.data).toEqual({
        message: { id: 1, userId: 1, origin: 'user', content: 'hello', time: '2024-03-01T12:00:00.000Z' },
        response: { id: 2, userId: 1, origin: 'bot', content: 'echo: hello', time: '2024-03-01T12:00:00.000Z' },
      });

      const listed = await request(app).get('/users/1/messages');
      expect(listed.status).toBe(200);
      expect(listed.body.data.map((m: { id: number; origin: string }) => [m.id, m.origin])).toEqual([
        [1, 'user'],
        [2, 'bot'],
      ]);

      const reply = await request(app).get('/users/1/messages/2');
      expect(reply.status).toBe(200);
      expect(reply.body.data.content).toBe('echo: hello');

      const missing = await request(app).get('/users/1/messages/3');
      expect(missing.status).toBe(404);
      expect(missing.body).toEqual({ error: { message: 'Message not found', code: 'NOT_FOUND' } });
    });

    it('accepts an explicit user origin and trims the content', async () => {
      const res = await request(app)
        .post('/users/1/messages')
        .send({ content: '  hi  ', origin: 'user' });

      expect(res.status).toBe(201);
      expect(res.body.data.message.content).toBe('hi');
      expect(respond).toHaveBeenCalledWith(expect.objectContaining({ content: 'hi' }));
    });

    it('rejects messages posing as the bot or without content', async () => {
      const asBot = await request(app).post('/users/1/messages').send({ content: 'hi', origin: 'bot' });
      expect(asBot.status).toBe(400);

      const blank = await request(app).post('/users/1/messages').send({ content: '   ' });
      expect(blank.status).toBe(400);
      expect(blank.body.error.message).toBe('Invalid message data');
      expect(respond).not.toHaveBeenCalled();
    });

    it('answers 404 for unknown users', async () => {
      expect((await request(app).get('/users/7/messages')).status).toBe(404);
      expect((await request(app).post('/users/7/messages').send({ content: 'hi' })).status).toBe(404);
      expect((await request(app).get('/users/7/messages/1')).status).toBe(404);
    });

    it('does not serve a message under another user', async () => {
      await createUser('bob');
      await request(app).post('/users/1/messages').send({ content: 'hello' });

      const res = await request(app).get('/users/2/messages/1');

      expect(res.status).toBe(404);
      expect(res.body.error.message).toBe('Message not found');
    });

    it('answers 502 when the bot engine fails', async () => {
      respond.mockRejectedValueOnce(new Error('engine down'));

      const res = await request(app).post('/users/1/messages').send({ content: 'hello' });

      expect(res.status).toBe(502);
      expect(res.body).toEqual({
        error: { message: 'Bot engine failed to respond', code: 'BOT_ENGINE_ERROR' },
      });
    });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { message: 'Cannot GET /nope', code: 'ROUTE_NOT_FOUND' } });
  });
});
