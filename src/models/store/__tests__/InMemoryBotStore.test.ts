import { beforeEach, describe, expect, it } from 'vitest';
import { InMemoryBotStore } from '../InMemoryBotStore';

const TIME = '2024-03-01T12:00:00.000Z';

describe('InMemoryBotStore', () => {
  let store: InMemoryBotStore;

  beforeEach(() => {
    store = new InMemoryBotStore();
  });

  it('assigns user ids from one sequence starting at 1', async () => {
    expect(await store.insertUser('alice')).toEqual({ id: 1, name: 'alice' });
    expect(await store.insertUser('bob')).toEqual({ id: 2, name: 'bob' });
    expect(await store.listUsers()).toEqual([
      { id: 1, name: 'alice' },
      { id: 2, name: 'bob' },
    ]);
  });

  it('numbers messages per user', async () => {
    await store.insertUser('alice');
    await store.insertUser('bob');

    const a1 = await store.insertMessage(1, { origin: 'user', content: 'hi', time: TIME });
    const a2 = await store.insertMessage(1, { origin: 'bot', content: 'hello', time: TIME });
    const b1 = await store.insertMessage(2, { origin: 'user', content: 'hey', time: TIME });

    expect([a1.id, a2.id, b1.id]).toEqual([1, 2, 1]);
    expect(b1).toEqual({ id: 1, userId: 2, origin: 'user', content: 'hey', time: TIME });
    expect((await store.listMessages(1)).map((m) => m.content)).toEqual(['hi', 'hello']);
  });

  it('returns null for unknown records', async () => {
    await store.insertUser('alice');
    await store.insertMessage(1, { origin: 'user', content: 'hi', time: TIME });

    expect(await store.findUser(7)).toBeNull();
    expect(await store.updateUserName(7, 'x')).toBeNull();
    expect(await store.findMessage(1, 2)).toBeNull();
    expect(await store.findMessage(2, 1)).toBeNull();
  });

  it('refuses messages for a user it does not know', async () => {
    await expect(
      store.insertMessage(5, { origin: 'user', content: 'hi', time: TIME })
    ).rejects.toThrow('No conversation for user 5');
  });

  it('hands out copies, not its own records', async () => {
    const user = await store.insertUser('alice');
    user.name = 'mallory';

    expect(await store.findUser(1)).toEqual({ id: 1, name: 'alice' });
    expect(await store.updateUserName(1, 'alicia')).toEqual({ id: 1, name: 'alicia' });
  });
});
