import { describe, expect, it } from 'vitest';

import { RedisSessionStore, type RedisSessionClient } from './redis-store';

class FakeRedis implements RedisSessionClient {
  readonly status = 'ready';
  readonly entries = new Map<string, { value: string; ttl: number }>();
  quitCalls = 0;

  async get(key: string): Promise<string | null> {
    return this.entries.get(key)?.value ?? null;
  }

  async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<'OK'> {
    this.entries.set(key, { value, ttl: seconds });
    return 'OK';
  }

  async del(key: string): Promise<number> {
    return this.entries.delete(key) ? 1 : 0;
  }

  async quit(): Promise<'OK'> {
    this.quitCalls += 1;
    return 'OK';
  }

  async connect(): Promise<void> {}
}

describe('RedisSessionStore', () => {
  it('stores encoded sessions under the prefix with an expiry', async () => {
    const client = new FakeRedis();
    const store = new RedisSessionStore({ client, prefix: 'turnflow:' });

    await store.write('ussd:abc', { name: 'Ada', answers: [1, 2] }, 3600);

    expect(client.entries.get('turnflow:ussd:abc')).toEqual({
      value: '{"name":"Ada","answers":[1,2]}',
      ttl: 3600,
    });
    expect(await store.read('ussd:abc')).toEqual({ name: 'Ada', answers: [1, 2] });
  });

  it('falls back to the default ttl', async () => {
    const client = new FakeRedis();
    const store = new RedisSessionStore({ client, defaultTtlSeconds: 90 });

    await store.write('chat:1', { a: 1 });

    expect(client.entries.get('session:chat:1')?.ttl).toBe(90);
  });

  it('drops payloads it cannot decode', async () => {
    const client = new FakeRedis();
    client.entries.set('session:chat:1', { value: '{not json', ttl: 60 });
    const store = new RedisSessionStore({ client });

    await expect(store.read('chat:1')).rejects.toThrow('Failed to parse session payload for key chat:1');
    expect(client.entries.has('session:chat:1')).toBe(false);
  });

  it('deletes sessions and leaves borrowed clients open', async () => {
    const client = new FakeRedis();
    const store = new RedisSessionStore({ client });
    await store.write('chat:1', { a: 1 });

    await store.delete('chat:1');
    await store.close();

    expect(await store.read('chat:1')).toBeUndefined();
    expect(client.quitCalls).toBe(0);
  });

  it('requires a client or a url', () => {
    expect(() => new RedisSessionStore()).toThrow('requires either a client or a url');
  });
});
