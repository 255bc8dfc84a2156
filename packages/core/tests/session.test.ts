import { afterEach, describe, expect, it, vi } from 'vitest';

import { jsonSessionCodec } from '../src/session/codec';
import { InMemorySessionStore } from '../src/session/in-memory-store';
import { Session } from '../src/session/session';
import type { SessionStore } from '../src/session/store';

describe('InMemorySessionStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('round-trips nested values as independent copies', async () => {
    const store = new InMemorySessionStore();
    const data = { profile: { name: 'Ada', tags: ['a', 'b'], age: 36, verified: true, nickname: null } };

    await store.write('chat:1', data);
    const first = await store.read('chat:1');
    const second = await store.read('chat:1');

    expect(first).toEqual(data);
    expect(first).not.toBe(second);
  });

  it('expires entries after their ttl', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));

    const store = new InMemorySessionStore();
    await store.write('ussd:1', { step: 1 }, 60);

    vi.setSystemTime(new Date('2026-01-01T00:00:59Z'));
    expect(await store.read('ussd:1')).toEqual({ step: 1 });

    vi.setSystemTime(new Date('2026-01-01T00:01:01Z'));
    expect(await store.read('ussd:1')).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it('deletes entries', async () => {
    const store = new InMemorySessionStore();
    await store.write('chat:1', { a: 1 });
    await store.delete('chat:1');

    expect(await store.read('chat:1')).toBeUndefined();
  });

  it('rejects payloads that are not session records', () => {
    expect(() => jsonSessionCodec.deserialize('[1, 2]')).toThrow();
    expect(jsonSessionCodec.deserialize('{"a":{"b":[1,"x",null]}}')).toEqual({ a: { b: [1, 'x', null] } });
  });
});

describe('Session', () => {
  function trackingStore(): SessionStore & { writes: unknown[]; deletes: string[] } {
    const inner = new InMemorySessionStore();
    const writes: unknown[] = [];
    const deletes: string[] = [];
    return {
      writes,
      deletes,
      read: (key) => inner.read(key),
      write: async (key, data, ttl) => {
        writes.push({ key, data: { ...data }, ttl });
        await inner.write(key, data, ttl);
      },
      delete: async (key) => {
        deletes.push(key);
        await inner.delete(key);
      },
    };
  }

  it('starts empty and does not exist until something is stored', async () => {
    const session = await Session.open(new InMemorySessionStore(), 'chat:1', { id: '1' });

    expect(session.exists()).toBe(false);
    expect(session.get('name')).toBeUndefined();

    session.set('name', 'Ada');
    expect(session.exists()).toBe(true);
    expect(session.get('name')).toBe('Ada');
  });

  it('writes once on flush with the configured ttl', async () => {
    const store = trackingStore();
    const session = await Session.open(store, 'chat:1', { id: '1', ttlSeconds: 3600 });

    session.set('a', 1);
    session.set('b', 2);
    await session.flush();
    await session.flush();

    expect(store.writes).toEqual([{ key: 'chat:1', data: { a: 1, b: 2 }, ttl: 3600 }]);
    expect(await store.read('chat:1')).toEqual({ a: 1, b: 2 });
  });

  it('resumes stored values in a later turn', async () => {
    const store = new InMemorySessionStore();
    const first = await Session.open(store, 'chat:1', { id: '1' });
    first.set('answers', { color: 'red' });
    await first.flush();

    const second = await Session.open(store, 'chat:1', { id: '1' });
    expect(second.exists()).toBe(true);
    expect(second.get('answers')).toEqual({ color: 'red' });
  });

  it('removes the stored record when destroyed', async () => {
    const store = trackingStore();
    const first = await Session.open(store, 'chat:1', { id: '1' });
    first.set('a', 1);
    await first.flush();

    const second = await Session.open(store, 'chat:1', { id: '1' });
    second.destroy();
    expect(second.exists()).toBe(false);
    expect(second.isDestroyed).toBe(true);
    await second.flush();

    expect(store.deletes).toEqual(['chat:1']);
    expect(await store.read('chat:1')).toBeUndefined();
  });

  it('keeps values written after destroy in the same turn', async () => {
    const store = new InMemorySessionStore();
    const session = await Session.open(store, 'chat:1', { id: '1' });
    session.set('a', 1);
    session.destroy();
    session.set('b', 2);
    await session.flush();

    expect(await store.read('chat:1')).toEqual({ b: 2 });
  });

  it('never writes an empty record', async () => {
    const store = trackingStore();
    const session = await Session.open(store, 'chat:1', { id: '1' });
    session.set('a', 1);
    session.delete('a');
    await session.flush();

    expect(store.writes).toEqual([]);
    expect(store.deletes).toEqual([]);
  });
});
