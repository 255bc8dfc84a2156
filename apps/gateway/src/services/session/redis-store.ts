import {
  DEFAULT_SESSION_TTL_SECONDS,
  jsonSessionCodec,
  type SessionCodec,
  type SessionData,
  type SessionKey,
  type SessionStore,
  type SessionStoreContext,
} from '@turnflow/core';
import { Redis, type RedisOptions } from 'ioredis';

/** Subset of the ioredis client the store relies on. */
export interface RedisSessionClient {
  readonly status: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
  connect(): Promise<void>;
}

/** Options used to configure the Redis-backed session store. */
export interface RedisSessionStoreOptions extends SessionStoreContext {
  url?: string;
  client?: RedisSessionClient;
  defaultTtlSeconds?: number;
  redisOptions?: RedisOptions;
}

/** Session store implementation backed by Redis. */
export class RedisSessionStore implements SessionStore {
  private readonly redis: RedisSessionClient;
  private readonly prefix: string;
  private readonly codec: SessionCodec;
  private readonly defaultTtlSeconds: number;
  private readonly ownsClient: boolean;

  constructor(options: RedisSessionStoreOptions = {}) {
    if (options.client) {
      this.redis = options.client;
      this.ownsClient = false;
    } else if (options.url) {
      this.redis = new Redis(options.url, { lazyConnect: true, ...options.redisOptions });
      this.ownsClient = true;
    } else {
      throw new Error('RedisSessionStore requires either a client or a url.');
    }

    this.prefix = options.prefix ?? 'session:';
    this.codec = options.codec ?? jsonSessionCodec;
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_SESSION_TTL_SECONDS;
  }

  async read(key: SessionKey): Promise<SessionData | undefined> {
    await this.ensureConnected();
    const raw = await this.redis.get(this.namespaced(key));

    if (!raw) {
      return undefined;
    }

    try {
      return this.codec.deserialize(raw);
    } catch (error) {
      await this.redis.del(this.namespaced(key));
      throw new Error(
        `Failed to parse session payload for key ${key}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  async write(key: SessionKey, data: SessionData, ttlSeconds?: number): Promise<void> {
    await this.ensureConnected();
    const ttl = ttlSeconds ?? this.defaultTtlSeconds;
    await this.redis.set(this.namespaced(key), this.codec.serialize(data), 'EX', ttl);
  }

  async delete(key: SessionKey): Promise<void> {
    await this.ensureConnected();
    await this.redis.del(this.namespaced(key));
  }

  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.redis.quit();
    }
  }

  private namespaced(key: SessionKey): SessionKey {
    return `${this.prefix}${key}`;
  }

  private async ensureConnected(): Promise<void> {
    if (!this.ownsClient) {
      return;
    }

    if (this.redis.status === 'ready' || this.redis.status === 'connecting') {
      return;
    }

    await this.redis.connect();
  }
}
