import { jsonSessionCodec, type SessionCodec, type SessionData } from './codec';
import {
  DEFAULT_SESSION_TTL_SECONDS,
  type SessionKey,
  type SessionStore,
  type SessionStoreContext,
} from './store';

/** Representation of a cached session entry with expiry metadata. */
interface MemoryEntry {
  payload: string;
  expiresAt: number;
}

/**
 * Map-based session store used for tests and local development. Entries are
 * kept in encoded form, so every read hands back an independent copy exactly
 * as a remote backend would.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly store = new Map<SessionKey, MemoryEntry>();
  private readonly prefix: string;
  private readonly codec: SessionCodec;

  constructor(context: SessionStoreContext = {}) {
    this.prefix = context.prefix ?? 'session:';
    this.codec = context.codec ?? jsonSessionCodec;
  }

  async read(key: SessionKey): Promise<SessionData | undefined> {
    const namespacedKey = this.namespaced(key);
    const entry = this.store.get(namespacedKey);

    if (!entry) {
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.store.delete(namespacedKey);
      return undefined;
    }

    return this.codec.deserialize(entry.payload);
  }

  async write(key: SessionKey, data: SessionData, ttlSeconds?: number): Promise<void> {
    const expiresIn = (ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS) * 1000;

    this.store.set(this.namespaced(key), {
      payload: this.codec.serialize(data),
      expiresAt: Date.now() + expiresIn,
    });
  }

  async delete(key: SessionKey): Promise<void> {
    this.store.delete(this.namespaced(key));
  }

  /** Number of live entries, expired ones included until next read. */
  get size(): number {
    return this.store.size;
  }

  private namespaced(key: SessionKey): SessionKey {
    return `${this.prefix}${key}`;
  }
}
