import type { SessionCodec, SessionData } from './codec';

export type SessionKey = string;

/** Interface implemented by session store drivers. */
export interface SessionStore {
  read(key: SessionKey): Promise<SessionData | undefined>;
  write(key: SessionKey, data: SessionData, ttlSeconds?: number): Promise<void>;
  delete(key: SessionKey): Promise<void>;
}

/** Optional configuration for session store instances. */
export interface SessionStoreContext {
  prefix?: string;
  codec?: SessionCodec;
}

/** Default expiry for conversation sessions (24 hours). */
export const DEFAULT_SESSION_TTL_SECONDS = 24 * 60 * 60;
