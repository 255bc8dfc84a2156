export { DEFAULT_SESSION_TTL_SECONDS, InMemorySessionStore } from '@turnflow/core';
export type { SessionData, SessionKey, SessionStore } from '@turnflow/core';
export { RedisSessionStore, type RedisSessionClient, type RedisSessionStoreOptions } from './redis-store';
