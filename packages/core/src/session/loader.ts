import type { Middleware } from '../pipeline';
import type { LoggerLike } from '../types';
import { Session } from './session';
import { DEFAULT_SESSION_TTL_SECONDS, type SessionStore } from './store';

/** Default lifetime per gateway: short for USSD dial-ins, long for chats. */
export const GATEWAY_SESSION_TTL_SECONDS: Readonly<Record<string, number>> = {
  ussd: 60 * 60,
  chat: 7 * 24 * 60 * 60,
};

export interface SessionMiddlewareOptions {
  store: SessionStore;
  /** Overrides the per-gateway defaults for every session. */
  ttlSeconds?: number;
  logger?: LoggerLike;
}

export function resolveSessionTtl(gateway: string, override?: number): number {
  return override ?? GATEWAY_SESSION_TTL_SECONDS[gateway] ?? DEFAULT_SESSION_TTL_SECONDS;
}

export function sessionKeyFor(gateway: string, sessionId: string): string {
  return `${gateway}:${sessionId}`;
}

/**
 * Pipeline stage that opens the conversation's session before the rest of
 * the pipeline runs and persists it once a response has been produced. A
 * turn that fails leaves the stored session as it was.
 */
export function createSessionMiddleware(options: SessionMiddlewareOptions): Middleware {
  return async (context, next) => {
    const session = await Session.open(options.store, sessionKeyFor(context.gateway, context.sessionId), {
      id: context.sessionId,
      ttlSeconds: resolveSessionTtl(context.gateway, options.ttlSeconds),
      logger: options.logger,
    });
    context.session = session;

    const response = await next(context);
    await session.flush();
    return response;
  };
}
