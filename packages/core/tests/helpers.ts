import type { ConversationContext } from '../src/context';
import { textPlatform, type Platform } from '../src/flow/platform';
import { InMemorySessionStore } from '../src/session/in-memory-store';
import { Session } from '../src/session/session';
import type { RequestMetadata } from '../src/types';

interface TestContextOptions {
  input?: string | null;
  platform?: Platform;
  metadata?: RequestMetadata;
  session?: Session;
}

export async function openTestSession(store = new InMemorySessionStore(), key = 'test:session-1'): Promise<Session> {
  return Session.open(store, key, { id: 'session-1' });
}

export async function createTestContext(options: TestContextOptions = {}): Promise<ConversationContext> {
  return {
    sessionId: 'session-1',
    gateway: 'test',
    platform: options.platform ?? textPlatform,
    metadata: options.metadata ?? {},
    flow: { name: 'TestFlow', action: 'main', start: () => undefined },
    input: options.input ?? null,
    session: options.session ?? (await openTestSession()),
    state: {},
  };
}
