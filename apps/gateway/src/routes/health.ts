import type {
  FastifyInstance,
  FastifyTypeProviderDefault,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from 'fastify';

import type { ConversationService } from '../services/conversation';
import type { AppLogger } from '../telemetry/logger';

type HealthFastifyInstance = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression<RawServerDefault>,
  RawReplyDefaultExpression<RawServerDefault>,
  AppLogger,
  FastifyTypeProviderDefault
>;

/** Liveness endpoint, reporting the number of conversations mid-turn. */
export async function registerHealthRoutes(app: HealthFastifyInstance, service: ConversationService): Promise<void> {
  app.get('/healthz', async () => ({ status: 'ok', activeSessions: service.activeSessions }));
}
