import type {
  FastifyInstance,
  FastifyTypeProviderDefault,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from 'fastify';

import type { ConversationService, GatewayChannel } from '../services/conversation';
import type { AppLogger } from '../telemetry/logger';
import type { GatewayMetrics } from '../telemetry/metrics';
import type { ChatReply, ChatRequest } from '../transports/chat';
import type { UssdReply, UssdRequest } from '../transports/ussd';

import { parseChatRequest, parseUssdRequest } from './request-schemas';

type ConversationFastifyInstance = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression<RawServerDefault>,
  RawReplyDefaultExpression<RawServerDefault>,
  AppLogger,
  FastifyTypeProviderDefault
>;

export interface ConversationRouteContext {
  service: ConversationService;
  ussd: GatewayChannel<UssdRequest, UssdReply>;
  chat: GatewayChannel<ChatRequest, ChatReply>;
  metrics: GatewayMetrics;
  rateLimit?: {
    max: number;
    timeWindow: string | number;
  };
}

/**
 * Register the provider callbacks: `POST /ussd` for Nalo-style USSD gateways
 * and `POST /chat` for rich chat providers. Each validates the body, runs one
 * conversation turn and answers with the provider's reply format.
 */
export async function registerConversationRoutes(
  app: ConversationFastifyInstance,
  context: ConversationRouteContext,
): Promise<void> {
  const routeOptions = { config: { rateLimit: context.rateLimit } };

  app.post('/ussd', routeOptions, async (request, reply) =>
    observe(context.metrics, context.ussd.adapter.name, async () => {
      const payload = parseUssdRequest(request.body);
      const result = await context.service.handle(context.ussd, payload);
      return reply.code(200).send(result);
    }),
  );

  app.post('/chat', routeOptions, async (request, reply) =>
    observe(context.metrics, context.chat.adapter.name, async () => {
      const payload = parseChatRequest(request.body);
      const result = await context.service.handle(context.chat, payload);
      return reply.code(200).send(result);
    }),
  );
}

async function observe<T>(metrics: GatewayMetrics, gateway: string, task: () => Promise<T>): Promise<T> {
  const stopTimer = metrics.requestDuration.startTimer();
  let statusCode = 200;

  try {
    return await task();
  } catch (error) {
    statusCode = inferStatusCode(error);
    throw error;
  } finally {
    metrics.requestCounter.inc({ gateway, status: String(statusCode) });
    stopTimer({ gateway, status: String(statusCode) });
  }
}

/**
 * Translate known error shapes into HTTP status codes for metric tagging. Any
 * unexpected error falls back to HTTP 500.
 */
function inferStatusCode(error: unknown): number {
  if (error && typeof error === 'object' && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }

  return 500;
}
