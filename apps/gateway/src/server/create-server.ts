import helmet from '@fastify/helmet';
import fastifyRateLimit, { type RateLimitPluginOptions } from '@fastify/rate-limit';
import Fastify, {
  type FastifyInstance,
  type FastifyPluginAsync,
  type FastifyTypeProviderDefault,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';

import type { AppConfig } from '../config';
import { registerConversationRoutes } from '../routes/conversation';
import { registerHealthRoutes } from '../routes/health';
import type { ConversationService, GatewayChannel } from '../services/conversation';
import type { AppLogger } from '../telemetry/logger';
import type { GatewayMetrics } from '../telemetry/metrics';
import type { ChatReply, ChatRequest } from '../transports/chat';
import type { UssdReply, UssdRequest } from '../transports/ussd';

export type GatewayFastifyInstance = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression<RawServerDefault>,
  RawReplyDefaultExpression<RawServerDefault>,
  AppLogger,
  FastifyTypeProviderDefault
>;

export interface ServerOptions {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  service: ConversationService;
  channels: {
    ussd: GatewayChannel<UssdRequest, UssdReply>;
    chat: GatewayChannel<ChatRequest, ChatReply>;
  };
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Build and configure the Fastify HTTP server exposing the provider
 * callbacks, health checks, metrics, and the operational middleware (helmet,
 * rate limiting, correlation IDs).
 */
export async function createServer(options: ServerOptions): Promise<GatewayFastifyInstance> {
  const app = Fastify({
    logger: options.logger,
    disableRequestLogging: options.config.env === 'production',
  });

  await app.register(helmet, {
    global: true,
  });

  await app.register(fastifyRateLimit as unknown as FastifyPluginAsync<RateLimitPluginOptions>, {
    global: false,
    max: options.config.rateLimit.max,
    timeWindow: options.config.rateLimit.timeWindow,
  });

  app.addHook('onRequest', (request, reply, done) => {
    const correlationId =
      headerValue(request.headers['x-request-id']) ?? headerValue(request.headers['x-correlation-id']) ?? request.id;

    void reply.header('x-request-id', correlationId);
    request.headers['x-correlation-id'] = correlationId;
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        requestId: reply.getHeader('x-request-id'),
      },
      'Request completed',
    );
    done();
  });

  await registerHealthRoutes(app, options.service);
  await registerConversationRoutes(app, {
    service: options.service,
    ussd: options.channels.ussd,
    chat: options.channels.chat,
    metrics: options.metrics,
    rateLimit: options.config.rateLimit,
  });

  app.get('/metrics', async (_, reply) => {
    const payload = await options.metrics.registry.metrics();
    return reply.type('text/plain').send(payload);
  });

  return app as GatewayFastifyInstance;
}
