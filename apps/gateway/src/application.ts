import { createEngineConfig } from '@turnflow/core';

import { loadConfig, type AppConfig } from './config';
import { launchRegistration, type FlowLauncher } from './flows';
import { createServer, type GatewayFastifyInstance } from './server';
import { ConversationService, createChannel } from './services/conversation';
import { InMemorySessionStore, RedisSessionStore, type SessionStore } from './services/session';
import { createLogger, type AppLogger } from './telemetry/logger';
import { createMetrics, type GatewayMetrics } from './telemetry/metrics';
import { createChatAdapter } from './transports/chat';
import { createUssdAdapter } from './transports/ussd';

export interface Application {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  server: GatewayFastifyInstance;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface ApplicationOverrides {
  config?: AppConfig;
  logger?: AppLogger;
  metrics?: GatewayMetrics;
  sessionStore?: SessionStore;
  launcher?: FlowLauncher;
}

/**
 * Compose the gateway by wiring configuration loading, logging/metrics,
 * session storage, one processor per transport, and the Fastify server. The
 * returned object exposes lifecycle helpers used by the entrypoint and
 * integration tests.
 */
export async function createApplication(overrides: ApplicationOverrides = {}): Promise<Application> {
  const config = overrides.config ?? loadConfig();
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const metrics = overrides.metrics ?? createMetrics();
  const sessionStore = overrides.sessionStore ?? createSessionStore(config);

  const engine = createEngineConfig({
    pagination: config.pagination,
    prompt: config.prompt,
    sessionTtlSeconds: config.session.ttlSeconds,
  });
  const channelOptions = { store: sessionStore, engine, metrics, logger };

  const service = new ConversationService(overrides.launcher ?? launchRegistration, metrics, logger);
  const server = await createServer({
    config,
    logger,
    metrics,
    service,
    channels: {
      ussd: createChannel(createUssdAdapter(), channelOptions),
      chat: createChannel(createChatAdapter(), channelOptions),
    },
  });

  return {
    config,
    logger,
    metrics,
    server,
    start: () => startServer(server, config),
    stop: () => stopServer(server, sessionStore, logger),
  };
}

async function startServer(server: GatewayFastifyInstance, config: AppConfig): Promise<void> {
  await server.listen({ port: config.port, host: '0.0.0.0' });
}

/**
 * Shut down the HTTP server and close any Redis client connections. Redis
 * close failures are logged and not rethrown, so shutdown always completes.
 */
async function stopServer(server: GatewayFastifyInstance, sessionStore: SessionStore, logger: AppLogger): Promise<void> {
  await server.close();

  if (sessionStore instanceof RedisSessionStore) {
    try {
      await sessionStore.close();
    } catch (error) {
      logger.warn({ error }, 'Failed to gracefully close Redis session store');
    }
  }
}

function createSessionStore(config: AppConfig): SessionStore {
  if (config.session.driver === 'redis') {
    if (!config.session.redisUrl) {
      throw new Error('SESSION_STORE_DRIVER=redis requires REDIS_URL environment variable');
    }

    return new RedisSessionStore({ url: config.session.redisUrl, prefix: 'turnflow:' });
  }

  return new InMemorySessionStore({ prefix: 'turnflow:' });
}
