import {
  Processor,
  type EngineConfig,
  type GatewayAdapter,
  type Middleware,
  type SessionStore,
} from '@turnflow/core';

import { FlowExecutionError } from '../../errors';
import type { FlowLauncher } from '../../flows';
import type { AppLogger } from '../../telemetry/logger';
import type { GatewayMetrics } from '../../telemetry/metrics';

/** A transport adapter together with the processor that serves it. */
export interface GatewayChannel<TRequest, TReply> {
  adapter: GatewayAdapter<TRequest, TReply>;
  processor: Processor<TRequest, TReply>;
}

export interface ChannelOptions {
  store: SessionStore;
  engine: EngineConfig;
  metrics: GatewayMetrics;
  logger: AppLogger;
}

/** Pipeline stage counting answered turns by response kind. */
export function createTurnMetricsMiddleware(gateway: string, metrics: GatewayMetrics): Middleware {
  return async (context, next) => {
    const response = await next(context);
    metrics.turnCounter.inc({ gateway, kind: response.kind });
    return response;
  };
}

export function createChannel<TRequest, TReply>(
  adapter: GatewayAdapter<TRequest, TReply>,
  options: ChannelOptions,
): GatewayChannel<TRequest, TReply> {
  const processor = new Processor({
    gateway: adapter,
    store: options.store,
    config: options.engine,
    logger: options.logger.child({ gateway: adapter.name }),
  });

  // Outside pagination so page navigation turns are counted too.
  processor.insertBefore('session', 'metrics', createTurnMetricsMiddleware(adapter.name, options.metrics));

  return { adapter, processor };
}

/**
 * Runs conversation turns for the HTTP routes. Turns of one conversation are
 * serialized: a session is read at the start of a turn and written at the
 * end, so two overlapping turns would lose one of the writes.
 */
export class ConversationService {
  private readonly sessionLocks = new Map<string, Promise<void>>();

  constructor(
    private readonly launch: FlowLauncher,
    private readonly metrics: GatewayMetrics,
    private readonly logger: AppLogger,
  ) {}

  async handle<TRequest, TReply>(channel: GatewayChannel<TRequest, TReply>, request: TRequest): Promise<TReply> {
    const gateway = channel.adapter.name;
    const { sessionId } = channel.adapter.decode(request);

    return this.withSessionLock(`${gateway}:${sessionId}`, async () => {
      try {
        return await this.launch(channel.processor, request);
      } catch (error) {
        this.metrics.flowFailures.inc({ gateway });
        this.logger.error({ error, gateway, sessionId }, 'Conversation turn failed');
        throw new FlowExecutionError(undefined, error);
      }
    });
  }

  /** Number of conversations with a turn in progress or queued. */
  get activeSessions(): number {
    return this.sessionLocks.size;
  }

  private async withSessionLock<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.sessionLocks.get(sessionId) ?? Promise.resolve();
    let release!: () => void;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chain = previous.then(() => current);
    this.sessionLocks.set(sessionId, chain);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.sessionLocks.get(sessionId) === chain) {
        this.sessionLocks.delete(sessionId);
      }
    }
  }
}
