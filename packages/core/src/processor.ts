import { createEngineConfig, type EngineConfig } from './config';
import { normalizeInput, type ConversationContext } from './context';
import { PipelineConfigError } from './errors';
import { createExecutor } from './executor';
import type { FlowAction, FlowClass } from './flow/flow';
import type { Platform } from './flow/platform';
import { createPaginationMiddleware } from './pagination';
import { MiddlewareStack, type Handler, type Middleware } from './pipeline';
import { createSessionMiddleware } from './session/loader';
import type { SessionStore } from './session/store';
import type { FlowResponse, LoggerLike, RequestMetadata } from './types';

export const SESSION_STAGE = 'session';
export const PAGINATION_STAGE = 'pagination';
export const EXECUTOR_STAGE = 'executor';

const CORE_STAGES = [SESSION_STAGE, PAGINATION_STAGE];

/** What a transport adapter extracts from an inbound request. */
export interface TurnRequest {
  sessionId: string;
  input: string | null;
  metadata?: RequestMetadata;
}

/**
 * Outermost layer of the pipeline: decodes the provider's request into a
 * turn and encodes the pipeline's response into the provider's reply.
 */
export interface GatewayAdapter<TRequest, TReply> {
  readonly name: string;
  readonly platform: Platform;
  decode(request: TRequest): TurnRequest;
  encode(response: FlowResponse, context: ConversationContext, request: TRequest): TReply;
}

export interface ProcessorOptions<TRequest, TReply> {
  gateway: GatewayAdapter<TRequest, TReply>;
  store: SessionStore;
  config?: EngineConfig;
  logger?: LoggerLike;
}

/**
 * Builds and runs the request pipeline for one gateway:
 * transport adapter → session → pagination → user middleware → executor.
 * User stages go between pagination and the executor by default and can be
 * placed relative to any named stage; the core stages keep their order.
 */
export class Processor<TRequest, TReply> {
  private readonly stack = new MiddlewareStack();
  private readonly gateway: GatewayAdapter<TRequest, TReply>;
  private readonly logger: LoggerLike | undefined;
  readonly config: EngineConfig;

  constructor(options: ProcessorOptions<TRequest, TReply>) {
    if (!options.gateway) {
      throw new PipelineConfigError('A gateway adapter is required');
    }
    if (!options.store) {
      throw new PipelineConfigError('A session store is required');
    }

    this.gateway = options.gateway;
    this.logger = options.logger;
    this.config = options.config ?? createEngineConfig();

    this.stack
      .use(
        SESSION_STAGE,
        createSessionMiddleware({
          store: options.store,
          ttlSeconds: this.config.sessionTtlSeconds,
          logger: this.logger,
        }),
      )
      .use(PAGINATION_STAGE, createPaginationMiddleware({ config: this.config.pagination, logger: this.logger }));
  }

  use(name: string, middleware: Middleware): this {
    this.stack.use(name, middleware);
    return this;
  }

  insertBefore(target: string, name: string, middleware: Middleware): this {
    if (target === EXECUTOR_STAGE) {
      return this.use(name, middleware);
    }
    if (target === PAGINATION_STAGE) {
      throw new PipelineConfigError('Stages cannot be placed between the session and pagination stages');
    }
    this.stack.insertBefore(target, name, middleware);
    return this;
  }

  insertAfter(target: string, name: string, middleware: Middleware): this {
    if (target === EXECUTOR_STAGE) {
      throw new PipelineConfigError('The executor is always the innermost stage');
    }
    if (target === SESSION_STAGE) {
      throw new PipelineConfigError('Stages cannot be placed between the session and pagination stages');
    }
    this.stack.insertAfter(target, name, middleware);
    return this;
  }

  remove(name: string): this {
    if (CORE_STAGES.includes(name)) {
      throw new PipelineConfigError(`The "${name}" stage cannot be removed`);
    }
    this.stack.remove(name);
    return this;
  }

  /** Stage names from outermost to innermost. */
  stages(): string[] {
    return [this.gateway.name, ...this.stack.names(), EXECUTOR_STAGE];
  }

  /** Run one turn of `action` on `flowClass` for an inbound request. */
  async run<K extends string, F extends Record<K, FlowAction>>(
    flowClass: FlowClass<F>,
    action: K,
    request: TRequest,
  ): Promise<TReply> {
    const turn = this.gateway.decode(request);
    const context: ConversationContext = {
      sessionId: turn.sessionId,
      gateway: this.gateway.name,
      platform: this.gateway.platform,
      metadata: turn.metadata ?? {},
      flow: {
        name: flowClass.name,
        action,
        start: (app) => new flowClass(app)[action](),
      },
      input: normalizeInput(turn.input),
      state: {},
    };

    this.logger?.info?.(
      { gateway: this.gateway.name, sessionId: context.sessionId, flow: flowClass.name, action },
      'Processing turn',
    );

    const handler: Handler = this.stack.build(
      createExecutor({ prompt: this.config.prompt, maxRestarts: this.config.maxRestarts, logger: this.logger }),
    );

    const response = await handler(context);
    return this.gateway.encode(response, context, request);
  }
}
