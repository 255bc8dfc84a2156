import type { ConversationContext } from './context';
import { PipelineConfigError } from './errors';
import type { FlowResponse } from './types';

export type Handler = (context: ConversationContext) => Promise<FlowResponse>;

/**
 * A request-processing stage. It may call `next` once and pass the result
 * through, transform the result, short-circuit without calling `next`, or
 * change the context before handing it on.
 *
 * @example
 * ```ts
 * const timing: Middleware = async (context, next) => {
 *   const started = Date.now();
 *   const response = await next(context);
 *   logger.info({ ms: Date.now() - started }, 'turn finished');
 *   return response;
 * };
 * ```
 */
export type Middleware = (context: ConversationContext, next: Handler) => Promise<FlowResponse>;

export interface NamedMiddleware {
  name: string;
  middleware: Middleware;
}

/** Ordered, named list of stages composed around a terminal handler. */
export class MiddlewareStack {
  private readonly stages: NamedMiddleware[] = [];

  use(name: string, middleware: Middleware): this {
    this.assertUnique(name);
    this.stages.push({ name, middleware });
    return this;
  }

  insertBefore(target: string, name: string, middleware: Middleware): this {
    this.assertUnique(name);
    this.stages.splice(this.indexOf(target), 0, { name, middleware });
    return this;
  }

  insertAfter(target: string, name: string, middleware: Middleware): this {
    this.assertUnique(name);
    this.stages.splice(this.indexOf(target) + 1, 0, { name, middleware });
    return this;
  }

  remove(name: string): this {
    this.stages.splice(this.indexOf(name), 1);
    return this;
  }

  has(name: string): boolean {
    return this.stages.some((stage) => stage.name === name);
  }

  names(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  /** Compose the stages, first one outermost, around `terminal`. */
  build(terminal: Handler): Handler {
    return this.stages.reduceRight<Handler>(
      (downstream, stage) => (context) => {
        let called = false;
        const next: Handler = async (nextContext) => {
          if (called) {
            throw new PipelineConfigError(`middleware "${stage.name}" called next more than once`);
          }
          called = true;
          return downstream(nextContext);
        };
        return stage.middleware(context, next);
      },
      terminal,
    );
  }

  private indexOf(name: string): number {
    const index = this.stages.findIndex((stage) => stage.name === name);
    if (index < 0) {
      throw new PipelineConfigError(`unknown middleware "${name}"`);
    }
    return index;
  }

  private assertUnique(name: string): void {
    if (this.has(name)) {
      throw new PipelineConfigError(`middleware "${name}" is already registered`);
    }
  }
}
