import { requireSession } from './context';
import { FlowDefinitionError } from './errors';
import { FlowApp } from './flow/app';
import { DEFAULT_PROMPT_OPTIONS, type PromptOptions } from './flow/prompt';
import type { Handler } from './pipeline';
import { isFlowInterrupt } from './signals';
import type { LoggerLike } from './types';

export const DEFAULT_MAX_RESTARTS = 25;

export interface ExecutorOptions {
  prompt?: PromptOptions;
  /** Bound on RestartFlow signals handled within one turn. */
  maxRestarts?: number;
  logger?: LoggerLike;
}

/**
 * Innermost handler of the pipeline. Runs the requested flow action and turns
 * the signal that ends the replay into a response. Any error other than a
 * signal aborts the turn.
 */
export function createExecutor(options: ExecutorOptions = {}): Handler {
  const promptOptions = options.prompt ?? DEFAULT_PROMPT_OPTIONS;
  const maxRestarts = options.maxRestarts ?? DEFAULT_MAX_RESTARTS;
  const logger = options.logger;

  return async (context) => {
    const session = requireSession(context);
    const { flow } = context;
    const logContext = { sessionId: context.sessionId, flow: flow.name, action: flow.action };

    for (let restarts = 0; ; restarts += 1) {
      const app = new FlowApp(context, promptOptions);

      try {
        await flow.start(app);
      } catch (error) {
        if (!isFlowInterrupt(error)) {
          logger?.error?.({ ...logContext, error }, 'Flow execution failed');
          throw error;
        }

        const { signal } = error;
        switch (signal.kind) {
          case 'prompt':
            logger?.info?.(
              { ...logContext, screens: app.navigationStack.length, choices: signal.choices?.length ?? 0 },
              'Flow prompted user',
            );
            return { kind: 'prompt', message: signal.message, choices: signal.choices, media: signal.media };
          case 'terminate':
            logger?.info?.(logContext, 'Flow terminated');
            session.destroy();
            return { kind: 'terminal', message: signal.message, media: signal.media };
          case 'restart':
            if (restarts >= maxRestarts) {
              throw new FlowDefinitionError(
                `${flow.name}#${flow.action} restarted more than ${maxRestarts} times in one turn`,
              );
            }
            logger?.debug?.({ ...logContext, restarts: restarts + 1 }, 'Flow restart requested');
            continue;
        }
      }

      logger?.warn?.(logContext, 'Flow returned without interacting with the user');
      throw new FlowDefinitionError(
        `${flow.name}#${flow.action} returned without prompting or terminating`,
      );
    }
  };
}
