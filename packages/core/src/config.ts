import { DEFAULT_MAX_RESTARTS } from './executor';
import { DEFAULT_PROMPT_OPTIONS, type PromptOptions } from './flow/prompt';
import { DEFAULT_PAGINATION_CONFIG, type PaginationConfig } from './pagination';

/**
 * Engine settings, passed explicitly to each processor. There is no
 * process-wide registry: two processors may run with different settings.
 */
export interface EngineConfig {
  pagination: PaginationConfig;
  prompt: PromptOptions;
  maxRestarts: number;
  /** Fixed session lifetime; per-gateway defaults apply when unset. */
  sessionTtlSeconds?: number;
}

export interface EngineConfigOverrides {
  pagination?: Partial<PaginationConfig>;
  prompt?: Partial<PromptOptions>;
  maxRestarts?: number;
  sessionTtlSeconds?: number;
}

export function createEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  return {
    pagination: { ...DEFAULT_PAGINATION_CONFIG, ...overrides.pagination },
    prompt: { ...DEFAULT_PROMPT_OPTIONS, ...overrides.prompt },
    maxRestarts: overrides.maxRestarts ?? DEFAULT_MAX_RESTARTS,
    sessionTtlSeconds: overrides.sessionTtlSeconds,
  };
}
