import { z } from 'zod';

function positiveInteger(name: string, fallback: number) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number.parseInt(value, 10);
      if (Number.isNaN(parsed) || parsed <= 0) {
        throw new Error(`Invalid ${name} value: ${value}`);
      }
      return parsed;
    });
}

/**
 * Zod schema describing the environment contract of the gateway. Everything
 * is optional: a bare environment runs the demo flow on in-memory sessions.
 */
const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default(process.env.NODE_ENV === 'production' ? 'production' : 'development'),
  PORT: positiveInteger('PORT', 8080),
  LOG_LEVEL: z.string().optional(),
  SESSION_STORE_DRIVER: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'memory'))
    .pipe(z.enum(['memory', 'redis'])),
  REDIS_URL: z.string().url('REDIS_URL must be a valid URL').optional(),
  SESSION_TTL_SECONDS: z
    .string()
    .optional()
    .transform((value) => {
      if (!value) {
        return undefined;
      }
      const parsed = Number.parseInt(value, 10);
      if (Number.isNaN(parsed) || parsed <= 0) {
        throw new Error(`Invalid SESSION_TTL_SECONDS value: ${value}`);
      }
      return parsed;
    }),
  PAGINATION_PAGE_SIZE: positiveInteger('PAGINATION_PAGE_SIZE', 140),
  PAGINATION_NEXT_TOKEN: z.string().min(1).default('#'),
  PAGINATION_NEXT_LABEL: z.string().default('More'),
  PAGINATION_BACK_TOKEN: z.string().min(1).default('0'),
  PAGINATION_BACK_LABEL: z.string().default('Back'),
  COMBINE_VALIDATION_ERRORS: z
    .string()
    .optional()
    .transform((value) => value === undefined || !['false', '0', 'no', 'off'].includes(value.toLowerCase())),
  RATE_LIMIT_MAX: positiveInteger('RATE_LIMIT_MAX', 120),
  RATE_LIMIT_WINDOW: z
    .string()
    .optional()
    .transform((value) => value ?? '1 minute'),
});

export type SessionStoreDriver = z.infer<typeof envSchema>['SESSION_STORE_DRIVER'];

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  rateLimit: {
    max: number;
    timeWindow: string;
  };
  session: {
    driver: SessionStoreDriver;
    redisUrl?: string;
    ttlSeconds?: number;
  };
  pagination: {
    maxPageSize: number;
    nextToken: string;
    nextLabel: string;
    backToken: string;
    backLabel: string;
  };
  prompt: {
    combineValidationErrorWithMessage: boolean;
  };
  logLevel?: string;
}

/**
 * Parse and validate configuration from the provided environment source,
 * returning a typed settings object or throwing on the first malformed
 * variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const firstError = result.error.issues[0];
    throw new Error(firstError?.message ?? 'Invalid environment configuration');
  }

  const {
    NODE_ENV,
    PORT,
    LOG_LEVEL,
    SESSION_STORE_DRIVER,
    REDIS_URL,
    SESSION_TTL_SECONDS,
    PAGINATION_PAGE_SIZE,
    PAGINATION_NEXT_TOKEN,
    PAGINATION_NEXT_LABEL,
    PAGINATION_BACK_TOKEN,
    PAGINATION_BACK_LABEL,
    COMBINE_VALIDATION_ERRORS,
    RATE_LIMIT_MAX,
    RATE_LIMIT_WINDOW,
  } = result.data;

  if (SESSION_STORE_DRIVER === 'redis' && !REDIS_URL) {
    throw new Error('SESSION_STORE_DRIVER=redis requires REDIS_URL environment variable');
  }

  return {
    env: NODE_ENV,
    port: PORT,
    rateLimit: {
      max: RATE_LIMIT_MAX,
      timeWindow: RATE_LIMIT_WINDOW,
    },
    session: {
      driver: SESSION_STORE_DRIVER,
      redisUrl: REDIS_URL,
      ttlSeconds: SESSION_TTL_SECONDS,
    },
    pagination: {
      maxPageSize: PAGINATION_PAGE_SIZE,
      nextToken: PAGINATION_NEXT_TOKEN,
      nextLabel: PAGINATION_NEXT_LABEL,
      backToken: PAGINATION_BACK_TOKEN,
      backLabel: PAGINATION_BACK_LABEL,
    },
    prompt: {
      combineValidationErrorWithMessage: COMBINE_VALIDATION_ERRORS,
    },
    logLevel: LOG_LEVEL,
  };
}
