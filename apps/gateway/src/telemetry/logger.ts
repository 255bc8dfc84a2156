import pino, { type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface LoggerConfig {
  level?: string;
  name?: string;
  /** Mask subscriber numbers in log output. Defaults to true in production. */
  maskCallerIds?: boolean;
}

const CALLER_ID_PATHS = ['callerId', 'metadata.callerId', 'req.body.MSISDN', 'req.body.from'];

/** Keep the last four digits of a subscriber number. */
export function maskCallerId(value: unknown): unknown {
  if (typeof value !== 'string' || value.length <= 4) {
    return value;
  }
  return `${'*'.repeat(value.length - 4)}${value.slice(-4)}`;
}

/** Create a Pino logger instance tuned for the gateway defaults. */
export function createLogger(config: LoggerConfig = {}): AppLogger {
  const options: LoggerOptions = {
    name: config.name ?? 'turnflow-gateway',
    level: config.level ?? inferDefaultLevel(),
  };

  if (config.maskCallerIds ?? process.env.NODE_ENV === 'production') {
    options.redact = { paths: CALLER_ID_PATHS, censor: maskCallerId };
  }

  return pino(options);
}

function inferDefaultLevel(): string {
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}
