import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface GatewayMetrics {
  registry: Registry;
  requestCounter: Counter<string>;
  requestDuration: Histogram<string>;
  turnCounter: Counter<string>;
  flowFailures: Counter<string>;
}

export interface MetricsOptions {
  prefix?: string;
  registry?: Registry;
}

export function createMetrics(options: MetricsOptions = {}): GatewayMetrics {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? 'turnflow_gateway_';

  collectDefaultMetrics({ register: registry, prefix });

  const requestCounter = new Counter({
    name: `${prefix}requests_total`,
    help: 'Total number of gateway requests processed',
    labelNames: ['gateway', 'status'],
    registers: [registry],
  });

  const requestDuration = new Histogram({
    name: `${prefix}request_duration_seconds`,
    help: 'Gateway request duration in seconds',
    labelNames: ['gateway', 'status'],
    buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2],
    registers: [registry],
  });

  const turnCounter = new Counter({
    name: `${prefix}turns_total`,
    help: 'Conversation turns answered, by gateway and response kind',
    labelNames: ['gateway', 'kind'],
    registers: [registry],
  });

  const flowFailures = new Counter({
    name: `${prefix}flow_failures_total`,
    help: 'Turns aborted by an error in flow code or the session backend',
    labelNames: ['gateway'],
    registers: [registry],
  });

  return {
    registry,
    requestCounter,
    requestDuration,
    turnCounter,
    flowFailures,
  };
}
