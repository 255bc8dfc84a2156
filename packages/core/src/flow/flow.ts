import type { FlowApp } from './app';

/**
 * Base class for conversation logic. Every public method without arguments
 * can serve as an entry action and is replayed from the top on each turn.
 */
export abstract class Flow {
  constructor(protected readonly app: FlowApp) {}
}

export type FlowAction = () => unknown;

export type FlowClass<F> = new (app: FlowApp) => F;
