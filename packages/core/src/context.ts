import { PipelineConfigError } from './errors';
import type { FlowApp } from './flow/app';
import type { Platform } from './flow/platform';
import type { Session } from './session/session';
import type { RequestMetadata } from './types';

/** The flow class and entry action a turn is meant to run. */
export interface FlowEntry {
  name: string;
  action: string;
  start(app: FlowApp): unknown;
}

/**
 * Per-turn state handed from stage to stage. Transport adapters fill in the
 * request fields, the session loader attaches `session`, and the executor
 * consumes `input`.
 */
export interface ConversationContext {
  readonly sessionId: string;
  readonly gateway: string;
  readonly platform: Platform;
  readonly metadata: Readonly<RequestMetadata>;
  readonly flow: FlowEntry;
  /** Raw user input for this turn; null on a session-opening turn and once consumed. */
  input: string | null;
  session?: Session;
  /** Free-form bag for user-supplied middleware. */
  state: Record<string, unknown>;
}

export function requireSession(context: ConversationContext): Session {
  if (!context.session) {
    throw new PipelineConfigError('No session attached to the context; is the session stage installed?');
  }
  return context.session;
}

/** Blank input counts as no input at all. */
export function normalizeInput(input: string | null | undefined): string | null {
  if (input === null || input === undefined) {
    return null;
  }
  return input.trim() === '' ? null : input;
}
