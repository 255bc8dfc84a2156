import type { Choice, MediaDescriptor } from './types';

export interface PromptSignal {
  kind: 'prompt';
  message: string;
  choices?: readonly Choice[];
  media?: MediaDescriptor;
}

export interface TerminateSignal {
  kind: 'terminate';
  message: string;
  media?: MediaDescriptor;
}

export interface RestartSignal {
  kind: 'restart';
}

/** Control-flow outcome of a replay. Crosses exactly one turn boundary. */
export type Signal = PromptSignal | TerminateSignal | RestartSignal;

/**
 * The single unwinding mechanism of a replay. Flow code throws it (through
 * the helpers below) and only the executor catches it, so every frame of an
 * action must be written assuming it may not run to completion.
 */
export class FlowInterrupt extends Error {
  constructor(readonly signal: Signal) {
    super(signal.kind === 'restart' ? 'restart flow' : signal.message);
    this.name = 'FlowInterrupt';
  }
}

export function isFlowInterrupt(error: unknown): error is FlowInterrupt {
  return error instanceof FlowInterrupt;
}

export interface PromptSignalOptions {
  choices?: readonly Choice[];
  media?: MediaDescriptor;
}

/** Suspend the replay and ask the user for more input. */
export function raisePrompt(message: string, options: PromptSignalOptions = {}): never {
  const signal: PromptSignal = { kind: 'prompt', message };
  if (options.choices && options.choices.length > 0) {
    signal.choices = options.choices;
  }
  if (options.media) {
    signal.media = options.media;
  }
  throw new FlowInterrupt(signal);
}

/** End the conversation with a final message. */
export function raiseTerminate(message: string, media?: MediaDescriptor): never {
  throw new FlowInterrupt(media ? { kind: 'terminate', message, media } : { kind: 'terminate', message });
}

/** Ask the executor to replay the current action straight away. */
export function raiseRestart(): never {
  throw new FlowInterrupt({ kind: 'restart' });
}
