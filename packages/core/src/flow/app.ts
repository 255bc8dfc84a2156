import type { ConversationContext } from '../context';
import { requireSession } from '../context';
import { FlowDefinitionError } from '../errors';
import type { Session } from '../session/session';
import { raiseRestart, raiseTerminate } from '../signals';
import type { GeoLocation, MediaDescriptor, SessionValue } from '../types';
import { DEFAULT_PROMPT_OPTIONS, type Prompt, type PromptOptions, type SayOptions } from './prompt';

/** Session key marking that the opening message of a chat has been seen. */
export const STARTED_AT_KEY = '$started_at';

export type ScreenBuilder<T extends SessionValue> = (prompt: Prompt) => T;

/**
 * The handle a flow uses to talk to the user. One instance exists per
 * replay; the executor builds a fresh one every time it (re)invokes an
 * action.
 */
export class FlowApp {
  private readonly stack: string[] = [];
  readonly session: Session;

  constructor(
    private readonly context: ConversationContext,
    private readonly promptOptions: PromptOptions = DEFAULT_PROMPT_OPTIONS,
  ) {
    this.session = requireSession(context);

    if (context.platform.discardsOpeningInput && !this.session.has(STARTED_AT_KEY)) {
      this.session.set(STARTED_AT_KEY, new Date().toISOString());
      context.input = null;
    }
  }

  /**
   * Present a memoized question. A value stored under `key` by an earlier
   * turn is returned without running `builder`; otherwise the builder gets a
   * prompt over this turn's input and either returns the answer, which is
   * stored, or suspends the replay.
   */
  screen<T extends SessionValue>(key: string, builder: ScreenBuilder<T>): T {
    if (typeof builder !== 'function') {
      throw new FlowDefinitionError(`screen "${key}" requires a builder function`);
    }
    if (this.stack.includes(key)) {
      throw new FlowDefinitionError(`screen "${key}" has already been presented`);
    }

    this.stack.push(key);

    const cached = this.session.get(key);
    if (cached !== undefined) {
      // Only this screen's builder ever writes under its key.
      return cached as T;
    }

    const prompt = this.context.platform.createPrompt(this.context.input, this.promptOptions);
    // Input is single-use: it belongs to the first unanswered screen.
    this.context.input = null;

    const value = builder(prompt);
    if (value === undefined) {
      throw new FlowDefinitionError(`screen "${key}" builder returned no value`);
    }

    return this.session.set(key, value);
  }

  say(message: string, options: SayOptions = {}): never {
    raiseTerminate(message, options.media);
  }

  /**
   * Forget the answer to the most recently touched screen and replay the
   * action. Returns false when no screen has been touched in this replay.
   */
  goBack(): false {
    const current = this.stack[this.stack.length - 1];
    if (current === undefined) {
      return false;
    }

    // The rewound screen must ask again, not take this turn's input as its answer.
    this.context.input = null;
    this.session.delete(current);
    raiseRestart();
  }

  get navigationStack(): readonly string[] {
    return this.stack;
  }

  /** Input not yet consumed by a screen in this replay. */
  get input(): string | null {
    return this.context.input;
  }

  get gateway(): string {
    return this.context.gateway;
  }

  get callerId(): string | undefined {
    return this.context.metadata.callerId;
  }

  get timestamp(): string | undefined {
    return this.context.metadata.timestamp;
  }

  get messageId(): string | undefined {
    return this.context.metadata.messageId;
  }

  get contactName(): string | undefined {
    return this.context.metadata.contactName;
  }

  get location(): GeoLocation | undefined {
    return this.context.metadata.location;
  }

  get media(): MediaDescriptor | undefined {
    return this.context.metadata.media;
  }
}
