import { InteractivePrompt, TextPrompt, type Prompt, type PromptOptions } from './prompt';

/**
 * Capabilities of the transport a turn arrived on. The transport adapter
 * picks one; the engine never inspects the transport itself.
 */
export interface Platform {
  readonly name: string;
  /** Renders choices natively, so replies are not flattened or paginated. */
  readonly interactive: boolean;
  /**
   * The message that opens a conversation only wakes the flow up and must
   * not be taken as the answer to the first screen.
   */
  readonly discardsOpeningInput: boolean;
  createPrompt(input: string | null, options: PromptOptions): Prompt;
}

export const textPlatform: Platform = {
  name: 'text',
  interactive: false,
  discardsOpeningInput: false,
  createPrompt: (input, options) => new TextPrompt(input, options),
};

export const interactivePlatform: Platform = {
  name: 'interactive',
  interactive: true,
  discardsOpeningInput: true,
  createPrompt: (input, options) => new InteractivePrompt(input, options),
};
