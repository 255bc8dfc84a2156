import { FlowDefinitionError } from '../errors';
import { raisePrompt, raiseTerminate } from '../signals';
import type { Choice, MediaDescriptor } from '../types';

export interface PromptOptions {
  /** Repeat the original question under a validation error. */
  combineValidationErrorWithMessage: boolean;
}

export const DEFAULT_PROMPT_OPTIONS: PromptOptions = {
  combineValidationErrorWithMessage: true,
};

/** Returns an error message for invalid values, nothing otherwise. */
export type Validator<T> = (value: T) => string | null | undefined;

export interface AskOptions {
  convert?: never;
  validate?: Validator<string>;
  transform?: (value: string) => string;
  media?: MediaDescriptor;
}

export interface ConvertingAskOptions<T> {
  convert: (input: string) => T;
  validate?: Validator<T>;
  transform?: (value: T) => T;
  media?: MediaDescriptor;
}

export interface SelectOptions {
  media?: MediaDescriptor;
}

export interface SayOptions {
  media?: MediaDescriptor;
}

/** Either a list of values or a map of keys to display labels. */
export type SelectChoices<K extends string> = readonly K[] | Readonly<Record<K, string>>;

/**
 * What a screen builder can do with the turn's input. Each operation returns
 * a value when the input answers the question and otherwise suspends the
 * replay with a prompt.
 */
export interface Prompt {
  readonly input: string | null;
  ask(message: string, options?: AskOptions): string;
  ask<T>(message: string, options: ConvertingAskOptions<T>): T;
  select<K extends string>(message: string, choices: SelectChoices<K>, options?: SelectOptions): K;
  yesNo(message: string, options?: SelectOptions): boolean;
  say(message: string, options?: SayOptions): never;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

interface Presentation {
  choices?: readonly Choice[];
  media?: MediaDescriptor;
}

interface SelectOption<K extends string> {
  key: K;
  label: string;
}

abstract class BasePrompt implements Prompt {
  constructor(
    readonly input: string | null,
    protected readonly options: PromptOptions = DEFAULT_PROMPT_OPTIONS,
  ) {}

  ask(message: string, options?: AskOptions): string;
  ask<T>(message: string, options: ConvertingAskOptions<T>): T;
  ask<T>(message: string, options: AskOptions | ConvertingAskOptions<T> = {}): string | T {
    const presentation: Presentation = { media: options.media };

    if (isConverting(options)) {
      return this.resolve(message, presentation, (input) => parseAnswer(input, options));
    }

    const textOptions: ConvertingAskOptions<string> = { ...options, convert: identity };
    return this.resolve(message, presentation, (input) => parseAnswer(input, textOptions));
  }

  abstract select<K extends string>(message: string, choices: SelectChoices<K>, options?: SelectOptions): K;

  abstract yesNo(message: string, options?: SelectOptions): boolean;

  say(message: string, options: SayOptions = {}): never {
    raiseTerminate(message, options.media);
  }

  /**
   * Shared builder contract: parse the input if there is any, re-prompt with
   * the validation message if parsing fails, and prompt with the question
   * when there is no input yet.
   */
  protected resolve<T>(message: string, presentation: Presentation, parse: (input: string) => Parsed<T>): T {
    if (this.input !== null && this.input.trim() !== '') {
      const parsed = parse(this.input);
      if (parsed.ok) {
        return parsed.value;
      }
      raisePrompt(this.validationMessage(parsed.error, message), presentation);
    }

    raisePrompt(message, presentation);
  }

  protected validationMessage(error: string, message: string): string {
    return this.options.combineValidationErrorWithMessage ? `${error}\n\n${message}` : error;
  }
}

/**
 * Prompt for text-only transports such as USSD: choices become a numbered
 * list and the user answers with the number.
 */
export class TextPrompt extends BasePrompt {
  select<K extends string>(message: string, choices: SelectChoices<K>, options: SelectOptions = {}): K {
    const selectable = normalizeChoices(choices);
    const numbered: Choice[] = selectable.map((choice, index) => ({
      key: String(index + 1),
      label: choice.label,
    }));

    const index = this.resolve<number>(message, { choices: numbered, media: options.media }, (input) => {
      const choice = Number.parseInt(input.trim(), 10);
      if (Number.isNaN(choice) || choice < 1 || choice > selectable.length) {
        return { ok: false, error: 'Invalid selection:' };
      }
      return { ok: true, value: choice - 1 };
    });

    return pickOption(selectable, index);
  }

  yesNo(message: string, options: SelectOptions = {}): boolean {
    return this.select(message, ['Yes', 'No'], options) === 'Yes';
  }
}

const MAX_INTERACTIVE_CHOICES = 100;
const MAX_CHOICE_LABEL_LENGTH = 100;

/**
 * Prompt for chat transports that render choices natively (buttons or
 * lists). Choices travel by key and the user may answer with the key or the
 * label.
 */
export class InteractivePrompt extends BasePrompt {
  select<K extends string>(message: string, choices: SelectChoices<K>, options: SelectOptions = {}): K {
    const selectable = normalizeChoices(choices);
    validateInteractiveChoices(selectable);

    const index = this.resolve<number>(
      message,
      { choices: selectable.map(({ key, label }) => ({ key, label })), media: options.media },
      (input) => {
        const answer = input.trim();
        const byKey = selectable.findIndex((choice) => choice.key === answer);
        const found =
          byKey >= 0
            ? byKey
            : selectable.findIndex((choice) => choice.label.toLowerCase() === answer.toLowerCase());
        if (found < 0) {
          return { ok: false, error: 'Invalid choice. Please select one of the options.' };
        }
        return { ok: true, value: found };
      },
    );

    return pickOption(selectable, index);
  }

  yesNo(message: string, options: SelectOptions = {}): boolean {
    const choices: Choice[] = [
      { key: 'yes', label: 'Yes' },
      { key: 'no', label: 'No' },
    ];

    return this.resolve<boolean>(message, { choices, media: options.media }, (input) => {
      switch (input.trim().toLowerCase()) {
        case 'yes':
        case 'y':
        case '1':
        case 'true':
          return { ok: true, value: true };
        case 'no':
        case 'n':
        case '0':
        case 'false':
          return { ok: true, value: false };
        default:
          return { ok: false, error: 'Please answer with Yes or No.' };
      }
    });
  }
}

function identity(input: string): string {
  return input;
}

function isConverting<T>(options: AskOptions | ConvertingAskOptions<T>): options is ConvertingAskOptions<T> {
  return typeof options.convert === 'function';
}

function parseAnswer<T>(input: string, options: ConvertingAskOptions<T>): Parsed<T> {
  const converted = options.convert(input);
  const error = options.validate?.(converted);
  if (error) {
    return { ok: false, error };
  }
  return { ok: true, value: options.transform ? options.transform(converted) : converted };
}

function isChoiceList<K extends string>(choices: SelectChoices<K>): choices is readonly K[] {
  return Array.isArray(choices);
}

function normalizeChoices<K extends string>(choices: SelectChoices<K>): SelectOption<K>[] {
  let options: SelectOption<K>[];

  if (isChoiceList(choices)) {
    options = choices.map((choice) => ({ key: choice, label: choice }));
  } else {
    options = Object.keys(choices)
      .filter((key): key is K => Object.hasOwn(choices, key))
      .map((key) => ({ key, label: choices[key] }));
  }

  if (options.length === 0) {
    throw new FlowDefinitionError('select requires at least one choice');
  }

  return options;
}

function validateInteractiveChoices<K extends string>(choices: SelectOption<K>[]): void {
  if (choices.length > MAX_INTERACTIVE_CHOICES) {
    throw new FlowDefinitionError(
      `interactive prompts support at most ${MAX_INTERACTIVE_CHOICES} choices, got ${choices.length}`,
    );
  }

  choices.forEach((choice, index) => {
    if (choice.label.trim() === '') {
      throw new FlowDefinitionError(`choice at index ${index} cannot be empty`);
    }
    if (choice.label.length > MAX_CHOICE_LABEL_LENGTH) {
      throw new FlowDefinitionError(
        `choice "${choice.label.slice(0, 20)}..." is too long (${choice.label.length} chars)`,
      );
    }
  });
}

function pickOption<K extends string>(options: SelectOption<K>[], index: number): K {
  const option = options[index];
  if (!option) {
    throw new FlowDefinitionError(`selection index ${index} is out of range`);
  }
  return option.key;
}
