import { z } from 'zod';

import { requireSession } from './context';
import { PaginationConfigError } from './errors';
import type { Middleware } from './pipeline';
import { renderText } from './render';
import type { Session } from './session/session';
import type { FlowResponse, LoggerLike, ResponseKind } from './types';

export interface PaginationConfig {
  /** Upper bound on an outgoing message, footer included, in UTF-16 code units. */
  maxPageSize: number;
  nextToken: string;
  nextLabel: string;
  backToken: string;
  backLabel: string;
}

export const DEFAULT_PAGINATION_CONFIG: PaginationConfig = {
  maxPageSize: 140,
  nextToken: '#',
  nextLabel: 'More',
  backToken: '0',
  backLabel: 'Back',
};

/** Reserved session key holding the pagination state. */
export const PAGINATION_STATE_KEY = '$pagination';

const pageOffsetSchema = z.object({
  start: z.number().int().nonnegative(),
  finish: z.number().int().nonnegative(),
});

const paginationStateSchema = z.object({
  page: z.number().int().positive(),
  offsets: z.record(pageOffsetSchema),
  fullText: z.string(),
  kind: z.enum(['prompt', 'terminal']),
});

export type PageOffset = z.infer<typeof pageOffsetSchema>;
export type PaginationState = z.infer<typeof paginationStateSchema>;

export type Navigation = 'next' | 'back' | 'stay';

/** A page ready to send, together with the state that produced it. */
export interface PageView {
  state: PaginationState;
  text: string;
  kind: ResponseKind;
  /** True when the page reaches the end of the full text. */
  final: boolean;
}

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Splits rendered text into pages no longer than `maxPageSize`, footer
 * included. Page 1 starts at offset 0; each later page starts where the
 * previous one finished, past any whitespace. Offsets of pages already
 * visited are reused, never recomputed.
 */
export class Paginator {
  readonly nextOption: string;
  readonly backOption: string;

  constructor(private readonly config: PaginationConfig) {
    if (!Number.isInteger(config.maxPageSize) || config.maxPageSize <= 0) {
      throw new PaginationConfigError(
        `maxPageSize must be a positive integer, got ${String(config.maxPageSize)}`,
      );
    }
    if (config.nextToken === '' || config.backToken === '' || config.nextToken === config.backToken) {
      throw new PaginationConfigError('next and back tokens must be non-empty and distinct');
    }

    this.nextOption = `${config.nextToken} ${config.nextLabel}`;
    this.backOption = `${config.backToken} ${config.backLabel}`;

    if (config.maxPageSize - this.footer(true, true).length < 1) {
      throw new PaginationConfigError(
        `maxPageSize ${config.maxPageSize} leaves no room for content next to the navigation footer`,
      );
    }
  }

  /** Whether this input should be served from stored pages instead of the flow. */
  isNavigation(state: PaginationState, input: string | null): boolean {
    // A terminal response has already ended the flow; replaying it would start over.
    return state.kind === 'terminal' || this.navigationFor(input) !== 'stay';
  }

  navigationFor(input: string | null): Navigation {
    if (input === this.config.nextToken) {
      return 'next';
    }
    if (input === this.config.backToken) {
      return 'back';
    }
    return 'stay';
  }

  /** Page 1 of a freshly rendered response. */
  open(fullText: string, kind: ResponseKind): PageView {
    const state: PaginationState = { page: 1, offsets: { '1': this.computeOffset(fullText, 0, 1) }, fullText, kind };
    return this.view(state);
  }

  /** Move from the stored page in the given direction and render the result. */
  navigate(state: PaginationState, direction: Navigation): PageView {
    const next: PaginationState = { ...state, offsets: { ...state.offsets } };

    if (direction === 'next') {
      if (this.offsetFor(next, state.page + 1)) {
        next.page = state.page + 1;
      }
    } else if (direction === 'back') {
      next.page = Math.max(state.page - 1, 1);
    }

    this.offsetFor(next, next.page);
    return this.view(next);
  }

  /**
   * Offsets of `page`, computing and recording them (and any missing earlier
   * pages) when needed. Returns undefined when the text ends before `page`.
   */
  offsetFor(state: PaginationState, page: number): PageOffset | undefined {
    const known = state.offsets[String(page)];
    if (known) {
      return known;
    }

    let start = 0;
    if (page > 1) {
      const previous = this.offsetFor(state, page - 1);
      if (!previous) {
        return undefined;
      }
      start = skipWhitespace(state.fullText, previous.finish);
      if (start >= state.fullText.length) {
        return undefined;
      }
    }

    const offset = this.computeOffset(state.fullText, start, page);
    state.offsets[String(page)] = offset;
    return offset;
  }

  /** Deterministic `{start, finish}` for a page beginning at `start`. */
  computeOffset(fullText: string, start: number, page: number): PageOffset {
    const showBack = page > 1;
    const remaining = fullText.length - start;

    if (remaining <= this.config.maxPageSize - this.footer(false, showBack).length) {
      return { start, finish: fullText.length };
    }

    const budget = this.config.maxPageSize - this.footer(true, showBack).length;
    return { start, finish: findPageBreak(fullText, start, start + budget) };
  }

  view(state: PaginationState): PageView {
    const offset = state.offsets[String(state.page)];
    if (!offset) {
      throw new PaginationConfigError(`no offsets recorded for page ${state.page}`);
    }

    const final = offset.finish >= state.fullText.length;
    const kind: ResponseKind = final ? state.kind : 'prompt';
    const showBack = state.page > 1 && kind === 'prompt';
    const text = state.fullText.slice(offset.start, offset.finish) + this.footer(!final, showBack);

    return { state, text, kind, final };
  }

  private footer(showNext: boolean, showBack: boolean): string {
    const options: string[] = [];
    if (showNext) {
      options.push(this.nextOption);
    }
    if (showBack) {
      options.push(this.backOption);
    }
    return options.length > 0 ? `\n\n${options.join('\n')}` : '';
  }
}

/**
 * Largest end offset in `(start, limit]` that does not split a word or a
 * grapheme cluster: the start of a whitespace run when one exists, else the
 * last cluster boundary (a hard cut), else the last code point boundary when
 * a single cluster is longer than the budget. Requires `limit < text.length`.
 */
export function findPageBreak(text: string, start: number, limit: number): number {
  const boundaries = clusterBoundaries(text, start, limit);

  for (let index = boundaries.length - 1; index >= 0; index -= 1) {
    const boundary = boundaries[index];
    if (isWhitespace(text[boundary]) && !isWhitespace(text[boundary - 1])) {
      return boundary;
    }
  }

  const lastBoundary = boundaries[boundaries.length - 1];
  if (lastBoundary !== undefined) {
    return lastBoundary;
  }

  return codePointBreak(text, start, limit);
}

/** Grapheme cluster boundaries of `text` strictly after `start` and up to `limit`. */
function clusterBoundaries(text: string, start: number, limit: number): number[] {
  const boundaries: number[] = [];

  for (const segment of graphemes.segment(text.slice(start))) {
    const position = start + segment.index;
    if (position > limit) {
      break;
    }
    if (position > start) {
      boundaries.push(position);
    }
  }

  // Segment starts never include the end of the text itself.
  if (limit >= text.length && boundaries[boundaries.length - 1] !== text.length) {
    boundaries.push(text.length);
  }

  return boundaries;
}

function codePointBreak(text: string, start: number, limit: number): number {
  if (isLowSurrogate(text.charCodeAt(limit)) && limit - 1 > start) {
    return limit - 1;
  }
  if (isLowSurrogate(text.charCodeAt(limit))) {
    // A lone code point wider than the budget still makes progress.
    return limit + 1;
  }
  return limit;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}

/** First cluster boundary at or after `position` that does not begin a whitespace-only cluster. */
function skipWhitespace(text: string, position: number): number {
  for (const segment of graphemes.segment(text.slice(position))) {
    if (!/^\s+$/.test(segment.segment)) {
      return position + segment.index;
    }
  }
  return text.length;
}

export function readPaginationState(session: Session, logger?: LoggerLike): PaginationState | undefined {
  const stored = session.get(PAGINATION_STATE_KEY);
  if (stored === undefined) {
    return undefined;
  }

  const parsed = paginationStateSchema.safeParse(stored);
  if (!parsed.success) {
    logger?.warn?.({ sessionId: session.id, issues: parsed.error.issues }, 'Discarding malformed pagination state');
    session.delete(PAGINATION_STATE_KEY);
    return undefined;
  }

  return parsed.data;
}

export interface PaginationMiddlewareOptions {
  config: PaginationConfig;
  logger?: LoggerLike;
}

/**
 * Pipeline stage that keeps text replies within the page size. Navigation
 * input is answered from the stored pages without running the flow; any
 * other turn runs the flow and starts a new set of pages. Interactive
 * platforms pass straight through.
 */
export function createPaginationMiddleware(options: PaginationMiddlewareOptions): Middleware {
  const { config, logger } = options;
  const paginator = new Paginator(config);

  return async (context, next) => {
    if (context.platform.interactive) {
      return next(context);
    }

    const session = requireSession(context);
    const stored = readPaginationState(session, logger);

    if (stored && paginator.isNavigation(stored, context.input)) {
      const direction = paginator.navigationFor(context.input);
      const view = paginator.navigate(stored, direction);
      logger?.debug?.(
        { sessionId: context.sessionId, direction, page: view.state.page, final: view.final },
        'Serving stored page',
      );
      return respond(session, view);
    }

    if (stored) {
      session.delete(PAGINATION_STATE_KEY);
    }

    const response = await next(context);
    const fullText = renderText(response).trimEnd();
    const view = paginator.open(fullText, response.kind);

    if (!view.final) {
      logger?.info?.(
        { sessionId: context.sessionId, length: fullText.length, pageSize: config.maxPageSize },
        'Paginating response',
      );
    }

    return respond(session, view);
  };
}

function respond(session: Session, view: PageView): FlowResponse {
  const singlePage = view.state.page === 1 && view.final;

  if ((view.final && view.kind === 'terminal') || singlePage) {
    session.delete(PAGINATION_STATE_KEY);
  } else {
    session.set(PAGINATION_STATE_KEY, view.state);
  }

  return { kind: view.kind, message: view.text, choices: [] };
}
