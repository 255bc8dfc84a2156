export type {
  JsonPrimitive,
  JsonValue,
  SessionValue,
  MediaType,
  MediaDescriptor,
  GeoLocation,
  Choice,
  ResponseKind,
  FlowResponse,
  RequestMetadata,
  LoggerLike,
} from './types';
export { FlowDefinitionError, PaginationConfigError, PipelineConfigError } from './errors';
export type { PromptSignal, TerminateSignal, RestartSignal, Signal, PromptSignalOptions } from './signals';
export { FlowInterrupt, isFlowInterrupt, raisePrompt, raiseTerminate, raiseRestart } from './signals';

export type { SessionData, SessionCodec } from './session/codec';
export { jsonSessionCodec, sessionDataSchema } from './session/codec';
export type { SessionKey, SessionStore, SessionStoreContext } from './session/store';
export { DEFAULT_SESSION_TTL_SECONDS } from './session/store';
export { InMemorySessionStore } from './session/in-memory-store';
export type { OpenSessionOptions } from './session/session';
export { Session } from './session/session';
export type { SessionMiddlewareOptions } from './session/loader';
export {
  GATEWAY_SESSION_TTL_SECONDS,
  createSessionMiddleware,
  resolveSessionTtl,
  sessionKeyFor,
} from './session/loader';

export type { FlowEntry, ConversationContext } from './context';
export { normalizeInput, requireSession } from './context';
export type {
  PromptOptions,
  Validator,
  AskOptions,
  ConvertingAskOptions,
  SelectOptions,
  SayOptions,
  SelectChoices,
  Prompt,
} from './flow/prompt';
export { DEFAULT_PROMPT_OPTIONS, TextPrompt, InteractivePrompt } from './flow/prompt';
export type { Platform } from './flow/platform';
export { textPlatform, interactivePlatform } from './flow/platform';
export type { ScreenBuilder } from './flow/app';
export { FlowApp, STARTED_AT_KEY } from './flow/app';
export type { FlowAction, FlowClass } from './flow/flow';
export { Flow } from './flow/flow';

export type { ChatButton, ChatListRow, ChatListSection, InteractiveMessage } from './render';
export { MAX_INLINE_BUTTONS, describeMedia, renderChoiceList, renderInteractive, renderText } from './render';
export type {
  PaginationConfig,
  PageOffset,
  PaginationState,
  Navigation,
  PageView,
  PaginationMiddlewareOptions,
} from './pagination';
export {
  DEFAULT_PAGINATION_CONFIG,
  PAGINATION_STATE_KEY,
  Paginator,
  createPaginationMiddleware,
  findPageBreak,
  readPaginationState,
} from './pagination';

export type { Handler, Middleware, NamedMiddleware } from './pipeline';
export { MiddlewareStack } from './pipeline';
export type { ExecutorOptions } from './executor';
export { DEFAULT_MAX_RESTARTS, createExecutor } from './executor';
export type { EngineConfig, EngineConfigOverrides } from './config';
export { createEngineConfig } from './config';
export type { TurnRequest, GatewayAdapter, ProcessorOptions } from './processor';
export { EXECUTOR_STAGE, PAGINATION_STAGE, SESSION_STAGE, Processor } from './processor';
