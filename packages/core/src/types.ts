export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Anything a screen or middleware may keep in a session between turns. */
export type SessionValue = JsonValue;

export type MediaType = 'image' | 'document' | 'audio' | 'video' | 'sticker';

/** Media attached to an outgoing message, or received from the user. */
export interface MediaDescriptor {
  type?: MediaType;
  url: string;
  filename?: string;
  mimeType?: string;
}

export interface GeoLocation {
  latitude: number;
  longitude: number;
  name?: string;
  address?: string;
}

/** A single option offered to the user. `key` is what the flow receives back. */
export interface Choice {
  key: string;
  label: string;
}

export type ResponseKind = 'prompt' | 'terminal';

/**
 * Result of one turn as it travels back out through the pipeline. A `prompt`
 * keeps the conversation open; a `terminal` response ends it.
 */
export interface FlowResponse {
  kind: ResponseKind;
  message: string;
  choices?: readonly Choice[];
  media?: MediaDescriptor;
}

/** Read-only request details populated by the transport adapter. */
export interface RequestMetadata {
  callerId?: string;
  timestamp?: string;
  messageId?: string;
  contactName?: string;
  location?: GeoLocation;
  media?: MediaDescriptor;
}

/**
 * Minimal logging contract used across the engine. A console or pino logger
 * satisfies this interface out of the box.
 */
export interface LoggerLike {
  debug?(payload?: unknown, message?: string): void;
  info?(payload?: unknown, message?: string): void;
  warn?(payload?: unknown, message?: string): void;
  error?(payload?: unknown, message?: string): void;
}
