import {
  interactivePlatform,
  renderInteractive,
  type GatewayAdapter,
  type GeoLocation,
  type InteractiveMessage,
  type MediaDescriptor,
  type ResponseKind,
} from '@turnflow/core';

/** Inbound message from a rich chat provider, already unwrapped from its webhook. */
export interface ChatRequest {
  /** Conversation id; defaults to the sender. */
  sessionId?: string;
  from: string;
  text?: string | null;
  messageId?: string;
  contactName?: string;
  timestamp?: string;
  location?: GeoLocation;
  media?: MediaDescriptor;
}

export interface ChatReply extends InteractiveMessage {
  to: string;
  kind: ResponseKind;
}

export interface ChatAdapterOptions {
  name?: string;
}

/**
 * Transport adapter for chat platforms with native buttons and lists. The
 * first message of a conversation only opens it; choices go out as buttons
 * or list sections instead of numbered text.
 */
export function createChatAdapter(options: ChatAdapterOptions = {}): GatewayAdapter<ChatRequest, ChatReply> {
  return {
    name: options.name ?? 'chat',
    platform: interactivePlatform,

    decode(request) {
      return {
        sessionId: request.sessionId ?? request.from,
        input: request.text ?? null,
        metadata: {
          callerId: request.from,
          messageId: request.messageId,
          contactName: request.contactName,
          timestamp: request.timestamp,
          location: request.location,
          media: request.media,
        },
      };
    },

    encode(response, _context, request) {
      return {
        to: request.from,
        kind: response.kind,
        ...renderInteractive(response),
      };
    },
  };
}
