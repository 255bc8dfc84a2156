import { z } from 'zod';

import { InvalidRequestError } from '../errors';
import type { ChatRequest } from '../transports/chat';
import type { UssdRequest } from '../transports/ussd';

const ussdRequestSchema = z.object({
  USERID: z.string().min(1),
  MSISDN: z.string().min(1),
  USERDATA: z.string().nullish(),
  MSGTYPE: z.boolean().optional(),
});

const mediaSchema = z.object({
  type: z.enum(['image', 'document', 'audio', 'video', 'sticker']).optional(),
  url: z.string().url(),
  filename: z.string().optional(),
  mimeType: z.string().optional(),
});

const chatRequestSchema = z.object({
  sessionId: z.string().min(1).optional(),
  from: z.string().min(1),
  text: z.string().nullish(),
  messageId: z.string().optional(),
  contactName: z.string().optional(),
  timestamp: z.string().optional(),
  location: z
    .object({
      latitude: z.number(),
      longitude: z.number(),
      name: z.string().optional(),
      address: z.string().optional(),
    })
    .optional(),
  media: mediaSchema.optional(),
});

/**
 * Validate an inbound USSD body. Failures surface as HTTP 400 before any
 * session is touched.
 */
export function parseUssdRequest(payload: unknown): UssdRequest {
  const result = ussdRequestSchema.safeParse(payload);
  if (!result.success) {
    throw new InvalidRequestError('Invalid USSD request payload');
  }
  return result.data;
}

export function parseChatRequest(payload: unknown): ChatRequest {
  const result = chatRequestSchema.safeParse(payload);
  if (!result.success) {
    throw new InvalidRequestError('Invalid chat request payload');
  }
  return result.data;
}
