import { z } from 'zod';

import type { JsonValue, SessionValue } from '../types';

/** Everything persisted for one conversation. */
export type SessionData = Record<string, SessionValue>;

/**
 * Serialization contract between the engine and a store backend. Backends
 * store the encoded payload and never look inside it, so a store can be
 * swapped without touching the replay engine.
 */
export interface SessionCodec {
  serialize(data: SessionData): string;
  deserialize(raw: string): SessionData;
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const sessionDataSchema = z.record(jsonValueSchema);

/** Default codec: plain JSON, validated on the way back in. */
export const jsonSessionCodec: SessionCodec = {
  serialize(data) {
    return JSON.stringify(data);
  },
  deserialize(raw) {
    return sessionDataSchema.parse(JSON.parse(raw));
  },
};
