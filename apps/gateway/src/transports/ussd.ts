import { randomUUID } from 'node:crypto';

import {
  renderText,
  textPlatform,
  type GatewayAdapter,
  type TurnRequest,
} from '@turnflow/core';

/** Inbound USSD request in the Nalo JSON format. */
export interface UssdRequest {
  USERID: string;
  MSISDN: string;
  USERDATA?: string | null;
  /** True on the request that opens the dial session. */
  MSGTYPE?: boolean;
}

export interface UssdReply {
  USERID: string;
  MSISDN: string;
  MSG: string;
  /** True keeps the dial session open for another reply. */
  MSGTYPE: boolean;
}

export interface UssdAdapterOptions {
  name?: string;
  /** Clock used for request timestamps. */
  now?: () => Date;
  generateId?: () => string;
}

/** Normalise an MSISDN to E.164 with a leading plus. */
export function toE164(msisdn: string): string {
  const digits = msisdn.replace(/[^\d]/g, '');
  return `+${digits}`;
}

/**
 * Transport adapter for Nalo-style USSD gateways. The dial session is keyed by
 * the operator's USERID together with the subscriber number; the USSD string
 * typed to open the session is never handed to the flow.
 */
export function createUssdAdapter(options: UssdAdapterOptions = {}): GatewayAdapter<UssdRequest, UssdReply> {
  const now = options.now ?? (() => new Date());
  const generateId = options.generateId ?? randomUUID;

  return {
    name: options.name ?? 'ussd',
    platform: textPlatform,

    decode(request): TurnRequest {
      return {
        sessionId: `${request.USERID}:${request.MSISDN}`,
        input: request.MSGTYPE ? null : request.USERDATA ?? null,
        metadata: {
          callerId: toE164(request.MSISDN),
          messageId: generateId(),
          timestamp: now().toISOString(),
        },
      };
    },

    encode(response, _context, request): UssdReply {
      return {
        USERID: request.USERID,
        MSISDN: request.MSISDN,
        MSG: renderText(response),
        MSGTYPE: response.kind === 'prompt',
      };
    },
  };
}
