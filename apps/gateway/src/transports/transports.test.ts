import {
  InMemorySessionStore,
  Processor,
  createEngineConfig,
  textPlatform,
  type ConversationContext,
} from '@turnflow/core';
import { describe, expect, it } from 'vitest';

import { RegistrationFlow } from '../flows/demo-flow';

import { createChatAdapter } from './chat';
import { createUssdAdapter, toE164 } from './ussd';

const context: ConversationContext = {
  sessionId: 'abc:233200000000',
  gateway: 'ussd',
  platform: textPlatform,
  metadata: {},
  flow: { name: 'Test', action: 'main', start: () => undefined },
  input: null,
  state: {},
};

describe('createUssdAdapter', () => {
  const adapter = createUssdAdapter({
    now: () => new Date('2026-03-01T10:30:00Z'),
    generateId: () => 'msg-1',
  });

  it('decodes a continuing request', () => {
    expect(adapter.decode({ USERID: 'abc', MSISDN: '233200000000', USERDATA: '2', MSGTYPE: false })).toEqual({
      sessionId: 'abc:233200000000',
      input: '2',
      metadata: { callerId: '+233200000000', messageId: 'msg-1', timestamp: '2026-03-01T10:30:00.000Z' },
    });
  });

  it('ignores the dial string on the opening request', () => {
    expect(adapter.decode({ USERID: 'abc', MSISDN: '233200000000', USERDATA: '*920*1#', MSGTYPE: true }).input).toBeNull();
  });

  it('renders choices as text and keeps prompts open', () => {
    const reply = adapter.encode(
      { kind: 'prompt', message: 'Color?', choices: [{ key: '1', label: 'Red' }] },
      context,
      { USERID: 'abc', MSISDN: '233200000000' },
    );

    expect(reply).toEqual({ USERID: 'abc', MSISDN: '233200000000', MSG: 'Color?\n\n1. Red', MSGTYPE: true });
  });

  it('closes the dial session on a terminal response', () => {
    const reply = adapter.encode({ kind: 'terminal', message: 'Bye' }, context, {
      USERID: 'abc',
      MSISDN: '233200000000',
    });

    expect(reply.MSGTYPE).toBe(false);
  });

  it('normalises phone numbers', () => {
    expect(toE164('233 20 000 0000')).toBe('+233200000000');
    expect(toE164('+233200000000')).toBe('+233200000000');
  });
});

describe('createChatAdapter', () => {
  const adapter = createChatAdapter();

  it('keys the conversation by sender unless a session id is given', () => {
    expect(adapter.decode({ from: '15550001111', text: 'hi' }).sessionId).toBe('15550001111');
    expect(adapter.decode({ from: '15550001111', sessionId: 'thread-9' }).sessionId).toBe('thread-9');
  });

  it('passes request details through as metadata', () => {
    const turn = adapter.decode({
      from: '15550001111',
      text: 'hello',
      messageId: 'wamid.1',
      contactName: 'Ada',
      location: { latitude: 5.6, longitude: -0.2 },
    });

    expect(turn.input).toBe('hello');
    expect(turn.metadata).toMatchObject({
      callerId: '15550001111',
      messageId: 'wamid.1',
      contactName: 'Ada',
      location: { latitude: 5.6, longitude: -0.2 },
    });
  });

  it('renders choices as buttons', () => {
    const reply = adapter.encode(
      {
        kind: 'prompt',
        message: 'Continue?',
        choices: [
          { key: 'yes', label: 'Yes' },
          { key: 'no', label: 'No' },
        ],
      },
      context,
      { from: '15550001111' },
    );

    expect(reply).toEqual({
      to: '15550001111',
      kind: 'prompt',
      text: 'Continue?',
      buttons: [
        { id: 'yes', title: 'Yes' },
        { id: 'no', title: 'No' },
      ],
    });
  });
});

describe('registration flow over USSD', () => {
  it('walks through the flow with paginated menus', async () => {
    const processor = new Processor({
      gateway: createUssdAdapter({ generateId: () => 'msg-1' }),
      store: new InMemorySessionStore(),
      config: createEngineConfig(),
    });
    const dial = (USERDATA: string, MSGTYPE = false) =>
      processor.run(RegistrationFlow, 'start', { USERID: 'abc', MSISDN: '233200000000', USERDATA, MSGTYPE });

    const opening = await dial('*920#', true);
    expect(opening).toEqual({
      USERID: 'abc',
      MSISDN: '233200000000',
      MSG: 'Welcome! What is your name?',
      MSGTYPE: true,
    });

    const age = await dial('Ada');
    expect(age.MSG).toBe('How old are you, Ada?');

    const tooYoung = await dial('12');
    expect(tooYoung.MSG).toBe('You must be at least 16 to register.\n\nHow old are you, Ada?');
  });
});
