import { describe, expect, it, vi } from 'vitest';

import { FlowDefinitionError } from '../src/errors';
import { FlowApp, STARTED_AT_KEY } from '../src/flow/app';
import { interactivePlatform } from '../src/flow/platform';
import { FlowInterrupt, type Signal } from '../src/signals';
import { createTestContext } from './helpers';

function signalOf(fn: () => unknown): Signal {
  try {
    fn();
  } catch (error) {
    if (error instanceof FlowInterrupt) {
      return error.signal;
    }
    throw error;
  }
  throw new Error('expected a flow interrupt');
}

describe('FlowApp.screen', () => {
  it('prompts with the question when there is no input', async () => {
    const app = new FlowApp(await createTestContext());

    expect(signalOf(() => app.screen('name', (prompt) => prompt.ask('Name?')))).toEqual({
      kind: 'prompt',
      message: 'Name?',
    });
  });

  it('stores the answer and serves it without running the builder again', async () => {
    const context = await createTestContext({ input: 'Ada' });
    const first = new FlowApp(context);
    expect(first.screen('name', (prompt) => prompt.ask('Name?'))).toBe('Ada');
    expect(context.session?.get('name')).toBe('Ada');

    const builder = vi.fn(() => 'other');
    const replay = new FlowApp(context);
    expect(replay.screen('name', builder)).toBe('Ada');
    expect(builder).not.toHaveBeenCalled();
  });

  it('hands the input to the first unanswered screen only', async () => {
    const context = await createTestContext({ input: 'Ada' });
    const app = new FlowApp(context);

    expect(app.screen('name', (prompt) => prompt.ask('Name?'))).toBe('Ada');
    expect(app.input).toBeNull();
    expect(signalOf(() => app.screen('city', (prompt) => prompt.ask('City?')))).toEqual({
      kind: 'prompt',
      message: 'City?',
    });
  });

  it('rejects a key presented twice in one replay', async () => {
    const context = await createTestContext({ input: 'Ada' });
    const app = new FlowApp(context);
    app.screen('name', (prompt) => prompt.ask('Name?'));

    expect(() => app.screen('name', (prompt) => prompt.ask('Name again?'))).toThrow(FlowDefinitionError);
  });

  it('rejects a builder that returns nothing', async () => {
    const app = new FlowApp(await createTestContext({ input: 'x' }));

    expect(() => app.screen('broken', () => undefined as unknown as string)).toThrow(
      'screen "broken" builder returned no value',
    );
  });

  it('lets interrupts from nested calls reach the caller', async () => {
    const app = new FlowApp(await createTestContext());
    let resumed = false;
    const askAge = () => {
      const age = app.screen('age', (prompt) => prompt.ask('Age?', { convert: Number }));
      resumed = true;
      return age;
    };
    const wrapper = () => [askAge()];

    expect(signalOf(wrapper)).toEqual({ kind: 'prompt', message: 'Age?' });
    expect(resumed).toBe(false);
  });

  it('ends the conversation through say', async () => {
    const app = new FlowApp(await createTestContext());

    expect(signalOf(() => app.say('Goodbye'))).toEqual({ kind: 'terminate', message: 'Goodbye' });
  });

  it('exposes request metadata', async () => {
    const app = new FlowApp(
      await createTestContext({ metadata: { callerId: '233200000000', messageId: 'm-1', contactName: 'Ada' } }),
    );

    expect(app.callerId).toBe('233200000000');
    expect(app.messageId).toBe('m-1');
    expect(app.contactName).toBe('Ada');
    expect(app.gateway).toBe('test');
  });
});

describe('FlowApp.goBack', () => {
  it('returns false before any screen is touched', async () => {
    const app = new FlowApp(await createTestContext());

    expect(app.goBack()).toBe(false);
  });

  it('forgets only the last answer and requests a restart', async () => {
    const context = await createTestContext({ input: 'y' });
    context.session?.set('a', 'x');
    const app = new FlowApp(context);
    expect(app.screen('a', (prompt) => prompt.ask('A?'))).toBe('x');
    expect(app.screen('b', (prompt) => prompt.ask('B?'))).toBe('y');

    expect(signalOf(() => app.goBack())).toEqual({ kind: 'restart' });
    expect(context.session?.get('a')).toBe('x');
    expect(context.session?.has('b')).toBe(false);
  });

  it('drops unconsumed input so the rewound screen asks again', async () => {
    const context = await createTestContext({ input: 'back' });
    context.session?.set('city', 'Accra');
    const app = new FlowApp(context);
    app.screen('city', (prompt) => prompt.ask('City?'));

    expect(app.input).toBe('back');
    expect(signalOf(() => app.goBack())).toEqual({ kind: 'restart' });
    expect(app.input).toBeNull();
  });
});

describe('opening input on interactive platforms', () => {
  it('discards the first message and marks the conversation as started', async () => {
    const context = await createTestContext({ input: 'hi', platform: interactivePlatform });
    const app = new FlowApp(context);

    expect(app.input).toBeNull();
    expect(typeof context.session?.get(STARTED_AT_KEY)).toBe('string');
  });

  it('keeps input once the conversation has started', async () => {
    const context = await createTestContext({ input: 'hi', platform: interactivePlatform });
    context.session?.set(STARTED_AT_KEY, '2026-01-01T00:00:00.000Z');

    expect(new FlowApp(context).input).toBe('hi');
  });
});
