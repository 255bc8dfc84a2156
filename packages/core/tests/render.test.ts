import { describe, expect, it } from 'vitest';

import { describeMedia, renderInteractive, renderText } from '../src/render';

describe('renderText', () => {
  it('puts the message, choices and media on separate blocks', () => {
    const text = renderText({
      message: 'Pick a color',
      choices: [
        { key: '1', label: 'Red' },
        { key: '2', label: 'Blue' },
      ],
      media: { type: 'document', url: 'https://example.test/menu.pdf' },
    });

    expect(text).toBe('Pick a color\n\n1. Red\n2. Blue\n\n📄 Document: https://example.test/menu.pdf');
  });

  it('returns the message alone when nothing else is attached', () => {
    expect(renderText({ message: 'Hello', choices: [] })).toBe('Hello');
  });

  it('describes untyped media as an image', () => {
    expect(describeMedia({ url: 'https://example.test/a.png' })).toBe('📷 Image: https://example.test/a.png');
  });
});

describe('renderInteractive', () => {
  it('uses buttons for up to three choices', () => {
    const message = renderInteractive({
      kind: 'prompt',
      message: 'Continue?',
      choices: [
        { key: 'yes', label: 'Yes' },
        { key: 'later', label: 'Remind me tomorrow morning please' },
      ],
    });

    expect(message).toEqual({
      text: 'Continue?',
      buttons: [
        { id: 'yes', title: 'Yes' },
        { id: 'later', title: 'Remind me tomorro...' },
      ],
    });
  });

  it('uses a single list section for up to ten choices', () => {
    const choices = ['A', 'B', 'C', 'D'].map((label) => ({ key: label.toLowerCase(), label }));
    const message = renderInteractive({ kind: 'prompt', message: 'Pick', choices });

    expect(message.buttons).toBeUndefined();
    expect(message.sections).toEqual([
      {
        title: 'Options',
        rows: [
          { id: 'a', title: 'A' },
          { id: 'b', title: 'B' },
          { id: 'c', title: 'C' },
          { id: 'd', title: 'D' },
        ],
      },
    ]);
  });

  it('splits long lists into numbered sections', () => {
    const choices = Array.from({ length: 23 }, (_, index) => ({ key: `k${index + 1}`, label: `Item ${index + 1}` }));
    const message = renderInteractive({ kind: 'prompt', message: 'Pick', choices });

    expect(message.sections?.map((section) => [section.title, section.rows.length])).toEqual([
      ['1-10', 10],
      ['11-20', 10],
      ['21-23', 3],
    ]);
  });

  it('adds a description for row titles that do not fit', () => {
    const label = 'A very long option label that goes on';
    const message = renderInteractive({
      kind: 'prompt',
      message: 'Pick',
      choices: ['a', 'b', 'c', 'd'].map((key) => ({ key, label })),
    });

    expect(message.sections?.[0]?.rows[0]).toEqual({
      id: 'a',
      title: 'A very long option la...',
      description: label,
    });
  });

  it('keeps media and omits choices for plain messages', () => {
    expect(
      renderInteractive({ kind: 'terminal', message: 'Done', media: { type: 'image', url: 'https://example.test/x.png' } }),
    ).toEqual({ text: 'Done', media: { type: 'image', url: 'https://example.test/x.png' } });
  });
});
