import type { Choice, FlowResponse, MediaDescriptor, MediaType } from './types';

const MEDIA_LABELS: Record<MediaType, string> = {
  image: '📷 Image',
  document: '📄 Document',
  audio: '🎵 Audio',
  video: '🎥 Video',
  sticker: '😊 Sticker',
};

/** One-line text stand-in for media on transports that cannot carry it. */
export function describeMedia(media: MediaDescriptor): string {
  return `${MEDIA_LABELS[media.type ?? 'image']}: ${media.url}`;
}

export function renderChoiceList(choices: readonly Choice[]): string {
  return choices.map((choice) => `${choice.key}. ${choice.label}`).join('\n');
}

/**
 * Flatten a response into plain text: the message, then the choice list,
 * then the media descriptor, separated by blank lines.
 */
export function renderText(response: Pick<FlowResponse, 'message' | 'choices' | 'media'>): string {
  const parts = [
    response.message,
    response.choices && response.choices.length > 0 ? renderChoiceList(response.choices) : '',
    response.media ? describeMedia(response.media) : '',
  ];

  return parts.filter((part) => part.length > 0).join('\n\n');
}

export interface ChatButton {
  id: string;
  title: string;
}

export interface ChatListRow {
  id: string;
  title: string;
  description?: string;
}

export interface ChatListSection {
  title: string;
  rows: ChatListRow[];
}

/** Reply shape for transports with native buttons and lists. */
export interface InteractiveMessage {
  text: string;
  media?: MediaDescriptor;
  buttons?: ChatButton[];
  sections?: ChatListSection[];
}

export const MAX_INLINE_BUTTONS = 3;
const BUTTON_TITLE_LIMIT = 20;
const ROW_TITLE_LIMIT = 24;
const ROW_DESCRIPTION_LIMIT = 72;
const ROWS_PER_SECTION = 10;

/**
 * Present a response on a rich chat transport: up to three choices become
 * buttons, more than that a list split into sections of ten rows.
 */
export function renderInteractive(response: FlowResponse): InteractiveMessage {
  const message: InteractiveMessage = { text: response.message };

  if (response.media) {
    message.media = response.media;
  }

  const choices = response.choices ?? [];
  if (choices.length === 0) {
    return message;
  }

  if (choices.length <= MAX_INLINE_BUTTONS) {
    message.buttons = choices.map((choice) => ({
      id: choice.key,
      title: truncate(choice.label, BUTTON_TITLE_LIMIT),
    }));
    return message;
  }

  const rows = choices.map((choice): ChatListRow => {
    const row: ChatListRow = { id: choice.key, title: truncate(choice.label, ROW_TITLE_LIMIT) };
    if (choice.label.length > ROW_TITLE_LIMIT) {
      row.description = truncate(choice.label, ROW_DESCRIPTION_LIMIT);
    }
    return row;
  });

  if (rows.length <= ROWS_PER_SECTION) {
    message.sections = [{ title: 'Options', rows }];
    return message;
  }

  message.sections = [];
  for (let offset = 0; offset < rows.length; offset += ROWS_PER_SECTION) {
    const sectionRows = rows.slice(offset, offset + ROWS_PER_SECTION);
    message.sections.push({
      title: `${offset + 1}-${offset + sectionRows.length}`,
      rows: sectionRows,
    });
  }

  return message;
}

function truncate(text: string, length: number): string {
  if (text.length <= length) {
    return text;
  }
  return `${text.slice(0, length - 3)}...`;
}
