import type { Message, MessageContent } from '../services/assistants/messages.js';

export type LineWriter = (text: string) => void;

function contentText(part: MessageContent): string {
  switch (part.type) {
    case 'text':
      return part.text.value;
    case 'image_file':
      return `[image file ${part.image_file.file_id}]`;
    case 'image_url':
      return `[image ${part.image_url.url}]`;
  }
}

export function messageText(message: Message): string {
  return message.content.map(contentText).join('\n');
}

/** `# Messages` followed by one `role: text` line per message, in the order given. */
export function formatMessages(messages: readonly Message[]): string {
  const lines = ['# Messages', ...messages.map((m) => `${m.role}: ${messageText(m)}`)];
  return `${lines.join('\n')}\n`;
}

export function prettyPrint(messages: readonly Message[], write: LineWriter = console.log): void {
  write(formatMessages(messages));
}

export function formatJson(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  return JSON.stringify(value, null, 2);
}

export function showJson(value: unknown, write: LineWriter = console.log): void {
  write(formatJson(value));
}
