import type { ChatMessage, MessageParts } from './message.js';
import { compactFields } from './text.js';

/**
 * Canonical message assembler.
 *
 * Pure function — the same parts always yield the same message. The
 * `fields` key is only attached when at least one field with a non-empty
 * value survives filtering.
 */
export function assembleMessage(
  username: string,
  defaultContent: string,
  parts: MessageParts,
): ChatMessage {
  const fields = compactFields(parts.fields);

  return {
    username,
    content: parts.content || defaultContent,
    embeds: [
      {
        author: { name: parts.author },
        title: parts.title,
        url: parts.url,
        description: parts.description,
        ...(fields.length > 0 ? { fields } : {}),
      },
    ],
  };
}
