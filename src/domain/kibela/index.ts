import { assembleMessage } from '../assemble.js';
import type { ChatMessage } from '../message.js';
import type { KibelaEvent } from './events.js';
import { kibelaMessageParts } from './parts.js';

export const KIBELA_USERNAME = 'kibela webhook';
export const KIBELA_DEFAULT_CONTENT = '新しい通知です';

/** Renders a parsed Kibela event into the canonical chat message. */
export function renderKibelaEvent(event: KibelaEvent): ChatMessage {
  return assembleMessage(KIBELA_USERNAME, KIBELA_DEFAULT_CONTENT, kibelaMessageParts(event));
}

export * from './events.js';
export { KIBELA_VARIANTS, kibelaMessageParts, resolveArticleAuthors } from './parts.js';
