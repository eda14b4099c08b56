import { assembleMessage } from '../assemble.js';
import type { ChatMessage } from '../message.js';
import type { BacklogEvent } from './events.js';
import { backlogMessageParts } from './parts.js';
import type { BacklogLinks } from './parts.js';

export const BACKLOG_USERNAME = 'backlog webhook';
export const BACKLOG_DEFAULT_CONTENT = '新しい更新通知なのです。';

/** Renders a parsed Backlog event into the canonical chat message. */
export function renderBacklogEvent(event: BacklogEvent, links: BacklogLinks): ChatMessage {
  return assembleMessage(
    BACKLOG_USERNAME,
    BACKLOG_DEFAULT_CONTENT,
    backlogMessageParts(event, links),
  );
}

export * from './events.js';
export {
  backlogMessageParts,
  issueFields,
  issueKey,
  issueUrl,
  milestoneUrl,
  parseInteger,
  projectUrl,
} from './parts.js';
export type { BacklogLinks } from './parts.js';
