export type {
  ChatMessage,
  Embed,
  EmbedField,
  MessageParts,
  TransformResult,
  WebhookSource,
} from './message.js';
export { assembleMessage } from './assemble.js';
export {
  COMMENT_LIMIT,
  DESCRIPTION_LIMIT,
  TRUNCATION_MARKER,
  compactFields,
  embedField,
  formatDiff,
  truncate,
} from './text.js';
export { MalformedPayloadError, UnknownEventTypeError } from './errors.js';
export type { PayloadIssue } from './errors.js';
