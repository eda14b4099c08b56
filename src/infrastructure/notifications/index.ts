export { loadRelayConfig, DEFAULT_CONFIG } from './config.js';
export type { RelayConfig } from './config.js';
export { sendChatMessage } from './chat-webhook.js';
export type { ChatWebhookTarget, NotifyLogger } from './chat-webhook.js';
export { createMessageDispatcher, targetFor } from './dispatcher.js';
export type { MessageDispatcher } from './dispatcher.js';
