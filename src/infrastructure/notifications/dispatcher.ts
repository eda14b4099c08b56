import type { ChatMessage, WebhookSource } from '../../domain/index.js';
import type { RelayConfig } from './config.js';
import { sendChatMessage } from './chat-webhook.js';
import type { ChatWebhookTarget, NotifyLogger } from './chat-webhook.js';

/** Hands a finished message to delivery without waiting for it. */
export type MessageDispatcher = (source: WebhookSource, message: ChatMessage) => void;

export function targetFor(config: RelayConfig, source: WebhookSource): ChatWebhookTarget {
  return {
    source,
    webhook_url: source === 'backlog' ? config.backlog.webhook_url : config.kibela.webhook_url,
    user_agent: config.delivery.user_agent,
  };
}

/**
 * Creates the fire-and-forget delivery function for both sources.
 *
 * The request handler never awaits delivery; anything that escapes
 * sendChatMessage is logged here.
 */
export function createMessageDispatcher(
  config: RelayConfig,
  log: NotifyLogger,
): MessageDispatcher {
  return (source: WebhookSource, message: ChatMessage): void => {
    void sendChatMessage(targetFor(config, source), log, message).catch((err: unknown) => {
      log.warn({ err, source }, 'Chat dispatch failed');
    });
  };
}
