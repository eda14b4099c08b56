import type { BaseLogger } from 'pino';
import type { ChatMessage, WebhookSource } from '../../domain/index.js';

export type NotifyLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn'>;

/** Where one source's messages go. */
export interface ChatWebhookTarget {
  readonly source: WebhookSource;
  readonly webhook_url: string;
  readonly user_agent: string;
}

/**
 * Posts a chat message to a webhook URL.
 *
 * One attempt, no retry. If no URL is configured, logs a skip message.
 * Non-2xx/3xx responses and network failures are logged at warn and never
 * thrown — delivery problems are not transformation failures.
 */
export async function sendChatMessage(
  target: ChatWebhookTarget,
  log: NotifyLogger,
  message: ChatMessage,
): Promise<void> {
  if (!target.webhook_url) {
    log.debug({ source: target.source }, 'Chat notification skipped (no webhook_url)');
    return;
  }

  try {
    const response = await fetch(target.webhook_url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': target.user_agent,
      },
      body: JSON.stringify(message),
    });

    if (response.status < 400) {
      log.info(
        { source: target.source, status: response.status },
        'Chat notification sent',
      );
      return;
    }

    const text = await response.text().catch(() => '');
    log.warn(
      { source: target.source, status: response.status, response: text, message },
      'Chat webhook returned error status',
    );
  } catch (err: unknown) {
    log.warn({ err, source: target.source }, 'Failed to send chat notification');
  }
}
