import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { sendChatMessage } from '../../src/infrastructure/notifications/chat-webhook.js';
import type { ChatWebhookTarget } from '../../src/infrastructure/notifications/chat-webhook.js';
import type { ChatMessage } from '../../src/domain/message.js';
import { fakeLogger } from '../helpers.js';

const sampleMessage: ChatMessage = {
  username: 'backlog webhook',
  content: '課題を作成しました',
  embeds: [
    {
      author: { name: 'alice' },
      title: 'Bug',
      url: 'https://example.backlog.jp/view/DEV-42',
      description: '説明なし',
    },
  ],
};

const target: ChatWebhookTarget = {
  source: 'backlog',
  webhook_url: 'https://chat.example.com/api/webhooks/test',
  user_agent: 'relay-test/1.0',
};

describe('sendChatMessage', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
    vi.restoreAllMocks();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('logs skip when no webhook_url is configured', async () => {
    const mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);

    await sendChatMessage({ ...target, webhook_url: '' }, log, sampleMessage);

    expect(mockFetch).not.toHaveBeenCalled();
    expect(log.debug).toHaveBeenCalledWith(
      { source: 'backlog' },
      'Chat notification skipped (no webhook_url)',
    );
  });

  it('posts the message as JSON with the configured user agent', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ status: 204 });
    vi.stubGlobal('fetch', mockFetch);

    await sendChatMessage(target, log, sampleMessage);

    expect(mockFetch).toHaveBeenCalledOnce();
    expect(mockFetch).toHaveBeenCalledWith('https://chat.example.com/api/webhooks/test', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'relay-test/1.0',
      },
      body: JSON.stringify(sampleMessage),
    });
    expect(log.info).toHaveBeenCalledWith(
      { source: 'backlog', status: 204 },
      'Chat notification sent',
    );
  });

  it('logs the response body on an error status without throwing', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({
      status: 400,
      text: vi.fn().mockResolvedValue('{"message": "Invalid Form Body"}'),
    }));

    await sendChatMessage(target, log, sampleMessage);

    expect(log.warn).toHaveBeenCalledWith(
      {
        source: 'backlog',
        status: 400,
        response: '{"message": "Invalid Form Body"}',
        message: sampleMessage,
      },
      'Chat webhook returned error status',
    );
    expect(log.info).not.toHaveBeenCalled();
  });

  it('handles fetch failure gracefully', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('Network error')));

    await sendChatMessage(target, log, sampleMessage);

    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error), source: 'backlog' }),
      'Failed to send chat notification',
    );
  });
});
