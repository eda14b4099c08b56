import { describe, it, expect } from 'vitest';
import { assembleMessage } from '../../src/domain/assemble.js';
import type { MessageParts } from '../../src/domain/message.js';

const parts: MessageParts = {
  content: '記事が作成されました',
  author: 'bob',
  title: 'Release notes',
  url: 'https://team.kibe.la/notes/1',
  description: 'Hello',
  fields: [{ name: '記事の作成者', value: 'carol', inline: true }],
};

describe('assembleMessage', () => {
  it('builds a message with exactly one embed', () => {
    const message = assembleMessage('kibela webhook', '新しい通知です', parts);

    expect(message).toEqual({
      username: 'kibela webhook',
      content: '記事が作成されました',
      embeds: [
        {
          author: { name: 'bob' },
          title: 'Release notes',
          url: 'https://team.kibe.la/notes/1',
          description: 'Hello',
          fields: [{ name: '記事の作成者', value: 'carol', inline: true }],
        },
      ],
    });
  });

  it('falls back to the default content when the variant has none', () => {
    const { content: _content, ...rest } = parts;
    expect(assembleMessage('kibela webhook', '新しい通知です', rest).content).toBe('新しい通知です');
    expect(assembleMessage('kibela webhook', '新しい通知です', { ...rest, content: '' }).content)
      .toBe('新しい通知です');
  });

  it('omits the fields key when there are no fields', () => {
    const message = assembleMessage('u', 'c', { ...parts, fields: [] });
    expect('fields' in message.embeds[0]).toBe(false);
  });

  it('omits the fields key when every field value is empty', () => {
    const message = assembleMessage('u', 'c', {
      ...parts,
      fields: [
        { name: 'a', value: '', inline: true },
        { name: 'b', value: '', inline: true },
      ],
    });
    expect('fields' in message.embeds[0]).toBe(false);
  });

  it('keeps an empty url and description as-is', () => {
    const message = assembleMessage('u', 'c', { ...parts, url: '', description: '' });
    expect(message.embeds[0].url).toBe('');
    expect(message.embeds[0].description).toBe('');
  });
});
