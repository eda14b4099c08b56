import { describe, it, expect } from 'vitest';
import {
  TRUNCATION_MARKER,
  compactFields,
  embedField,
  formatDiff,
  truncate,
} from '../../src/domain/text.js';

describe('truncate', () => {
  it('returns short text unchanged', () => {
    expect(truncate('abc', 5)).toBe('abc');
  });

  it('returns text of exactly the limit unchanged', () => {
    const text = 'a'.repeat(500);
    expect(truncate(text, 500)).toBe(text);
  });

  it('cuts 600 characters down to 500 plus the marker', () => {
    const result = truncate('b'.repeat(600), 500);
    expect(result).toBe('b'.repeat(500) + TRUNCATION_MARKER);
  });

  it('counts multi-byte characters, not bytes', () => {
    const text = 'あ'.repeat(501);
    expect(truncate(text, 500)).toBe('あ'.repeat(500) + '（省略されました）');
    expect(truncate('あ'.repeat(500), 500)).toBe('あ'.repeat(500));
  });

  it('never splits a surrogate pair', () => {
    expect(truncate('😀😀😀', 2, '…')).toBe('😀😀…');
    expect(truncate('😀😀', 2, '…')).toBe('😀😀');
  });

  it('is idempotent at the same limit', () => {
    const once = truncate('c'.repeat(700), 500);
    expect(truncate(once, 500)).toBe(once);
  });

  it('uses a custom suffix', () => {
    expect(truncate('abcdef', 3, '...')).toBe('abc...');
  });
});

describe('formatDiff', () => {
  it('wraps text in a diff fence', () => {
    expect(formatDiff('+a\n-b')).toBe('```diff\n+a\n-b\n```');
  });
});

describe('embedField', () => {
  it('builds an inline field', () => {
    expect(embedField('種別', 'Bug')).toEqual({ name: '種別', value: 'Bug', inline: true });
  });

  it.each([null, undefined, ''])('returns null for %s', (value) => {
    expect(embedField('種別', value)).toBeNull();
  });
});

describe('compactFields', () => {
  it('drops absent fields and keeps order', () => {
    const fields = compactFields([
      embedField('a', '1'),
      null,
      embedField('b', ''),
      embedField('c', '3'),
    ]);
    expect(fields).toEqual([
      { name: 'a', value: '1', inline: true },
      { name: 'c', value: '3', inline: true },
    ]);
  });

  it('drops fields whose value is empty even when built by hand', () => {
    expect(compactFields([{ name: 'x', value: '', inline: true }])).toEqual([]);
  });
});
