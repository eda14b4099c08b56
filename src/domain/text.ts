import type { EmbedField } from './message.js';

/** Appended to any text cut by {@link truncate}. */
export const TRUNCATION_MARKER = '（省略されました）';

/** Character budget for article, issue and comment bodies. */
export const DESCRIPTION_LIMIT = 500;

/** Character budget for the comment attached to a bulk issue update. */
export const COMMENT_LIMIT = 300;

/**
 * Cuts `text` down to `limit` characters and appends `suffix` when it was
 * longer than that; otherwise returns it untouched.
 *
 * Counts code points rather than UTF-16 units, so surrogate pairs are
 * never split.
 */
export function truncate(
  text: string,
  limit: number,
  suffix: string = TRUNCATION_MARKER,
): string {
  const chars = Array.from(text);
  if (chars.length <= limit) return text;
  return chars.slice(0, limit).join('') + suffix;
}

/** Wraps a unified diff in a fenced block so chat clients colour it. */
export function formatDiff(diff: string): string {
  return `\`\`\`diff\n${diff}\n\`\`\``;
}

/**
 * Builds an inline embed field, or `null` when there is no value to show.
 */
export function embedField(
  name: string,
  value: string | null | undefined,
): EmbedField | null {
  if (value === null || value === undefined || value === '') return null;
  return { name, value, inline: true };
}

/** Drops the absent entries produced by {@link embedField}. */
export function compactFields(
  candidates: readonly (EmbedField | null)[],
): EmbedField[] {
  return candidates.filter((f): f is EmbedField => f !== null && f.value !== '');
}
