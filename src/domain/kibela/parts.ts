import type { MessageParts } from '../message.js';
import {
  DESCRIPTION_LIMIT,
  compactFields,
  embedField,
  formatDiff,
  truncate,
} from '../text.js';
import type {
  KibelaAction,
  KibelaAuthored,
  KibelaEvent,
  KibelaResource,
} from './events.js';

/** How a variant fills the embed description. */
type DescriptionSource = 'markdown' | 'diff' | 'none';

interface KibelaVariant {
  readonly content: string;
  readonly description: DescriptionSource;
}

/**
 * Dispatch table: resource first, then action. Comments have no diff in
 * Kibela's payload, so their updates show the full markdown.
 */
export const KIBELA_VARIANTS: Readonly<Record<KibelaResource, Readonly<Record<KibelaAction, KibelaVariant>>>> = {
  blog: {
    create: { content: '記事が作成されました', description: 'markdown' },
    update: { content: '記事が更新されました', description: 'diff' },
    delete: { content: '記事が削除されました', description: 'none' },
  },
  wiki: {
    create: { content: '記事が作成されました', description: 'markdown' },
    update: { content: '記事が更新されました', description: 'diff' },
    delete: { content: '記事が削除されました', description: 'none' },
  },
  comment: {
    create: { content: 'コメントが付きました', description: 'markdown' },
    update: { content: 'コメントが更新されました', description: 'markdown' },
    delete: { content: 'コメントが削除されました', description: 'none' },
  },
  comment_reply: {
    create: { content: 'コメントが付きました', description: 'markdown' },
    update: { content: 'コメントが更新されました', description: 'markdown' },
    delete: { content: 'コメントが削除されました', description: 'none' },
  },
};

/**
 * Normalizes the article author(s) into one display string.
 *
 * `author` wins over `authors`; a list becomes `"a, b"`. Returns `''` when
 * neither key is present.
 */
export function resolveArticleAuthors(article: KibelaAuthored): string {
  if (article.author !== undefined && article.author !== null) {
    return article.author.account ?? '';
  }
  if (article.authors !== undefined && article.authors !== null) {
    return article.authors
      .map((author) => author.account ?? '')
      .filter((account) => account !== '')
      .join(', ');
  }
  return '';
}

function descriptionFor(
  source: DescriptionSource,
  markdown: string | null | undefined,
  diff: string | null | undefined,
): string {
  switch (source) {
    case 'markdown':
      return truncate(markdown ?? '', DESCRIPTION_LIMIT);
    case 'diff':
      return formatDiff(truncate(diff ?? '', DESCRIPTION_LIMIT));
    case 'none':
      return '';
  }
}

/**
 * Extracts the message capabilities from a Kibela event.
 *
 * Comment events keep the comment's and the article's titles apart; the
 * embed shows the comment's own title and link, and only borrows the
 * article title when the comment has none.
 */
export function kibelaMessageParts(event: KibelaEvent): MessageParts {
  const variant = KIBELA_VARIANTS[event.resource][event.action];
  const author = event.actionUser?.account ?? '';
  const articleAuthors = resolveArticleAuthors(event.article);
  const fields = compactFields([embedField('記事の作成者', articleAuthors)]);

  if (event.kind === 'article') {
    const { article } = event;
    return {
      content: variant.content,
      author,
      title: article.title ?? '',
      url: article.url ?? '',
      description: descriptionFor(variant.description, article.content_md, article.content_diff),
      fields,
    };
  }

  const { comment } = event;
  return {
    content: variant.content,
    author,
    title: comment.title || event.article.title || '',
    url: comment.url ?? '',
    description: descriptionFor(variant.description, comment.content_md, null),
    fields,
  };
}
