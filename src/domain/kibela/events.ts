/**
 * Kibela outgoing-webhook event model.
 *
 * Kibela identifies an event by the `(resource_type, action)` pair. Blogs
 * and wikis share one article shape; comments and comment replies share a
 * comment shape that always nests the article it belongs to.
 */

export type KibelaResource = 'blog' | 'wiki' | 'comment' | 'comment_reply';
export type KibelaAction = 'create' | 'update' | 'delete';

export const KIBELA_RESOURCES: readonly KibelaResource[] = ['blog', 'wiki', 'comment', 'comment_reply'];
export const KIBELA_ACTIONS: readonly KibelaAction[] = ['create', 'update', 'delete'];

export interface KibelaUser {
  readonly account?: string | null;
}

/**
 * Kibela documents both `author` and `authors` on articles; either may be
 * present depending on the event.
 */
export interface KibelaAuthored {
  readonly author?: KibelaUser | null;
  readonly authors?: readonly KibelaUser[] | null;
}

export interface KibelaArticle extends KibelaAuthored {
  readonly title?: string | null;
  readonly url?: string | null;
  readonly content_md?: string | null;
  readonly content_diff?: string | null;
}

/** The article a comment belongs to, kept apart from the comment's own data. */
export interface KibelaArticleRef extends KibelaAuthored {
  readonly title?: string | null;
  readonly url?: string | null;
}

export interface KibelaComment {
  readonly title?: string | null;
  readonly url?: string | null;
  readonly content_md?: string | null;
}

export interface KibelaArticleEvent {
  readonly kind: 'article';
  readonly resource: 'blog' | 'wiki';
  readonly action: KibelaAction;
  readonly actionUser?: KibelaUser | null;
  readonly article: KibelaArticle;
}

export interface KibelaCommentEvent {
  readonly kind: 'comment';
  readonly resource: 'comment' | 'comment_reply';
  readonly action: KibelaAction;
  readonly actionUser?: KibelaUser | null;
  readonly comment: KibelaComment;
  readonly article: KibelaArticleRef;
}

export type KibelaEvent = KibelaArticleEvent | KibelaCommentEvent;

export function isKibelaResource(value: string): value is KibelaResource {
  return KIBELA_RESOURCES.some((resource) => resource === value);
}

export function isKibelaAction(value: string): value is KibelaAction {
  return KIBELA_ACTIONS.some((action) => action === value);
}

/** `send`/`test` is the ping Kibela fires when a webhook is saved. */
export function isConnectivityTest(resourceType: string, action: string): boolean {
  return action === 'send' && resourceType === 'test';
}

/** Returned instead of an event for the connectivity ping. */
export interface KibelaConnectivityTest {
  readonly kind: 'connectivity-test';
}

export type KibelaInbound = KibelaEvent | KibelaConnectivityTest;
