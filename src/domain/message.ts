/**
 * Canonical chat-notification model.
 *
 * Every inbound webhook, whatever its source, is rendered into this one
 * shape before delivery. The types carry no framework dependencies and
 * serialize directly into a chat webhook request body.
 */

/** A labeled key/value row rendered inside an embed. */
export interface EmbedField {
  readonly name: string;
  readonly value: string;
  readonly inline: true;
}

/** The structured block (author/title/link/description/fields) of a message. */
export interface Embed {
  readonly author: { readonly name: string };
  readonly title: string;
  readonly url: string;
  readonly description: string;
  /** Omitted entirely when there is nothing to show — never an empty list. */
  readonly fields?: readonly EmbedField[];
}

/**
 * The document handed to the delivery channel.
 *
 * `embeds` always holds exactly one embed.
 */
export interface ChatMessage {
  readonly username: string;
  readonly content: string;
  readonly embeds: readonly [Embed];
}

/**
 * The capability record every event variant supplies.
 *
 * `content` is optional: when a variant has no fixed headline the
 * source-wide default is used instead.
 */
export interface MessageParts {
  readonly content?: string;
  readonly author: string;
  readonly title: string;
  readonly url: string;
  readonly description: string;
  readonly fields: readonly EmbedField[];
}

/** The webhook sources this relay understands. */
export type WebhookSource = 'backlog' | 'kibela';

/**
 * Result of transforming one inbound payload.
 *
 * `notify === false` is the acknowledge-only outcome for connectivity
 * pings: the request succeeded but nothing should be posted.
 */
export type TransformResult =
  | { readonly notify: true; readonly message: ChatMessage }
  | { readonly notify: false; readonly reason: 'connectivity-test' };
