import type { WebhookSource } from './message.js';

/**
 * Raised when a payload's discriminator maps to no known variant.
 *
 * `discriminator` holds the offending values as received, e.g.
 * `{ type: 99 }` or `{ resource_type: 'group', action: 'create' }`.
 */
export class UnknownEventTypeError extends Error {
  readonly source: WebhookSource;
  readonly discriminator: Readonly<Record<string, unknown>>;

  constructor(source: WebhookSource, discriminator: Readonly<Record<string, unknown>>) {
    const described = Object.entries(discriminator)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(', ');
    super(`Unknown ${source} event type: ${described}`);
    this.name = 'UnknownEventTypeError';
    this.source = source;
    this.discriminator = discriminator;
  }
}

/** One schema violation, trimmed down to what a caller can act on. */
export interface PayloadIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Raised when a structure the transformation cannot do without is absent
 * or has the wrong shape (e.g. a comment event with no article).
 */
export class MalformedPayloadError extends Error {
  readonly source: WebhookSource;
  readonly issues: readonly PayloadIssue[];

  constructor(source: WebhookSource, detail: string, issues: readonly PayloadIssue[] = []) {
    super(`Malformed ${source} payload: ${detail}`);
    this.name = 'MalformedPayloadError';
    this.source = source;
    this.issues = issues;
  }
}
