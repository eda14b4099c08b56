import type { BaseLogger } from 'pino';
import type { z } from 'zod';
import {
  MalformedPayloadError,
  UnknownEventTypeError,
} from '../domain/index.js';
import type { PayloadIssue, TransformResult, WebhookSource } from '../domain/index.js';
import { backlogEventKind, renderBacklogEvent } from '../domain/backlog/index.js';
import type { BacklogEvent, BacklogLinks } from '../domain/backlog/index.js';
import {
  isConnectivityTest,
  isKibelaAction,
  isKibelaResource,
  renderKibelaEvent,
} from '../domain/kibela/index.js';
import type { KibelaInbound } from '../domain/kibela/index.js';
import {
  backlogBulkUpdateContentSchema,
  backlogDiscriminatorSchema,
  backlogEnvelopeSchema,
  backlogIssueContentSchema,
  backlogMilestoneContentSchema,
  kibelaArticleSchema,
  kibelaCommentSchema,
  kibelaDiscriminatorSchema,
  kibelaEnvelopeSchema,
  webhookBodySchema,
} from './payload-schema.js';

/** Logger surface the dispatcher needs — satisfied by pino and Fastify's logger. */
export type DispatchLogger = Pick<BaseLogger, 'warn'>;

/** Read-only collaborators injected per call. */
export interface TransformContext {
  readonly links: BacklogLinks;
  readonly log: DispatchLogger;
}

function toIssues(error: z.ZodError): PayloadIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function parseOrThrow<S extends z.ZodTypeAny>(
  source: WebhookSource,
  schema: S,
  value: unknown,
  detail: string,
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedPayloadError(source, detail, toIssues(parsed.error));
  }
  return parsed.data;
}

// ─── Backlog ─────────────────────────────────────────────────

/**
 * Validates a Backlog payload and narrows it to its event variant.
 *
 * Throws UnknownEventTypeError for unmapped `type` codes and
 * MalformedPayloadError when the structure the variant reads is missing.
 */
export function readBacklogEvent(payload: unknown): BacklogEvent {
  const body = parseOrThrow('backlog', webhookBodySchema, payload, 'body must be a JSON object');
  const { type } = parseOrThrow('backlog', backlogDiscriminatorSchema, body, 'missing integer "type"');

  const kind = backlogEventKind(type);
  if (kind === undefined) {
    throw new UnknownEventTypeError('backlog', { type });
  }

  const envelope = parseOrThrow('backlog', backlogEnvelopeSchema, body, 'missing "content"');
  const base = { project: envelope.project, createdUser: envelope.createdUser };

  switch (kind) {
    case 'issue-created':
    case 'issue-updated':
    case 'issue-deleted':
    case 'comment-added':
      return {
        kind,
        ...base,
        content: parseOrThrow('backlog', backlogIssueContentSchema, envelope.content, 'invalid issue content'),
      };

    case 'milestone-created':
    case 'milestone-updated':
    case 'milestone-deleted':
      return {
        kind,
        ...base,
        content: parseOrThrow('backlog', backlogMilestoneContentSchema, envelope.content, 'invalid milestone content'),
      };

    case 'issues-bulk-updated':
      return {
        kind,
        ...base,
        content: parseOrThrow('backlog', backlogBulkUpdateContentSchema, envelope.content, 'invalid bulk update content'),
      };
  }
}

// ─── Kibela ──────────────────────────────────────────────────

/**
 * Validates a Kibela payload and narrows it to its event variant, or to
 * the connectivity-test marker for the `send`/`test` ping.
 */
export function readKibelaEvent(payload: unknown): KibelaInbound {
  const body = parseOrThrow('kibela', webhookBodySchema, payload, 'body must be a JSON object');
  const { resource_type, action } = parseOrThrow(
    'kibela',
    kibelaDiscriminatorSchema,
    body,
    'missing "resource_type" or "action"',
  );

  if (isConnectivityTest(resource_type, action)) {
    return { kind: 'connectivity-test' };
  }

  if (!isKibelaResource(resource_type) || !isKibelaAction(action)) {
    throw new UnknownEventTypeError('kibela', { resource_type, action });
  }

  const { action_user: actionUser } = parseOrThrow('kibela', kibelaEnvelopeSchema, body, 'invalid "action_user"');
  const resource = body[resource_type];

  if (resource_type === 'blog' || resource_type === 'wiki') {
    const article = parseOrThrow('kibela', kibelaArticleSchema, resource, `missing "${resource_type}" object`);
    return { kind: 'article', resource: resource_type, action, actionUser, article };
  }

  const comment = parseOrThrow('kibela', kibelaCommentSchema, resource, `missing "${resource_type}" object`);
  const article = comment.blog ?? comment.wiki;
  if (article === null || article === undefined) {
    throw new MalformedPayloadError('kibela', `"${resource_type}" has no "blog" or "wiki" article`);
  }

  return {
    kind: 'comment',
    resource: resource_type,
    action,
    actionUser,
    comment: { title: comment.title, url: comment.url, content_md: comment.content_md },
    article,
  };
}

// ─── Dispatch ────────────────────────────────────────────────

/** Best-effort copy of the discriminator fields, for diagnostics only. */
function discriminatorOf(source: WebhookSource, payload: unknown): Record<string, unknown> {
  const body = webhookBodySchema.safeParse(payload);
  if (!body.success) return {};
  return source === 'backlog'
    ? { type: body.data['type'] }
    : { resource_type: body.data['resource_type'], action: body.data['action'] };
}

/**
 * Transforms one inbound webhook payload into a chat message.
 *
 * Synchronous and stateless. Failures are logged with the offending
 * discriminator, then rethrown for the caller to map to a response.
 */
export function transformEvent(
  source: WebhookSource,
  payload: unknown,
  ctx: TransformContext,
): TransformResult {
  try {
    if (source === 'backlog') {
      return { notify: true, message: renderBacklogEvent(readBacklogEvent(payload), ctx.links) };
    }

    const event = readKibelaEvent(payload);
    if (event.kind === 'connectivity-test') {
      return { notify: false, reason: 'connectivity-test' };
    }
    return { notify: true, message: renderKibelaEvent(event) };
  } catch (err: unknown) {
    if (err instanceof UnknownEventTypeError) {
      ctx.log.warn({ source, discriminator: err.discriminator }, 'Unknown event type');
    } else if (err instanceof MalformedPayloadError) {
      ctx.log.warn(
        { source, discriminator: discriminatorOf(source, payload), issues: err.issues },
        'Malformed webhook payload',
      );
    }
    throw err;
  }
}
