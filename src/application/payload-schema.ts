import { z } from 'zod';

/**
 * zod schemas for the inbound webhook payloads.
 *
 * - Discriminator schemas are checked first, on their own, so an unknown
 *   event type is reported as such even when the rest of the body is odd.
 * - Everything the transformers can live without is `.nullish()`; the
 *   fallback for each lives next to the code that reads it.
 * - Unknown keys are stripped — the sources send far more than we show.
 */

/** Any JSON object body. Arrays, strings and `null` are rejected. */
export const webhookBodySchema = z.record(z.string(), z.unknown());

// ─── Backlog ─────────────────────────────────────────────────

const backlogIdSchema = z.union([z.number(), z.string()]);

const backlogNamedSchema = z.object({
  name: z.string().nullish(),
});

const backlogCommentSchema = z.object({
  id: backlogIdSchema.nullish(),
  content: z.string().nullish(),
});

export const backlogDiscriminatorSchema = z.object({
  type: z.number().int(),
});

export const backlogEnvelopeSchema = z.object({
  project: z.object({
    id: backlogIdSchema.nullish(),
    projectKey: z.string().nullish(),
    name: z.string().nullish(),
  }).nullish(),
  createdUser: z.object({
    name: z.string().nullish(),
  }).nullish(),
  content: webhookBodySchema,
});

export const backlogIssueContentSchema = z.object({
  id: backlogIdSchema,
  key_id: backlogIdSchema.nullish(),
  summary: z.string().nullish(),
  description: z.string().nullish(),
  issueType: backlogNamedSchema.nullish(),
  assignee: backlogNamedSchema.nullish(),
  priority: backlogNamedSchema.nullish(),
  status: backlogNamedSchema.nullish(),
  milestone: z.array(backlogNamedSchema).nullish(),
  versions: z.array(backlogNamedSchema).nullish(),
  dueDate: z.string().nullish(),
  comment: backlogCommentSchema.nullish(),
});

export const backlogMilestoneContentSchema = z.object({
  id: backlogIdSchema.nullish(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  start_date: z.string().nullish(),
  reference_date: z.string().nullish(),
});

export const backlogBulkUpdateContentSchema = z.object({
  link: z.array(z.object({
    id: backlogIdSchema,
    key_id: backlogIdSchema.nullish(),
    title: z.string().nullish(),
    comment: backlogCommentSchema.nullish(),
  })).nullish(),
  changes: z.array(z.object({
    field: z.string().nullish(),
    new_value: z.string().nullish(),
    old_value: z.string().nullish(),
  })).nullish(),
});

// ─── Kibela ──────────────────────────────────────────────────

const kibelaUserSchema = z.object({
  account: z.string().nullish(),
});

const kibelaAuthoredShape = {
  author: kibelaUserSchema.nullish(),
  authors: z.array(kibelaUserSchema).nullish(),
};

export const kibelaDiscriminatorSchema = z.object({
  resource_type: z.string(),
  action: z.string(),
});

export const kibelaEnvelopeSchema = z.object({
  action_user: kibelaUserSchema.nullish(),
});

export const kibelaArticleSchema = z.object({
  title: z.string().nullish(),
  url: z.string().nullish(),
  content_md: z.string().nullish(),
  content_diff: z.string().nullish(),
  ...kibelaAuthoredShape,
});

const kibelaArticleRefSchema = z.object({
  title: z.string().nullish(),
  url: z.string().nullish(),
  ...kibelaAuthoredShape,
});

export const kibelaCommentSchema = z.object({
  title: z.string().nullish(),
  url: z.string().nullish(),
  content_md: z.string().nullish(),
  blog: kibelaArticleRefSchema.nullish(),
  wiki: kibelaArticleRefSchema.nullish(),
});
