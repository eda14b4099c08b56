/**
 * Backlog webhook event model.
 *
 * Each supported `type` code becomes its own variant of the
 * {@link BacklogEvent} tagged union, holding only the structure that
 * variant reads. Optional payload fields stay optional (`?: T | null`) so
 * every extraction has to spell out its fallback.
 */

/** Backlog sends numeric ids, but some proxies stringify them. */
export type BacklogId = number | string;

export interface BacklogNamed {
  readonly name?: string | null;
}

export interface BacklogUser {
  readonly name?: string | null;
}

export interface BacklogProject {
  readonly id?: BacklogId | null;
  readonly projectKey?: string | null;
  readonly name?: string | null;
}

export interface BacklogComment {
  readonly id?: BacklogId | null;
  readonly content?: string | null;
}

/** `content` of issue created/updated/deleted and comment-added events. */
export interface BacklogIssueContent {
  readonly id: BacklogId;
  readonly key_id?: BacklogId | null;
  readonly summary?: string | null;
  readonly description?: string | null;
  readonly issueType?: BacklogNamed | null;
  readonly assignee?: BacklogNamed | null;
  readonly priority?: BacklogNamed | null;
  readonly status?: BacklogNamed | null;
  readonly milestone?: readonly BacklogNamed[] | null;
  readonly versions?: readonly BacklogNamed[] | null;
  readonly dueDate?: string | null;
  readonly comment?: BacklogComment | null;
}

/** `content` of milestone created/updated/deleted events. */
export interface BacklogMilestoneContent {
  readonly id?: BacklogId | null;
  readonly name?: string | null;
  readonly description?: string | null;
  readonly start_date?: string | null;
  readonly reference_date?: string | null;
}

export interface BacklogLinkedIssue {
  readonly id: BacklogId;
  readonly key_id?: BacklogId | null;
  readonly title?: string | null;
  readonly comment?: BacklogComment | null;
}

export interface BacklogChange {
  readonly field?: string | null;
  readonly new_value?: string | null;
  readonly old_value?: string | null;
}

/** `content` of the bulk ("multi issue") update event. */
export interface BacklogBulkUpdateContent {
  readonly link?: readonly BacklogLinkedIssue[] | null;
  readonly changes?: readonly BacklogChange[] | null;
}

/** Maps a Backlog `type` code to the variant that handles it. */
export const BACKLOG_EVENT_KINDS = {
  1: 'issue-created',
  2: 'issue-updated',
  3: 'comment-added',
  4: 'issue-deleted',
  14: 'issues-bulk-updated',
  22: 'milestone-created',
  23: 'milestone-updated',
  24: 'milestone-deleted',
} as const satisfies Readonly<Record<number, string>>;

export type BacklogEventKind = (typeof BACKLOG_EVENT_KINDS)[keyof typeof BACKLOG_EVENT_KINDS];

interface BacklogEventOf<K extends BacklogEventKind, C> {
  readonly kind: K;
  readonly project?: BacklogProject | null;
  readonly createdUser?: BacklogUser | null;
  readonly content: C;
}

export type IssueCreatedEvent = BacklogEventOf<'issue-created', BacklogIssueContent>;
export type IssueUpdatedEvent = BacklogEventOf<'issue-updated', BacklogIssueContent>;
export type IssueDeletedEvent = BacklogEventOf<'issue-deleted', BacklogIssueContent>;
export type CommentAddedEvent = BacklogEventOf<'comment-added', BacklogIssueContent>;
export type IssuesBulkUpdatedEvent = BacklogEventOf<'issues-bulk-updated', BacklogBulkUpdateContent>;
export type MilestoneCreatedEvent = BacklogEventOf<'milestone-created', BacklogMilestoneContent>;
export type MilestoneUpdatedEvent = BacklogEventOf<'milestone-updated', BacklogMilestoneContent>;
export type MilestoneDeletedEvent = BacklogEventOf<'milestone-deleted', BacklogMilestoneContent>;

export type BacklogEvent =
  | IssueCreatedEvent
  | IssueUpdatedEvent
  | IssueDeletedEvent
  | CommentAddedEvent
  | IssuesBulkUpdatedEvent
  | MilestoneCreatedEvent
  | MilestoneUpdatedEvent
  | MilestoneDeletedEvent;

/** Looks a raw `type` code up; `undefined` for codes the relay does not handle. */
export function backlogEventKind(type: number): BacklogEventKind | undefined {
  const table: Readonly<Record<number, BacklogEventKind>> = BACKLOG_EVENT_KINDS;
  return table[type];
}
