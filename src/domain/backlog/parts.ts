import type { EmbedField, MessageParts } from '../message.js';
import {
  COMMENT_LIMIT,
  DESCRIPTION_LIMIT,
  compactFields,
  embedField,
  truncate,
} from '../text.js';
import type {
  BacklogBulkUpdateContent,
  BacklogEvent,
  BacklogId,
  BacklogIssueContent,
  BacklogMilestoneContent,
  BacklogNamed,
  BacklogProject,
  BacklogUser,
} from './events.js';

/** Deep-link settings injected from configuration. */
export interface BacklogLinks {
  /** Space URL without a trailing slash, e.g. `https://example.backlog.jp`. */
  readonly baseUrl: string;
  /** Project key used in issue keys, e.g. `DEV` in `DEV-42`. */
  readonly projectPrefix: string;
}

const NO_TITLE = 'タイトルなし';
const NO_NAME = '名前なし';
const NO_DESCRIPTION = '説明なし';
const UNASSIGNED = '未指定';
const NO_MILESTONE_NAME = '名称無し';
const NO_CONTENT = '内容無し';
const CHANGED = 'changed';

const CONTENT: Record<BacklogEvent['kind'], string> = {
  'issue-created': '課題を作成しました',
  'issue-updated': '課題を更新しました',
  'issue-deleted': '課題を削除しました',
  'comment-added': '課題にコメントしました',
  'issues-bulk-updated': '課題をまとめて更新しました',
  'milestone-created': 'マイルストーンを作成しました',
  'milestone-updated': 'マイルストーンを更新しました',
  'milestone-deleted': 'マイルストーンを削除しました',
};

// ─── Links ───────────────────────────────────────────────────

export function issueKey(links: BacklogLinks, id: BacklogId): string {
  return `${links.projectPrefix}-${id}`;
}

export function issueUrl(links: BacklogLinks, id: BacklogId): string {
  return `${links.baseUrl}/view/${issueKey(links, id)}`;
}

export function projectUrl(links: BacklogLinks): string {
  return `${links.baseUrl}/projects/${links.projectPrefix}`;
}

/** Accepts integers and integer strings; anything else is `null`. */
export function parseInteger(value: BacklogId | null | undefined): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  return null;
}

/**
 * Issue search filtered on one milestone, or the project top page when
 * either id is missing or not an integer.
 */
export function milestoneUrl(
  links: BacklogLinks,
  project: BacklogProject | null | undefined,
  milestoneId: BacklogId | null | undefined,
): string {
  const projectId = parseInteger(project?.id);
  const id = parseInteger(milestoneId);
  if (projectId === null || id === null) return projectUrl(links);

  return `${links.baseUrl}/find/${links.projectPrefix}`
    + `?condition.projectId=${projectId}&condition.milestoneId=${id}`;
}

// ─── Shared extraction ───────────────────────────────────────

function authorName(user: BacklogUser | null | undefined): string {
  return user?.name || NO_NAME;
}

/** Backlog allows several milestones/versions; only the first is shown. */
function firstName(list: readonly BacklogNamed[] | null | undefined): string | null {
  return list?.[0]?.name ?? null;
}

/**
 * Issue attribute fields, in display order. Shared by issue and comment
 * events since both embed the same issue structure.
 */
export function issueFields(content: BacklogIssueContent): EmbedField[] {
  return compactFields([
    embedField('種別', content.issueType?.name),
    embedField('担当者', content.assignee?.name || UNASSIGNED),
    embedField('優先度', content.priority?.name),
    embedField('状態', content.status?.name),
    embedField('マイルストーン', firstName(content.milestone)),
    embedField('発生バージョン', firstName(content.versions)),
    embedField('期限日', content.dueDate),
  ]);
}

// ─── Variants ────────────────────────────────────────────────

function issueParts(
  event: { readonly createdUser?: BacklogUser | null; readonly content: BacklogIssueContent },
  links: BacklogLinks,
  description: string | null | undefined,
): Omit<MessageParts, 'content'> {
  const { content } = event;
  return {
    author: authorName(event.createdUser),
    title: content.summary || NO_TITLE,
    url: issueUrl(links, content.id),
    description: truncate(description ?? NO_DESCRIPTION, DESCRIPTION_LIMIT),
    fields: issueFields(content),
  };
}

function milestoneParts(
  event: {
    readonly project?: BacklogProject | null;
    readonly createdUser?: BacklogUser | null;
    readonly content: BacklogMilestoneContent;
  },
  links: BacklogLinks,
): Omit<MessageParts, 'content'> {
  const { content } = event;
  return {
    author: authorName(event.createdUser),
    title: content.name || NO_MILESTONE_NAME,
    url: milestoneUrl(links, event.project, content.id),
    description: content.description ?? '',
    fields: compactFields([
      embedField('開始日', content.start_date),
      embedField('期限日', content.reference_date),
    ]),
  };
}

/**
 * Renders a bulk update: one markdown link per touched issue, plus one
 * field per changed attribute.
 *
 * When several linked issues carry a comment, the last one wins.
 */
function bulkUpdateParts(
  event: { readonly createdUser?: BacklogUser | null; readonly content: BacklogBulkUpdateContent },
  links: BacklogLinks,
): Omit<MessageParts, 'content'> {
  const linked = event.content.link ?? [];
  const lines: string[] = [];
  let comment: string | null = null;

  for (const issue of linked) {
    const title = issue.title || NO_TITLE;
    lines.push(`[${issueKey(links, issue.id)} ${title}](${issueUrl(links, issue.id)})`);
    if (issue.comment?.content) {
      comment = issue.comment.content;
    }
  }

  const changeFields = (event.content.changes ?? []).map((change) =>
    change.field ? embedField(change.field, change.new_value || CHANGED) : null,
  );

  return {
    author: authorName(event.createdUser),
    title: '',
    url: projectUrl(links),
    description: lines.length > 0 ? lines.join('\n') : NO_CONTENT,
    fields: compactFields([
      embedField('コメント', comment === null ? null : truncate(comment, COMMENT_LIMIT)),
      ...changeFields,
    ]),
  };
}

/**
 * Extracts the five message capabilities (plus the fixed headline) from a
 * Backlog event. Exhaustive over {@link BacklogEvent}.
 */
export function backlogMessageParts(event: BacklogEvent, links: BacklogLinks): MessageParts {
  const content = CONTENT[event.kind];

  switch (event.kind) {
    case 'issue-created':
    case 'issue-updated':
      return { content, ...issueParts(event, links, event.content.description) };

    case 'comment-added':
      return { content, ...issueParts(event, links, event.content.comment?.content) };

    case 'issue-deleted':
      return {
        content,
        author: authorName(event.createdUser),
        title: issueKey(links, event.content.id),
        url: issueUrl(links, event.content.id),
        description: '',
        fields: [],
      };

    case 'milestone-created':
    case 'milestone-updated':
    case 'milestone-deleted':
      return { content, ...milestoneParts(event, links) };

    case 'issues-bulk-updated':
      return { content, ...bulkUpdateParts(event, links) };

    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}
