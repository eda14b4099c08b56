import { vi } from 'vitest';
import type { BacklogLinks } from '../src/domain/backlog/index.js';

/** Pino-shaped spy logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

export const LINKS: BacklogLinks = {
  baseUrl: 'https://example.backlog.jp',
  projectPrefix: 'DEV',
};

/** Backlog "issue created" body with every optional field empty. */
export function backlogIssuePayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: 1,
    project: { id: 100, projectKey: 'DEV', name: 'Development' },
    content: {
      summary: 'Bug',
      id: 42,
      issueType: { name: 'Bug' },
      priority: { name: 'High' },
      assignee: null,
      milestone: [],
      versions: [],
      dueDate: null,
    },
    createdUser: { name: 'alice' },
    ...overrides,
  };
}

/** Kibela blog event body; `blog` merges over a minimal article. */
export function kibelaBlogPayload(
  action: string,
  blog: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    action,
    resource_type: 'blog',
    action_user: { account: 'bob' },
    blog: {
      title: 'Release notes',
      url: 'https://team.kibe.la/notes/1',
      content_md: 'Hello',
      content_diff: '+Hello',
      author: { account: 'carol' },
      ...blog,
    },
  };
}
