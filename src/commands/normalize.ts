import type { JiraIssueResponse, JiraUserRef } from '../jira/types.js';
import type { Issue } from './types.js';

function person(user: JiraUserRef | null | undefined): string | null {
  if (!user) return null;
  return user.displayName ?? user.name ?? null;
}

/** Project a raw Jira issue onto the stable {@link Issue} shape. */
export function toIssue(issue: JiraIssueResponse): Issue {
  const f = issue.fields;
  return {
    key: issue.key,
    id: issue.id,
    summary: f.summary ?? '',
    description: f.description ?? null,
    status: f.status?.name ?? 'Unknown',
    issue_type: f.issuetype?.name ?? 'Unknown',
    project: f.project?.key ?? 'Unknown',
    priority: f.priority?.name ?? null,
    assignee: person(f.assignee),
    reporter: person(f.reporter),
    parent: f.parent?.key ?? null,
    created: f.created ?? null,
    updated: f.updated ?? null,
    duedate: f.duedate ?? null,
  };
}
