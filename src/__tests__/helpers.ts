import { vi } from 'vitest';
import { JiraApiError, NotFoundError } from '../errors.js';
import type {
  CreatedIssue,
  CreateIssuePayload,
  JiraGateway,
  JiraIssueFields,
  JiraIssueResponse,
  JiraSearchPage,
  JiraTransition,
  JiraUserRef,
  SearchOptions,
  UpdateIssueFields,
} from '../jira/types.js';

export const pagination = { defaultPageSize: 20, maxPageSize: 50 };

/** Build a raw Jira issue; the numeric part of the key drives its id. */
export function makeIssue(key: string, fields: JiraIssueFields = {}): JiraIssueResponse {
  const [project, number] = key.split('-');
  return {
    id: String(10000 + Number(number)),
    key,
    fields: {
      summary: `Issue ${key}`,
      description: null,
      status: { name: 'To Do' },
      issuetype: { name: 'Task', subtask: false },
      project: { key: project, name: `${project} project` },
      priority: { name: 'Medium' },
      assignee: null,
      reporter: null,
      created: '2024-01-01T09:00:00.000+0000',
      updated: '2024-01-01T09:00:00.000+0000',
      duedate: null,
      ...fields,
    },
  };
}

function sortIssues(issues: JiraIssueResponse[], order: string): JiraIssueResponse[] {
  const [field, direction] = order.split(' ');
  if (field !== 'created' && field !== 'updated') {
    return issues;
  }
  const sign = direction === 'DESC' ? -1 : 1;
  return [...issues].sort((a, b) => sign * (a.fields[field] ?? '').localeCompare(b.fields[field] ?? ''));
}

/**
 * In-memory Jira. Search results are registered per JQL filter (the part
 * before ORDER BY); created/updated ordering is applied on the way out.
 */
export class FakeJira implements JiraGateway {
  readonly issues = new Map<string, JiraIssueResponse>();
  readonly queries = new Map<string, JiraIssueResponse[]>();
  readonly workflows = new Map<string, JiraTransition[]>();
  private nextNumber = 100;

  add(...issues: JiraIssueResponse[]): this {
    for (const issue of issues) {
      this.issues.set(issue.key, issue);
    }
    return this;
  }

  whenSearching(filter: string, issues: JiraIssueResponse[]): this {
    this.queries.set(filter, issues);
    return this;
  }

  private require(issueKey: string): JiraIssueResponse {
    const issue = this.issues.get(issueKey);
    if (!issue) {
      throw new NotFoundError(`Issue ${issueKey} not found`);
    }
    return issue;
  }

  getIssue = vi.fn(async (issueKey: string): Promise<JiraIssueResponse> => this.require(issueKey));

  createIssue = vi.fn(async (payload: CreateIssuePayload): Promise<CreatedIssue> => {
    const key = `${payload.fields.project.key}-${this.nextNumber++}`;
    const issue = makeIssue(key, {
      summary: payload.fields.summary,
      description: payload.fields.description ?? null,
      issuetype: { name: payload.fields.issuetype.name },
      parent: payload.fields.parent ?? null,
    });
    this.issues.set(key, issue);
    return { id: issue.id, key, self: `https://jira.test/rest/api/2/issue/${issue.id}` };
  });

  updateIssue = vi.fn(async (issueKey: string, fields: UpdateIssueFields): Promise<void> => {
    const issue = this.require(issueKey);
    this.issues.set(issueKey, { ...issue, fields: { ...issue.fields, ...fields } });
  });

  searchIssues = vi.fn(async (jql: string, options: SearchOptions): Promise<JiraSearchPage> => {
    const [filter, order] = jql.split(' ORDER BY ');
    const matches = this.queries.get(filter);
    if (!matches) {
      throw new JiraApiError(400, `Unexpected JQL: ${jql}`);
    }
    const sorted = order ? sortIssues(matches, order) : matches;
    return {
      startAt: options.startAt,
      maxResults: options.maxResults,
      total: sorted.length,
      issues: sorted.slice(options.startAt, options.startAt + options.maxResults),
    };
  });

  getTransitions = vi.fn(async (issueKey: string): Promise<JiraTransition[]> => {
    this.require(issueKey);
    return this.workflows.get(issueKey) ?? [];
  });

  transitionIssue = vi.fn(async (issueKey: string, transitionId: string): Promise<void> => {
    const issue = this.require(issueKey);
    const transition = (this.workflows.get(issueKey) ?? []).find((t) => t.id === transitionId);
    if (!transition) {
      throw new JiraApiError(400, `Transition id '${transitionId}' is not valid for this issue.`);
    }
    this.issues.set(issueKey, {
      ...issue,
      fields: { ...issue.fields, status: { name: transition.to.name } },
    });
  });

  getMyself = vi.fn(async (): Promise<JiraUserRef> => ({ name: 'jira-bot', displayName: 'Jira Bot' }));
}
