export interface JiraUserRef {
  name?: string;
  accountId?: string;
  displayName?: string;
  emailAddress?: string;
}

export interface JiraIssueFields {
  summary?: string;
  description?: string | null;
  status?: { name: string } | null;
  issuetype?: { name: string; subtask?: boolean } | null;
  project?: { key: string; name?: string } | null;
  priority?: { name: string } | null;
  assignee?: JiraUserRef | null;
  reporter?: JiraUserRef | null;
  parent?: { key: string } | null;
  created?: string | null;
  updated?: string | null;
  duedate?: string | null;
}

export interface JiraIssueResponse {
  id: string;
  key: string;
  self?: string;
  fields: JiraIssueFields;
}

export interface JiraSearchPage {
  startAt: number;
  maxResults: number;
  total: number;
  issues: JiraIssueResponse[];
}

export interface SearchOptions {
  startAt: number;
  maxResults: number;
}

export interface JiraTransition {
  id: string;
  name: string;
  to: {
    id: string;
    name: string;
  };
}

export interface CreatedIssue {
  id: string;
  key: string;
  self: string;
}

/** Fields accepted when creating an issue. */
export interface CreateIssueFields {
  project: { key: string };
  summary: string;
  issuetype: { name: string };
  description?: string;
  parent?: { key: string };
}

export interface CreateIssuePayload {
  fields: CreateIssueFields;
}

/** Fields accepted when editing an issue. */
export interface UpdateIssueFields {
  summary?: string;
  description?: string;
}

/**
 * The operations the command handlers need from Jira.
 * JiraClient implements it over HTTP; tests provide an in-memory fake.
 */
export interface JiraGateway {
  getIssue(issueKey: string): Promise<JiraIssueResponse>;
  createIssue(payload: CreateIssuePayload): Promise<CreatedIssue>;
  updateIssue(issueKey: string, fields: UpdateIssueFields): Promise<void>;
  searchIssues(jql: string, options: SearchOptions): Promise<JiraSearchPage>;
  getTransitions(issueKey: string): Promise<JiraTransition[]>;
  transitionIssue(issueKey: string, transitionId: string): Promise<void>;
  getMyself(): Promise<JiraUserRef>;
}
