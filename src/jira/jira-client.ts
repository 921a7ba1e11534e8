import axios, { AxiosInstance } from 'axios';
import { JiraApiError, NotFoundError, toError } from '../errors.js';
import type { JiraConfig } from '../config/index.js';
import type {
  CreatedIssue,
  CreateIssuePayload,
  JiraGateway,
  JiraIssueResponse,
  JiraSearchPage,
  JiraTransition,
  JiraUserRef,
  SearchOptions,
  UpdateIssueFields,
} from './types.js';

/** Fields requested for every issue the server returns. */
export const ISSUE_FIELDS = [
  'summary',
  'description',
  'status',
  'issuetype',
  'project',
  'priority',
  'assignee',
  'reporter',
  'parent',
  'created',
  'updated',
  'duedate',
].join(',');

/** Build the axios instance used to talk to the Jira REST API v2. */
export function createJiraHttp(config: JiraConfig): AxiosInstance {
  return axios.create({
    baseURL: `${config.server}/rest/api/2`,
    auth: {
      username: config.user,
      password: config.token,
    },
    headers: {
      'Content-Type': 'application/json',
      'Accept': 'application/json',
    },
    timeout: config.timeoutMs,
  });
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null || data === '') {
    return 'no response body';
  }
  if (typeof data === 'string') {
    return data;
  }
  if (typeof data === 'object' && 'errorMessages' in data) {
    const { errorMessages } = data;
    if (Array.isArray(errorMessages) && errorMessages.length > 0) {
      return errorMessages.map(String).join('; ');
    }
  }
  return JSON.stringify(data);
}

/**
 * Convert a failed axios call into a JiraApiError.
 * Responses carry their HTTP status; transport failures get status 0.
 */
export function toJiraError(error: unknown): JiraApiError {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return new JiraApiError(error.response.status, describeBody(error.response.data), error);
    }
    return new JiraApiError(0, error.message, error);
  }
  const cause = toError(error);
  return new JiraApiError(0, cause.message, cause);
}

export class JiraClient implements JiraGateway {
  private client: AxiosInstance;

  constructor(config: JiraConfig, client: AxiosInstance = createJiraHttp(config)) {
    this.client = client;
  }

  /**
   * Run a request and unwrap its body. With an issue key, a 404 becomes
   * a NotFoundError for that issue.
   */
  private async call<T>(request: () => Promise<{ data: T }>, issueKey?: string): Promise<T> {
    try {
      const response = await request();
      return response.data;
    } catch (error) {
      if (issueKey && axios.isAxiosError(error) && error.response?.status === 404) {
        throw new NotFoundError(`Issue ${issueKey} not found`, error);
      }
      throw toJiraError(error);
    }
  }

  /** Fetch a single issue with the normalized field set. */
  async getIssue(issueKey: string): Promise<JiraIssueResponse> {
    return this.call(
      () =>
        this.client.get<JiraIssueResponse>(`/issue/${encodeURIComponent(issueKey)}`, {
          params: { fields: ISSUE_FIELDS },
        }),
      issueKey
    );
  }

  async createIssue(payload: CreateIssuePayload): Promise<CreatedIssue> {
    return this.call(() => this.client.post<CreatedIssue>('/issue', payload));
  }

  async updateIssue(issueKey: string, fields: UpdateIssueFields): Promise<void> {
    await this.call(
      () => this.client.put(`/issue/${encodeURIComponent(issueKey)}`, { fields }),
      issueKey
    );
  }

  /**
   * Search issues by JQL. Jira rejects invalid queries instead of
   * silently ignoring unknown clauses.
   */
  async searchIssues(jql: string, options: SearchOptions): Promise<JiraSearchPage> {
    const data = await this.call(() =>
      this.client.get<Partial<JiraSearchPage>>('/search', {
        params: {
          jql,
          startAt: options.startAt,
          maxResults: options.maxResults,
          fields: ISSUE_FIELDS,
          validateQuery: 'strict',
        },
      })
    );
    const issues = data.issues || [];
    return {
      startAt: data.startAt ?? options.startAt,
      maxResults: data.maxResults ?? options.maxResults,
      total: data.total ?? issues.length,
      issues,
    };
  }

  /**
   * Get available transitions for an issue
   */
  async getTransitions(issueKey: string): Promise<JiraTransition[]> {
    const data = await this.call(() =>
      this.client.get<{ transitions?: JiraTransition[] }>(
        `/issue/${encodeURIComponent(issueKey)}/transitions`
      ),
      issueKey
    );
    return data.transitions || [];
  }

  async transitionIssue(issueKey: string, transitionId: string): Promise<void> {
    await this.call(() =>
      this.client.post(`/issue/${encodeURIComponent(issueKey)}/transitions`, {
        transition: { id: transitionId },
      }),
      issueKey
    );
  }

  /** The user the configured credentials authenticate as. */
  async getMyself(): Promise<JiraUserRef> {
    return this.call(() => this.client.get<JiraUserRef>('/myself'));
  }
}
