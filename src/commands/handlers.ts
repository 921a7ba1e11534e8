import type { PaginationConfig } from '../config/index.js';
import { AmbiguityError, NotFoundError, ValidationError, toError } from '../errors.js';
import {
  epicCandidatesJql,
  epicChildrenJql,
  myIssuesJql,
  searchIssuesJql,
} from '../jira/jql.js';
import type {
  CreateIssueFields,
  JiraGateway,
  JiraIssueResponse,
  UpdateIssueFields,
} from '../jira/types.js';
import logger from '../utils/logger.js';
import { toIssue } from './normalize.js';
import { buildPagination, normalizePage, paginate, startAt } from './pagination.js';
import type {
  CreateIssueInput,
  EpicWithSubtasksInput,
  GetIssueInput,
  GetTransitionsInput,
  MyIssuesInput,
  SearchIssuesInput,
  UpdateIssueInput,
} from './schemas.js';
import type { EpicWithSubtasks, Issue, IssuePage, IssueTransitions } from './types.js';

/** Upper bound on search batches one command may issue. */
export const MAX_FETCH_BATCHES = 20;

/**
 * One method per command. Inputs arrive validated; every method talks to
 * Jira only through the gateway it was built with.
 */
export class IssueHandlers {
  constructor(
    private readonly jira: JiraGateway,
    private readonly pagination: PaginationConfig,
    private readonly maxBatches: number = MAX_FETCH_BATCHES
  ) {}

  /**
   * Run a JQL query to exhaustion, in batches of the maximum page size.
   * Stops after `maxBatches` calls and returns what it has so far.
   */
  async fetchAll(jql: string): Promise<JiraIssueResponse[]> {
    const all: JiraIssueResponse[] = [];
    for (let batch = 1; ; batch++) {
      const page = await this.jira.searchIssues(jql, {
        startAt: all.length,
        maxResults: this.pagination.maxPageSize,
      });
      all.push(...page.issues);
      if (page.issues.length === 0 || all.length >= page.total) {
        return all;
      }
      if (batch >= this.maxBatches) {
        logger.warn(`Stopped fetching after ${batch} batches: ${all.length} of ${page.total} issues`, { jql });
        return all;
      }
    }
  }

  async createIssue(input: CreateIssueInput): Promise<Issue> {
    const fields: CreateIssueFields = {
      project: { key: input.project },
      summary: input.summary,
      issuetype: { name: input.issue_type },
    };
    if (input.description !== undefined) {
      fields.description = input.description;
    }
    if (input.parent_issue) {
      fields.parent = { key: input.parent_issue };
    }

    const created = await this.jira.createIssue({ fields });
    logger.info(`Created issue ${created.key}`, { project: input.project, issueType: input.issue_type });

    // The issue exists from here on; a failed read-back must not look like a failed create.
    try {
      return toIssue(await this.jira.getIssue(created.key));
    } catch (err) {
      logger.warn(`Created issue ${created.key} but could not read it back: ${toError(err).message}`);
      return {
        key: created.key,
        id: created.id,
        summary: input.summary,
        description: input.description ?? null,
        status: 'Unknown',
        issue_type: input.issue_type,
        project: input.project,
        priority: null,
        assignee: null,
        reporter: null,
        parent: input.parent_issue ?? null,
        created: null,
        updated: null,
        duedate: null,
      };
    }
  }

  async getIssue(input: GetIssueInput): Promise<Issue> {
    return toIssue(await this.jira.getIssue(input.issue_key));
  }

  /**
   * Edit summary and description and optionally move the issue to a new
   * status. The transition is resolved before anything is written.
   */
  async updateIssue(input: UpdateIssueInput): Promise<Issue> {
    const key = input.issue_key;
    const fields: UpdateIssueFields = {};
    if (input.summary !== undefined) {
      fields.summary = input.summary;
    }
    if (input.description !== undefined) {
      fields.description = input.description;
    }
    if (Object.keys(fields).length === 0 && input.status === undefined) {
      throw new ValidationError('Nothing to update: provide summary, description or status');
    }

    let transitionId: string | undefined;
    if (input.status !== undefined) {
      const target = input.status.toLowerCase();
      const transitions = await this.jira.getTransitions(key);
      const match = transitions.find((t) => t.to.name.toLowerCase() === target);
      if (!match) {
        const available = transitions.map((t) => t.to.name).join(', ');
        throw new ValidationError(
          `No transition found to status: ${input.status}. Available status transitions are: ${available}`
        );
      }
      transitionId = match.id;
    }

    if (Object.keys(fields).length > 0) {
      await this.jira.updateIssue(key, fields);
    }
    if (transitionId !== undefined) {
      await this.jira.transitionIssue(key, transitionId);
    }
    logger.info(`Updated issue ${key}`, { fields: Object.keys(fields), status: input.status });

    return toIssue(await this.jira.getIssue(key));
  }

  /**
   * Title-only searches are checked locally against the summary, so they
   * fetch every candidate and paginate here. Full-text searches let Jira
   * paginate.
   */
  async searchIssues(input: SearchIssuesInput): Promise<IssuePage> {
    const request = normalizePage(input.page, input.page_size, this.pagination);
    const jql = searchIssuesJql(input.search_text, input.title_only);

    if (input.title_only) {
      const needle = input.search_text.toLowerCase();
      const matches = (await this.fetchAll(jql))
        .map(toIssue)
        .filter((issue) => issue.summary.toLowerCase().includes(needle));
      const { items, pagination } = paginate(matches, request);
      return { issues: items, pagination };
    }

    const page = await this.jira.searchIssues(jql, {
      startAt: startAt(request),
      maxResults: request.pageSize,
    });
    return {
      issues: page.issues.map(toIssue),
      pagination: buildPagination(page.total, request),
    };
  }

  /**
   * Resolve an epic by exact (case-insensitive) summary, then page
   * through the issues linked to it.
   */
  async getEpicWithSubtasks(input: EpicWithSubtasksInput): Promise<EpicWithSubtasks> {
    const request = normalizePage(input.page, input.page_size, this.pagination);
    const name = input.epic_name.toLowerCase();

    const candidates = await this.fetchAll(epicCandidatesJql(input.epic_name));
    const epics = candidates.filter(
      (candidate) => (candidate.fields.summary ?? '').trim().toLowerCase() === name
    );
    if (epics.length === 0) {
      throw new NotFoundError(`No epic found with name "${input.epic_name}"`);
    }
    if (epics.length > 1) {
      const keys = epics.map((epic) => epic.key).join(', ');
      throw new AmbiguityError(`Epic name "${input.epic_name}" matches ${epics.length} epics: ${keys}`);
    }

    const epic = toIssue(epics[0]);
    const children = (await this.fetchAll(epicChildrenJql(epic.key))).map(toIssue);
    const { items, pagination } = paginate(children, request);
    return { epic, subtasks: items, pagination };
  }

  async getMyIssues(input: MyIssuesInput): Promise<IssuePage> {
    const request = normalizePage(input.page, input.page_size, this.pagination);
    const jql = myIssuesJql({
      status: input.status,
      project: input.project,
      sortBy: input.sort_by,
      sortOrder: input.sort_order,
    });

    const page = await this.jira.searchIssues(jql, {
      startAt: startAt(request),
      maxResults: request.pageSize,
    });
    return {
      issues: page.issues.map(toIssue),
      pagination: buildPagination(page.total, request),
    };
  }

  async getTransitions(input: GetTransitionsInput): Promise<IssueTransitions> {
    const issue = toIssue(await this.jira.getIssue(input.issue_key));
    const transitions = await this.jira.getTransitions(input.issue_key);
    const next = [...new Set(transitions.map((t) => t.to.name))].sort();
    return {
      issue_key: issue.key,
      current_status: issue.status,
      possible_next_statuses: next,
      transitions: transitions.map((t) => ({ id: t.id, name: t.name, to_status: t.to.name })),
    };
  }
}
