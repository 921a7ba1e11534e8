import { describe, expect, it } from 'vitest';
import { IssueHandlers } from '../commands/handlers.js';
import { FakeJira, makeIssue } from './helpers.js';

const smallPages = { defaultPageSize: 2, maxPageSize: 2 };

describe('IssueHandlers.fetchAll', () => {
  it('walks every page in batches of the maximum page size', async () => {
    const jira = new FakeJira().whenSearching(
      'project = OPS',
      ['OPS-1', 'OPS-2', 'OPS-3', 'OPS-4', 'OPS-5'].map((key) => makeIssue(key))
    );
    const handlers = new IssueHandlers(jira, smallPages);

    const issues = await handlers.fetchAll('project = OPS');

    expect(issues.map((issue) => issue.key)).toEqual(['OPS-1', 'OPS-2', 'OPS-3', 'OPS-4', 'OPS-5']);
    expect(jira.searchIssues.mock.calls.map(([, options]) => options)).toEqual([
      { startAt: 0, maxResults: 2 },
      { startAt: 2, maxResults: 2 },
      { startAt: 4, maxResults: 2 },
    ]);
  });

  it('stops after the batch limit', async () => {
    const jira = new FakeJira().whenSearching(
      'project = OPS',
      ['OPS-1', 'OPS-2', 'OPS-3', 'OPS-4', 'OPS-5'].map((key) => makeIssue(key))
    );
    const handlers = new IssueHandlers(jira, smallPages, 2);

    const issues = await handlers.fetchAll('project = OPS');

    expect(issues.map((issue) => issue.key)).toEqual(['OPS-1', 'OPS-2', 'OPS-3', 'OPS-4']);
    expect(jira.searchIssues).toHaveBeenCalledTimes(2);
  });

  it('stops on an empty page even if Jira over-reports the total', async () => {
    const jira = new FakeJira();
    jira.searchIssues
      .mockResolvedValueOnce({ startAt: 0, maxResults: 2, total: 10, issues: [makeIssue('OPS-1')] })
      .mockResolvedValueOnce({ startAt: 1, maxResults: 2, total: 10, issues: [] });
    const handlers = new IssueHandlers(jira, smallPages);

    const issues = await handlers.fetchAll('project = OPS');

    expect(issues).toHaveLength(1);
    expect(jira.searchIssues).toHaveBeenCalledTimes(2);
  });
});

describe('IssueHandlers.searchIssues', () => {
  it('paginates title-only matches locally across Jira batches', async () => {
    const jira = new FakeJira().whenSearching('summary ~ "deploy" AND issuetype != Epic', [
      makeIssue('OPS-1', { summary: 'Deploy API' }),
      makeIssue('OPS-2', { summary: 'Deployment checklist' }),
      makeIssue('OPS-3', { summary: 'Release notes' }),
      makeIssue('OPS-4', { summary: 'Redeploy workers' }),
    ]);
    const handlers = new IssueHandlers(jira, smallPages);

    const result = await handlers.searchIssues({ search_text: 'deploy', title_only: true, page: 2 });

    expect(result.issues.map((issue) => issue.key)).toEqual(['OPS-4']);
    expect(result.pagination).toEqual({ total: 3, page: 2, page_size: 2, total_pages: 2 });
  });
});
