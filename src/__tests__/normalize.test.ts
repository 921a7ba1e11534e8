import { describe, expect, it } from 'vitest';
import { toIssue } from '../commands/normalize.js';
import { makeIssue } from './helpers.js';

describe('toIssue', () => {
  it('projects Jira fields onto the stable shape', () => {
    const raw = makeIssue('OPS-7', {
      summary: 'Rotate keys',
      description: 'Quarterly rotation',
      status: { name: 'In Progress' },
      assignee: { displayName: 'Dana Lee', name: 'dlee' },
      reporter: { name: 'jsmith' },
      parent: { key: 'OPS-1' },
      duedate: '2024-03-01',
    });

    expect(toIssue(raw)).toEqual({
      key: 'OPS-7',
      id: '10007',
      summary: 'Rotate keys',
      description: 'Quarterly rotation',
      status: 'In Progress',
      issue_type: 'Task',
      project: 'OPS',
      priority: 'Medium',
      assignee: 'Dana Lee',
      reporter: 'jsmith',
      parent: 'OPS-1',
      created: '2024-01-01T09:00:00.000+0000',
      updated: '2024-01-01T09:00:00.000+0000',
      duedate: '2024-03-01',
    });
  });

  it('fills in missing sub-objects', () => {
    const issue = toIssue({ id: '1', key: 'OPS-1', fields: {} });

    expect(issue).toEqual({
      key: 'OPS-1',
      id: '1',
      summary: '',
      description: null,
      status: 'Unknown',
      issue_type: 'Unknown',
      project: 'Unknown',
      priority: null,
      assignee: null,
      reporter: null,
      parent: null,
      created: null,
      updated: null,
      duedate: null,
    });
  });
});
