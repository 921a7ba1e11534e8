export const COMMAND_NAMES = [
  'create_issue',
  'get_issue',
  'update_issue',
  'search_issues',
  'get_epic_with_subtasks',
  'get_my_issues',
  'get_transitions',
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export function isCommandName(value: string): value is CommandName {
  const names: readonly string[] = COMMAND_NAMES;
  return names.includes(value);
}

/** Stable projection of a Jira issue returned by every command. */
export interface Issue {
  key: string;
  id: string;
  summary: string;
  description: string | null;
  status: string;
  issue_type: string;
  project: string;
  priority: string | null;
  assignee: string | null;
  reporter: string | null;
  parent: string | null;
  created: string | null;
  updated: string | null;
  duedate: string | null;
}

export interface PaginationMetadata {
  total: number;
  page: number;
  page_size: number;
  total_pages: number;
}

export interface IssuePage {
  issues: Issue[];
  pagination: PaginationMetadata;
}

export interface EpicWithSubtasks {
  epic: Issue;
  subtasks: Issue[];
  pagination: PaginationMetadata;
}

export interface TransitionOption {
  id: string;
  name: string;
  to_status: string;
}

export interface IssueTransitions {
  issue_key: string;
  current_status: string;
  possible_next_statuses: string[];
  transitions: TransitionOption[];
}

export interface SuccessEnvelope<T = unknown> {
  status: 'success';
  data: T;
}

export interface ErrorEnvelope {
  status: 'error';
  message: string;
}

export type Envelope<T = unknown> = SuccessEnvelope<T> | ErrorEnvelope;

export function success<T>(data: T): SuccessEnvelope<T> {
  return { status: 'success', data };
}

export function failure(message: string): ErrorEnvelope {
  return { status: 'error', message };
}
