export const SORT_FIELDS = ['created', 'updated', 'priority', 'status', 'duedate'] as const;
export type SortField = (typeof SORT_FIELDS)[number];

export const SORT_ORDERS = ['asc', 'desc'] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

/** Quote user text as a JQL string literal. */
export function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Quote user text for a `~` clause. Lucene operators in the text are
 * escaped so they match literally.
 */
export function textQuery(value: string): string {
  return quote(value.replace(/[+\-&|!(){}[\]^~*?:\\/]/g, '\\$&'));
}

/** Issues (other than epics) whose summary, or also description, matches the text. */
export function searchIssuesJql(searchText: string, titleOnly: boolean): string {
  const text = textQuery(searchText);
  const match = titleOnly ? `summary ~ ${text}` : `(summary ~ ${text} OR description ~ ${text})`;
  return `${match} AND issuetype != Epic`;
}

export function epicCandidatesJql(epicName: string): string {
  return `issuetype = Epic AND summary ~ ${textQuery(epicName)}`;
}

export function epicChildrenJql(epicKey: string): string {
  return `"Epic Link" = ${quote(epicKey)} ORDER BY created DESC`;
}

export interface MyIssuesQuery {
  status?: string;
  project?: string;
  sortBy: SortField;
  sortOrder: SortOrder;
}

export function myIssuesJql(query: MyIssuesQuery): string {
  const clauses = ['assignee = currentUser()'];
  if (query.status) {
    clauses.push(`status = ${quote(query.status)}`);
  }
  if (query.project) {
    clauses.push(`project = ${quote(query.project)}`);
  }
  return `${clauses.join(' AND ')} ORDER BY ${query.sortBy} ${query.sortOrder.toUpperCase()}`;
}
