import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { SORT_FIELDS, SORT_ORDERS } from '../jira/jql.js';

export const ISSUE_KEY_PATTERN = /^[A-Za-z][A-Za-z0-9_]*-[0-9]+$/;

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} is required`);

const optionalText = (field: string) =>
  z.string({ invalid_type_error: `${field} must be a string` }).optional();

const issueKey = requiredText('issue_key')
  .regex(ISSUE_KEY_PATTERN, 'issue_key must look like PROJ-123')
  .transform((key) => key.toUpperCase());

// Accepts 3 or "3"; rounding and clamping happen in normalizePage.
const pageNumber = (field: string) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value ?? undefined),
    z
      .number({ invalid_type_error: `${field} must be an integer` })
      .int(`${field} must be an integer`)
      .optional()
  );

const lowerCased = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

const payload = <T extends z.ZodRawShape>(shape: T) =>
  z.object(shape, { invalid_type_error: 'data must be an object' });

export const createIssueSchema = payload({
  project: requiredText('project'),
  summary: requiredText('summary'),
  description: optionalText('description'),
  issue_type: requiredText('issue_type').default('Task'),
  parent_issue: issueKey.optional(),
});

export const getIssueSchema = payload({
  issue_key: issueKey,
});

export const updateIssueSchema = payload({
  issue_key: issueKey,
  summary: requiredText('summary').optional(),
  description: optionalText('description'),
  status: requiredText('status').optional(),
});

export const searchIssuesSchema = payload({
  search_text: requiredText('search_text'),
  title_only: z.boolean({ invalid_type_error: 'title_only must be a boolean' }).default(false),
  page: pageNumber('page'),
  page_size: pageNumber('page_size'),
});

export const epicWithSubtasksSchema = payload({
  epic_name: requiredText('epic_name'),
  page: pageNumber('page'),
  page_size: pageNumber('page_size'),
});

export const myIssuesSchema = payload({
  status: requiredText('status').optional(),
  project: requiredText('project').optional(),
  page: pageNumber('page'),
  page_size: pageNumber('page_size'),
  sort_by: z.preprocess(
    lowerCased,
    z
      .enum(SORT_FIELDS, {
        errorMap: () => ({ message: `sort_by must be one of: ${SORT_FIELDS.join(', ')}` }),
      })
      .default('updated')
  ),
  sort_order: z.preprocess(
    lowerCased,
    z
      .enum(SORT_ORDERS, {
        errorMap: () => ({ message: `sort_order must be one of: ${SORT_ORDERS.join(', ')}` }),
      })
      .default('desc')
  ),
});

export const getTransitionsSchema = getIssueSchema;

export type CreateIssueInput = z.infer<typeof createIssueSchema>;
export type GetIssueInput = z.infer<typeof getIssueSchema>;
export type UpdateIssueInput = z.infer<typeof updateIssueSchema>;
export type SearchIssuesInput = z.infer<typeof searchIssuesSchema>;
export type EpicWithSubtasksInput = z.infer<typeof epicWithSubtasksSchema>;
export type MyIssuesInput = z.infer<typeof myIssuesSchema>;
export type GetTransitionsInput = z.infer<typeof getTransitionsSchema>;

/**
 * Validate a command payload. Throws ValidationError listing every problem.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => issue.message);
    throw new ValidationError(`Invalid input: ${problems.join('; ')}`);
  }
  return result.data;
}
