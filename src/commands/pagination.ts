import type { PaginationConfig } from '../config/index.js';
import type { PaginationMetadata } from './types.js';

export interface PageRequest {
  page: number;
  pageSize: number;
}

/**
 * Apply defaults and clamp: page to at least 1, page size to [1, max].
 */
export function normalizePage(
  page: number | undefined,
  pageSize: number | undefined,
  config: PaginationConfig
): PageRequest {
  return {
    page: Math.max(1, page ?? 1),
    pageSize: Math.min(config.maxPageSize, Math.max(1, pageSize ?? config.defaultPageSize)),
  };
}

/** Offset of the first item on a page, as Jira's `startAt`. */
export function startAt({ page, pageSize }: PageRequest): number {
  return (page - 1) * pageSize;
}

export function buildPagination(total: number, { page, pageSize }: PageRequest): PaginationMetadata {
  return {
    total,
    page,
    page_size: pageSize,
    total_pages: Math.ceil(total / pageSize),
  };
}

/**
 * Slice one page out of a full ordered list. A page past the end yields
 * no items; the metadata still reports the full total.
 */
export function paginate<T>(
  items: readonly T[],
  request: PageRequest
): { items: T[]; pagination: PaginationMetadata } {
  const offset = startAt(request);
  return {
    items: items.slice(offset, offset + request.pageSize),
    pagination: buildPagination(items.length, request),
  };
}
