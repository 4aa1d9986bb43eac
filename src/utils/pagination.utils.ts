import { Pagination } from '../types';

export const DEFAULT_PER_PAGE = 10;
export const MAX_PER_PAGE = 100;

export interface PageRequest {
  page: number;
  perPage: number;
  limit: number;
  offset: number;
}

function toInt(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return parseInt(value, 10);
  }
  return null;
}

/**
 * Read `page` / `per_page` from a query string.
 * Garbage falls back to the defaults; per_page is capped at MAX_PER_PAGE.
 */
export function parsePageRequest(page: unknown, perPage: unknown): PageRequest {
  const requestedPage = toInt(page);
  const requestedPerPage = toInt(perPage);

  const safePage = requestedPage !== null && requestedPage >= 1 ? requestedPage : 1;
  const safePerPage =
    requestedPerPage !== null && requestedPerPage >= 1 ? Math.min(requestedPerPage, MAX_PER_PAGE) : DEFAULT_PER_PAGE;

  return {
    page: safePage,
    perPage: safePerPage,
    limit: safePerPage,
    offset: (safePage - 1) * safePerPage,
  };
}

export function buildPagination(request: PageRequest, total: number): Pagination {
  const pages = total === 0 ? 0 : Math.ceil(total / request.perPage);
  return {
    page: request.page,
    per_page: request.perPage,
    total,
    pages,
    has_next: request.page < pages,
    has_prev: request.page > 1,
  };
}
