export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 100;

export interface Page {
  page: number;
  limit: number;
  offset: number;
}

export interface PaginationMeta {
  current_page: number;
  per_page: number;
  total: number;
  total_pages: number;
}

/**
 * Normalize raw page/limit input. Missing or out-of-range values fall back to
 * defaults instead of failing; limit is capped at MAX_LIMIT.
 */
export function normalizePage(page?: number, limit?: number): Page {
  let safePage = page !== undefined && Number.isInteger(page) && page >= 1 ? page : DEFAULT_PAGE;

  let safeLimit = limit !== undefined && Number.isInteger(limit) && limit >= 1 ? limit : DEFAULT_LIMIT;
  if (safeLimit > MAX_LIMIT) {
    safeLimit = MAX_LIMIT;
  }

  // An offset past 2^53 cannot be sent to the database as an integer
  if (!Number.isSafeInteger((safePage - 1) * safeLimit)) {
    safePage = DEFAULT_PAGE;
  }

  return {
    page: safePage,
    limit: safeLimit,
    offset: (safePage - 1) * safeLimit,
  };
}

export function buildPaginationMeta(page: number, perPage: number, total: number): PaginationMeta {
  return {
    current_page: page,
    per_page: perPage,
    total,
    total_pages: Math.ceil(total / perPage),
  };
}
