export interface PaginationParams {
  page?: number;
  limit?: number;
  offset?: number;
}

export interface Pagination {
  page: number;
  limit: number;
  offset: number;
}

export const DEFAULT_PAGE_LIMIT = 50;
export const MAX_PAGE_LIMIT = 1000;

function finiteOr(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * An explicit offset wins over page; page numbers start at 1. NaN and
 * out-of-range values fall back to the defaults.
 */
export function resolvePagination(params: PaginationParams): Pagination {
  const limit = Math.min(MAX_PAGE_LIMIT, Math.max(1, Math.floor(finiteOr(params.limit, DEFAULT_PAGE_LIMIT))));

  let offset: number;
  if (params.offset !== undefined) {
    offset = Math.max(0, Math.floor(finiteOr(params.offset, 0)));
  } else {
    const page = Math.max(1, Math.floor(finiteOr(params.page, 1)));
    offset = (page - 1) * limit;
  }

  return {
    page: Math.floor(offset / limit) + 1,
    limit,
    offset,
  };
}
