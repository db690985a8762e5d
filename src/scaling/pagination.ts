/**
 * API Pagination Helper: offset-based pagination for registry listings
 *
 * ?page=1&limit=50. Default limit: 50, max limit: 200
 */

export interface PaginationParams {
  page: number;
  limit: number;
  offset: number;
}

export interface PaginatedResponse<T> {
  items: T[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
    hasMore: boolean;
  };
}

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/**
 * Extract pagination params from an Express request query
 */
export function parsePagination(query: Record<string, unknown>): PaginationParams {
  const page = Math.max(1, parseInt(firstString(query.page) ?? '', 10) || 1);
  const rawLimit = parseInt(firstString(query.limit) ?? '', 10) || DEFAULT_LIMIT;
  const limit = Math.min(Math.max(1, rawLimit), MAX_LIMIT);
  const offset = (page - 1) * limit;
  return { page, limit, offset };
}

/**
 * Apply pagination to an array of items
 */
export function paginate<T>(items: T[], params: PaginationParams): PaginatedResponse<T> {
  const total = items.length;
  const totalPages = Math.ceil(total / params.limit) || 1;
  const paged = items.slice(params.offset, params.offset + params.limit);

  return {
    items: paged,
    pagination: {
      page: params.page,
      limit: params.limit,
      total,
      totalPages,
      hasMore: params.page < totalPages,
    },
  };
}
