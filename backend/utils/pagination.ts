/**
 * Pagination helpers for list endpoints.
 * Lists always answer with a `{ data, total, page, limit }` envelope.
 */

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

export interface PageParams {
  page: number;
  limit: number;
  skip: number;
}

function positiveInt(value: unknown): number | undefined {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

/** Parse page/limit from query params with safe bounds. */
export function parsePagination(
  query: { page?: unknown; limit?: unknown },
  defaults: { limit?: number; maxLimit?: number } = {}
): PageParams {
  const maxLimit = defaults.maxLimit ?? MAX_LIMIT;
  const page = positiveInt(query.page) ?? 1;
  const limit = Math.min(maxLimit, positiveInt(query.limit) ?? defaults.limit ?? DEFAULT_LIMIT);
  return { page, limit, skip: (page - 1) * limit };
}

export interface PaginatedResponse<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
}

export function paginatedResponse<T>(data: T[], total: number, params: PageParams): PaginatedResponse<T> {
  return { data, total, page: params.page, limit: params.limit };
}
