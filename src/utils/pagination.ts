import type { PageRequest, PaginatedResult } from "../types/entities";

export interface PaginationLimits {
  defaultPerPage: number;
  maxPerPage: number;
}

/** Applies defaults and clamps `perPage` to the configured maximum. */
export function resolvePageRequest(
  query: { page?: number; per_page?: number },
  limits: PaginationLimits
): PageRequest {
  const page = query.page ?? 1;
  const perPage = Math.min(
    query.per_page ?? limits.defaultPerPage,
    limits.maxPerPage
  );
  return { page, perPage };
}

export function pageOffset(request: PageRequest): number {
  return (request.page - 1) * request.perPage;
}

export function buildPage<T>(
  items: T[],
  totalItems: number,
  request: PageRequest
): PaginatedResult<T> {
  return {
    items,
    page: request.page,
    perPage: request.perPage,
    totalItems,
    totalPages: totalItems === 0 ? 0 : Math.ceil(totalItems / request.perPage),
  };
}
