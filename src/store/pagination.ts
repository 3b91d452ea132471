import { NormalizedPage, Page, PageRequest } from "./types";

export const DEFAULT_PAGE_LIMIT = 100;
export const MAX_PAGE_LIMIT = 1000;

export function normalizePage(page: PageRequest = {}): NormalizedPage {
  const rawLimit = page.limit !== undefined && Number.isFinite(page.limit) ? Math.trunc(page.limit) : DEFAULT_PAGE_LIMIT;
  const rawOffset = page.offset !== undefined && Number.isFinite(page.offset) ? Math.trunc(page.offset) : 0;

  return {
    limit: Math.min(Math.max(rawLimit, 1), MAX_PAGE_LIMIT),
    offset: Math.max(rawOffset, 0),
  };
}

export function toPage<T>(items: T[], page: NormalizedPage, total: number): Page<T> {
  return {
    items,
    limit: page.limit,
    offset: page.offset,
    total,
    returned: items.length,
  };
}
