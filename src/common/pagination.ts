export const DEFAULT_PAGE = 1;
export const DEFAULT_ITEMS_PER_PAGE = 10;
export const MAX_ITEMS_PER_PAGE = 1000;

/**
 * 1-based page and page size, as carried by every list filter
 */
export interface PageFilter {
  page?: number;
  itemsPerPage?: number;
}

/**
 * skip = (page - 1) * itemsPerPage, take = itemsPerPage
 */
export const toSkipTake = (filter: PageFilter): { skip: number; take: number } => {
  const page = Math.max(DEFAULT_PAGE, Math.trunc(filter.page ?? DEFAULT_PAGE));
  const take = Math.min(
    MAX_ITEMS_PER_PAGE,
    Math.max(1, Math.trunc(filter.itemsPerPage ?? DEFAULT_ITEMS_PER_PAGE))
  );
  return { skip: (page - 1) * take, take };
};
