import { CATALOG } from '../config/constants.js';

export interface Page {
  limit: number;
  offset: number;
}

/**
 * Bring search paging into the range MusicBrainz accepts.
 * A limit of 0 or less (or not a number) means the default; above the cap
 * means the cap. Negative offsets become 0.
 */
export function normalizePaging(limit: number | undefined, offset: number | undefined): Page {
  let pageLimit: number = CATALOG.SEARCH_DEFAULT_LIMIT;
  if (limit !== undefined && Number.isFinite(limit) && limit > 0) {
    pageLimit = Math.min(Math.trunc(limit), CATALOG.SEARCH_MAX_LIMIT);
  }

  const pageOffset = offset !== undefined && Number.isFinite(offset) && offset > 0
    ? Math.trunc(offset)
    : 0;

  return { limit: Math.max(1, pageLimit), offset: pageOffset };
}
