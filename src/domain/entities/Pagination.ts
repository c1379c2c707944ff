/**
 * Cursor-based paging information returned with every collection
 */
export interface Pagination {
  readonly refreshUrl: string;
  readonly nextUrl?: string;
  /** Only present when `includeCount` was requested */
  readonly total?: number;
  readonly matched?: number;
  readonly refreshCursor?: string;
  readonly nextCursor?: string;
}

/**
 * Paging information for log listings (no refresh link)
 */
export interface LogPagination {
  readonly nextUrl?: string;
  readonly matched?: number;
  readonly nextCursor?: string;
}

/**
 * Optional paging parameters accepted by every list operation
 */
export interface PageOptions {
  /** Number of records per page. The service default is 100. */
  pageLimit?: number;
  /** Whether to include `total` in the pagination block */
  includeCount?: boolean;
  /** Property to sort by, prefixed with `-` for descending order */
  sort?: string;
  /** Token from `pagination.nextCursor` of the previous page */
  cursor?: string;
}
