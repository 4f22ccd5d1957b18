// src/core/pagination/types.ts

import type { QueryParams } from '../http/types';
import type { DedupeKeyField, SanitizedPage } from '../sanitizer/types';
import type { LoggerLike, StatusSink } from '../../observability/types';

export interface PaginateOptions<T> {
  url: string;
  params?: QueryParams;
  /** Upper bound on returned records. */
  limit: number;
  sanitize: (response: unknown) => SanitizedPage<T>;
  dedupeKey?: DedupeKeyField;
  expandMore?: ExpandMoreOptions<T>;
  status?: StatusSink;
  logger?: LoggerLike;
  signal?: AbortSignal;
}

/**
 * Resolution of continuation markers through the additional-comments endpoint.
 */
export interface ExpandMoreOptions<T> {
  /** Fullname of the post the markers belong to (`t3_...`). */
  linkId: string;
  sanitize: (response: unknown) => T[];
  /** Defaults to `/api/morechildren.json`. */
  url?: string;
  /** Ids per sub-fetch, default 100. */
  batchSize?: number;
}

export interface PaginationStats {
  pages: number;
  subRequests: number;
  stopReason: StopReason;
}

export type StopReason = 'short_page' | 'limit_reached' | 'no_cursor' | 'repeated_cursor';
