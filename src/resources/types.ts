// src/resources/types.ts

import type { Transport } from '../core/http/types';
import type { DedupeKeyField } from '../core/sanitizer/types';
import type { Paginator } from '../core/pagination/Paginator';
import type { Sanitizer } from '../core/sanitizer/Sanitizer';
import type { LoggerLike, StatusSink } from '../observability/types';

export interface CoreDeps {
  http: Transport;
  sanitizer: Sanitizer;
  paginator: Paginator;
  logger: LoggerLike;
}

export const SORT_ORDERS = [
  'all',
  'best',
  'comments',
  'controversial',
  'hot',
  'new',
  'relevance',
  'rising',
  'top',
] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

export const TIMEFRAMES = ['all', 'hour', 'day', 'week', 'month', 'year'] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export interface RequestOptions {
  status?: StatusSink;
  signal?: AbortSignal;
}

export interface ListingOptions extends RequestOptions {
  /** Defaults to 100. */
  limit?: number;
  sort?: SortOrder;
  timeframe?: Timeframe;
  /** Identity used to drop duplicates, `'fullname'` unless set. */
  dedupeKey?: DedupeKeyField;
}

export interface SubredditCount {
  subreddit: string;
  count: number;
}
