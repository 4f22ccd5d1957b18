// src/index.ts

export { KarmaClient, withClient } from './client';
export type { ClientOverrides } from './client';
export {
  ClientConfigSchema,
  loadConfigFromEnv,
  validateConfig,
  validateConfigSafe,
} from './config/ConfigValidator';
export type { ClientConfig, ResolvedClientConfig } from './config/ConfigValidator';

export { HttpCore } from './core/http/HttpCore';
export type { HttpRequestConfig, HttpResponse, QueryParams, Transport } from './core/http/types';
export { Sanitizer } from './core/sanitizer/Sanitizer';
export { dedupeKeyOf, isKind } from './core/sanitizer/types';
export type {
  CommentRecord,
  DedupeKeyField,
  ModeratedSubredditRecord,
  PostRecord,
  RecordKind,
  RecordOf,
  RedditRecord,
  SanitizedPage,
  SubredditRecord,
  UserRecord,
  UserSubredditRecord,
  WikiPageRecord,
} from './core/sanitizer/types';
export { Paginator } from './core/pagination/Paginator';
export type { PaginationResult, PaginatorDeps } from './core/pagination/Paginator';
export type { ExpandMoreOptions, PaginateOptions, PaginationStats, StopReason } from './core/pagination/types';

export type { ListingOptions, RequestOptions, SortOrder, SubredditCount, Timeframe } from './resources/types';
export type { PostListing, SearchTarget, SubredditListing, UserListing } from './resources/endpoints';

export { Logger } from './observability/Logger';
export type { LoggerConfig, LogLevel } from './observability/Logger';
export { noopLogger, noopStatus } from './observability/types';
export type { LoggerLike, StatusSink } from './observability/types';

export { exportRecords, EXPORT_FORMATS } from './export/Exporter';
export type { ExportFormat, ExportOptions } from './export/Exporter';

export { buildUserAgent, VERSION } from './meta';

// Export error classes for error handling
export {
  KarmaError,
  ConfigError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  OperationCancelledError,
  EntityNotFoundError,
  ValidationError,
  summarizeError,
} from './utils/errors';
