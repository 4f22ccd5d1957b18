// src/resources/BaseResource.ts

import type { QueryParams } from '../core/http/types';
import type { ExpandMoreOptions } from '../core/pagination/types';
import type { RedditRecord, SanitizedPage } from '../core/sanitizer/types';
import { EntityNotFoundError } from '../utils/errors';
import type { CoreDeps, ListingOptions, RequestOptions } from './types';

export const DEFAULT_LIMIT = 100;

export abstract class BaseResource {
  constructor(protected deps: CoreDeps) {}

  protected listingParams(options: ListingOptions, extra: QueryParams = {}): QueryParams {
    return {
      sort: options.sort ?? 'all',
      t: options.timeframe ?? 'all',
      raw_json: 1,
      ...extra,
    };
  }

  protected paginate<T extends RedditRecord>(
    url: string,
    sanitize: (response: unknown) => SanitizedPage<T>,
    options: ListingOptions,
    params: QueryParams = this.listingParams(options),
    expandMore?: ExpandMoreOptions<T>
  ): Promise<T[]> {
    return this.deps.paginator.paginate({
      url,
      params,
      limit: options.limit ?? DEFAULT_LIMIT,
      sanitize,
      dedupeKey: options.dedupeKey,
      expandMore,
      status: options.status,
      signal: options.signal,
    });
  }

  /** One GET, raw body. */
  protected async getRaw(url: string, options: RequestOptions, query: QueryParams = {}): Promise<unknown> {
    const response = await this.deps.http.get(url, {
      query: { raw_json: 1, ...query },
      signal: options.signal,
    });
    return response.data;
  }

  /**
   * Fetches a single entity and fails with `EntityNotFoundError` when nothing
   * usable comes back (the upstream answers unknown names with an empty
   * listing or a redirect to search).
   */
  protected async fetchOne<T>(
    url: string,
    sanitize: (response: unknown) => T | null,
    options: RequestOptions,
    description: string,
    query: QueryParams = {}
  ): Promise<T> {
    options.status?.update(`Retrieving ${description}`);
    const entity = sanitize(await this.getRaw(url, options, query));
    if (entity === null) {
      throw new EntityNotFoundError(`${description} not found`, { url });
    }
    return entity;
  }
}
