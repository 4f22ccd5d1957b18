// src/resources/Search.ts

import type { PostRecord, SubredditRecord, UserRecord, UserSubredditRecord } from '../core/sanitizer/types';
import { BaseResource } from './BaseResource';
import { SEARCH } from './endpoints';
import type { CoreDeps, ListingOptions } from './types';

/**
 * Site-wide search for one query string.
 */
export class Search extends BaseResource {
  constructor(
    deps: CoreDeps,
    readonly query: string
  ) {
    super(deps);
  }

  posts(options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.paginate(
      SEARCH.posts,
      (page) => this.deps.sanitizer.listing(page, ['post'] as const),
      options,
      this.listingParams(options, { q: this.query })
    );
  }

  subreddits(options: ListingOptions = {}): Promise<SubredditRecord[]> {
    return this.paginate(
      SEARCH.subreddits,
      (page) => this.deps.sanitizer.listing(page, ['subreddit'] as const),
      options,
      this.listingParams(options, { q: this.query })
    );
  }

  /** Accounts may come back as `t2` users or as their profile spaces. */
  users(options: ListingOptions = {}): Promise<Array<UserRecord | UserSubredditRecord>> {
    return this.paginate(
      SEARCH.users,
      (page) => this.deps.sanitizer.listing(page, ['user', 'user_subreddit'] as const),
      options,
      this.listingParams(options, { q: this.query })
    );
  }
}
