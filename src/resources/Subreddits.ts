// src/resources/Subreddits.ts

import type { SubredditRecord } from '../core/sanitizer/types';
import { BaseResource } from './BaseResource';
import { SUBREDDIT_LISTINGS, SubredditListing } from './endpoints';
import type { ListingOptions } from './types';

export class Subreddits extends BaseResource {
  all(options: ListingOptions = {}): Promise<SubredditRecord[]> {
    return this.list('all', options);
  }

  default(options: ListingOptions = {}): Promise<SubredditRecord[]> {
    return this.list('default', options);
  }

  new(options: ListingOptions = {}): Promise<SubredditRecord[]> {
    return this.list('new', options);
  }

  popular(options: ListingOptions = {}): Promise<SubredditRecord[]> {
    return this.list('popular', options);
  }

  list(listing: SubredditListing, options: ListingOptions = {}): Promise<SubredditRecord[]> {
    return this.paginate(
      SUBREDDIT_LISTINGS[listing],
      (page) => this.deps.sanitizer.listing(page, ['subreddit'] as const),
      options
    );
  }
}
