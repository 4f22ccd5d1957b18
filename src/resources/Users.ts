// src/resources/Users.ts

import type { UserSubredditRecord } from '../core/sanitizer/types';
import { BaseResource } from './BaseResource';
import { USER_LISTINGS, UserListing } from './endpoints';
import type { ListingOptions } from './types';

/** Site-wide user listings. Each user is represented by their profile space. */
export class Users extends BaseResource {
  all(options: ListingOptions = {}): Promise<UserSubredditRecord[]> {
    return this.list('all', options);
  }

  new(options: ListingOptions = {}): Promise<UserSubredditRecord[]> {
    return this.list('new', options);
  }

  popular(options: ListingOptions = {}): Promise<UserSubredditRecord[]> {
    return this.list('popular', options);
  }

  list(listing: UserListing, options: ListingOptions = {}): Promise<UserSubredditRecord[]> {
    return this.paginate(
      USER_LISTINGS[listing],
      (page) => this.deps.sanitizer.listing(page, ['user_subreddit'] as const),
      options
    );
  }
}
