// src/resources/Posts.ts

import type { PostRecord } from '../core/sanitizer/types';
import { BaseResource } from './BaseResource';
import { POST_LISTINGS, PostListing } from './endpoints';
import type { ListingOptions } from './types';

export class Posts extends BaseResource {
  best(options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.list('best', options);
  }

  controversial(options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.list('controversial', options);
  }

  frontPage(options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.list('frontPage', options);
  }

  new(options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.list('new', options);
  }

  popular(options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.list('popular', options);
  }

  rising(options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.list('rising', options);
  }

  top(options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.list('top', options);
  }

  list(listing: PostListing, options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.paginate(
      POST_LISTINGS[listing],
      (page) => this.deps.sanitizer.listing(page, ['post'] as const),
      options
    );
  }
}
