// src/resources/Post.ts

import type { CommentRecord, PostRecord } from '../core/sanitizer/types';
import { BaseResource } from './BaseResource';
import { postPath } from './endpoints';
import type { CoreDeps, ListingOptions, RequestOptions } from './types';

export class Post extends BaseResource {
  readonly id: string;
  private readonly path: string;

  constructor(
    deps: CoreDeps,
    id: string,
    readonly subreddit: string
  ) {
    super(deps);
    // Accept fullnames too
    this.id = id.replace(/^t3_/, '');
    this.path = postPath(this.id, subreddit);
  }

  info(options: RequestOptions = {}): Promise<PostRecord> {
    return this.fetchOne(this.path, (raw) => this.deps.sanitizer.post(raw), options, `Post ${this.id} in r/${this.subreddit}`);
  }

  /**
   * The comment tree flattened depth-first, with "load more" markers
   * resolved until `limit` is met.
   */
  comments(options: ListingOptions = {}): Promise<CommentRecord[]> {
    return this.paginate(
      this.path,
      (raw) => this.deps.sanitizer.commentTree(raw),
      options,
      this.listingParams(options),
      {
        linkId: `t3_${this.id}`,
        sanitize: (raw) => this.deps.sanitizer.moreChildren(raw),
      }
    );
  }
}
