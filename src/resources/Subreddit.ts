// src/resources/Subreddit.ts

import type {
  CommentRecord,
  PostRecord,
  SubredditRecord,
  UserSubredditRecord,
  WikiPageRecord,
} from '../core/sanitizer/types';
import { BaseResource } from './BaseResource';
import { subredditPaths } from './endpoints';
import type { CoreDeps, ListingOptions, RequestOptions } from './types';

export class Subreddit extends BaseResource {
  private readonly paths: ReturnType<typeof subredditPaths>;

  constructor(
    deps: CoreDeps,
    readonly name: string
  ) {
    super(deps);
    this.paths = subredditPaths(name);
  }

  profile(options: RequestOptions = {}): Promise<SubredditRecord | UserSubredditRecord> {
    return this.fetchOne(
      this.paths.about,
      (raw) => this.deps.sanitizer.subreddit(raw),
      options,
      `Subreddit r/${this.name}`
    );
  }

  posts(options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.paginate(
      this.paths.posts,
      (page) => this.deps.sanitizer.listing(page, ['post'] as const),
      options
    );
  }

  comments(options: ListingOptions = {}): Promise<CommentRecord[]> {
    return this.paginate(
      this.paths.comments,
      (page) => this.deps.sanitizer.listing(page, ['comment'] as const),
      options
    );
  }

  search(query: string, options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.paginate(
      this.paths.search,
      (page) => this.deps.sanitizer.listing(page, ['post'] as const),
      options,
      this.listingParams(options, { q: query, restrict_sr: 1 })
    );
  }

  async wikiPages(options: RequestOptions = {}): Promise<string[]> {
    options.status?.update(`Retrieving wiki pages of r/${this.name}`);
    const raw = await this.getRaw(this.paths.wikiPages, options);
    return this.deps.sanitizer.wikiPageNames(raw);
  }

  wikiPage(pageName: string, options: RequestOptions = {}): Promise<WikiPageRecord> {
    return this.fetchOne(
      this.paths.wikiPage(pageName),
      (raw) => this.deps.sanitizer.wikiPage(raw),
      options,
      `Wiki page ${pageName} of r/${this.name}`
    );
  }
}
