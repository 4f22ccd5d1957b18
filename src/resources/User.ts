// src/resources/User.ts

import type {
  CommentRecord,
  ModeratedSubredditRecord,
  PostRecord,
  UserRecord,
} from '../core/sanitizer/types';
import { BaseResource } from './BaseResource';
import { USERNAME_AVAILABLE, userPaths } from './endpoints';
import type { CoreDeps, ListingOptions, RequestOptions, SubredditCount } from './types';

export class User extends BaseResource {
  private readonly paths: ReturnType<typeof userPaths>;

  constructor(
    deps: CoreDeps,
    readonly name: string
  ) {
    super(deps);
    this.paths = userPaths(name);
  }

  profile(options: RequestOptions = {}): Promise<UserRecord> {
    return this.fetchOne(this.paths.about, (raw) => this.deps.sanitizer.user(raw), options, `User u/${this.name}`);
  }

  /**
   * Whether the username is taken. An unrecognised availability answer counts
   * as "does not exist".
   */
  async exists(options: RequestOptions = {}): Promise<boolean> {
    options.status?.update(`Checking whether u/${this.name} exists`);
    const raw = await this.getRaw(USERNAME_AVAILABLE, options, { user: this.name });
    return this.deps.sanitizer.usernameAvailable(raw) === false;
  }

  posts(options: ListingOptions = {}): Promise<PostRecord[]> {
    return this.paginate(
      this.paths.submitted,
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

  /** Posts and comments, interleaved as the upstream returns them. */
  overview(options: ListingOptions = {}): Promise<Array<PostRecord | CommentRecord>> {
    return this.paginate(
      this.paths.overview,
      (page) => this.deps.sanitizer.listing(page, ['post', 'comment'] as const),
      options
    );
  }

  async moderatedSubreddits(options: RequestOptions = {}): Promise<ModeratedSubredditRecord[]> {
    options.status?.update(`Retrieving subreddits moderated by u/${this.name}`);
    const raw = await this.getRaw(this.paths.moderated, options);
    return this.deps.sanitizer.moderatedSubreddits(raw);
  }

  /**
   * Subreddits the user's top posts were made in, most frequent first.
   * Ties keep the order in which the subreddits were first seen.
   */
  async topSubreddits(topN: number, options: ListingOptions = {}): Promise<SubredditCount[]> {
    const posts = await this.posts({ ...options, sort: 'top' });

    const counts = new Map<string, number>();
    for (const post of posts) {
      counts.set(post.subreddit, (counts.get(post.subreddit) ?? 0) + 1);
    }
    this.deps.logger.debug('Counted subreddits of top posts', {
      user: this.name,
      posts: posts.length,
      subreddits: counts.size,
    });

    return Array.from(counts, ([subreddit, count]) => ({ subreddit, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, Math.max(0, topN));
  }
}
