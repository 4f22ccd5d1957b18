// src/client.ts

import { ClientConfig, ResolvedClientConfig, validateConfig } from './config/ConfigValidator';
import { HttpCore } from './core/http/HttpCore';
import type { Transport } from './core/http/types';
import { Paginator } from './core/pagination/Paginator';
import { Sanitizer } from './core/sanitizer/Sanitizer';
import { buildUserAgent } from './meta';
import { Logger } from './observability/Logger';
import type { LoggerLike } from './observability/types';
import { Post } from './resources/Post';
import { Posts } from './resources/Posts';
import { Search } from './resources/Search';
import { Subreddit } from './resources/Subreddit';
import { Subreddits } from './resources/Subreddits';
import type { CoreDeps } from './resources/types';
import { User } from './resources/User';
import { Users } from './resources/Users';

export interface ClientOverrides {
  logger?: LoggerLike;
  /** Replaces the HTTP session, e.g. with a test double. */
  transport?: Transport;
  /** Source of randomness for pacing delays. */
  random?: () => number;
}

export class KarmaClient {
  readonly users: Users;
  readonly posts: Posts;
  readonly subreddits: Subreddits;

  private readonly core: CoreDeps;
  private readonly session?: HttpCore;
  private closed = false;

  private constructor(
    readonly config: ResolvedClientConfig,
    overrides: ClientOverrides
  ) {
    // Build every collaborator before the resources that share them
    // Warnings only unless configured
    const logger = overrides.logger ?? new Logger({ ...config.logging, level: config.logging?.level ?? 'warn' });
    let http: Transport;
    if (overrides.transport) {
      http = overrides.transport;
    } else {
      this.session = new HttpCore(
        {
          baseUrl: config.http.baseUrl,
          timeoutMs: config.http.timeoutMs,
          userAgent: buildUserAgent(config.userAgentContact),
        },
        logger
      );
      http = this.session;
    }
    const sanitizer = new Sanitizer(logger);
    const paginator = new Paginator({
      transport: http,
      pageSize: config.pagination.pageSize,
      pacing: config.pacing,
      logger,
      random: overrides.random,
    });

    this.core = { http, sanitizer, paginator, logger };

    this.users = new Users(this.core);
    this.posts = new Posts(this.core);
    this.subreddits = new Subreddits(this.core);
  }

  /**
   * Validate configuration and open a client. The client owns one keep-alive
   * HTTP session; call `close()` (or use `withClient`) when done.
   *
   * @throws {ConfigError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const client = KarmaClient.create({ userAgentContact: 'you@example.com' });
   * try {
   *   const posts = await client.subreddit('typescript').posts({ limit: 50, sort: 'top' });
   * } finally {
   *   client.close();
   * }
   * ```
   */
  static create(config: ClientConfig = {}, overrides: ClientOverrides = {}): KarmaClient {
    const client = new KarmaClient(validateConfig(config), overrides);
    client.core.logger.debug('Client created', {
      baseUrl: client.config.http.baseUrl,
      pageSize: client.config.pagination.pageSize,
    });
    return client;
  }

  get logger(): LoggerLike {
    return this.core.logger;
  }

  search(query: string): Search {
    return new Search(this.core, query);
  }

  user(name: string): User {
    return new User(this.core, name);
  }

  subreddit(name: string): Subreddit {
    return new Subreddit(this.core, name);
  }

  post(id: string, subreddit: string): Post {
    return new Post(this.core, id, subreddit);
  }

  /**
   * Release the HTTP session. Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.session?.close();
  }
}

/**
 * Runs `fn` with a fresh client and closes it afterwards, whether `fn`
 * resolves or throws.
 */
export async function withClient<T>(
  config: ClientConfig,
  fn: (client: KarmaClient) => Promise<T>,
  overrides: ClientOverrides = {}
): Promise<T> {
  const client = KarmaClient.create(config, overrides);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
