// src/core/sanitizer/Sanitizer.ts

import { z, ZodTypeAny } from 'zod';
import { LoggerLike, noopLogger } from '../../observability/types';
import {
  CommentSchema,
  ModeratedSubredditSchema,
  PostSchema,
  SubredditSchema,
  UserSchema,
  UserSubredditSchema,
  WikiPageSchema,
} from './schemas';
import {
  CommentRecord,
  isKind,
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
} from './types';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function childrenOf(page: unknown): unknown[] {
  if (!isObject(page) || !isObject(page.data)) return [];
  const { children } = page.data;
  return Array.isArray(children) ? children : [];
}

function moreIdsOf(node: JsonObject): string[] {
  if (!isObject(node.data) || !Array.isArray(node.data.children)) return [];
  return node.data.children.filter((id): id is string => typeof id === 'string' && id.length > 0);
}

/**
 * Turns raw upstream JSON into typed records.
 *
 * Every method accepts `unknown` and degrades to an empty result rather than
 * throwing: malformed nodes are skipped and logged at warn.
 */
export class Sanitizer {
  constructor(private readonly logger: LoggerLike = noopLogger) {}

  entity(node: unknown): RedditRecord | null {
    if (!isObject(node) || typeof node.kind !== 'string' || !isObject(node.data)) {
      return null;
    }

    const { data } = node;
    switch (node.kind) {
      case 't1':
        return this.parse('comment', CommentSchema, data);
      case 't2':
        return this.parse('user', UserSchema, data);
      case 't3':
        return this.parse('post', PostSchema, data);
      case 't5':
        return data.subreddit_type === 'user'
          ? this.parse('user_subreddit', UserSubredditSchema, data)
          : this.parse('subreddit', SubredditSchema, data);
      case 'wikipage':
        return this.parse('wiki_page', WikiPageSchema, data);
      default:
        return null;
    }
  }

  listing<K extends RecordKind = RecordKind>(
    page: unknown,
    kinds?: readonly K[]
  ): SanitizedPage<RecordOf<K>> {
    const children = childrenOf(page);
    const items: RecordOf<K>[] = [];
    const moreIds: string[] = [];

    for (const child of children) {
      if (isObject(child) && child.kind === 'more') {
        moreIds.push(...moreIdsOf(child));
        continue;
      }
      const record = this.entity(child);
      if (record && this.accepts(record, kinds)) {
        items.push(record);
      }
    }

    return { items, rawCount: children.length, after: this.after(page), moreIds };
  }

  after(page: unknown): string | null {
    if (!isObject(page) || !isObject(page.data)) return null;
    const { after } = page.data;
    return typeof after === 'string' && after.length > 0 ? after : null;
  }

  /**
   * Flattens the comment half of a `[post-listing, comment-listing]` response
   * depth-first. Continuation markers at any depth contribute to `moreIds`.
   */
  commentTree(response: unknown): SanitizedPage<CommentRecord> {
    const listing = Array.isArray(response) ? response[1] : undefined;
    const items: CommentRecord[] = [];
    const moreIds: string[] = [];
    const topLevel = childrenOf(listing);

    const walk = (nodes: unknown[]): void => {
      for (const node of nodes) {
        if (!isObject(node)) continue;
        if (node.kind === 'more') {
          moreIds.push(...moreIdsOf(node));
          continue;
        }
        if (node.kind !== 't1') continue;

        const comment = this.entity(node);
        if (comment && comment.kind === 'comment') {
          items.push(comment);
        }
        if (isObject(node.data)) {
          walk(childrenOf(node.data.replies));
        }
      }
    };

    walk(topLevel);
    return { items, rawCount: topLevel.length, after: this.after(listing), moreIds };
  }

  /**
   * Comments from an additional-comments response,
   * `{json: {data: {things: [...]}}}`.
   */
  moreChildren(response: unknown): CommentRecord[] {
    if (!isObject(response) || !isObject(response.json) || !isObject(response.json.data)) {
      return [];
    }
    const { things } = response.json.data;
    if (!Array.isArray(things)) return [];

    const comments: CommentRecord[] = [];
    for (const thing of things) {
      const record = this.entity(thing);
      if (record && record.kind === 'comment') {
        comments.push(record);
      }
    }
    return comments;
  }

  user(response: unknown): UserRecord | null {
    const record = this.entity(response);
    return record && record.kind === 'user' ? record : null;
  }

  subreddit(response: unknown): SubredditRecord | UserSubredditRecord | null {
    const record = this.entity(response);
    return record && this.accepts(record, ['subreddit', 'user_subreddit'] as const) ? record : null;
  }

  wikiPage(response: unknown): WikiPageRecord | null {
    const record = this.entity(response);
    return record && record.kind === 'wiki_page' ? record : null;
  }

  post(response: unknown): PostRecord | null {
    const listing = Array.isArray(response) ? response[0] : response;
    const [first] = this.listing(listing, ['post'] as const).items;
    return first ?? null;
  }

  moderatedSubreddits(response: unknown): ModeratedSubredditRecord[] {
    if (!isObject(response) || !Array.isArray(response.data)) return [];

    const rows: ModeratedSubredditRecord[] = [];
    for (const row of response.data) {
      const record = this.parse('moderated_subreddit', ModeratedSubredditSchema, row);
      if (record) rows.push(record);
    }
    return rows;
  }

  wikiPageNames(response: unknown): string[] {
    if (!isObject(response) || !Array.isArray(response.data)) return [];
    return response.data.filter((name): name is string => typeof name === 'string');
  }

  usernameAvailable(response: unknown): boolean | null {
    return typeof response === 'boolean' ? response : null;
  }

  private accepts<K extends RecordKind>(
    record: RedditRecord,
    kinds?: readonly K[]
  ): record is RecordOf<K> {
    return kinds === undefined || isKind(record, kinds);
  }

  private parse<K extends RecordKind, S extends ZodTypeAny>(
    kind: K,
    schema: S,
    data: unknown
  ): ({ kind: K } & z.output<S>) | null {
    const result = schema.safeParse(data);
    if (!result.success) {
      this.logger.warn('Skipping malformed entity', {
        kind,
        id: isObject(data) ? data.id : undefined,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return null;
    }
    return { ...result.data, kind };
  }
}
