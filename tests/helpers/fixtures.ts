// tests/helpers/fixtures.ts

import type { HttpRequestConfig, HttpResponse, QueryParams, Transport } from '../../src/core/http/types';
import type { LoggerLike } from '../../src/observability/types';
import { vi } from 'vitest';

export function rawPost(id: string, overrides: Record<string, unknown> = {}) {
  return {
    kind: 't3',
    data: {
      id,
      name: `t3_${id}`,
      title: `Post ${id}`,
      subreddit: 'testsub',
      created_utc: 1700000000,
      score: 10,
      num_comments: 2,
      ...overrides,
    },
  };
}

export function rawComment(id: string, overrides: Record<string, unknown> = {}) {
  return {
    kind: 't1',
    data: {
      id,
      name: `t1_${id}`,
      body: `Comment ${id}`,
      link_id: 't3_post1',
      parent_id: 't3_post1',
      created_utc: 1700000000,
      author: 'commenter',
      score: 1,
      ...overrides,
    },
  };
}

export function rawSubreddit(id: string, displayName: string, overrides: Record<string, unknown> = {}) {
  return {
    kind: 't5',
    data: {
      id,
      name: `t5_${id}`,
      display_name: displayName,
      display_name_prefixed: `r/${displayName}`,
      subreddit_type: 'public',
      subscribers: 1000,
      ...overrides,
    },
  };
}

export function rawUserSpace(id: string, username: string) {
  return {
    kind: 't5',
    data: {
      id,
      name: `t5_${id}`,
      display_name: `u_${username}`,
      display_name_prefixed: `u/${username}`,
      subreddit_type: 'user',
      subscribers: 5,
    },
  };
}

export function listing(children: unknown[], after: string | null = null) {
  return { kind: 'Listing', data: { children, after, before: null } };
}

export function more(ids: string[]) {
  return { kind: 'more', data: { count: ids.length, name: 't1__', children: ids } };
}

/** `[post-listing, comment-listing]` as returned for one post. */
export function commentTree(comments: unknown[], postId = 'post1') {
  return [listing([rawPost(postId)]), listing(comments)];
}

export function moreChildrenResponse(things: unknown[]) {
  return { json: { errors: [], data: { things } } };
}

export function ids(from: number, to: number): string[] {
  const result: string[] = [];
  for (let i = from; i <= to; i++) result.push(String(i));
  return result;
}

export interface RecordedCall {
  url: string;
  query: QueryParams;
}

/**
 * In-process transport that answers from a handler and records every call.
 */
export class StubTransport implements Transport {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly handler: (call: RecordedCall, signal?: AbortSignal) => unknown) {}

  async get(url: string, config: HttpRequestConfig = {}): Promise<HttpResponse<unknown>> {
    const call = { url, query: config.query ?? {} };
    this.calls.push(call);
    const data = await this.handler(call, config.signal);
    return { data, status: 200, headers: {} };
  }

  callsTo(url: string): RecordedCall[] {
    return this.calls.filter((call) => call.url === url);
  }
}

/** Answers successive calls with the given bodies, then fails. */
export function scripted(...bodies: unknown[]): StubTransport {
  let index = 0;
  return new StubTransport(() => {
    if (index >= bodies.length) {
      throw new Error(`Unexpected request #${index + 1}`);
    }
    return bodies[index++];
  });
}

export function spyLogger() {
  return {
    debug: vi.fn<[string, Record<string, unknown>?], void>(),
    info: vi.fn<[string, Record<string, unknown>?], void>(),
    warn: vi.fn<[string, Record<string, unknown>?], void>(),
  } satisfies LoggerLike;
}
