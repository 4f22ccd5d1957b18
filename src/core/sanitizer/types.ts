// src/core/sanitizer/types.ts

import { z } from 'zod';
import { RECORD_SCHEMAS } from './schemas';

type RecordSchemas = typeof RECORD_SCHEMAS;

export type RecordKind = keyof RecordSchemas;

export type RecordOf<K extends RecordKind> = K extends RecordKind
  ? Readonly<{ kind: K } & z.output<RecordSchemas[K]>>
  : never;

/** Closed union of every record the sanitizer can produce. */
export type RedditRecord = { [K in RecordKind]: RecordOf<K> }[RecordKind];

export type UserRecord = RecordOf<'user'>;
export type PostRecord = RecordOf<'post'>;
export type CommentRecord = RecordOf<'comment'>;
export type SubredditRecord = RecordOf<'subreddit'>;
export type UserSubredditRecord = RecordOf<'user_subreddit'>;
export type WikiPageRecord = RecordOf<'wiki_page'>;
export type ModeratedSubredditRecord = RecordOf<'moderated_subreddit'>;

/**
 * One sanitized listing page. `rawCount` counts every child the upstream
 * returned, before filtering, so the paginator can tell a short page apart
 * from a page that merely had nothing usable on it.
 */
export interface SanitizedPage<T = RedditRecord> {
  items: T[];
  rawCount: number;
  after: string | null;
  moreIds: string[];
}

export type DedupeKeyField = 'fullname' | 'id';

export function isKind<K extends RecordKind>(
  record: RedditRecord,
  kinds: readonly K[]
): record is RecordOf<K> {
  return kinds.some((kind) => kind === record.kind);
}

function fullnameOf(record: RedditRecord): string | undefined {
  switch (record.kind) {
    case 'user':
      return record.id ? `t2_${record.id}` : undefined;
    case 'wiki_page':
      return record.revision_id ?? undefined;
    default:
      return record.name;
  }
}

function bareIdOf(record: RedditRecord): string | undefined {
  switch (record.kind) {
    case 'user':
      return record.id ?? record.name;
    case 'wiki_page':
    case 'moderated_subreddit':
      return undefined;
    default:
      return record.id ?? undefined;
  }
}

/**
 * Identity used to collapse duplicates across pages. Post and comment ids are
 * numbered separately, so the type-prefixed fullname is preferred. Undefined
 * means the record carries no usable key and is dropped.
 */
export function dedupeKeyOf(
  record: RedditRecord,
  field: DedupeKeyField = 'fullname'
): string | undefined {
  return field === 'fullname'
    ? fullnameOf(record) ?? bareIdOf(record)
    : bareIdOf(record) ?? fullnameOf(record);
}
