// src/cli/render.ts

import pc from 'picocolors';
import type { RedditRecord } from '../core/sanitizer/types';
import type { SubredditCount } from '../resources/types';

export type Colors = ReturnType<typeof pc.createColors>;

export type CommandResult =
  | { type: 'records'; records: readonly RedditRecord[] }
  | { type: 'profile'; record: RedditRecord }
  | { type: 'names'; title: string; names: string[] }
  | { type: 'counts'; counts: SubredditCount[] }
  | { type: 'exists'; name: string; exists: boolean };

const EXCERPT_LENGTH = 80;

export function excerpt(text: string, length: number = EXCERPT_LENGTH): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > length ? `${flat.slice(0, length - 1)}…` : flat;
}

function count(value: number | null | undefined): string {
  return (value ?? 0).toLocaleString('en-US');
}

/**
 * Terminal output for command results, one line per record.
 */
export class Renderer {
  constructor(private readonly c: Colors = pc) {}

  record(record: RedditRecord): string {
    const { c } = this;
    switch (record.kind) {
      case 'post':
        return [
          c.bold(record.title),
          c.dim(`r/${record.subreddit}`),
          c.yellow(`▲ ${count(record.score)}`),
          c.dim(`${count(record.num_comments)} comments`),
          c.dim(record.id),
        ].join(' ');
      case 'comment':
        return [
          c.cyan(`u/${record.author ?? '[deleted]'}`),
          c.yellow(`▲ ${count(record.score)}`),
          excerpt(record.body),
          c.dim(record.id),
        ].join(' ');
      case 'user':
        return [
          c.bold(`u/${record.name}`),
          c.yellow(`${count(record.total_karma ?? (record.link_karma ?? 0) + (record.comment_karma ?? 0))} karma`),
        ].join(' ');
      case 'subreddit':
        return [
          c.bold(record.display_name_prefixed ?? `r/${record.display_name}`),
          c.green(`${count(record.subscribers)} subscribers`),
          excerpt(record.public_description ?? ''),
        ]
          .filter(Boolean)
          .join(' ');
      case 'user_subreddit':
        return [
          c.bold(record.display_name_prefixed ?? record.display_name),
          c.green(`${count(record.subscribers)} followers`),
          excerpt(record.public_description ?? ''),
        ]
          .filter(Boolean)
          .join(' ');
      case 'wiki_page':
        return [
          c.bold(`revision ${record.revision_id ?? '?'}`),
          c.dim(`by ${record.revision_by ?? 'unknown'}`),
          excerpt(record.content_md),
        ].join(' ');
      case 'moderated_subreddit':
        return [
          c.bold(record.sr_display_name_prefixed ?? `r/${record.sr}`),
          c.green(`${count(record.subscribers)} subscribers`),
        ].join(' ');
    }
  }

  /** Every populated field, one per line. */
  profile(record: RedditRecord): string {
    const { c } = this;
    const fields = Object.entries(record).filter(([, value]) => value !== null && value !== undefined);
    const width = Math.max(...fields.map(([key]) => key.length));

    return fields
      .map(([key, value]) => {
        const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
        return `${c.dim(key.padEnd(width))}  ${text}`;
      })
      .join('\n');
  }

  result(result: CommandResult): string {
    const { c } = this;
    switch (result.type) {
      case 'records':
        if (result.records.length === 0) return c.yellow('No results.');
        return result.records.map((record) => this.record(record)).join('\n');
      case 'profile':
        return this.profile(result.record);
      case 'names':
        if (result.names.length === 0) return c.yellow('No results.');
        return [c.bold(result.title), ...result.names.map((name) => `  ${name}`)].join('\n');
      case 'counts':
        if (result.counts.length === 0) return c.yellow('No results.');
        return result.counts.map(({ subreddit, count: n }) => `${c.bold(`r/${subreddit}`)} ${c.yellow(String(n))}`).join('\n');
      case 'exists':
        return result.exists
          ? c.green(`u/${result.name} exists`)
          : c.red(`u/${result.name} does not exist`);
    }
  }

  json(result: CommandResult): string {
    switch (result.type) {
      case 'records':
        return JSON.stringify(result.records, null, 2);
      case 'profile':
        return JSON.stringify(result.record, null, 2);
      case 'names':
        return JSON.stringify(result.names, null, 2);
      case 'counts':
        return JSON.stringify(result.counts, null, 2);
      case 'exists':
        return JSON.stringify({ name: result.name, exists: result.exists }, null, 2);
    }
  }
}

/** Rows written by `--export`, or an empty list when the result has none. */
export function exportableRows(result: CommandResult): readonly object[] {
  switch (result.type) {
    case 'records':
      return result.records;
    case 'profile':
      return [result.record];
    case 'counts':
      return result.counts;
    case 'names':
      return result.names.map((name) => ({ name }));
    case 'exists':
      return [];
  }
}
