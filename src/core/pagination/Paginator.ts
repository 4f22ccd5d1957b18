// src/core/pagination/Paginator.ts

import PQueue from 'p-queue';
import type { QueryParams, Transport } from '../http/types';
import type { RedditRecord } from '../sanitizer/types';
import { LoggerLike, noopLogger, noopStatus, StatusSink } from '../../observability/types';
import { Accumulator } from './Accumulator';
import { countdown, PacingWindow, randomDelay, throwIfAborted } from './pacing';
import type { ExpandMoreOptions, PaginateOptions, PaginationStats, StopReason } from './types';
import { ValidationError } from '../../utils/errors';

export interface PaginatorDeps {
  transport: Transport;
  pageSize?: number;
  pacing: PacingWindow & { concurrency: number };
  logger?: LoggerLike;
  random?: () => number;
}

export interface PaginationResult<T> {
  items: T[];
  stats: PaginationStats;
}

interface Invocation<T extends RedditRecord> {
  options: PaginateOptions<T>;
  accumulator: Accumulator<T>;
  logger: LoggerLike;
  status: StatusSink;
}

export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_MORE_BATCH_SIZE = 100;
export const MORE_CHILDREN_URL = '/api/morechildren.json';

function chunk<T>(values: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size));
  }
  return chunks;
}

/**
 * Drives a cursor-paginated listing until it runs dry, the limit is met or
 * the upstream starts repeating itself.
 */
export class Paginator {
  private readonly pageSize: number;
  private readonly logger: LoggerLike;
  private readonly random: () => number;

  constructor(private readonly deps: PaginatorDeps) {
    this.pageSize = deps.pageSize ?? DEFAULT_PAGE_SIZE;
    this.logger = deps.logger ?? noopLogger;
    this.random = deps.random ?? Math.random;
  }

  async paginate<T extends RedditRecord>(options: PaginateOptions<T>): Promise<T[]> {
    const { items } = await this.run(options);
    return items;
  }

  /**
   * @throws {ValidationError} If `limit` is not a positive integer
   */
  async run<T extends RedditRecord>(options: PaginateOptions<T>): Promise<PaginationResult<T>> {
    if (!Number.isInteger(options.limit) || options.limit <= 0) {
      throw new ValidationError(`limit must be a positive integer, got: ${options.limit}`, {
        url: options.url,
        limit: options.limit,
      });
    }
    const run: Invocation<T> = {
      options,
      accumulator: new Accumulator<T>(options.limit, options.dedupeKey),
      logger: options.logger ?? this.logger,
      status: options.status ?? noopStatus,
    };
    const seenCursors = new Set<string>();
    let cursor: string | null = null;
    let pages = 0;
    let subRequests = 0;
    let stopReason: StopReason = 'limit_reached';

    while (!run.accumulator.full) {
      pages++;
      run.status.update(`Fetching page ${pages} (${run.accumulator.size}/${options.limit})`);
      const response = await this.fetch(options.url, options.signal, {
        ...options.params,
        limit: this.pageSize,
        after: cursor ?? undefined,
      });

      const page = options.sanitize(response);
      const added = run.accumulator.add(page.items);
      run.logger.debug('Page merged', {
        url: options.url,
        page: pages,
        raw: page.rawCount,
        added,
        total: run.accumulator.size,
      });

      if (options.expandMore && page.moreIds.length > 0) {
        subRequests += await this.expand(run, options.expandMore, page.moreIds);
      }

      if (page.rawCount < this.pageSize) {
        stopReason = 'short_page';
        break;
      }
      if (run.accumulator.full) {
        stopReason = 'limit_reached';
        break;
      }
      if (page.after === null) {
        stopReason = 'no_cursor';
        break;
      }
      if (seenCursors.has(page.after)) {
        run.logger.warn('Repeated cursor, stopping', { url: options.url, after: page.after });
        stopReason = 'repeated_cursor';
        break;
      }
      seenCursors.add(page.after);
      cursor = page.after;

      await this.pace(run);
    }

    run.logger.info('Pagination finished', {
      url: options.url,
      items: run.accumulator.size,
      pages,
      subRequests,
      stopReason,
    });

    return { items: run.accumulator.toArray(), stats: { pages, subRequests, stopReason } };
  }

  /**
   * Resolves continuation ids in batches, with at most `pacing.concurrency`
   * sub-fetches in flight. Returns the number of sub-fetches issued.
   */
  private async expand<T extends RedditRecord>(
    run: Invocation<T>,
    more: ExpandMoreOptions<T>,
    ids: string[]
  ): Promise<number> {
    if (run.accumulator.full) return 0;

    const batches = chunk(ids, Math.max(1, more.batchSize ?? DEFAULT_MORE_BATCH_SIZE));
    run.logger.info('Expanding continuation markers', {
      linkId: more.linkId,
      ids: ids.length,
      batches: batches.length,
    });

    const queue = new PQueue({ concurrency: Math.max(1, this.deps.pacing.concurrency) });
    const url = more.url ?? MORE_CHILDREN_URL;
    // Cancels sibling sub-fetches once one fails, and follows the caller's signal
    const controller = new AbortController();
    const abort = () => controller.abort();
    run.options.signal?.addEventListener('abort', abort, { once: true });
    if (run.options.signal?.aborted) abort();
    let issued = 0;

    const tasks = batches.map((batch) =>
      queue.add(async () => {
        if (run.accumulator.full) return;

        try {
          issued++;
          run.status.update(`Fetching ${batch.length} more comments (${run.accumulator.size}/${run.options.limit})`);
          const response = await this.fetch(url, controller.signal, {
            api_type: 'json',
            link_id: more.linkId,
            children: batch.join(','),
          });
          if (run.accumulator.full) return;

          run.accumulator.add(more.sanitize(response));
          if (!run.accumulator.full && queue.size > 0) {
            await this.pace(run, controller.signal);
          }
        } catch (error: unknown) {
          queue.clear();
          abort();
          throw error;
        }
      })
    );

    try {
      await Promise.all(tasks);
    } finally {
      run.options.signal?.removeEventListener('abort', abort);
    }
    return issued;
  }

  private async fetch(url: string, signal: AbortSignal | undefined, query: QueryParams): Promise<unknown> {
    throwIfAborted(signal);
    const response = await this.deps.transport.get(url, { query, signal });
    return response.data;
  }

  private async pace<T extends RedditRecord>(
    run: Invocation<T>,
    signal: AbortSignal | undefined = run.options.signal
  ): Promise<void> {
    const delayMs = randomDelay(this.deps.pacing, this.random);
    await countdown(delayMs, {
      progress: `Fetched ${run.accumulator.size}/${run.options.limit}`,
      status: run.status,
      signal,
    });
  }
}
