// src/cli/program.ts

import { Command, InvalidArgumentError } from 'commander';
import { ClientOverrides, KarmaClient, withClient } from '../client';
import { loadConfigFromEnv, ResolvedClientConfig } from '../config/ConfigValidator';
import { EXPORT_FORMATS, ExportFormat, exportRecords, isExportFormat } from '../export/Exporter';
import { VERSION, PROJECT_NAME } from '../meta';
import { Logger, LogLevel } from '../observability/Logger';
import type { StatusSink } from '../observability/types';
import { POST_LISTINGS, PostListing, SUBREDDIT_LISTINGS, SubredditListing, USER_LISTINGS, UserListing } from '../resources/endpoints';
import { ListingOptions, SORT_ORDERS, SortOrder, TIMEFRAMES, Timeframe } from '../resources/types';
import { CommandResult, exportableRows, Renderer } from './render';
import { StatusLine } from './StatusLine';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
const SEARCH_KINDS = ['posts', 'subreddits', 'users'] as const;
type SearchKind = (typeof SEARCH_KINDS)[number];

export type GlobalOptions = {
  limit: number;
  sort: SortOrder;
  timeframe: Timeframe;
  export?: ExportFormat[];
  outputDir: string;
  logLevel?: LogLevel;
  json?: boolean;
};

export interface ProgramDeps {
  env: NodeJS.ProcessEnv;
  write: (text: string) => void;
  status: StatusSink & { stop(): void };
  overrides?: ClientOverrides;
  /** Interrupt source; defaults to the process receiving SIGINT. */
  onInterrupt?: (abort: () => void) => () => void;
}

export const positiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got: ${value}`);
  }
  return parsed;
};

export function choice<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value) => {
    const match = choices.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new InvalidArgumentError(`Expected one of ${choices.join(', ')}, got: ${value}`);
    }
    return match;
  };
}

export const exportFormats = (value: string): ExportFormat[] => {
  const formats = value
    .split(',')
    .map((format) => format.trim().toLowerCase())
    .filter((format) => format.length > 0);
  const invalid = formats.filter((format) => !isExportFormat(format));
  if (formats.length === 0 || invalid.length > 0) {
    throw new InvalidArgumentError(
      `Expected a comma-separated list of ${EXPORT_FORMATS.join(', ')}, got: ${value}`
    );
  }
  return formats.filter(isExportFormat);
};

function keysOf<T extends object>(record: T): Array<keyof T & string> {
  return Object.keys(record).filter((key): key is keyof T & string => key in record);
}

const sigint = (abort: () => void): (() => void) => {
  process.once('SIGINT', abort);
  return () => {
    process.off('SIGINT', abort);
  };
};

function defaultDeps(): ProgramDeps {
  return {
    env: process.env,
    write: (text) => {
      process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
    },
    status: new StatusLine(),
  };
}

export function buildProgram(deps: ProgramDeps = defaultDeps()): Command {
  const renderer = new Renderer();
  const program = new Command();

  program
    .name(PROJECT_NAME)
    .description('Query the public Reddit JSON API from the command line')
    .version(VERSION)
    .option('-l, --limit <n>', 'maximum number of records', positiveInt, 100)
    .option('-s, --sort <order>', `sort order (${SORT_ORDERS.join(', ')})`, choice(SORT_ORDERS), 'all')
    .option('-t, --timeframe <range>', `timeframe (${TIMEFRAMES.join(', ')})`, choice(TIMEFRAMES), 'all')
    .option('-e, --export <formats>', `export to ${EXPORT_FORMATS.join(',')} (comma-separated)`, exportFormats)
    .option('-o, --output-dir <dir>', 'export directory', 'exports')
    .option('--log-level <level>', `log level (${LOG_LEVELS.join(', ')})`, choice(LOG_LEVELS))
    .option('--json', 'print records as JSON');

  /**
   * Opens a client for one command, prints and exports its result, and
   * closes the session whether the command succeeds or not.
   */
  const run = async (
    command: Command,
    fetch: (client: KarmaClient, options: ListingOptions) => Promise<CommandResult>
  ): Promise<void> => {
    const opts = command.optsWithGlobals<GlobalOptions>();
    const config = resolveConfig(deps.env, opts.logLevel);
    const logger = deps.overrides?.logger ?? new Logger({ ...config.logging, level: config.logging?.level ?? 'warn' });
    const controller = new AbortController();
    const release = (deps.onInterrupt ?? sigint)(() => controller.abort());

    try {
      const result = await withClient(
        config,
        (client) =>
          fetch(client, {
            limit: opts.limit,
            sort: opts.sort,
            timeframe: opts.timeframe,
            status: deps.status,
            signal: controller.signal,
          }),
        { ...deps.overrides, logger }
      );
      deps.status.stop();

      deps.write(opts.json ? renderer.json(result) : renderer.result(result));

      const rows = exportableRows(result);
      if (opts.export && rows.length > 0) {
        const paths = await exportRecords(rows, {
          formats: opts.export,
          outputDir: opts.outputDir,
          logger,
        });
        for (const path of paths) {
          deps.write(`Exported ${rows.length} rows to ${path}`);
        }
      }
    } finally {
      deps.status.stop();
      release();
    }
  };

  program
    .command('posts')
    .description('site-wide post listings')
    .argument('<listing>', keysOf(POST_LISTINGS).join(', '), choice<PostListing>(keysOf(POST_LISTINGS)))
    .action((listing: PostListing, _options: unknown, command: Command) =>
      run(command, async (client, options) => ({
        type: 'records',
        records: await client.posts.list(listing, options),
      }))
    );

  program
    .command('subreddits')
    .description('site-wide subreddit listings')
    .argument('<listing>', keysOf(SUBREDDIT_LISTINGS).join(', '), choice<SubredditListing>(keysOf(SUBREDDIT_LISTINGS)))
    .action((listing: SubredditListing, _options: unknown, command: Command) =>
      run(command, async (client, options) => ({
        type: 'records',
        records: await client.subreddits.list(listing, options),
      }))
    );

  program
    .command('users')
    .description('site-wide user listings')
    .argument('<listing>', keysOf(USER_LISTINGS).join(', '), choice<UserListing>(keysOf(USER_LISTINGS)))
    .action((listing: UserListing, _options: unknown, command: Command) =>
      run(command, async (client, options) => ({
        type: 'records',
        records: await client.users.list(listing, options),
      }))
    );

  program
    .command('search')
    .description('search posts, subreddits or users')
    .argument('<query>', 'search query')
    .option('-k, --kind <kind>', SEARCH_KINDS.join(', '), choice(SEARCH_KINDS), 'posts')
    .action((query: string, options: { kind: SearchKind }, command: Command) =>
      run(command, async (client, listing) => {
        const search = client.search(query);
        switch (options.kind) {
          case 'posts':
            return { type: 'records', records: await search.posts(listing) };
          case 'subreddits':
            return { type: 'records', records: await search.subreddits(listing) };
          case 'users':
            return { type: 'records', records: await search.users(listing) };
        }
      })
    );

  program
    .command('user')
    .description('data about one user')
    .argument('<username>', 'username without the u/ prefix')
    .option('--profile', 'profile')
    .option('--posts', 'submitted posts')
    .option('--comments', 'comments')
    .option('--overview', 'posts and comments')
    .option('--moderated-subreddits', 'subreddits the user moderates')
    .option('--top-subreddits <n>', 'subreddits of the user\'s top posts, ranked', positiveInt)
    .option('--exists', 'whether the username is taken')
    .action((username: string, options: UserCommandOptions, command: Command) =>
      run(command, async (client, listing) => {
        const user = client.user(username);
        if (options.posts) return { type: 'records', records: await user.posts(listing) };
        if (options.comments) return { type: 'records', records: await user.comments(listing) };
        if (options.overview) return { type: 'records', records: await user.overview(listing) };
        if (options.moderatedSubreddits) {
          return { type: 'records', records: await user.moderatedSubreddits(listing) };
        }
        if (options.topSubreddits !== undefined) {
          return { type: 'counts', counts: await user.topSubreddits(options.topSubreddits, listing) };
        }
        if (options.exists) return { type: 'exists', name: username, exists: await user.exists(listing) };
        return { type: 'profile', record: await user.profile(listing) };
      })
    );

  program
    .command('subreddit')
    .description('data about one subreddit')
    .argument('<name>', 'subreddit name without the r/ prefix')
    .option('--profile', 'profile')
    .option('--posts', 'posts')
    .option('--comments', 'latest comments')
    .option('--search <query>', 'search posts within the subreddit')
    .option('--wiki-pages', 'names of the wiki pages')
    .option('--wiki-page <page>', 'one wiki page')
    .action((name: string, options: SubredditCommandOptions, command: Command) =>
      run(command, async (client, listing) => {
        const subreddit = client.subreddit(name);
        if (options.posts) return { type: 'records', records: await subreddit.posts(listing) };
        if (options.comments) return { type: 'records', records: await subreddit.comments(listing) };
        if (options.search !== undefined) {
          return { type: 'records', records: await subreddit.search(options.search, listing) };
        }
        if (options.wikiPages) {
          return { type: 'names', title: `Wiki pages of r/${name}`, names: await subreddit.wikiPages(listing) };
        }
        if (options.wikiPage !== undefined) {
          return { type: 'profile', record: await subreddit.wikiPage(options.wikiPage, listing) };
        }
        return { type: 'profile', record: await subreddit.profile(listing) };
      })
    );

  program
    .command('post')
    .description('one post, or its comments')
    .argument('<id>', 'post id (with or without t3_)')
    .argument('<subreddit>', 'subreddit the post belongs to')
    .option('--comments', 'comment tree instead of the post itself')
    .action((id: string, subreddit: string, options: { comments?: boolean }, command: Command) =>
      run(command, async (client, listing) => {
        const post = client.post(id, subreddit);
        return options.comments
          ? { type: 'records', records: await post.comments(listing) }
          : { type: 'profile', record: await post.info(listing) };
      })
    );

  return program;
}

interface UserCommandOptions {
  profile?: boolean;
  posts?: boolean;
  comments?: boolean;
  overview?: boolean;
  moderatedSubreddits?: boolean;
  topSubreddits?: number;
  exists?: boolean;
}

interface SubredditCommandOptions {
  profile?: boolean;
  posts?: boolean;
  comments?: boolean;
  search?: string;
  wikiPages?: boolean;
  wikiPage?: string;
}

function resolveConfig(env: NodeJS.ProcessEnv, logLevel?: LogLevel): ResolvedClientConfig {
  const config = loadConfigFromEnv(env);
  return logLevel ? { ...config, logging: { ...config.logging, level: logLevel } } : config;
}
