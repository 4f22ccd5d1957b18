// tests/unit/cli.test.ts

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import pc from 'picocolors';
import { CommanderError, InvalidArgumentError } from 'commander';
import { buildProgram, choice, exportFormats, positiveInt } from '../../src/cli/program';
import { excerpt, exportableRows, Renderer } from '../../src/cli/render';
import { noopLogger } from '../../src/observability/types';
import { EntityNotFoundError } from '../../src/utils/errors';
import { listing, rawPost, rawSubreddit, RecordedCall, StubTransport } from '../helpers/fixtures';

describe('argument parsers', () => {
  it('should accept positive integers only', () => {
    expect(positiveInt('25')).toBe(25);
    expect(() => positiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => positiveInt('2.5')).toThrow('Expected a positive integer, got: 2.5');
  });

  it('should accept one of the given choices', () => {
    const parse = choice(['day', 'week'] as const);

    expect(parse('week')).toBe('week');
    expect(() => parse('year')).toThrow('Expected one of day, week, got: year');
  });

  it('should parse a comma-separated list of export formats', () => {
    expect(exportFormats('CSV, json')).toEqual(['csv', 'json']);
    expect(() => exportFormats('csv,pdf')).toThrow(InvalidArgumentError);
    expect(() => exportFormats(',')).toThrow(InvalidArgumentError);
  });
});

describe('Renderer', () => {
  const renderer = new Renderer(pc.createColors(false));

  it('should summarise a post on one line', () => {
    expect(
      renderer.record({
        kind: 'post',
        id: 'a',
        name: 't3_a',
        title: 'Hello',
        subreddit: 'typescript',
        created_utc: 1700000000,
        score: 1234,
        num_comments: 5,
      })
    ).toBe('Hello r/typescript ▲ 1,234 5 comments a');
  });

  it('should list populated profile fields with aligned keys', () => {
    expect(renderer.profile({ kind: 'user', name: 'alice', link_karma: 5, comment_karma: null })).toBe(
      ['kind        user', 'name        alice', 'link_karma  5'].join('\n')
    );
  });

  it('should render rankings and existence checks', () => {
    expect(
      renderer.result({
        type: 'counts',
        counts: [
          { subreddit: 'a', count: 3 },
          { subreddit: 'b', count: 1 },
        ],
      })
    ).toBe('r/a 3\nr/b 1');
    expect(renderer.result({ type: 'exists', name: 'x', exists: false })).toBe('u/x does not exist');
    expect(renderer.result({ type: 'records', records: [] })).toBe('No results.');
  });

  it('should collapse whitespace in excerpts', () => {
    expect(excerpt('a  b\n c')).toBe('a b c');
    expect(excerpt('abcdef', 4)).toBe('abc…');
  });

  it('should turn names into exportable rows', () => {
    expect(exportableRows({ type: 'names', title: 'Wiki', names: ['index'] })).toEqual([{ name: 'index' }]);
    expect(exportableRows({ type: 'exists', name: 'x', exists: true })).toEqual([]);
  });
});

describe('buildProgram', () => {
  let output: string[];
  let status: { update: ReturnType<typeof vi.fn>; stop: ReturnType<typeof vi.fn> };
  let dir: string;

  const env = { KARMALENS_MIN_DELAY_MS: '0', KARMALENS_MAX_DELAY_MS: '0' };

  const program = (handler: (call: RecordedCall) => unknown) => {
    const transport = new StubTransport(handler);
    const command = buildProgram({
      env,
      write: (text) => {
        output.push(text);
      },
      status: { update: (text) => status.update(text), stop: () => status.stop() },
      overrides: { transport, logger: noopLogger },
      onInterrupt: () => () => undefined,
    });
    command.exitOverride().configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
    return { command, transport };
  };

  beforeEach(async () => {
    output = [];
    status = { update: vi.fn(), stop: vi.fn() };
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'karmalens-cli-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should print a listing as JSON, capped at --limit', async () => {
    const { command, transport } = program(() => listing([rawPost('a'), rawPost('b'), rawPost('c')]));

    await command.parseAsync(['--json', '-l', '2', 'posts', 'new'], { from: 'user' });

    expect(transport.calls.map((call) => call.url)).toEqual(['/new.json']);
    expect(output).toHaveLength(1);
    const printed: unknown = JSON.parse(output[0]);
    expect(Array.isArray(printed) && printed.map((record: { id: string }) => record.id)).toEqual(['a', 'b']);
    expect(status.stop).toHaveBeenCalled();
  });

  it('should pass sort and timeframe to the listing', async () => {
    const { command, transport } = program(() => listing([]));

    await command.parseAsync(['-s', 'top', '-t', 'day', 'subreddit', 'typescript', '--posts'], { from: 'user' });

    expect(transport.calls[0].url).toBe('/r/typescript.json');
    expect(transport.calls[0].query).toMatchObject({ sort: 'top', t: 'day' });
    expect(output).toHaveLength(1);
    expect(output[0]).toContain('No results.');
  });

  it('should report whether a user exists', async () => {
    const { command, transport } = program(() => false);

    await command.parseAsync(['--json', 'user', 'alice', '--exists'], { from: 'user' });

    expect(transport.calls[0]).toEqual({
      url: '/api/username_available.json',
      query: { raw_json: 1, user: 'alice' },
    });
    expect(output).toEqual([JSON.stringify({ name: 'alice', exists: true }, null, 2)]);
  });

  it('should export the records it prints', async () => {
    const { command } = program(() => listing([rawSubreddit('s1', 'typescript')]));

    await command.parseAsync(['--json', '-e', 'csv', '-o', dir, 'subreddits', 'popular'], { from: 'user' });

    expect(output).toHaveLength(2);
    expect(output[1]).toMatch(
      new RegExp(`^Exported 1 rows to ${escapeRegExp(path.join(dir, 'csv'))}/\\d{4}-\\d{2}-\\d{2}_\\d{2}-\\d{2}-\\d{2}\\.csv$`)
    );
    const [file] = await fs.readdir(path.join(dir, 'csv'));
    const csv = await fs.readFile(path.join(dir, 'csv', file), 'utf-8');
    expect(csv.split('\n')[0]).toMatch(/^id,name,display_name,display_name_prefixed,/);
  });

  it('should reject an invalid global option', async () => {
    const { command, transport } = program(() => listing([]));

    await expect(command.parseAsync(['-l', '0', 'posts', 'new'], { from: 'user' })).rejects.toBeInstanceOf(
      CommanderError
    );
    expect(transport.calls).toHaveLength(0);
  });

  it('should propagate client errors and still stop the status line', async () => {
    const { command } = program(() => ({}));

    await expect(command.parseAsync(['user', 'ghost', '--profile'], { from: 'user' })).rejects.toBeInstanceOf(
      EntityNotFoundError
    );
    expect(output).toEqual([]);
    expect(status.stop).toHaveBeenCalled();
  });
});

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
