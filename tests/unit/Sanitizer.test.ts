// tests/unit/Sanitizer.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import { Sanitizer } from '../../src/core/sanitizer/Sanitizer';
import { dedupeKeyOf, RedditRecord } from '../../src/core/sanitizer/types';
import {
  commentTree,
  listing,
  more,
  moreChildrenResponse,
  rawComment,
  rawPost,
  rawSubreddit,
  rawUserSpace,
  spyLogger,
} from '../helpers/fixtures';

describe('Sanitizer', () => {
  let logger: ReturnType<typeof spyLogger>;
  let sanitizer: Sanitizer;

  beforeEach(() => {
    logger = spyLogger();
    sanitizer = new Sanitizer(logger);
  });

  describe('entity', () => {
    it('should convert a post and drop unknown fields', () => {
      const record = sanitizer.entity(rawPost('abc', { unknown_field: 'x', all_awardings: [] }));

      expect(record).not.toBeNull();
      expect(record?.kind).toBe('post');
      if (record?.kind !== 'post') return;
      expect(record.id).toBe('abc');
      expect(record.name).toBe('t3_abc');
      expect(record.title).toBe('Post abc');
      expect(record.score).toBe(10);
      expect('unknown_field' in record).toBe(false);
      expect('all_awardings' in record).toBe(false);
    });

    it('should return null for missing data', () => {
      expect(sanitizer.entity({ kind: 't3' })).toBeNull();
    });

    it('should return null for unknown kinds', () => {
      expect(sanitizer.entity({ kind: 't9', data: { id: 'x' } })).toBeNull();
      expect(sanitizer.entity({ kind: 'more', data: { children: ['a'] } })).toBeNull();
    });

    it('should return null for non-object input', () => {
      expect(sanitizer.entity(null)).toBeNull();
      expect(sanitizer.entity('t3')).toBeNull();
      expect(sanitizer.entity([rawPost('a')])).toBeNull();
      expect(sanitizer.entity({ kind: 't3', data: 'oops' })).toBeNull();
    });

    it('should skip and warn when a required field is missing', () => {
      const node = { kind: 't3', data: { id: 'abc', name: 't3_abc', subreddit: 's', created_utc: 1 } };

      expect(sanitizer.entity(node)).toBeNull();
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn.mock.calls[0][0]).toBe('Skipping malformed entity');
      expect(logger.warn.mock.calls[0][1]).toMatchObject({ kind: 'post', id: 'abc' });
    });

    it('should null out a wrongly typed optional field instead of dropping the entity', () => {
      const record = sanitizer.entity(rawPost('abc', { score: 'many', over_18: 'no' }));

      expect(record?.kind).toBe('post');
      if (record?.kind !== 'post') return;
      expect(record.score).toBeNull();
      expect(record.over_18).toBeNull();
    });

    it('should classify a t5 with subreddit_type "user" as a user space', () => {
      expect(sanitizer.entity(rawUserSpace('u1', 'alice'))?.kind).toBe('user_subreddit');
      expect(sanitizer.entity(rawSubreddit('s1', 'typescript'))?.kind).toBe('subreddit');
    });

    it('should convert users, comments and wiki pages', () => {
      const user = sanitizer.entity({
        kind: 't2',
        data: { name: 'alice', id: 'xyz', link_karma: 5, comment_karma: 7, is_mod: true },
      });
      expect(user).toMatchObject({ kind: 'user', name: 'alice', id: 'xyz', link_karma: 5, is_mod: true });

      expect(sanitizer.entity(rawComment('c1'))).toMatchObject({
        kind: 'comment',
        id: 'c1',
        body: 'Comment c1',
        parent_id: 't3_post1',
      });

      const wiki = sanitizer.entity({
        kind: 'wikipage',
        data: {
          content_md: '# Rules',
          revision_date: 1700000000,
          revision_id: 'rev-1',
          revision_by: { kind: 't2', data: { name: 'moderator' } },
        },
      });
      expect(wiki).toMatchObject({ kind: 'wiki_page', content_md: '# Rules', revision_by: 'moderator' });
    });
  });

  describe('listing', () => {
    it('should count every raw child and keep only usable records', () => {
      const page = sanitizer.listing(
        listing([rawPost('a'), { kind: 't3' }, rawPost('b'), rawComment('c')], 't3_b')
      );

      expect(page.rawCount).toBe(4);
      expect(page.items.map((item) => item.kind)).toEqual(['post', 'post', 'comment']);
      expect(page.after).toBe('t3_b');
      expect(page.moreIds).toEqual([]);
    });

    it('should filter to the requested kinds', () => {
      const page = sanitizer.listing(listing([rawPost('a'), rawComment('c')]), ['comment'] as const);

      expect(page.items).toHaveLength(1);
      expect(page.items[0].id).toBe('c');
      expect(page.rawCount).toBe(2);
    });

    it('should collect continuation marker ids', () => {
      const page = sanitizer.listing(listing([rawComment('a'), more(['x', 'y'])]));

      expect(page.moreIds).toEqual(['x', 'y']);
      expect(page.items).toHaveLength(1);
    });

    it('should return an empty page for malformed input', () => {
      expect(sanitizer.listing('<html>')).toEqual({ items: [], rawCount: 0, after: null, moreIds: [] });
      expect(sanitizer.listing({ kind: 'Listing', data: { children: 'x' } }).rawCount).toBe(0);
    });
  });

  describe('after', () => {
    it('should read the cursor', () => {
      expect(sanitizer.after(listing([], 't3_zz'))).toBe('t3_zz');
    });

    it('should treat missing, empty and malformed cursors as absent', () => {
      expect(sanitizer.after(listing([], null))).toBeNull();
      expect(sanitizer.after(listing([], ''))).toBeNull();
      expect(sanitizer.after({ data: { after: 42 } })).toBeNull();
      expect(sanitizer.after(undefined)).toBeNull();
    });
  });

  describe('commentTree', () => {
    it('should flatten replies depth-first and collect nested markers', () => {
      const tree = commentTree([
        rawComment('c1', {
          replies: listing([
            rawComment('c2', {
              parent_id: 't1_c1',
              replies: listing([rawComment('c3', { parent_id: 't1_c2' }), more(['m2'])]),
            }),
          ]),
        }),
        rawComment('c4', { replies: '' }),
        more(['m1']),
      ]);

      const page = sanitizer.commentTree(tree);

      expect(page.items.map((comment) => comment.id)).toEqual(['c1', 'c2', 'c3', 'c4']);
      expect(page.moreIds).toEqual(['m2', 'm1']);
      expect(page.rawCount).toBe(3);
      expect('replies' in page.items[0]).toBe(false);
    });

    it('should return an empty page when the response is not a pair of listings', () => {
      expect(sanitizer.commentTree(listing([rawComment('c1')])).items).toEqual([]);
    });
  });

  it('should read comments from an additional-comments response', () => {
    const comments = sanitizer.moreChildren(
      moreChildrenResponse([rawComment('m1'), more(['deeper']), rawPost('p1'), rawComment('m2')])
    );

    expect(comments.map((comment) => comment.id)).toEqual(['m1', 'm2']);
    expect(sanitizer.moreChildren({ json: { errors: [['RATELIMIT']] } })).toEqual([]);
  });

  it('should read single entities of the expected kind only', () => {
    expect(sanitizer.user({ kind: 't2', data: { name: 'alice' } })?.name).toBe('alice');
    expect(sanitizer.user(rawPost('a'))).toBeNull();
    expect(sanitizer.subreddit(rawSubreddit('s1', 'typescript'))?.display_name).toBe('typescript');
    expect(sanitizer.subreddit(rawUserSpace('u1', 'alice'))?.kind).toBe('user_subreddit');
    expect(sanitizer.subreddit(listing([]))).toBeNull();
    expect(sanitizer.wikiPage({ kind: 'wikipage', data: { content_md: 'x' } })).toBeNull();
  });

  it('should take the post from the first listing of a comment tree', () => {
    expect(sanitizer.post(commentTree([rawComment('c1')], 'p9'))?.id).toBe('p9');
    expect(sanitizer.post([listing([]), listing([])])).toBeNull();
  });

  it('should read moderated subreddits, wiki page names and username availability', () => {
    const moderated = sanitizer.moderatedSubreddits({
      kind: 'ModeratedList',
      data: [
        { name: 't5_1', sr: 'typescript', sr_display_name_prefixed: 'r/typescript', subscribers: 10 },
        { name: 't5_2' },
      ],
    });
    expect(moderated).toEqual([
      { kind: 'moderated_subreddit', name: 't5_1', sr: 'typescript', sr_display_name_prefixed: 'r/typescript', subscribers: 10 },
    ]);

    expect(sanitizer.wikiPageNames({ kind: 'wikipagelisting', data: ['index', 'config/sidebar', 3] })).toEqual([
      'index',
      'config/sidebar',
    ]);

    expect(sanitizer.usernameAvailable(true)).toBe(true);
    expect(sanitizer.usernameAvailable(false)).toBe(false);
    expect(sanitizer.usernameAvailable({ error: 'x' })).toBeNull();
  });
});

describe('dedupeKeyOf', () => {
  const sanitizer = new Sanitizer();
  const entity = (node: unknown): RedditRecord => {
    const record = sanitizer.entity(node);
    if (!record) throw new Error('fixture did not sanitize');
    return record;
  };

  it('should prefer the fullname by default', () => {
    expect(dedupeKeyOf(entity(rawPost('abc')))).toBe('t3_abc');
    expect(dedupeKeyOf(entity(rawComment('abc')))).toBe('t1_abc');
    expect(dedupeKeyOf(entity({ kind: 't2', data: { name: 'alice', id: 'xyz' } }))).toBe('t2_xyz');
  });

  it('should prefer the bare id when asked', () => {
    expect(dedupeKeyOf(entity(rawPost('abc')), 'id')).toBe('abc');
    expect(dedupeKeyOf(entity(rawComment('c1')), 'id')).toBe('c1');
  });

  it('should fall back when the preferred key is missing', () => {
    expect(dedupeKeyOf(entity({ kind: 't2', data: { name: 'alice' } }))).toBe('alice');
    expect(
      dedupeKeyOf(entity({ kind: 'wikipage', data: { content_md: 'x', revision_date: 1, revision_id: 'r1' } }))
    ).toBe('r1');
  });

  it('should return undefined when no key exists', () => {
    expect(dedupeKeyOf(entity({ kind: 'wikipage', data: { content_md: 'x', revision_date: 1 } }))).toBeUndefined();
  });
});
