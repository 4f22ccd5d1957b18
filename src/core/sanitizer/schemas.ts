// src/core/sanitizer/schemas.ts

import { z, ZodTypeAny } from 'zod';

/**
 * Optional upstream field. Missing, null and wrongly-typed values all collapse
 * to null so one odd field never costs the whole entity.
 */
function lenient<T extends ZodTypeAny>(schema: T) {
  return schema.nullish().catch(null);
}

const str = () => lenient(z.string());
const num = () => lenient(z.number());
const bool = () => lenient(z.boolean());
// `edited` is `false` or an edit timestamp
const edited = () => lenient(z.union([z.boolean(), z.number()]));

const ProfileSpaceSchema = z.object({
  name: str(),
  display_name_prefixed: str(),
  title: str(),
  public_description: str(),
  subscribers: num(),
  over_18: bool(),
});

export const UserSchema = z.object({
  name: z.string(),
  id: str(),
  created: num(),
  created_utc: num(),
  link_karma: num(),
  comment_karma: num(),
  total_karma: num(),
  awardee_karma: num(),
  awarder_karma: num(),
  is_employee: bool(),
  is_gold: bool(),
  is_mod: bool(),
  verified: bool(),
  has_verified_email: bool(),
  is_suspended: bool(),
  is_blocked: bool(),
  accept_followers: bool(),
  hide_from_robots: bool(),
  icon_img: str(),
  snoovatar_img: str(),
  subreddit: lenient(ProfileSpaceSchema),
});

export const PostSchema = z.object({
  id: z.string(),
  name: z.string(),
  title: z.string(),
  subreddit: z.string(),
  created_utc: z.number(),
  author: str(),
  author_fullname: str(),
  subreddit_id: str(),
  subreddit_name_prefixed: str(),
  selftext: str(),
  url: str(),
  permalink: str(),
  domain: str(),
  thumbnail: str(),
  link_flair_text: str(),
  distinguished: str(),
  score: num(),
  ups: num(),
  downs: num(),
  upvote_ratio: num(),
  num_comments: num(),
  num_crossposts: num(),
  total_awards_received: num(),
  subreddit_subscribers: num(),
  created: num(),
  edited: edited(),
  over_18: bool(),
  spoiler: bool(),
  locked: bool(),
  stickied: bool(),
  archived: bool(),
  is_self: bool(),
  is_video: bool(),
  is_original_content: bool(),
});

export const CommentSchema = z.object({
  id: z.string(),
  name: z.string(),
  body: z.string(),
  link_id: z.string(),
  parent_id: z.string(),
  created_utc: z.number(),
  author: str(),
  author_fullname: str(),
  author_flair_text: str(),
  subreddit: str(),
  subreddit_id: str(),
  subreddit_name_prefixed: str(),
  link_title: str(),
  permalink: str(),
  distinguished: str(),
  score: num(),
  ups: num(),
  downs: num(),
  controversiality: num(),
  depth: num(),
  created: num(),
  edited: edited(),
  stickied: bool(),
  locked: bool(),
  archived: bool(),
  is_submitter: bool(),
  score_hidden: bool(),
  collapsed: bool(),
});

export const SubredditSchema = z.object({
  id: z.string(),
  name: z.string(),
  display_name: z.string(),
  display_name_prefixed: str(),
  title: str(),
  public_description: str(),
  description: str(),
  url: str(),
  subreddit_type: str(),
  lang: str(),
  advertiser_category: str(),
  submission_type: str(),
  header_title: str(),
  icon_img: str(),
  community_icon: str(),
  banner_img: str(),
  subscribers: num(),
  active_user_count: num(),
  accounts_active: num(),
  created: num(),
  created_utc: num(),
  over18: bool(),
  quarantine: bool(),
  wiki_enabled: bool(),
  spoilers_enabled: bool(),
  allow_images: bool(),
  allow_videos: bool(),
});

// A `t5` entity whose `subreddit_type` is "user": a profile space, not a community
export const UserSubredditSchema = z.object({
  name: z.string(),
  display_name: z.string(),
  id: str(),
  display_name_prefixed: str(),
  title: str(),
  public_description: str(),
  url: str(),
  subreddit_type: str(),
  icon_img: str(),
  banner_img: str(),
  subscribers: num(),
  created: num(),
  created_utc: num(),
  over_18: bool(),
  over18: bool(),
});

export const WikiPageSchema = z.object({
  content_md: z.string(),
  revision_date: z.number(),
  content_html: str(),
  revision_id: str(),
  reason: str(),
  may_revise: bool(),
  revision_by: lenient(
    z.object({ data: z.object({ name: z.string() }) }).transform((author) => author.data.name)
  ),
});

export const ModeratedSubredditSchema = z.object({
  name: z.string(),
  sr: z.string(),
  sr_display_name_prefixed: str(),
  title: str(),
  url: str(),
  subreddit_type: str(),
  icon_img: str(),
  community_icon: str(),
  subscribers: num(),
  created: num(),
  created_utc: num(),
  over_18: bool(),
});

export const RECORD_SCHEMAS = {
  user: UserSchema,
  post: PostSchema,
  comment: CommentSchema,
  subreddit: SubredditSchema,
  user_subreddit: UserSubredditSchema,
  wiki_page: WikiPageSchema,
  moderated_subreddit: ModeratedSubredditSchema,
} as const;
