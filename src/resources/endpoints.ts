// src/resources/endpoints.ts

// Paths are relative to the configured base URL.

export const USER_LISTINGS = {
  all: '/users.json',
  new: '/users/new.json',
  popular: '/users/popular.json',
} as const;
export type UserListing = keyof typeof USER_LISTINGS;

export const POST_LISTINGS = {
  best: '/best.json',
  controversial: '/controversial.json',
  frontPage: '/.json',
  new: '/new.json',
  popular: '/r/popular.json',
  rising: '/rising.json',
  top: '/top.json',
} as const;
export type PostListing = keyof typeof POST_LISTINGS;

export const SUBREDDIT_LISTINGS = {
  all: '/subreddits.json',
  default: '/subreddits/default.json',
  new: '/subreddits/new.json',
  popular: '/subreddits/popular.json',
} as const;
export type SubredditListing = keyof typeof SUBREDDIT_LISTINGS;

export const SEARCH = {
  posts: '/search.json',
  subreddits: '/subreddits/search.json',
  users: '/users/search.json',
} as const;
export type SearchTarget = keyof typeof SEARCH;

export const USERNAME_AVAILABLE = '/api/username_available.json';

const segment = (value: string): string => encodeURIComponent(value);

export const userPaths = (username: string) => {
  const base = `/user/${segment(username)}`;
  return {
    about: `${base}/about.json`,
    submitted: `${base}/submitted.json`,
    comments: `${base}/comments.json`,
    overview: `${base}/overview.json`,
    moderated: `${base}/moderated_subreddits.json`,
  };
};

export const subredditPaths = (name: string) => {
  const base = `/r/${segment(name)}`;
  return {
    about: `${base}/about.json`,
    posts: `${base}.json`,
    comments: `${base}/comments.json`,
    search: `${base}/search.json`,
    wikiPages: `${base}/wiki/pages.json`,
    wikiPage: (page: string) => `${base}/wiki/${page.split('/').map(segment).join('/')}.json`,
  };
};

export const postPath = (id: string, subreddit: string): string =>
  `/r/${segment(subreddit)}/comments/${segment(id)}.json`;
