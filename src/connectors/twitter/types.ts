import type { FetchParams } from '../types';

/**
 * Twitter-specific activity fetch parameters
 */
export interface TwitterFetchParams extends FetchParams {
  /**
   * '@self' reads the authenticated user's own timeline,
   * anything else (default '@friends') the home timeline
   */
  groupId?: string;

  /**
   * Fetch a single status instead of a timeline
   */
  activityId?: string;
}

/**
 * Span of an entity in the tweet text: [start, end)
 */
export type TwitterIndices = [number, number] | number[];

/**
 * Twitter user object (API v1.1)
 */
export interface TwitterUser {
  id?: number;
  id_str?: string;
  screen_name?: string | null;
  name?: string | null;
  profile_image_url?: string | null;
  created_at?: string | null;
  location?: string | null;
  description?: string | null;
}

export interface TwitterUserMention {
  screen_name?: string;
  name?: string | null;
  id_str?: string;
  indices?: TwitterIndices;
}

export interface TwitterHashtag {
  text?: string;
  indices?: TwitterIndices;
}

export interface TwitterUrlEntity {
  url?: string;
  expanded_url?: string | null;
  display_url?: string;
  indices?: TwitterIndices;
}

export interface TwitterMediaEntity {
  id_str?: string;
  type?: string;
  media_url?: string | null;
  media_url_https?: string | null;
  indices?: TwitterIndices;
}

export interface TwitterEntities {
  user_mentions?: TwitterUserMention[];
  hashtags?: TwitterHashtag[];
  urls?: TwitterUrlEntity[];
  media?: TwitterMediaEntity[];
}

export interface TwitterPlace {
  id?: string | null;
  full_name?: string | null;
  url?: string;
}

export interface TwitterGeo {
  type?: string;
  coordinates?: [number, number] | null;
}

/**
 * Twitter tweet object (API v1.1)
 *
 * `id` is a 64-bit integer that loses precision in JavaScript; `id_str` is
 * the only identifier used.
 */
export interface TwitterTweet {
  id?: number;
  id_str?: string | null;
  created_at?: string | null;
  text?: string | null;
  source?: string | null;
  user?: TwitterUser | null;
  entities?: TwitterEntities | null;
  in_reply_to_status_id?: number | null;
  in_reply_to_status_id_str?: string | null;
  in_reply_to_screen_name?: string | null;
  place?: TwitterPlace | null;
  geo?: TwitterGeo | null;
  retweeted?: boolean;
  retweet_count?: number;
  retweeted_status?: TwitterTweet | null;
  /** Attached by the connector when shares are resolved */
  retweets?: TwitterTweet[];
}

/**
 * search/tweets response
 */
export interface TwitterSearchResponse {
  statuses?: TwitterTweet[];
  search_metadata?: {
    count?: number;
    max_id_str?: string;
    next_results?: string;
  };
}
