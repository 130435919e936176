import PQueue from 'p-queue';
import { BaseConnector } from '../BaseConnector';
import type { ActivityPage, FetchParams } from '../types';
import type { Activity, ActivityObject, Actor } from '../../core/normalizer/types';
import type { QueryParams } from '../../core/http/types';
import type {
  TwitterFetchParams,
  TwitterSearchResponse,
  TwitterTweet,
  TwitterUser,
} from './types';

const API_BASE_URL = 'https://api.twitter.com/1.1';

export const TWITTER_ENDPOINTS = {
  timeline: `${API_BASE_URL}/statuses/home_timeline.json`,
  selfTimeline: `${API_BASE_URL}/statuses/user_timeline.json`,
  status: `${API_BASE_URL}/statuses/show.json`,
  retweets: `${API_BASE_URL}/statuses/retweets.json`,
  userLookup: `${API_BASE_URL}/users/lookup.json`,
  currentUser: `${API_BASE_URL}/account/verify_credentials.json`,
  search: `${API_BASE_URL}/search/tweets.json`,
} as const;

/** Group id selecting the authenticated user's own timeline */
export const SELF = '@self';

const SEARCH_COUNT = 100;

/**
 * Twitter (API v1.1) source
 *
 * Reads timelines, statuses, users and search results with OAuth 1.0a
 * signed requests and converts them to ActivityStreams documents.
 *
 * **Shares:** with `fetchShares`, every original tweet that has been
 * retweeted costs one extra statuses/retweets request. The number of
 * requests is unbounded and the endpoint is heavily rate limited, so
 * callers decide when to pay for it. Lookups run through a queue whose
 * concurrency defaults to 1 (sequential, in page order).
 *
 * @example
 * ```typescript
 * const source = TwitterSource.init(config);
 * const { items } = await source.getActivities({ count: 20, fetchShares: true });
 * ```
 */
export class TwitterConnector extends BaseConnector {
  readonly name = 'twitter' as const;

  /**
   * Returns a user as an actor. Defaults to the authenticated user.
   */
  async getActor(screenName?: string): Promise<Actor> {
    if (screenName === undefined) {
      const user = await this.read<TwitterUser>(TWITTER_ENDPOINTS.currentUser);
      return this.deps.normalizer.userToActor(user);
    }

    // users/lookup answers with a list
    const users = await this.read<TwitterUser[] | TwitterUser>(TWITTER_ENDPOINTS.userLookup, {
      screen_name: screenName,
    });
    const user = Array.isArray(users) ? users[0] : users;
    return this.deps.normalizer.userToActor(user);
  }

  /**
   * Fetches a timeline page (or a single status) as post activities
   */
  async getActivities(params: TwitterFetchParams = {}): Promise<ActivityPage> {
    let tweets: TwitterTweet[];
    let totalCount: number | undefined;

    if (params.activityId) {
      tweets = [await this.readStatus(params.activityId)];
      totalCount = tweets.length;
    } else {
      const startIndex = params.startIndex ?? 0;
      const twitterCount = (params.count ?? 0) + startIndex;
      const url = params.groupId === SELF ? TWITTER_ENDPOINTS.selfTimeline : TWITTER_ENDPOINTS.timeline;

      const query: QueryParams = { include_entities: true };
      if (twitterCount > 0) {
        query.count = twitterCount;
      }

      const page = await this.read<TwitterTweet[]>(url, query);
      tweets = page.slice(startIndex);
    }

    const items = await this.toActivities(tweets, params);

    this.deps.logger.info('Twitter activities fetched', {
      provider: this.name,
      groupId: params.groupId,
      activityId: params.activityId,
      activityCount: items.length,
      fetchShares: Boolean(params.fetchShares),
    });

    return { totalCount, items };
  }

  /**
   * Searches recent tweets and returns them as post activities
   */
  async search(query: string, params: FetchParams = {}): Promise<ActivityPage> {
    const response = await this.read<TwitterSearchResponse>(TWITTER_ENDPOINTS.search, {
      q: query,
      include_entities: true,
      result_type: 'recent',
      count: SEARCH_COUNT,
    });

    const items = await this.toActivities(response.statuses ?? [], params);

    this.deps.logger.info('Twitter search completed', {
      provider: this.name,
      activityCount: items.length,
    });

    return { items };
  }

  /**
   * Returns a reply (any status, really) as a note object
   */
  async getComment(commentId: string, _activityId?: string): Promise<ActivityObject> {
    const tweet = await this.readStatus(commentId);
    return this.deps.normalizer.tweetToObject(tweet);
  }

  /**
   * The REST API only exposes a favorite count, never who favorited, so
   * likes can't be looked up.
   */
  async getLike(
    _activityUserId: string,
    _activityId: string,
    likeUserId: string
  ): Promise<Activity | undefined> {
    this.deps.logger.debug('Likes are not available from the REST API', {
      provider: this.name,
      likeUserId,
    });
    return undefined;
  }

  /**
   * Returns a retweet as a share object, or undefined when the status is
   * not a retweet
   */
  async getShare(
    _activityUserId: string,
    _activityId: string,
    shareId: string
  ): Promise<ActivityObject | undefined> {
    const tweet = await this.readStatus(shareId);
    return this.deps.normalizer.retweetToObject(tweet);
  }

  private async readStatus(id: string): Promise<TwitterTweet> {
    return this.read<TwitterTweet>(TWITTER_ENDPOINTS.status, { id, include_entities: true });
  }

  private async toActivities(tweets: TwitterTweet[], params: FetchParams): Promise<Activity[]> {
    const resolved = params.fetchShares
      ? await this.resolveShares(tweets, params.shareConcurrency)
      : tweets;

    return this.convertBatch('activity', resolved, (tweet) =>
      this.deps.normalizer.tweetToActivity(tweet)
    );
  }

  /**
   * Attaches `retweets` to every original tweet that has been retweeted.
   * Returns copies; the page order is kept whatever the concurrency.
   */
  private async resolveShares(
    tweets: TwitterTweet[],
    concurrency?: number
  ): Promise<TwitterTweet[]> {
    const queue = new PQueue({
      concurrency: Math.max(1, Math.floor(concurrency ?? this.options.shareConcurrency ?? 1)),
    });

    const pending = tweets.map((tweet) => {
      if (!this.hasRetweets(tweet)) {
        return Promise.resolve(tweet);
      }

      return queue.add(async () => {
        const id = tweet.id_str ?? '';
        this.deps.logger.debug('Fetching retweets', { provider: this.name, tweetId: id });
        this.deps.metrics.incrementCounter('share_fetches');

        const retweets = await this.read<TwitterTweet[]>(TWITTER_ENDPOINTS.retweets, { id });
        return { ...tweet, retweets };
      });
    });

    try {
      return await Promise.all(pending);
    } catch (error: unknown) {
      queue.clear();
      throw error;
    }
  }

  // this *is not* a retweet and it *has* retweets
  private hasRetweets(tweet: TwitterTweet): boolean {
    return (
      Boolean(tweet.id_str) &&
      !tweet.retweeted &&
      !tweet.retweeted_status &&
      (tweet.retweet_count ?? 0) >= 1
    );
  }
}
