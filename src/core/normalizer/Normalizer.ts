// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import type { Activity, ActivityObject, Actor } from './types';
import type {
  TwitterIndices,
  TwitterTweet,
  TwitterUser,
} from '../../connectors/twitter/types';
import { isEmpty, rfc2822ToIso8601, tagUri, trimNulls } from './utils';
import { SchemaValidationError } from '../../utils/errors';

// Validation schemas (exported for JSON Schema generation)
const ObjectTypeSchema = z.enum(['note', 'article', 'image', 'activity', 'person', 'hashtag']);
const VerbSchema = z.enum(['post', 'share']);

const MediaLinkSchema = z.object({
  url: z.string(),
});

const LocationSchema = z.object({
  displayName: z.string().optional(),
  id: z.string().optional(),
  url: z.string().optional(),
});

export const ActorSchema: z.ZodType<Actor> = z.object({
  id: z.string().optional(),
  displayName: z.string().optional(),
  username: z.string().optional(),
  url: z.string().optional(),
  image: MediaLinkSchema.optional(),
  location: LocationSchema.optional(),
  published: z.string().optional(),
  description: z.string().optional(),
});

export const ObjectSchema: z.ZodType<ActivityObject> = z.lazy(() =>
  z.object({
    objectType: ObjectTypeSchema.optional(),
    id: z.string().optional(),
    url: z.string().optional(),
    displayName: z.string().optional(),
    published: z.string().optional(),
    content: z.string().optional(),
    author: ActorSchema.optional(),
    image: MediaLinkSchema.optional(),
    attachments: z.array(ObjectSchema).optional(),
    tags: z.array(ObjectSchema).optional(),
    location: LocationSchema.optional(),
    startIndex: z.number().int().nonnegative().optional(),
    length: z.number().int().optional(),
    verb: VerbSchema.optional(),
    object: ObjectSchema.optional(),
  })
);

export const ActivitySchema: z.ZodType<Activity> = z.object({
  verb: VerbSchema.optional(),
  id: z.string().optional(),
  url: z.string().optional(),
  published: z.string().optional(),
  actor: ActorSchema.optional(),
  object: ObjectSchema.optional(),
  context: z
    .object({
      inReplyTo: z.array(ObjectSchema).optional(),
    })
    .optional(),
  generator: z
    .object({
      displayName: z.string().optional(),
      url: z.string().optional(),
    })
    .optional(),
});

// yes, the source field carries an HTML link to the client app
const GENERATOR_LINK = /<a href="([^"]+)".*>(.+)<\/a>/;

const SHARE_CONTENT = 'retweeted this.';

export interface NormalizerOptions {
  /** Domain used for tag URIs and profile/status URLs */
  domain?: string;
}

/**
 * Converts Twitter API v1.1 records into ActivityStreams 1.0 documents.
 *
 * Every conversion is pure. A record without an id converts to `{}`
 * rather than throwing, so one bad record never fails a batch; check the
 * result with `isEmpty()`. Null and empty values are trimmed from every
 * document before it is validated and returned.
 */
export class Normalizer {
  readonly domain: string;

  constructor(options: NormalizerOptions = {}) {
    this.domain = options.domain ?? 'twitter.com';
  }

  /**
   * Converts a user to an actor. Users without a screen name give `{}`.
   */
  userToActor(user: TwitterUser | null | undefined): Actor {
    const username = user?.screen_name;
    if (!user || !username) {
      return {};
    }

    return this.finalize(ActorSchema, 'actor', {
      displayName: user.name,
      image: { url: user.profile_image_url },
      id: this.tagUri(username),
      published: rfc2822ToIso8601(user.created_at),
      url: this.userUrl(username),
      location: { displayName: user.location },
      username,
      description: user.description,
    });
  }

  /**
   * Converts a tweet to a note object. Tweets without `id_str` give `{}`.
   *
   * The text is left as is: its links are t.co redirects, and the real
   * targets only appear in the url entities, which become article tags.
   */
  tweetToObject(tweet: TwitterTweet): ActivityObject {
    const id = tweet.id_str;
    if (!id) {
      return {};
    }

    const author = tweet.user ? this.userToActor(tweet.user) : undefined;
    const username = author?.username;
    const entities = tweet.entities ?? {};

    // only photos show up in the media list today; the first entry wins
    const mediaUrl = entities.media?.[0]?.media_url;

    const tags: Array<Record<string, unknown> | ActivityObject | undefined> = [
      ...(entities.user_mentions ?? []).map((mention) => ({
        objectType: 'person',
        id: mention.screen_name ? this.tagUri(mention.screen_name) : undefined,
        url: mention.screen_name ? this.userUrl(mention.screen_name) : undefined,
        displayName: mention.name,
        ...this.span(mention.indices),
      })),
      ...(entities.hashtags ?? []).map((hashtag) => ({
        objectType: 'hashtag',
        url: hashtag.text ? `https://${this.domain}/search?q=%23${hashtag.text}` : undefined,
        ...this.span(hashtag.indices),
      })),
      ...(entities.urls ?? []).map((link) => ({
        objectType: 'article',
        url: link.expanded_url,
        ...this.span(link.indices),
      })),
      ...(tweet.retweets ?? []).map((retweet) => this.retweetToObject(retweet)),
    ];

    return this.finalize(ObjectSchema, 'object', {
      objectType: 'note',
      id: username ? this.tagUri(id) : undefined,
      url: username ? this.statusUrl(username, id) : undefined,
      published: rfc2822ToIso8601(tweet.created_at),
      content: tweet.text,
      author,
      image: mediaUrl ? { url: mediaUrl } : undefined,
      attachments: mediaUrl ? [{ objectType: 'image', image: { url: mediaUrl } }] : [],
      tags,
      location: this.location(tweet),
    });
  }

  /**
   * Converts a tweet to a post activity. Tweets without `id_str` give `{}`.
   */
  tweetToActivity(tweet: TwitterTweet): Activity {
    const object = this.tweetToObject(tweet);
    if (isEmpty(object)) {
      return {};
    }

    const replyToName = tweet.in_reply_to_screen_name;
    const replyToId =
      tweet.in_reply_to_status_id_str ||
      (tweet.in_reply_to_status_id ? String(tweet.in_reply_to_status_id) : undefined);

    const context =
      replyToName && replyToId
        ? {
            inReplyTo: [
              {
                objectType: 'note',
                id: this.tagUri(replyToId),
                url: this.statusUrl(replyToName, replyToId),
              },
            ],
          }
        : undefined;

    const parsed = GENERATOR_LINK.exec(tweet.source ?? '');
    const generator = parsed ? { displayName: parsed[2], url: parsed[1] } : undefined;

    return this.finalize(ActivitySchema, 'activity', {
      verb: 'post',
      published: object.published,
      id: object.id,
      url: object.url,
      actor: object.author,
      object,
      context,
      generator,
    });
  }

  /**
   * Converts a retweet to a share activity object.
   *
   * Returns undefined when the record carries no `retweeted_status`, since
   * it can't be told apart from an ordinary tweet.
   */
  retweetToObject(retweet: TwitterTweet): ActivityObject | undefined {
    const original = retweet.retweeted_status;
    if (!original) {
      return undefined;
    }

    const share = this.tweetToObject(retweet);
    if (isEmpty(share)) {
      return {};
    }

    const originalUsername = original.user?.screen_name;
    const originalId = original.id_str;

    return this.finalize(ObjectSchema, 'share', {
      ...share,
      objectType: 'activity',
      verb: 'share',
      content: SHARE_CONTENT,
      object:
        originalUsername && originalId
          ? { url: this.statusUrl(originalUsername, originalId) }
          : undefined,
    });
  }

  tagUri(name: string): string {
    return tagUri(this.domain, name);
  }

  userUrl(username: string): string {
    return `http://${this.domain}/${username}`;
  }

  statusUrl(username: string, id: string): string {
    return `${this.userUrl(username)}/status/${id}`;
  }

  // [start, end) -> startIndex + length
  private span(indices: TwitterIndices | undefined): { startIndex?: number; length?: number } {
    if (!indices || indices.length < 2) {
      return {};
    }
    return { startIndex: indices[0], length: indices[1] - indices[0] };
  }

  private location(tweet: TwitterTweet): Record<string, unknown> | undefined {
    const place = tweet.place;
    if (!place) {
      return undefined;
    }

    // place.url is an API url, not a page; link to a map of the geo point instead
    const coordinates = tweet.geo?.coordinates;
    const url =
      coordinates && coordinates.length >= 2
        ? `https://maps.google.com/maps?q=${coordinates[0]},${coordinates[1]}`
        : undefined;

    return {
      displayName: place.full_name,
      id: place.id,
      url,
    };
  }

  private finalize<T>(schema: z.ZodType<T>, kind: string, raw: Record<string, unknown>): T {
    const result = schema.safeParse(trimNulls(raw));
    if (!result.success) {
      throw new SchemaValidationError(`Schema validation failed for ${kind}`, {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return result.data;
  }
}
