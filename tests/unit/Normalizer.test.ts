// tests/unit/Normalizer.test.ts

import { describe, it, expect } from 'vitest';
import { Normalizer, ActivitySchema } from '../../src/core/normalizer/Normalizer';
import { SchemaValidationError } from '../../src/utils/errors';
import type { TwitterTweet } from '../../src/connectors/twitter/types';
import {
  alice,
  aliceActor,
  carolActor,
  collectNullPaths,
  entityTags,
  retweetOf42,
  shareOf42,
  tweet,
} from '../fixtures/twitter';

const noteOf42 = {
  objectType: 'note',
  id: 'tag:twitter.com:42',
  url: 'http://twitter.com/alice/status/42',
  published: '2007-05-23T06:01:13',
  content: '@bob check #tests at http://t.co/abc',
  author: aliceActor,
  tags: entityTags,
};

describe('Normalizer', () => {
  const normalizer = new Normalizer();

  describe('userToActor', () => {
    it('should convert a user to an actor', () => {
      expect(normalizer.userToActor(alice)).toEqual(aliceActor);
    });

    it('should nest the location instead of flattening it', () => {
      const actor = normalizer.userToActor({ screen_name: 'dave', location: 'Porto' });

      expect(actor.location).toEqual({ displayName: 'Porto' });
    });

    it('should omit absent fields', () => {
      expect(normalizer.userToActor({ screen_name: 'dave', name: null, description: '' })).toEqual({
        id: 'tag:twitter.com:dave',
        url: 'http://twitter.com/dave',
        username: 'dave',
      });
    });

    it('should return an empty actor without a screen name', () => {
      expect(normalizer.userToActor({ name: 'No Handle' })).toEqual({});
      expect(normalizer.userToActor(undefined)).toEqual({});
      expect(normalizer.userToActor(null)).toEqual({});
    });

    it('should use the configured domain', () => {
      const other = new Normalizer({ domain: 'example.org' });

      expect(other.userToActor({ screen_name: 'dave' })).toEqual({
        id: 'tag:example.org:dave',
        url: 'http://example.org/dave',
        username: 'dave',
      });
    });
  });

  describe('tweetToObject', () => {
    it('should convert a tweet to a note', () => {
      expect(normalizer.tweetToObject(tweet())).toEqual(noteOf42);
    });

    it('should rewrite entity spans to startIndex and length', () => {
      const tags = normalizer.tweetToObject(tweet()).tags ?? [];

      expect(tags.map((tag) => [tag.startIndex, tag.length])).toEqual([
        [0, 4],
        [11, 6],
        [21, 15],
      ]);
      for (const tag of tags) {
        expect(tag).not.toHaveProperty('indices');
      }
    });

    it('should keep tags in mention, hashtag, link order', () => {
      const object = normalizer.tweetToObject(
        tweet({
          entities: {
            urls: [{ expanded_url: 'https://example.com/1', indices: [30, 40] }],
            hashtags: [{ text: 'b', indices: [20, 22] }],
            user_mentions: [{ screen_name: 'erin', indices: [10, 15] }],
          },
        })
      );

      expect(object.tags?.map((tag) => tag.objectType)).toEqual(['person', 'hashtag', 'article']);
    });

    it('should keep the text un-linkified', () => {
      expect(normalizer.tweetToObject(tweet()).content).toBe('@bob check #tests at http://t.co/abc');
    });

    it('should attach the first media entry as image and attachment', () => {
      const object = normalizer.tweetToObject(
        tweet({
          entities: {
            media: [
              { type: 'photo', media_url: 'http://pbs.example.com/one.jpg', indices: [0, 5] },
              { type: 'photo', media_url: 'http://pbs.example.com/two.jpg', indices: [6, 9] },
            ],
          },
        })
      );

      expect(object.image).toEqual({ url: 'http://pbs.example.com/one.jpg' });
      expect(object.attachments).toEqual([
        { objectType: 'image', image: { url: 'http://pbs.example.com/one.jpg' } },
      ]);
    });

    it('should not fall back to later media when the first has no url', () => {
      const object = normalizer.tweetToObject(
        tweet({
          entities: {
            media: [
              { type: 'photo', indices: [0, 5] },
              { type: 'photo', media_url: 'http://pbs.example.com/two.jpg', indices: [6, 9] },
            ],
          },
        })
      );

      expect(object).not.toHaveProperty('image');
      expect(object).not.toHaveProperty('attachments');
    });

    it('should omit image and attachments without media', () => {
      const object = normalizer.tweetToObject(tweet({ entities: {} }));

      expect(object).not.toHaveProperty('image');
      expect(object).not.toHaveProperty('attachments');
      expect(object).not.toHaveProperty('tags');
    });

    it('should build the location from the place', () => {
      const object = normalizer.tweetToObject(
        tweet({ place: { id: '7d62cffe6f98f349', full_name: 'San Jose, CA' } })
      );

      expect(object.location).toEqual({ displayName: 'San Jose, CA', id: '7d62cffe6f98f349' });
    });

    it('should add a map link when the tweet has coordinates', () => {
      const object = normalizer.tweetToObject(
        tweet({
          place: { id: '7d62cffe6f98f349', full_name: 'San Jose, CA' },
          geo: { type: 'Point', coordinates: [37.33, -121.89] },
        })
      );

      expect(object.location).toEqual({
        displayName: 'San Jose, CA',
        id: '7d62cffe6f98f349',
        url: 'https://maps.google.com/maps?q=37.33,-121.89',
      });
    });

    it('should ignore coordinates without a place', () => {
      const object = normalizer.tweetToObject(
        tweet({ geo: { type: 'Point', coordinates: [37.33, -121.89] } })
      );

      expect(object).not.toHaveProperty('location');
    });

    it('should omit id, url and author when the user has no screen name', () => {
      expect(normalizer.tweetToObject({ id_str: '5', text: 'hi', user: { name: 'Anon' } })).toEqual({
        objectType: 'note',
        content: 'hi',
      });
    });

    it('should append retweets as share objects after the entity tags', () => {
      const object = normalizer.tweetToObject(
        tweet({ retweets: [retweetOf42(), tweet({ id_str: '43' })] })
      );

      expect(object.tags).toEqual([...entityTags, shareOf42]);
    });

    it('should return an empty object without id_str', () => {
      expect(normalizer.tweetToObject({})).toEqual({});
      expect(normalizer.tweetToObject(tweet({ id_str: null }))).toEqual({});
      expect(normalizer.tweetToObject(tweet({ id_str: '' }))).toEqual({});
    });

    it('should never emit null or empty values', () => {
      const object = normalizer.tweetToObject(
        tweet({
          text: '',
          user: { screen_name: 'dave', name: '', location: null },
          entities: { user_mentions: [{ screen_name: 'bob', name: null }], hashtags: [], urls: [] },
          place: { id: null, full_name: null },
          retweets: [],
        })
      );

      expect(collectNullPaths(object)).toEqual([]);
    });

    it('should throw SchemaValidationError for malformed values', () => {
      const malformed: TwitterTweet = JSON.parse('{"id_str": "7", "text": {"html": "<b>hi</b>"}}');

      expect(() => normalizer.tweetToObject(malformed)).toThrow(SchemaValidationError);
    });
  });

  describe('tweetToActivity', () => {
    it('should convert a tweet to a post activity', () => {
      const activity = normalizer.tweetToActivity(tweet());

      expect(activity).toEqual({
        verb: 'post',
        published: '2007-05-23T06:01:13',
        id: 'tag:twitter.com:42',
        url: 'http://twitter.com/alice/status/42',
        actor: aliceActor,
        object: noteOf42,
        generator: { displayName: 'MyApp', url: 'http://x.io/app' },
      });
      expect(ActivitySchema.safeParse(activity).success).toBe(true);
    });

    it('should parse the generator from a plain anchor', () => {
      const activity = normalizer.tweetToActivity(
        tweet({ source: '<a href="http://x.io/app">MyApp</a>' })
      );

      expect(activity.generator).toEqual({ displayName: 'MyApp', url: 'http://x.io/app' });
    });

    it('should omit the generator when the source has no anchor', () => {
      expect(normalizer.tweetToActivity(tweet({ source: 'web' }))).not.toHaveProperty('generator');
      expect(normalizer.tweetToActivity(tweet({ source: null }))).not.toHaveProperty('generator');
    });

    it('should add the reply context when both reply fields are present', () => {
      const activity = normalizer.tweetToActivity(
        tweet({ in_reply_to_status_id_str: '41', in_reply_to_screen_name: 'bob' })
      );

      expect(activity.context).toEqual({
        inReplyTo: [
          {
            objectType: 'note',
            id: 'tag:twitter.com:41',
            url: 'http://twitter.com/bob/status/41',
          },
        ],
      });
    });

    it('should fall back to the numeric reply id', () => {
      const activity = normalizer.tweetToActivity(
        tweet({ in_reply_to_status_id: 41, in_reply_to_screen_name: 'bob' })
      );

      expect(activity.context?.inReplyTo).toHaveLength(1);
      expect(activity.context?.inReplyTo?.[0].id).toBe('tag:twitter.com:41');
    });

    it('should omit the context when either reply field is missing', () => {
      expect(
        normalizer.tweetToActivity(tweet({ in_reply_to_status_id_str: '41' }))
      ).not.toHaveProperty('context');
      expect(
        normalizer.tweetToActivity(tweet({ in_reply_to_screen_name: 'bob' }))
      ).not.toHaveProperty('context');
    });

    it('should return an empty activity without id_str', () => {
      expect(
        normalizer.tweetToActivity({
          text: 'no id',
          source: '<a href="http://x.io/app">MyApp</a>',
          in_reply_to_status_id_str: '41',
          in_reply_to_screen_name: 'bob',
        })
      ).toEqual({});
    });

    it('should never emit null or empty values', () => {
      const activity = normalizer.tweetToActivity(
        tweet({ source: '', retweets: [retweetOf42()], in_reply_to_screen_name: '' })
      );

      expect(collectNullPaths(activity)).toEqual([]);
    });
  });

  describe('retweetToObject', () => {
    it('should convert a retweet to a share object', () => {
      expect(normalizer.retweetToObject(retweetOf42())).toEqual(shareOf42);
    });

    it('should reference the original by status url only', () => {
      const share = normalizer.retweetToObject(retweetOf42());

      expect(share?.verb).toBe('share');
      expect(share?.content).toBe('retweeted this.');
      expect(share?.object?.url).toMatch(/\/alice\/status\/42$/);
      expect(share?.object).toEqual({ url: 'http://twitter.com/alice/status/42' });
    });

    it('should keep the wrapper author, not the original author', () => {
      expect(normalizer.retweetToObject(retweetOf42())?.author).toEqual(carolActor);
    });

    it('should return undefined for a tweet that is not a retweet', () => {
      expect(normalizer.retweetToObject(tweet())).toBeUndefined();
    });

    it('should omit the object when the original has no screen name', () => {
      const share = normalizer.retweetToObject(
        retweetOf42({ retweeted_status: { id_str: '42', user: {} } })
      );

      expect(share).not.toHaveProperty('object');
      expect(share?.verb).toBe('share');
    });

    it('should return an empty object for a retweet without id_str', () => {
      expect(normalizer.retweetToObject(retweetOf42({ id_str: undefined }))).toEqual({});
    });
  });

  describe('urls', () => {
    it('should build tag URIs and canonical urls', () => {
      expect(normalizer.tagUri('alice')).toBe('tag:twitter.com:alice');
      expect(normalizer.userUrl('alice')).toBe('http://twitter.com/alice');
      expect(normalizer.statusUrl('alice', '42')).toBe('http://twitter.com/alice/status/42');
    });
  });
});
