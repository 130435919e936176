// tests/unit/OAuth1Client.test.ts

import crypto from 'crypto';
import { describe, it, expect } from 'vitest';
import { OAuth1Client, encodeQuery, percentEncode } from '../../src/core/auth/OAuth1Client';

const credentials = {
  accessTokenKey: 'test-access-key',
  accessTokenSecret: 'test-access-secret',
};

function parseAuthHeader(header: string): Record<string, string> {
  const params: Record<string, string> = {};
  for (const match of header.matchAll(/(\w+)="([^"]*)"/g)) {
    params[match[1]] = decodeURIComponent(match[2]);
  }
  return params;
}

function expectedSignature(
  url: string,
  params: Record<string, string>,
  consumerSecret: string,
  tokenSecret: string
): string {
  const paramString = Object.keys(params)
    .sort()
    .map((key) => `${percentEncode(key)}=${percentEncode(params[key])}`)
    .join('&');
  const baseString = ['GET', percentEncode(url), percentEncode(paramString)].join('&');
  const key = `${percentEncode(consumerSecret)}&${percentEncode(tokenSecret)}`;
  return crypto.createHmac('sha1', key).update(baseString).digest('base64');
}

describe('OAuth1Client', () => {
  const client = new OAuth1Client({
    consumerKey: 'test-consumer-key',
    consumerSecret: 'test-consumer-secret',
  });

  it('should build an OAuth Authorization header', () => {
    const header = client.signRequest(
      'GET',
      'https://api.twitter.com/1.1/statuses/show.json',
      { id: '42' },
      credentials
    );

    expect(header.startsWith('OAuth ')).toBe(true);

    const params = parseAuthHeader(header);
    expect(Object.keys(params).sort()).toEqual([
      'oauth_consumer_key',
      'oauth_nonce',
      'oauth_signature',
      'oauth_signature_method',
      'oauth_timestamp',
      'oauth_token',
      'oauth_version',
    ]);
    expect(params.oauth_consumer_key).toBe('test-consumer-key');
    expect(params.oauth_token).toBe('test-access-key');
    expect(params.oauth_signature_method).toBe('HMAC-SHA1');
    expect(params.oauth_version).toBe('1.0');
    expect(params.oauth_timestamp).toMatch(/^\d+$/);
    expect(params.oauth_nonce).toMatch(/^[a-zA-Z0-9]+$/);
  });

  it('should sign query parameters together with the oauth parameters', () => {
    const url = 'https://api.twitter.com/1.1/search/tweets.json';
    const query = { q: '#tests and more', count: '100' };

    const params = parseAuthHeader(client.signRequest('GET', url, query, credentials));
    const { oauth_signature: signature, ...oauthParams } = params;

    expect(signature).toBe(
      expectedSignature(url, { ...query, ...oauthParams }, 'test-consumer-secret', 'test-access-secret')
    );
  });

  it('should produce a different signature for a different token secret', () => {
    const url = 'https://api.twitter.com/1.1/account/verify_credentials.json';

    const params = parseAuthHeader(client.signRequest('GET', url, {}, credentials));
    const { oauth_signature: signature, ...oauthParams } = params;

    expect(signature).not.toBe(
      expectedSignature(url, oauthParams, 'test-consumer-secret', 'another-secret')
    );
    expect(signature).toBe(
      expectedSignature(url, oauthParams, 'test-consumer-secret', 'test-access-secret')
    );
  });
});

describe('percentEncode', () => {
  it('should encode reserved characters per RFC 3986', () => {
    expect(percentEncode("a b!*'()")).toBe('a%20b%21%2A%27%28%29');
    expect(percentEncode('#tests')).toBe('%23tests');
    expect(percentEncode('safe-_.~')).toBe('safe-_.~');
  });
});

describe('encodeQuery', () => {
  it('should join encoded pairs in insertion order', () => {
    expect(encodeQuery({ q: '#tests', count: '100' })).toBe('q=%23tests&count=100');
    expect(encodeQuery({})).toBe('');
  });
});
