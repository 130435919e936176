import crypto from 'crypto';
import type { AccessCredentials, ConsumerCredentials } from './types';

const SIGNATURE_METHOD = 'HMAC-SHA1';
const OAUTH_VERSION = '1.0';

/**
 * Percent-encode for OAuth (RFC 3986)
 */
export function percentEncode(str: string): string {
  return encodeURIComponent(str)
    .replace(/!/g, '%21')
    .replace(/'/g, '%27')
    .replace(/\(/g, '%28')
    .replace(/\)/g, '%29')
    .replace(/\*/g, '%2A');
}

/**
 * Encode query parameters the same way they enter the signature base string
 */
export function encodeQuery(params: Record<string, string>): string {
  return Object.keys(params)
    .map((key) => `${percentEncode(key)}=${percentEncode(params[key])}`)
    .join('&');
}

/**
 * OAuth 1.0a request signer
 *
 * Produces the Authorization header for a request made on behalf of a user
 * whose access token has already been issued. Twitter API v1.1 only accepts
 * HMAC-SHA1.
 *
 * @example
 * ```typescript
 * const oauth1 = new OAuth1Client({ consumerKey, consumerSecret });
 * const header = oauth1.signRequest('GET', url, { id: '42' }, credentials);
 * ```
 */
export class OAuth1Client {
  constructor(private readonly config: ConsumerCredentials) {}

  /**
   * Sign an OAuth1 request
   *
   * @param method - HTTP method
   * @param url - Request URL without query string
   * @param params - Query parameters, included in the signature
   * @param credentials - User access token and secret
   * @returns Authorization header value
   */
  signRequest(
    method: string,
    url: string,
    params: Record<string, string>,
    credentials: AccessCredentials
  ): string {
    const oauthParams: Record<string, string> = {
      oauth_consumer_key: this.config.consumerKey,
      oauth_nonce: this.generateNonce(),
      oauth_signature_method: SIGNATURE_METHOD,
      oauth_timestamp: this.getTimestamp(),
      oauth_token: credentials.accessTokenKey,
      oauth_version: OAUTH_VERSION,
    };

    const signature = this.generateSignature(
      method,
      url,
      { ...params, ...oauthParams },
      credentials.accessTokenSecret
    );

    return this.buildAuthHeader({
      ...oauthParams,
      oauth_signature: signature,
    });
  }

  /**
   * Generate the HMAC-SHA1 signature
   */
  private generateSignature(
    method: string,
    url: string,
    params: Record<string, string>,
    tokenSecret: string
  ): string {
    // 1. Create parameter string (sorted by encoded key)
    const sortedParams = Object.keys(params)
      .map((key) => [percentEncode(key), percentEncode(params[key])])
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => `${key}=${value}`)
      .join('&');

    // 2. Create base string
    const baseString = [
      method.toUpperCase(),
      percentEncode(url),
      percentEncode(sortedParams),
    ].join('&');

    // 3. Create signing key
    const signingKey = [
      percentEncode(this.config.consumerSecret),
      percentEncode(tokenSecret),
    ].join('&');

    // 4. Generate signature
    return crypto.createHmac('sha1', signingKey).update(baseString).digest('base64');
  }

  /**
   * Build OAuth Authorization header
   */
  private buildAuthHeader(params: Record<string, string>): string {
    const oauthParams = Object.keys(params)
      .filter((key) => key.startsWith('oauth_'))
      .sort()
      .map((key) => `${percentEncode(key)}="${percentEncode(params[key])}"`)
      .join(', ');

    return `OAuth ${oauthParams}`;
  }

  /**
   * Generate random nonce
   */
  private generateNonce(): string {
    return crypto.randomBytes(16).toString('base64').replace(/[^a-zA-Z0-9]/g, '');
  }

  /**
   * Get current Unix timestamp
   */
  private getTimestamp(): string {
    return Math.floor(Date.now() / 1000).toString();
  }
}
