// src/core/auth/types.ts

/**
 * Application (consumer) credentials issued for the API client
 */
export interface ConsumerCredentials {
  consumerKey: string;
  consumerSecret: string;
}

/**
 * Per-user access token credentials, already issued by the OAuth 1.0a flow
 */
export interface AccessCredentials {
  accessTokenKey: string;
  accessTokenSecret: string;
}
