// src/index.ts

export { TwitterSource } from './sdk';
export type { InitConfig } from './sdk';
export { Normalizer, ActorSchema, ObjectSchema, ActivitySchema } from './core/normalizer/Normalizer';
export type { NormalizerOptions } from './core/normalizer/Normalizer';
export { trimNulls, isEmpty, tagUri, rfc2822ToIso8601 } from './core/normalizer/utils';
export type {
  Actor,
  Activity,
  ActivityObject,
  Generator,
  Location,
  MediaLink,
  ObjectType,
  Verb,
} from './core/normalizer/types';
export type { ActivityPage, FetchParams } from './connectors/types';
export { TWITTER_ENDPOINTS, SELF } from './connectors/twitter/TwitterConnector';
export type {
  TwitterFetchParams,
  TwitterTweet,
  TwitterUser,
  TwitterEntities,
} from './connectors/twitter/types';
export type { AccessCredentials, ConsumerCredentials } from './core/auth/types';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';

// Export error classes for error handling
export {
  SDKError,
  ConfigError,
  SchemaValidationError,
  OAuthError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
} from './utils/errors';
