// src/core/http/types.ts

export type QueryParams = Record<string, string | number | boolean>;

export interface HttpRequestConfig {
  url: string;
  query?: QueryParams;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface HttpConfig {
  timeout?: number; // milliseconds
  userAgent?: string;
}

export const DEFAULT_TIMEOUT_MS = 999_000;
export const DEFAULT_USER_AGENT = 'tweet-activitystreams/1.0';
