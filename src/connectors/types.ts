// src/connectors/types.ts

import type { Activity, ActivityObject, Actor } from '../core/normalizer/types';
import type { HttpCore } from '../core/http/HttpCore';
import type { Normalizer } from '../core/normalizer/Normalizer';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';

export interface Connector {
  readonly name: string;

  getActor(screenName?: string): Promise<Actor>;
  getActivities(params?: FetchParams): Promise<ActivityPage>;
  getComment(commentId: string, activityId?: string): Promise<ActivityObject>;
  getLike(
    activityUserId: string,
    activityId: string,
    likeUserId: string
  ): Promise<Activity | undefined>;
  getShare(
    activityUserId: string,
    activityId: string,
    shareId: string
  ): Promise<ActivityObject | undefined>;
}

export interface FetchParams {
  startIndex?: number;
  count?: number;
  fetchShares?: boolean; // Resolve retweets of each original tweet
  shareConcurrency?: number; // Parallel retweet lookups, default from config
  [key: string]: unknown; // Allow provider-specific params
}

export interface ActivityPage {
  totalCount?: number; // Known only for single-item reads
  items: Activity[];
}

export interface ConnectorOptions {
  shareConcurrency?: number;
}

export interface CoreDeps {
  http: HttpCore;
  normalizer: Normalizer;
  logger: Logger;
  metrics: MetricsCollector;
}
