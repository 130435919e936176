// src/sdk.ts

import type { Activity, ActivityObject, Actor } from './core/normalizer/types';
import type { AccessCredentials, ConsumerCredentials } from './core/auth/types';
import type { ActivityPage, CoreDeps, FetchParams } from './connectors/types';
import type { HttpConfig } from './core/http/types';
import type { TwitterFetchParams } from './connectors/twitter/types';
import { OAuth1Client } from './core/auth/OAuth1Client';
import { HttpCore } from './core/http/HttpCore';
import { Normalizer } from './core/normalizer/Normalizer';
import { Logger, LoggerConfig } from './observability/Logger';
import { MetricsCollector, MetricsConfig } from './observability/MetricsCollector';
import { TwitterConnector } from './connectors/twitter/TwitterConnector';
import { validateConfig, withEnvDefaults } from './config/ConfigValidator';

export interface InitConfig {
  credentials: AccessCredentials;
  consumer?: ConsumerCredentials; // Defaults to TWITTER_CONSUMER_KEY / TWITTER_CONSUMER_SECRET
  http?: HttpConfig;
  shares?: {
    concurrency?: number;
  };
  metrics?: MetricsConfig;
  logging?: LoggerConfig;
}

export class TwitterSource {
  private connector: TwitterConnector;
  private core: CoreDeps;

  private constructor(config: InitConfig & { consumer: ConsumerCredentials }) {
    // Build ALL dependencies FIRST
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const normalizer = new Normalizer();
    const signer = new OAuth1Client(config.consumer);
    const http = new HttpCore(signer, config.credentials, config.http ?? {}, metrics, logger);

    this.core = { logger, metrics, normalizer, http };
    this.connector = new TwitterConnector(this.core, {
      shareConcurrency: config.shares?.concurrency,
    });
  }

  /**
   * Create a Twitter activity source
   *
   * @param config - Access token credentials plus optional consumer, http, share, metrics and logging settings
   * @returns Ready-to-use source
   * @throws {ConfigError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const source = TwitterSource.init({
   *   credentials: {
   *     accessTokenKey: process.env.TWITTER_ACCESS_TOKEN_KEY,
   *     accessTokenSecret: process.env.TWITTER_ACCESS_TOKEN_SECRET,
   *   },
   *   shares: { concurrency: 1 },
   *   logging: { level: 'info' },
   * });
   *
   * const { items } = await source.getActivities({ count: 20 });
   * ```
   */
  static init(config: InitConfig): TwitterSource {
    // Validate configuration (fail-fast with clear errors)
    const validated = validateConfig(withEnvDefaults(config));

    const source = new TwitterSource(validated);
    source.core.logger.info('Twitter source initialized', {
      timeout: validated.http?.timeout,
      shareConcurrency: validated.shares?.concurrency ?? 1,
    });

    return source;
  }

  /**
   * Returns a user as an actor; the authenticated user when no screen name is given
   */
  async getActor(screenName?: string): Promise<Actor> {
    return this.connector.getActor(screenName);
  }

  /**
   * Returns a timeline page, or a single status with `activityId`, as activities
   */
  async getActivities(params?: TwitterFetchParams): Promise<ActivityPage> {
    return this.connector.getActivities(params);
  }

  async search(query: string, params?: FetchParams): Promise<ActivityPage> {
    return this.connector.search(query, params);
  }

  async getComment(commentId: string, activityId?: string): Promise<ActivityObject> {
    return this.connector.getComment(commentId, activityId);
  }

  async getLike(
    activityUserId: string,
    activityId: string,
    likeUserId: string
  ): Promise<Activity | undefined> {
    return this.connector.getLike(activityUserId, activityId, likeUserId);
  }

  async getShare(
    activityUserId: string,
    activityId: string,
    shareId: string
  ): Promise<ActivityObject | undefined> {
    return this.connector.getShare(activityUserId, activityId, shareId);
  }

  /**
   * The pure converter, for callers holding source records already
   */
  get normalizer(): Normalizer {
    return this.core.normalizer;
  }

  /**
   * Prometheus metrics (text format)
   */
  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }
}
