// src/core/http/HttpCore.ts

import axios, { AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import type { HttpConfig, HttpRequestConfig, HttpResponse, QueryParams } from './types';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './types';
import type { AccessCredentials } from '../auth/types';
import { OAuth1Client, encodeQuery } from '../auth/OAuth1Client';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import {
  ApiClientError,
  ApiServerError,
  NetworkError,
  NetworkTimeoutError,
  OAuthError,
  RateLimitError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

/**
 * Signed, read-only HTTP access to the API.
 *
 * Every request carries a fresh OAuth 1.0a signature. There is no retry,
 * no cache and no rate limiter here: failures surface as typed errors and
 * repeated reads pay the full network cost.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;

  constructor(
    private readonly signer: OAuth1Client,
    private readonly credentials: AccessCredentials,
    config: HttpConfig,
    private readonly metrics: MetricsCollector,
    private readonly logger: Logger
  ) {
    this.axiosInstance = axios.create({
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      headers: {
        'User-Agent': config.userAgent ?? DEFAULT_USER_AGENT,
        Accept: 'application/json',
      },
    });
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url });
  }

  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const endpoint = this.extractEndpoint(config.url);
    const requestId = uuidv4();
    const params = this.stringifyQuery(config.query ?? {});
    const queryString = encodeQuery(params);
    const fullUrl = queryString ? `${config.url}?${queryString}` : config.url;

    this.logger.debug('HTTP request', {
      requestId,
      endpoint,
      url: fullUrl,
    });

    return withHttpSpan('GET', config.url, endpoint, async () => {
      const startTime = Date.now();

      try {
        const response = await this.axiosInstance.get<T>(fullUrl, {
          headers: {
            Authorization: this.signer.signRequest('GET', config.url, params, this.credentials),
            'X-Request-ID': requestId,
          },
        });

        this.metrics.incrementCounter('http_requests_total', {
          endpoint,
          method: 'GET',
          status: response.status.toString(),
        });
        this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
          endpoint,
          status: response.status,
        });

        return {
          data: response.data,
          status: response.status,
          headers: this.toHeaderRecord(response.headers),
        };
      } catch (error: unknown) {
        const errorStatus =
          axios.isAxiosError(error) && error.response ? error.response.status.toString() : 'error';

        this.metrics.incrementCounter('http_requests_total', {
          endpoint,
          method: 'GET',
          status: errorStatus,
        });
        this.metrics.incrementCounter('http_errors', { endpoint, status: errorStatus });

        throw this.transformError(error, endpoint, requestId);
      }
    });
  }

  private stringifyQuery(query: QueryParams): Record<string, string> {
    const params: Record<string, string> = {};
    for (const [key, value] of Object.entries(query)) {
      params[key] = String(value);
    }
    return params;
  }

  // https://api.twitter.com/1.1/statuses/show.json -> statuses/show
  private extractEndpoint(url: string): string {
    return new URL(url).pathname.replace(/^\/1\.1\//, '').replace(/\.json$/, '');
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private retryAfterSeconds(headers: Record<string, string>): number | undefined {
    const retryAfter = Number(headers['retry-after']);
    if (headers['retry-after'] && Number.isFinite(retryAfter)) {
      return retryAfter;
    }

    const reset = Number(headers['x-rate-limit-reset']);
    if (headers['x-rate-limit-reset'] && Number.isFinite(reset)) {
      return Math.max(0, reset - Math.floor(Date.now() / 1000));
    }

    return undefined;
  }

  private transformError(error: unknown, endpoint: string, requestId: string): Error {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        const headers = this.toHeaderRecord(error.response.headers);

        this.logger.debug('HTTP error response', {
          requestId,
          endpoint,
          status,
          statusText: error.response.statusText,
          data: error.response.data,
        });

        if (status === 401 || status === 403) {
          return new OAuthError(`Authentication rejected: ${status}`, {
            endpoint,
            status,
            response: error.response.data,
          });
        }
        if (status === 429) {
          return new RateLimitError(
            `Rate limit exceeded for ${endpoint}`,
            this.retryAfterSeconds(headers),
            { endpoint }
          );
        }
        if (status >= 400 && status < 500) {
          return new ApiClientError(`Client error: ${status}`, status, {
            endpoint,
            response: error.response.data,
          });
        }
        if (status >= 500) {
          return new ApiServerError(`Server error: ${status}`, status, { endpoint });
        }
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new NetworkTimeoutError('Request timeout', { endpoint });
      }
    }
    return new NetworkError('Network error', { endpoint, cause: error });
  }
}
