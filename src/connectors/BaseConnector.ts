// src/connectors/BaseConnector.ts

import type {
  ActivityPage,
  Connector,
  ConnectorOptions,
  CoreDeps,
  FetchParams,
} from './types';
import type { Activity, ActivityObject, Actor } from '../core/normalizer/types';
import type { QueryParams } from '../core/http/types';
import { isEmpty } from '../core/normalizer/utils';
import { SchemaValidationError } from '../utils/errors';

export abstract class BaseConnector implements Connector {
  abstract readonly name: string;

  constructor(
    protected deps: CoreDeps,
    protected options: ConnectorOptions = {}
  ) {}

  abstract getActor(screenName?: string): Promise<Actor>;

  abstract getActivities(params?: FetchParams): Promise<ActivityPage>;

  abstract getComment(commentId: string, activityId?: string): Promise<ActivityObject>;

  abstract getLike(
    activityUserId: string,
    activityId: string,
    likeUserId: string
  ): Promise<Activity | undefined>;

  abstract getShare(
    activityUserId: string,
    activityId: string,
    shareId: string
  ): Promise<ActivityObject | undefined>;

  /**
   * Signed GET returning the decoded JSON body. Transport and API failures
   * propagate unchanged.
   */
  protected async read<T>(url: string, query?: QueryParams): Promise<T> {
    const response = await this.deps.http.get<T>(url, { query });
    return response.data;
  }

  /**
   * Converts a page of records, preserving order.
   *
   * Records without an id stay in the page as empty documents. A record
   * whose output fails schema validation is logged and dropped; any other
   * error propagates.
   */
  protected convertBatch<S, T extends object>(
    kind: string,
    records: S[],
    convert: (record: S) => T
  ): T[] {
    const converted: T[] = [];

    for (const record of records) {
      try {
        const result = convert(record);
        converted.push(result);

        if (isEmpty(result)) {
          this.deps.metrics.incrementCounter('records_skipped', { kind, reason: 'missing_id' });
        } else {
          this.deps.metrics.incrementCounter('records_converted', { kind });
        }
      } catch (error: unknown) {
        if (!(error instanceof SchemaValidationError)) {
          throw error;
        }

        this.deps.logger.warn('Dropping record that failed schema validation', {
          provider: this.name,
          kind,
          issues: error.details?.issues,
        });
        this.deps.metrics.incrementCounter('records_skipped', {
          kind,
          reason: 'schema_validation',
        });
      }
    }

    return converted;
  }
}
