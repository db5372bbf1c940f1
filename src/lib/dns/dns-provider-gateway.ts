/**
 * DNS Provider Gateway
 *
 * The only component that talks to the DNS provider. Creates are idempotent
 * (an identical TXT record is reused), deletes treat a missing record as done,
 * zone refreshes never throw. Provider failures surface as the typed errors of
 * `orchestration-errors`; rate limits and transient failures are retried with
 * bounded backoff before {@link ProviderUnavailableError} is raised.
 */

import {
  PROVIDER_MAX_RETRIES,
  PROVIDER_RETRY_BASE_DELAY_MS,
  PROVIDER_RETRY_MAX_DELAY_MS,
  CHALLENGE_RECORD_PREFIX,
  DEFAULT_RECORD_TTL,
} from '../constants/defaults.js';
import {
  AuthenticationError,
  ProviderRateLimitedError,
  ProviderRequestError,
  ProviderUnavailableError,
  RecordNotFoundError,
  TransientProviderError,
  isProviderError,
  isRetryableProviderError,
} from '../errors/orchestration-errors.js';
import { debugGateway } from '../utils/debug.js';
import { createDebugLogger, describeError, toError, type Logger } from '../utils/logger.js';
import { isNetworkError, withRetry, type RetryOptions } from '../utils/retry.js';
import { OvhApiError, type OvhRequester } from './ovh-api-client.js';
import { relativeName, resolveZone } from './record-mapper.js';

export interface ProviderRecordId {
  zone: string;
  id: number;
}

export interface TxtRecord {
  recordId: ProviderRecordId;
  /** Fully qualified name */
  recordName: string;
  /** TXT value without surrounding quotes */
  value: string;
  ttl?: number;
}

export interface DnsProviderGateway {
  /** Create the TXT record, or return the id of an identical existing one */
  createTxtRecord(recordName: string, value: string): Promise<ProviderRecordId>;
  /** Delete a record; an unknown id is logged, not thrown */
  deleteTxtRecord(recordId: ProviderRecordId): Promise<void>;
  /** Apply pending zone changes; failures are logged, never thrown */
  refreshZone(zone: string): Promise<void>;
  listTxtRecords(recordName: string): Promise<TxtRecord[]>;
  /** Every `_acme-challenge` TXT record of a zone */
  listChallengeRecords(zone: string): Promise<TxtRecord[]>;
}

export interface OvhDnsGatewayOptions {
  /** Zones managed at the provider, see {@link resolveZone} */
  zones?: readonly string[];
  ttl?: number;
  retry?: Omit<RetryOptions, 'shouldRetry' | 'retryAfterMs'>;
  logger?: Logger;
}

/**
 * Map a raw provider failure onto the gateway's error taxonomy
 */
export function classifyProviderError(error: unknown, operation: string): Error {
  if (isProviderError(error)) return error;

  if (error instanceof OvhApiError) {
    const context = { operation, errorCode: error.errorCode };
    const { statusCode } = error;
    if (statusCode === 401 || statusCode === 403) {
      return new AuthenticationError(`${operation}: ${error.message}`, statusCode, context);
    }
    if (statusCode === 404) {
      return new RecordNotFoundError(`${operation}: ${error.message}`, context);
    }
    if (statusCode === 429) {
      return new ProviderRateLimitedError(`${operation}: ${error.message}`, error.retryAfterMs, context);
    }
    if (statusCode === 408 || statusCode >= 500) {
      return new TransientProviderError(`${operation}: ${error.message}`, statusCode, context, {
        cause: error,
      });
    }
    return new ProviderRequestError(`${operation}: ${error.message}`, statusCode, context);
  }

  if (isNetworkError(error)) {
    return new TransientProviderError(`${operation}: ${describeError(error)}`, undefined, { operation }, {
      cause: error,
    });
  }

  return toError(error);
}

function parseRecordIds(body: unknown): number[] {
  if (!Array.isArray(body)) return [];
  return body.filter((id): id is number => typeof id === 'number');
}

/** TXT targets may come back quoted */
export function stripQuotes(target: string): string {
  return target.replace(/^"+|"+$/g, '');
}

export class OvhDnsGateway implements DnsProviderGateway {
  private readonly zones: readonly string[];
  private readonly ttl: number;
  private readonly retry: RetryOptions;
  private readonly logger: Logger;

  constructor(
    private readonly api: OvhRequester,
    options: OvhDnsGatewayOptions = {},
  ) {
    this.zones = options.zones ?? [];
    this.ttl = options.ttl ?? DEFAULT_RECORD_TTL;
    this.logger = options.logger ?? createDebugLogger(debugGateway);
    this.retry = {
      maxRetries: PROVIDER_MAX_RETRIES,
      baseDelayMs: PROVIDER_RETRY_BASE_DELAY_MS,
      maxDelayMs: PROVIDER_RETRY_MAX_DELAY_MS,
      ...options.retry,
      shouldRetry: isRetryableProviderError,
      retryAfterMs: (error) => (error instanceof ProviderRateLimitedError ? error.retryAfterMs : null),
    };
  }

  zoneOf(recordName: string): string {
    return resolveZone(recordName, this.zones);
  }

  /**
   * Run one provider operation under the retry policy
   *
   * @throws {ProviderUnavailableError} When retryable failures exhaust the attempts
   */
  private async invoke<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    let attempts = 0;
    try {
      return await withRetry(
        () => {
          attempts++;
          return this.attempt(operation, fn);
        },
        this.retry,
        operation,
      );
    } catch (error) {
      if (isRetryableProviderError(error)) {
        throw new ProviderUnavailableError(operation, attempts, error);
      }
      throw error;
    }
  }

  /** Single provider call, failures classified */
  private async attempt<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw classifyProviderError(error, operation);
    }
  }

  private async fetchRecord(zone: string, id: number): Promise<TxtRecord | null> {
    const body = await this.attempt(`get record ${zone}/${id}`, () =>
      this.api.call('GET', `/domain/zone/${zone}/record/${id}`),
    );
    if (typeof body !== 'object' || body === null) return null;

    const target: unknown = Reflect.get(body, 'target');
    const subDomain: unknown = Reflect.get(body, 'subDomain');
    const ttl: unknown = Reflect.get(body, 'ttl');
    if (typeof target !== 'string') return null;

    const record: TxtRecord = {
      recordId: { zone, id },
      recordName: typeof subDomain === 'string' && subDomain ? `${subDomain}.${zone}` : zone,
      value: stripQuotes(target),
    };
    if (typeof ttl === 'number') record.ttl = ttl;
    return record;
  }

  /** One listing pass; callers run it under {@link invoke} */
  private async readRecords(zone: string, subDomain?: string): Promise<TxtRecord[]> {
    const ids = parseRecordIds(
      await this.attempt(`list TXT ${subDomain ?? '*'} in ${zone}`, () =>
        this.api.call('GET', `/domain/zone/${zone}/record`, {
          query: { fieldType: 'TXT', subDomain },
        }),
      ),
    );

    const records: TxtRecord[] = [];
    for (const id of ids) {
      try {
        const record = await this.fetchRecord(zone, id);
        if (record) records.push(record);
      } catch (error) {
        // Deleted between the listing and the lookup
        if (!(error instanceof RecordNotFoundError)) throw error;
      }
    }
    return records;
  }

  private listRecords(zone: string, subDomain?: string): Promise<TxtRecord[]> {
    return this.invoke(`list TXT ${subDomain ?? '*'} in ${zone}`, () => this.readRecords(zone, subDomain));
  }

  async listTxtRecords(recordName: string): Promise<TxtRecord[]> {
    const zone = this.zoneOf(recordName);
    return this.listRecords(zone, relativeName(recordName, zone));
  }

  async listChallengeRecords(zone: string): Promise<TxtRecord[]> {
    const records = await this.listRecords(zone);
    return records.filter((r) => r.recordName.startsWith(`${CHALLENGE_RECORD_PREFIX}.`));
  }

  /**
   * Every attempt looks for an identical record before posting, so a create
   * that was committed before its answer got lost is picked up, not repeated.
   */
  async createTxtRecord(recordName: string, value: string): Promise<ProviderRecordId> {
    const zone = this.zoneOf(recordName);
    const subDomain = relativeName(recordName, zone);
    const progress = { posted: false };

    const { id, reused } = await this.invoke(`create TXT ${recordName}`, async () => {
      const existing = (await this.readRecords(zone, subDomain)).find((r) => r.value === value);
      if (existing) return { id: existing.recordId.id, reused: true };

      progress.posted = true;
      const body = await this.attempt(`create TXT ${recordName}`, () =>
        this.api.call('POST', `/domain/zone/${zone}/record`, {
          body: { fieldType: 'TXT', subDomain, target: value, ttl: this.ttl },
        }),
      );
      const created: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'id') : undefined;
      if (typeof created !== 'number') {
        throw new ProviderRequestError(`create TXT ${recordName}: response carries no record id`, 200);
      }
      return { id: created, reused: false };
    });

    if (reused) {
      this.logger.info(`Reusing existing TXT record ${recordName} (id ${id})`);
    } else {
      debugGateway('created TXT %s id=%d', recordName, id);
      this.logger.info(`Created TXT record ${recordName} (id ${id})`);
    }
    if (progress.posted) await this.refreshZone(zone);
    return { zone, id };
  }

  async deleteTxtRecord(recordId: ProviderRecordId): Promise<void> {
    const { zone, id } = recordId;
    try {
      await this.invoke(`delete record ${zone}/${id}`, () =>
        this.api.call('DELETE', `/domain/zone/${zone}/record/${id}`),
      );
      debugGateway('deleted record %s/%d', zone, id);
    } catch (error) {
      if (error instanceof RecordNotFoundError) {
        this.logger.warn(`TXT record ${id} in ${zone} was already gone`);
        return;
      }
      throw error;
    }
  }

  async refreshZone(zone: string): Promise<void> {
    try {
      await this.invoke(`refresh ${zone}`, () => this.api.call('POST', `/domain/zone/${zone}/refresh`));
      debugGateway('refreshed zone %s', zone);
    } catch (error) {
      this.logger.warn(`Zone refresh failed for ${zone}: ${describeError(error)}`);
    }
  }
}
