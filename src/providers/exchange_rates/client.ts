/**
 * HTTP client for an exchangeratesapi.io-style daily rates endpoint.
 *
 * One request per snapshot, spaced by a FIFO throttler. Failures are not
 * retried here; the caller decides whether the run survives.
 */

import { SourceError, TransportError } from '@/core/errors';
import type { IsoDate } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import { RequestThrottler } from '@/utils/throttler';
import type { CurrencyCode, RateSnapshot, RateSnapshotSource } from '../types';
import { withBaseRate } from '../types';
import { parseRatesResponse } from './response';

const logger = createChildLogger('exchange_rates');

const PROVIDER_NAME = 'exchangeratesapi';
const DEFAULT_TIMEOUT_MS = 8000;

export interface ExchangeRatesClientOptions {
  baseUrl: string;
  apiKey?: string | null;
  timeoutMs?: number;
  minIntervalMs?: number;
}

export class ExchangeRatesClient implements RateSnapshotSource {
  readonly name = PROVIDER_NAME;
  private readonly baseUrl: string;
  private readonly apiKey: string | null;
  private readonly timeoutMs: number;
  private readonly throttler: RequestThrottler;
  private requestCount = 0;

  constructor(options: ExchangeRatesClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.throttler = new RequestThrottler(options.minIntervalMs ?? 0);
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  buildUrl(date: IsoDate, base: CurrencyCode): URL {
    const url = new URL(`${this.baseUrl}/${date}`);
    url.searchParams.set('base', base);
    if (this.apiKey) {
      url.searchParams.set('access_key', this.apiKey);
    }
    return url;
  }

  private async fetchWithTimeout(url: URL): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await fetch(url, {
        signal: controller.signal,
        headers: { accept: 'application/json' },
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  async fetchSnapshot(date: IsoDate, base: CurrencyCode): Promise<RateSnapshot> {
    const requestedBase = base.toUpperCase();
    const url = this.buildUrl(date, requestedBase);

    let response: Response;
    try {
      response = await this.throttler.schedule(() => this.fetchWithTimeout(url));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ date, base: requestedBase, error: reason }, 'Rate request failed');
      throw new TransportError(
        `Request for ${date} (base ${requestedBase}) failed: ${reason}`,
        this.name,
        date,
        requestedBase,
        error
      );
    }
    this.requestCount++;

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (!response.ok) {
        throw new SourceError(
          `HTTP ${response.status} ${response.statusText}`.trim(),
          this.name,
          date,
          requestedBase
        );
      }
      throw new TransportError(
        `Response for ${date} is not valid JSON`,
        this.name,
        date,
        requestedBase,
        error
      );
    }

    const result = parseRatesResponse(response.status, body);
    if (!result.ok) {
      logger.error({ date, base: requestedBase, kind: result.kind, message: result.message }, 'Rate request rejected');
      if (result.kind === 'provider') {
        throw new SourceError(result.message, this.name, date, requestedBase);
      }
      throw new TransportError(result.message, this.name, date, requestedBase);
    }

    if (result.body.base !== requestedBase) {
      throw new TransportError(
        `Provider answered with base ${result.body.base} for requested base ${requestedBase}`,
        this.name,
        date,
        requestedBase
      );
    }

    logger.debug(
      { date, base: requestedBase, currencies: Object.keys(result.body.rates).length },
      'Fetched rate snapshot'
    );

    return withBaseRate({
      date,
      base: requestedBase,
      rates: result.body.rates,
      publishedDate: result.body.date,
    });
  }
}
