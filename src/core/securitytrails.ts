/**
 * SecurityTrails API client
 */

import { ApiError, isRetryable } from './errors.js';
import { normalizeDomain } from './config.js';
import { HttpClient, headerValue, type HttpResponse } from '../utils/http.js';
import { parseRetryAfter, retryWithBackoff } from '../utils/retry.js';
import { logger } from '../utils/logger.js';
import type { PageCursor, RetryPolicy, SearchPage } from './types.js';

export const USER_AGENT = 'trailscout/1.0.0';

export interface SecurityTrailsClientOptions {
  apiKey: string;
  baseUrl: string;
  http: HttpClient;
  retry: RetryPolicy;
}

export interface SubdomainListing {
  hostnames: string[];
  /** The account's plan capped the listing */
  limitReached: boolean;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(record: JsonRecord | undefined, key: string): number | undefined {
  const value = record?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

const UNUSABLE_LABEL = /[\s*]/;

/**
 * Turn a label from the listing endpoint into a full hostname.
 * Labels that already carry the root domain are kept as they are.
 */
export function toHostname(label: string, domain: string): string | undefined {
  const cleaned = normalizeDomain(label);
  // underscore labels such as _dmarc are kept
  if (!cleaned || UNUSABLE_LABEL.test(cleaned)) {
    return undefined;
  }

  return belongsTo(cleaned, domain) ? cleaned : `${cleaned}.${domain}`;
}

/**
 * Whether a hostname is the domain itself or one of its subdomains
 */
export function belongsTo(hostname: string, domain: string): boolean {
  return hostname === domain || hostname.endsWith(`.${domain}`);
}

/**
 * Cursor for the page after `page`. An empty page ends the search, as does
 * reaching `total_pages` or `max_page` when the response reports them.
 */
export function nextCursor(
  page: number,
  recordCount: number,
  meta: JsonRecord | undefined
): PageCursor | undefined {
  if (recordCount === 0) {
    return undefined;
  }

  const totalPages = numberField(meta, 'total_pages') ?? Number.POSITIVE_INFINITY;
  const maxPage = numberField(meta, 'max_page') ?? Number.POSITIVE_INFINITY;
  return page < Math.min(totalPages, maxPage) ? page + 1 : undefined;
}

/**
 * Thin client over the two subdomain endpoints. Each call is retried on
 * rate limiting, server errors and network failures.
 */
export class SecurityTrailsClient {
  private apiKey: string;
  private baseUrl: string;
  private http: HttpClient;
  private retry: RetryPolicy;
  private requestCount = 0;
  private retryCount = 0;

  constructor(options: SecurityTrailsClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.http = options.http;
    this.retry = options.retry;
  }

  /**
   * Requests sent and retries taken so far, failed attempts included
   */
  getStats() {
    return {
      requests: this.requestCount,
      retries: this.retryCount,
    };
  }

  /**
   * GET /domain/{domain}/subdomains
   */
  async listSubdomains(domain: string): Promise<SubdomainListing> {
    const data = await this.call('GET', `/domain/${encodeURIComponent(domain)}/subdomains`);

    if (!Array.isArray(data.subdomains)) {
      throw new ApiError('invalid_response', 'Listing response has no subdomains array');
    }

    const hostnames: string[] = [];
    for (const label of data.subdomains) {
      if (typeof label !== 'string') {
        continue;
      }
      const hostname = toHostname(label, domain);
      if (hostname) {
        hostnames.push(hostname);
      } else if (label.trim()) {
        logger.debug(`Skipping unusable label: ${label}`);
      }
    }

    const meta = isRecord(data.meta) ? data.meta : undefined;
    return {
      hostnames,
      limitReached: meta?.limit_reached === true,
    };
  }

  /**
   * POST /domains/list for one page of an apex-domain search
   */
  async searchPage(domain: string, page: number, pageSize: number): Promise<SearchPage> {
    const data = await this.call('POST', '/domains/list', {
      filter: { apex_domain: domain },
      limit: pageSize,
      page,
    });

    if (!Array.isArray(data.records)) {
      throw new ApiError('invalid_response', `Search page ${page} has no records array`);
    }

    const hostnames: string[] = [];
    for (const record of data.records) {
      if (!isRecord(record)) {
        continue;
      }
      const raw = record.hostname ?? record.domain;
      if (typeof raw !== 'string') {
        continue;
      }
      const hostname = normalizeDomain(raw);
      if (belongsTo(hostname, domain)) {
        hostnames.push(hostname);
      }
    }

    return {
      page,
      hostnames,
      next: nextCursor(page, data.records.length, isRecord(data.meta) ? data.meta : undefined),
    };
  }

  private async call(method: 'GET' | 'POST', path: string, payload?: unknown): Promise<JsonRecord> {
    const url = `${this.baseUrl}${path}`;
    const headers = {
      accept: 'application/json',
      apikey: this.apiKey,
      'user-agent': USER_AGENT,
    };

    return retryWithBackoff(
      async () => {
        this.requestCount++;
        logger.debug(`${method} ${url}`);
        const response =
          method === 'GET'
            ? await this.http.get(url, headers)
            : await this.http.postJson(url, payload, headers);
        return this.parse(response, url);
      },
      this.retry,
      {
        isRetryable,
        delayFor: (error) => (error instanceof ApiError ? error.retryAfterMs : undefined),
        onRetry: (error, attempt, delayMs) => {
          this.retryCount++;
          const reason = error instanceof Error ? error.message : String(error);
          logger.warn(
            `${reason}. Retrying in ${delayMs}ms (attempt ${attempt + 1}/${this.retry.maxAttempts})`
          );
        },
      }
    );
  }

  private parse(response: HttpResponse, url: string): JsonRecord {
    const { statusCode } = response;

    if (statusCode >= 200 && statusCode < 300) {
      let body: unknown;
      try {
        body = JSON.parse(response.body);
      } catch {
        throw new ApiError('invalid_response', `Response from ${url} is not valid JSON`, {
          status: statusCode,
          url,
        });
      }
      if (!isRecord(body)) {
        throw new ApiError('invalid_response', `Response from ${url} is not a JSON object`, {
          status: statusCode,
          url,
        });
      }
      return body;
    }

    const detail = this.errorDetail(response.body);

    if (statusCode === 429) {
      throw new ApiError('rate_limited', `Rate limited by SecurityTrails (429)${detail}`, {
        status: statusCode,
        retryAfterMs: parseRetryAfter(headerValue(response.headers, 'retry-after')),
        url,
      });
    }

    if (statusCode >= 500) {
      throw new ApiError('server_error', `SecurityTrails server error (${statusCode})${detail}`, {
        status: statusCode,
        url,
      });
    }

    throw new ApiError('rejected', `SecurityTrails rejected the request (${statusCode})${detail}`, {
      status: statusCode,
      url,
    });
  }

  /**
   * The API reports failures as `{ "message": "..." }`
   */
  private errorDetail(body: string): string {
    try {
      const parsed: unknown = JSON.parse(body);
      if (isRecord(parsed) && typeof parsed.message === 'string' && parsed.message) {
        return `: ${parsed.message}`;
      }
    } catch {
      // not JSON; the status alone is reported
    }
    return '';
  }
}
