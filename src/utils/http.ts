/**
 * HTTP utilities with connection pooling
 */

import { request, Agent, type Dispatcher } from 'undici';
import pLimit from 'p-limit';
import { NetworkError } from '../core/errors.js';

export type HttpMethod = 'GET' | 'POST';

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

export interface HttpClientOptions {
  timeout?: number;
  /** Use this dispatcher instead of a private agent; the caller owns its lifecycle */
  dispatcher?: Dispatcher;
}

/**
 * Create a persistent HTTP agent. Requests are sequential, so one
 * kept-alive connection per origin is enough.
 */
export function createHttpAgent() {
  return new Agent({
    connections: 1,
    keepAliveTimeout: 10000,
    keepAliveMaxTimeout: 60000,
  });
}

/**
 * HTTP client with a per-request timeout and at most one request in flight
 */
export class HttpClient {
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;
  private timeout: number;
  private limit = pLimit(1);

  constructor(options: HttpClientOptions = {}) {
    this.timeout = options.timeout ?? 15000;
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? createHttpAgent();
  }

  /**
   * Make an HTTP GET request
   */
  async get(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.send('GET', url, headers);
  }

  /**
   * Make an HTTP POST request with a JSON body
   */
  async postJson(
    url: string,
    payload: unknown,
    headers: Record<string, string> = {}
  ): Promise<HttpResponse> {
    return this.send(
      'POST',
      url,
      { ...headers, 'content-type': 'application/json' },
      JSON.stringify(payload)
    );
  }

  private send(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: string
  ): Promise<HttpResponse> {
    return this.limit(async () => {
      try {
        const response = await request(url, {
          method,
          headers,
          body,
          headersTimeout: this.timeout,
          bodyTimeout: this.timeout,
          // bodyTimeout only bounds the gap between chunks; this bounds the whole exchange
          signal: AbortSignal.timeout(this.timeout),
          dispatcher: this.dispatcher,
          throwOnError: false,
        });

        const text = await response.body.text();

        return {
          statusCode: response.statusCode,
          headers: response.headers,
          body: text,
        };
      } catch (error) {
        throw new NetworkError(
          `HTTP ${method} ${url} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
          url,
          error
        );
      }
    });
  }

  /**
   * Close the agent and cleanup connections
   */
  async close() {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

/**
 * Parse URL safely
 */
export function parseUrl(urlString: string): URL | null {
  try {
    return new URL(urlString);
  } catch {
    return null;
  }
}

/**
 * Validate an http(s) URL
 */
export function isValidUrl(urlString: string): boolean {
  const url = parseUrl(urlString);
  return url !== null && (url.protocol === 'https:' || url.protocol === 'http:');
}

/**
 * First value of a response header
 */
export function headerValue(
  headers: HttpResponse['headers'],
  name: string
): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
