/**
 * Input validation and defaults
 */

import { ConfigurationError } from './errors.js';
import { isValidUrl } from '../utils/http.js';
import { ENUMERATION_METHODS } from './types.js';
import type { EnumerationMethod, EnumeratorOptions, Query } from './types.js';

export const DEFAULT_BASE_URL = 'https://api.securitytrails.com/v1';
export const API_KEY_ENV = 'SECURITYTRAILS_APIKEY';
export const BASE_URL_ENV = 'SECURITYTRAILS_BASE_URL';

export const DEFAULT_OPTIONS: EnumeratorOptions = {
  timeoutMs: 15000,
  pageSize: 100,
  maxPages: 10,
  pageDelayMs: 300,
  retry: {
    maxAttempts: 4,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
  },
};

export const MAX_PAGE_SIZE = 1000;

/**
 * Raw query input as it arrives from the CLI or a library caller
 */
export interface QueryInput {
  domain?: string;
  method?: string;
  apiKey?: string;
  outputPath?: string;
  baseUrl?: string;
}

export interface OptionsInput {
  timeoutMs?: number;
  pageSize?: number;
  maxPages?: number;
  pageDelayMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
}

export type Env = Record<string, string | undefined>;

/**
 * Validate domain format
 */
export function isValidDomain(domain: string): boolean {
  const domainRegex = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;
  return domain.length <= 253 && domainRegex.test(domain);
}

export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/\.$/, '');
}

function isEnumerationMethod(value: string): value is EnumerationMethod {
  return ENUMERATION_METHODS.some((method) => method === value);
}

/**
 * Build the immutable query for a run. Flags win over environment variables.
 */
export function buildQuery(input: QueryInput, env: Env = process.env): Query {
  const domain = normalizeDomain(input.domain ?? '');
  if (!domain) {
    throw new ConfigurationError('Domain is required');
  }
  if (!isValidDomain(domain)) {
    throw new ConfigurationError(`Invalid domain: ${input.domain ?? ''}`, { domain });
  }

  const method = input.method ?? 'list';
  if (!isEnumerationMethod(method)) {
    throw new ConfigurationError(
      `Invalid method: ${method}. Use ${ENUMERATION_METHODS.join(' or ')}.`,
      { method }
    );
  }

  const apiKey = (input.apiKey ?? env[API_KEY_ENV] ?? '').trim();
  if (!apiKey) {
    throw new ConfigurationError(
      `SecurityTrails API key not provided. Pass --api-key or set ${API_KEY_ENV}.`
    );
  }

  const baseUrl = (input.baseUrl ?? env[BASE_URL_ENV] ?? DEFAULT_BASE_URL).trim().replace(/\/+$/, '');
  if (!isValidUrl(baseUrl)) {
    throw new ConfigurationError(`Invalid base URL: ${baseUrl}`, { baseUrl });
  }

  if (input.outputPath !== undefined && input.outputPath.trim() === '') {
    throw new ConfigurationError('Output path must not be empty');
  }

  return Object.freeze({
    domain,
    method,
    apiKey,
    baseUrl,
    outputPath: input.outputPath,
  });
}

function checkInteger(name: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER) {
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ConfigurationError(`Invalid ${name}: ${value}. Expected an integer ${range}.`, {
      [name]: value,
    });
  }
  return value;
}

/**
 * Merge overrides onto the defaults
 */
export function resolveOptions(input: OptionsInput = {}): EnumeratorOptions {
  const retry = DEFAULT_OPTIONS.retry;

  return {
    timeoutMs: checkInteger('timeout', input.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs, 1),
    pageSize: checkInteger('page size', input.pageSize ?? DEFAULT_OPTIONS.pageSize, 1, MAX_PAGE_SIZE),
    maxPages: checkInteger('max pages', input.maxPages ?? DEFAULT_OPTIONS.maxPages, 1),
    pageDelayMs: checkInteger('page delay', input.pageDelayMs ?? DEFAULT_OPTIONS.pageDelayMs, 0),
    retry: {
      maxAttempts: checkInteger('max attempts', input.maxAttempts ?? retry.maxAttempts, 1),
      baseDelayMs: checkInteger('retry delay', input.retryDelayMs ?? retry.baseDelayMs, 0),
      maxDelayMs: retry.maxDelayMs,
    },
  };
}
