// src/core/types.ts
/**
 * Type definitions for trailscout
 */

import type { Dispatcher } from 'undici';

/**
 * SecurityTrails endpoint used to enumerate subdomains
 */
export type EnumerationMethod = 'list' | 'search';

export const ENUMERATION_METHODS: readonly EnumerationMethod[] = ['list', 'search'];

/**
 * A single enumeration run. Built once from input and never mutated.
 */
export type Query = Readonly<{
  domain: string;
  method: EnumerationMethod;
  apiKey: string;
  baseUrl: string;
  outputPath?: string;
}>;

/**
 * Application configuration
 */
export interface AppConfig {
  query: Query;
  options: EnumeratorOptions;
  quiet: boolean;
  verbose: boolean;
  /** undici dispatcher for every request; a private keep-alive agent when absent */
  dispatcher?: Dispatcher;
}

/**
 * Backoff settings for retryable failures
 */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Tunables for the HTTP client and the search pagination loop
 */
export interface EnumeratorOptions {
  timeoutMs: number;
  pageSize: number;
  maxPages: number;
  pageDelayMs: number;
  retry: RetryPolicy;
}

/**
 * Next page to request in search mode; absent when the search is exhausted
 */
export type PageCursor = number;

/**
 * One page of search results
 */
export interface SearchPage {
  page: number;
  hostnames: string[];
  next?: PageCursor;
}

/**
 * Counters collected during a run
 */
export interface EnumerationStats {
  requests: number;
  retries: number;
  pages: number;
  truncated: boolean;
}

/**
 * Hostnames collected by the enumerator, before any output is written
 */
export interface EnumerationResult {
  domain: string;
  method: EnumerationMethod;
  hostnames: string[];
  stats: EnumerationStats;
}

/**
 * Run metadata
 */
export interface RunMetadata {
  startTime: Date;
  endTime: Date;
  duration: number;
}

/**
 * Complete result of one run
 */
export interface EnumerationReport extends EnumerationResult {
  outputPath?: string;
  metadata: RunMetadata;
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
