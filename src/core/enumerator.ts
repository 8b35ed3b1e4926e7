/**
 * Subdomain enumeration engine
 */

import { ResultSet } from './result-set.js';
import { SecurityTrailsClient } from './securitytrails.js';
import { HttpClient } from '../utils/http.js';
import { sleep } from '../utils/retry.js';
import { logger } from '../utils/logger.js';
import type { Dispatcher } from 'undici';
import type {
  EnumerationResult,
  EnumerationStats,
  EnumeratorOptions,
  Query,
  SearchPage,
} from './types.js';

/**
 * Enumerates subdomains through one of the two SecurityTrails endpoints
 */
export class SubdomainEnumerator {
  private options: EnumeratorOptions;
  private dispatcher?: Dispatcher;

  /**
   * @param dispatcher Optional undici dispatcher shared by every request of a run
   */
  constructor(options: EnumeratorOptions, dispatcher?: Dispatcher) {
    this.options = options;
    this.dispatcher = dispatcher;
  }

  /**
   * Collect every hostname the API knows for the query's domain
   */
  async enumerate(query: Query): Promise<EnumerationResult> {
    const http = new HttpClient({ timeout: this.options.timeoutMs, dispatcher: this.dispatcher });
    const client = new SecurityTrailsClient({
      apiKey: query.apiKey,
      baseUrl: query.baseUrl,
      http,
      retry: this.options.retry,
    });
    const results = new ResultSet();

    try {
      let pages: number;
      let truncated: boolean;

      if (query.method === 'list') {
        ({ pages, truncated } = await this.enumerateFromList(client, query.domain, results));
      } else {
        ({ pages, truncated } = await this.enumerateFromSearch(client, query.domain, results));
      }

      const stats: EnumerationStats = { ...client.getStats(), pages, truncated };
      logger.info(`Total unique subdomains: ${results.size}`);

      return {
        domain: query.domain,
        method: query.method,
        hostnames: results.toSortedArray(),
        stats,
      };
    } finally {
      await http.close();
    }
  }

  /**
   * Single round trip to the listing endpoint
   */
  private async enumerateFromList(
    client: SecurityTrailsClient,
    domain: string,
    results: ResultSet
  ): Promise<{ pages: number; truncated: boolean }> {
    logger.info(`Requesting subdomains for ${domain} (list)...`);
    const listing = await client.listSubdomains(domain);
    results.addAll(listing.hostnames);

    if (listing.limitReached) {
      logger.warn('SecurityTrails reports the listing was capped by the account plan');
    }
    logger.info(`Found ${results.size} subdomains via list`);

    return { pages: 1, truncated: listing.limitReached };
  }

  /**
   * Paginated search, bounded by the page cap
   */
  private async enumerateFromSearch(
    client: SecurityTrailsClient,
    domain: string,
    results: ResultSet
  ): Promise<{ pages: number; truncated: boolean }> {
    let pages = 0;
    let truncated = false;

    for await (const page of this.searchPages(client, domain)) {
      pages++;
      const added = results.addAll(page.hostnames);
      logger.progress(`Fetched search page ${page.page} (+${added} new)`, pages, this.options.maxPages);

      if (page.next !== undefined && pages >= this.options.maxPages) {
        truncated = true;
        logger.warn(`Stopped after ${pages} pages; more results are available`);
      }
    }

    logger.info(`Search aggregated ${results.size} unique hostnames`);
    return { pages, truncated };
  }

  /**
   * Pages in order from the first. Finite: ends when a page has no cursor or
   * the cap is hit, and each generator walks the search once.
   */
  private async *searchPages(
    client: SecurityTrailsClient,
    domain: string
  ): AsyncGenerator<SearchPage, void, undefined> {
    let cursor: number | undefined = 1;
    let fetched = 0;

    while (cursor !== undefined && fetched < this.options.maxPages) {
      if (fetched > 0 && this.options.pageDelayMs > 0) {
        await sleep(this.options.pageDelayMs);
      }

      logger.debug(`Fetching page ${cursor}...`);
      const page = await client.searchPage(domain, cursor, this.options.pageSize);
      fetched++;
      yield page;
      cursor = page.next;
    }
  }
}
