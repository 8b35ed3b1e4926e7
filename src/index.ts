/**
 * trailscout - SecurityTrails subdomain enumerator
 * Main entry point for programmatic usage
 */

import type { Dispatcher } from 'undici';
import type { EnumerationReport } from './core/types.js';
import type { OptionsInput, QueryInput } from './core/config.js';

export { App } from './core/app.js';
export { SubdomainEnumerator } from './core/enumerator.js';
export { SecurityTrailsClient } from './core/securitytrails.js';
export { ResultSet } from './core/result-set.js';
export { buildQuery, resolveOptions, DEFAULT_OPTIONS, DEFAULT_BASE_URL } from './core/config.js';
export type { QueryInput, OptionsInput } from './core/config.js';
export { formatHostnames, writeHostnames } from './core/output.js';
export { nextDelay, retryWithBackoff } from './utils/retry.js';
export * from './core/errors.js';
export * from './core/types.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Enumerate subdomains and write them to `outputPath` when given
 * @example
 * ```typescript
 * import { enumerate } from 'trailscout';
 *
 * const report = await enumerate(
 *   { domain: 'example.com', method: 'search', apiKey: 'your-api-key', outputPath: 'hosts.txt' },
 *   { maxPages: 5 }
 * );
 * ```
 */
export async function enumerate(
  input: QueryInput,
  options: OptionsInput & { quiet?: boolean; dispatcher?: Dispatcher } = {}
): Promise<EnumerationReport> {
  const { App } = await import('./core/app.js');
  const { buildQuery, resolveOptions } = await import('./core/config.js');
  const { logger } = await import('./utils/logger.js');

  // App configures the shared logger; the caller's settings come back afterwards
  const previous = logger.snapshot();
  try {
    const app = new App({
      query: buildQuery(input),
      options: resolveOptions(options),
      quiet: options.quiet ?? true,
      verbose: false,
      dispatcher: options.dispatcher,
    });

    return await app.run();
  } finally {
    logger.restore(previous);
  }
}
