/**
 * Enumerate command implementation
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { App } from '../../core/app.js';
import { buildQuery, resolveOptions, API_KEY_ENV, type Env } from '../../core/config.js';
import { formatHostnames } from '../../core/output.js';
import { VERSION } from '../../index.js';
import type { Dispatcher } from 'undici';

/**
 * Where the command reads its environment and writes its output
 */
export interface CliContext {
  env: Env;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  dispatcher?: Dispatcher;
}

interface EnumerateOptions {
  method: string;
  apiKey?: string;
  out?: string;
  baseUrl?: string;
  timeout?: number;
  pageSize?: number;
  maxPages?: number;
  pageDelay?: number;
  maxAttempts?: number;
  retryDelay?: number;
  verbose: boolean;
  quiet: boolean;
}

const banner = `
${chalk.cyan('╔════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('TRAILSCOUT')} ${chalk.gray(`v${VERSION}`)}                       ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('SecurityTrails subdomain enumerator')}       ${chalk.cyan('║')}
${chalk.cyan('╚════════════════════════════════════════════╝')}
`;

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
}

export function createEnumerateCommand(context: CliContext): Command {
  return new Command('trailscout')
    .description('Enumerate subdomains of a domain through the SecurityTrails API')
    .version(VERSION)
    .addHelpText('beforeAll', banner)
    .argument('<domain>', 'Target domain, e.g. example.com')
    .option('-m, --method <method>', 'SecurityTrails endpoint: list|search', 'list')
    .option('-k, --api-key <key>', `SecurityTrails API key (default: $${API_KEY_ENV})`)
    .option('-o, --out <file>', 'Write hostnames to file, one per line (default: stdout)')
    .option('--base-url <url>', 'API base URL')
    .option('-t, --timeout <ms>', 'Per-request timeout in milliseconds', parseInteger)
    .option('--page-size <number>', 'Records per search page', parseInteger)
    .option('--max-pages <number>', 'Maximum search pages to fetch', parseInteger)
    .option('--page-delay <ms>', 'Pause between search pages in milliseconds', parseInteger)
    .option('--max-attempts <number>', 'Attempts per request before giving up', parseInteger)
    .option('--retry-delay <ms>', 'Initial backoff delay in milliseconds', parseInteger)
    .option('-v, --verbose', 'Log every request', false)
    .option('-q, --quiet', 'Suppress log output', false)
    .action(async (domain: string, options: EnumerateOptions) => {
      const query = buildQuery(
        {
          domain,
          method: options.method,
          apiKey: options.apiKey,
          outputPath: options.out,
          baseUrl: options.baseUrl,
        },
        context.env
      );

      const enumeratorOptions = resolveOptions({
        timeoutMs: options.timeout,
        pageSize: options.pageSize,
        maxPages: options.maxPages,
        pageDelayMs: options.pageDelay,
        maxAttempts: options.maxAttempts,
        retryDelayMs: options.retryDelay,
      });

      const app = new App({
        query,
        options: enumeratorOptions,
        quiet: options.quiet,
        verbose: options.verbose,
        dispatcher: context.dispatcher,
      });
      const report = await app.run();

      if (query.outputPath === undefined) {
        context.stdout(formatHostnames(report.hostnames));
      }
    });
}
