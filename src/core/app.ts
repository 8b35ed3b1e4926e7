/**
 * Main application orchestrator
 */
import chalk from 'chalk';
import { SubdomainEnumerator } from './enumerator.js';
import { writeHostnames } from './output.js';
import { logger } from '../utils/logger.js';
import type { AppConfig, EnumerationReport } from './types.js';

/**
 * Runs one enumeration and persists its results
 */
export class App {
  private config: AppConfig;
  private enumerator: SubdomainEnumerator;

  constructor(config: AppConfig) {
    this.config = config;
    this.enumerator = new SubdomainEnumerator(config.options, config.dispatcher);

    // Configure logger
    logger.setQuiet(config.quiet);
    logger.setLevel(config.verbose ? 'debug' : 'info');
  }

  /**
   * Enumerate, then write the output file when one is configured
   */
  async run(): Promise<EnumerationReport> {
    const { query } = this.config;
    const startTime = new Date();

    logger.info(
      chalk.cyan.bold(`Enumerating ${query.domain}`) + chalk.cyan(` via SecurityTrails (${query.method})`)
    );
    const result = await this.enumerator.enumerate(query);

    if (query.outputPath !== undefined) {
      await writeHostnames(query.outputPath, result.hostnames);
      logger.info(`Saved ${result.hostnames.length} hostnames to ${query.outputPath}`);
    }

    const endTime = new Date();
    const report: EnumerationReport = {
      ...result,
      outputPath: query.outputPath,
      metadata: {
        startTime,
        endTime,
        duration: endTime.getTime() - startTime.getTime(),
      },
    };

    logger.success(
      `Found ${report.hostnames.length} subdomains for ${query.domain} ` +
        `(${report.stats.requests} requests, ${report.stats.retries} retries, ` +
        `${(report.metadata.duration / 1000).toFixed(2)}s)`
    );
    if (report.stats.truncated) {
      logger.warn('Results are incomplete; raise --max-pages or check the account plan');
    }

    return report;
  }
}
