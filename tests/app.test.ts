/**
 * Tests for App
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { MockAgent } from 'undici';
import { App } from '../src/core/app.js';
import { buildQuery, resolveOptions } from '../src/core/config.js';
import { IoError } from '../src/core/errors.js';
import { enumerate } from '../src/index.js';
import { logger } from '../src/utils/logger.js';
import { API_KEY, LIST_PATH, createMockApi } from './helpers/mock-api.js';

describe('App', () => {
  let agent: MockAgent;
  let pool: ReturnType<typeof createMockApi>['pool'];
  let dir: string;

  const createApp = (outputPath?: string) =>
    new App({
      query: buildQuery({ domain: 'example.com', apiKey: API_KEY, outputPath }, {}),
      options: resolveOptions({ retryDelayMs: 0, pageDelayMs: 0 }),
      quiet: true,
      verbose: false,
      dispatcher: agent,
    });

  beforeEach(async () => {
    ({ agent, pool } = createMockApi());
    dir = await mkdtemp(join(tmpdir(), 'trailscout-app-'));
  });

  afterEach(async () => {
    await agent.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the hostnames and report the run', async () => {
    pool.intercept({ path: LIST_PATH, method: 'GET' }).reply(200, { subdomains: ['www', 'api'] });
    const outputPath = join(dir, 'hosts.txt');

    const report = await createApp(outputPath).run();

    expect(await readFile(outputPath, 'utf-8')).toBe('api.example.com\nwww.example.com\n');
    expect(report).toMatchObject({
      domain: 'example.com',
      method: 'list',
      hostnames: ['api.example.com', 'www.example.com'],
      outputPath,
    });
    expect(report.metadata.duration).toBeGreaterThanOrEqual(0);
  });

  it('should replace the previous run output', async () => {
    pool.intercept({ path: LIST_PATH, method: 'GET' }).reply(200, { subdomains: ['www', 'api'] });
    pool.intercept({ path: LIST_PATH, method: 'GET' }).reply(200, { subdomains: ['mail'] });
    const outputPath = join(dir, 'hosts.txt');

    await createApp(outputPath).run();
    await createApp(outputPath).run();

    expect(await readFile(outputPath, 'utf-8')).toBe('mail.example.com\n');
  });

  it('should raise an IoError for an unwritable output path', async () => {
    pool.intercept({ path: LIST_PATH, method: 'GET' }).reply(200, { subdomains: ['www'] });

    await expect(createApp(join(dir, 'no-such-dir', 'hosts.txt')).run()).rejects.toBeInstanceOf(IoError);
  });

  it('should leave the file system alone without an output path', async () => {
    pool.intercept({ path: LIST_PATH, method: 'GET' }).reply(200, { subdomains: ['www'] });

    const report = await createApp().run();

    expect(report.outputPath).toBeUndefined();
    expect(report.hostnames).toEqual(['www.example.com']);
  });

  it('should run through the programmatic shortcut', async () => {
    pool.intercept({ path: LIST_PATH, method: 'GET' }).reply(200, { subdomains: ['www', 'ftp'] });
    const outputPath = join(dir, 'shortcut.txt');

    const report = await enumerate(
      { domain: 'example.com', apiKey: API_KEY, outputPath },
      { retryDelayMs: 0, dispatcher: agent }
    );

    expect(report.stats.requests).toBe(1);
    expect(await readFile(outputPath, 'utf-8')).toBe('ftp.example.com\nwww.example.com\n');
  });

  it('should leave the caller logger settings in place after the shortcut', async () => {
    pool.intercept({ path: LIST_PATH, method: 'GET' }).reply(200, { subdomains: ['www'] });
    logger.setQuiet(false);
    logger.setLevel('warn');

    try {
      await enumerate({ domain: 'example.com', apiKey: API_KEY }, { retryDelayMs: 0, dispatcher: agent });

      expect(logger.snapshot()).toEqual({ level: 'warn', quiet: false });
    } finally {
      logger.restore({ level: 'info', quiet: true });
    }
  });
});
