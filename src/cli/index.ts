#!/usr/bin/env node

/**
 * trailscout CLI entry point
 */

import { runCli } from './run.js';

process.exitCode = await runCli(process.argv);
