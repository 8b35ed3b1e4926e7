/**
 * CLI runner: parses arguments and maps failures to exit codes
 */

import { CommanderError } from 'commander';
import chalk from 'chalk';
import { createEnumerateCommand, type CliContext } from './commands/enumerate.js';
import { EXIT_CODES, ErrorCode, exitCodeFor } from '../core/errors.js';

export function defaultContext(): CliContext {
  return {
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  };
}

/**
 * @returns the process exit code
 */
export async function runCli(argv: string[], context: CliContext = defaultContext()): Promise<number> {
  const program = createEnumerateCommand(context);

  program.exitOverride();
  program.configureOutput({
    writeOut: context.stdout,
    writeErr: context.stderr,
  });

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    // Usage errors were already printed by commander
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : EXIT_CODES[ErrorCode.CONFIGURATION];
    }

    const message = error instanceof Error ? error.message : String(error);
    context.stderr(chalk.red(`Error: ${message}`) + '\n');
    return exitCodeFor(error);
  }
}
