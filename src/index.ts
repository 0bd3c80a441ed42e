#!/usr/bin/env node
/**
 * CLI entry point — `framescan <command>`.
 */
import { runCli } from './cli.js';
import { logger } from './utils/logger.js';
import { ExternalToolFailure, UsageError } from './utils/errors.js';

async function main(): Promise<void> {
  await runCli(process.argv.slice(2), text => process.stdout.write(text));
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    logger.error(err.message);
  } else if (err instanceof ExternalToolFailure) {
    logger.error(err.message, { tool: err.tool, args: err.args, exitCode: err.exitCode });
  } else {
    logger.error('Fatal', { err: err instanceof Error ? err.message : String(err) });
  }
  process.exit(1);
});
