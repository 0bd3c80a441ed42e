/**
 * Blocking runner for external executables. Arguments are passed as an
 * array, never through a shell, and the child's output goes straight to the
 * terminal.
 */
import { spawnSync } from 'child_process';
import { logger } from '../utils/logger.js';
import { ExternalToolFailure } from '../utils/errors.js';

/**
 * Run `bin` with `args` and wait for it to exit.
 * Throws ExternalToolFailure when it cannot start or exits non-zero.
 */
export function runTool(bin: string, args: readonly string[], label: string): void {
  logger.debug(`Tool [${label}]`, { bin, args });

  const result = spawnSync(bin, args, { stdio: 'inherit' });

  if (result.error) {
    throw new ExternalToolFailure(
      `${label} could not start ${bin}: ${result.error.message}`,
      bin,
      args,
      null,
      result.error,
    );
  }
  if (result.status !== 0) {
    const reason = result.signal ? `signal ${result.signal}` : `exit code ${result.status}`;
    throw new ExternalToolFailure(`${label} failed with ${reason}`, bin, args, result.status);
  }
}
