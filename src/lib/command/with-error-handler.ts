import chalk from 'chalk';
import { WrError, errorMessage, exitCodeFor } from '../errors.js';

/** Print an error the way every `wr` command shows it; returns the exit code to use */
export function reportError(err: unknown): number {
  if (err instanceof WrError) {
    console.error(chalk.red(`✗ ${err.message}`));
    if (err.hint) {
      console.error(chalk.dim(`  ${err.hint}`));
    }
    return exitCodeFor(err.code);
  }

  console.error(chalk.red(`✗ Unexpected error: ${errorMessage(err)}`));
  return 1;
}

/** Run a commander action; a failure is reported and ends the process */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      process.exit(reportError(err));
    }
  };
}
