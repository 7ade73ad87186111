import chalk from 'chalk';

/**
 * Trace output for `WR_DEBUG=<namespace>` (`*` for everything, `ex*` or `ex`
 * for a prefix). Written to stderr so it never mixes with command output.
 */
export function debug(namespace: string, ...args: unknown[]): void {
  const filter = process.env.WR_DEBUG;
  if (!filter) return;
  if (namespace.startsWith(filter.replace(/\*$/, ''))) {
    console.error(chalk.dim(`[${namespace}]`), ...args);
  }
}
