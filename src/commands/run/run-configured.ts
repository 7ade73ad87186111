import { spawnSync } from 'node:child_process';
import type { WrConfig } from '../../config/index.js';
import { WrError, ErrorCode } from '../../lib/errors.js';
import type { Output } from '../../lib/ui/console.js';
import { debug } from '../../lib/utils/debug.js';

/** Look up a named shell line in the config */
export function resolveCommand(name: string, config: WrConfig): string {
  const line = Object.hasOwn(config.commands, name) ? config.commands[name] : undefined;
  if (line === undefined) {
    const available = Object.keys(config.commands);
    throw new WrError(
      ErrorCode.COMMAND_NOT_DEFINED,
      `Command '${name}' not found. Available commands: ${available.join(', ')}`,
      available.length === 0 ? 'Add a `commands:` mapping to wr.yml' : undefined,
    );
  }
  return line;
}

/**
 * Run a configured command through the shell, relaying its captured output.
 * Resolves to the process exit code.
 */
export function runConfiguredCommand(name: string, config: WrConfig, output: Output): number {
  const line = resolveCommand(name, config);
  output.print(`[blue]Running:[/blue] ${line}`);
  debug('run', name, line);

  const result = spawnSync(line, {
    shell: true,
    encoding: 'utf-8',
    maxBuffer: 16 * 1024 * 1024,
    stdio: ['inherit', 'pipe', 'pipe'],
  });

  if (result.error) {
    throw new WrError(ErrorCode.COMMAND_FAILED, `Could not start '${name}': ${result.error.message}`);
  }

  const stdout = (result.stdout ?? '').trimEnd();
  const stderr = (result.stderr ?? '').trimEnd();

  if (result.status === 0) {
    if (stdout) output.print(stdout);
    output.print(`[green]✓ Command '${name}' completed successfully[/green]`);
    return 0;
  }

  const exitCode = result.status ?? 1;
  output.print(`[red]✗ Command '${name}' failed with exit code ${exitCode}[/red]`);
  if (stdout) {
    output.print('[yellow]stdout:[/yellow]');
    output.print(stdout);
  }
  if (stderr) {
    output.print('[red]stderr:[/red]');
    output.print(stderr);
  }
  return exitCode;
}
