import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { SetupStep } from '../step.js';

export const PYTHON_VERSION_FILE = '.python-version';
export const DEFAULT_PYTHON_VERSION = '3.11';

/**
 * Target version from a `.python-version` file: its first non-comment line,
 * or the default when the file is missing or empty.
 */
export function readTargetVersion(cwd: string): string {
  const file = join(cwd, PYTHON_VERSION_FILE);
  if (!existsSync(file)) return DEFAULT_PYTHON_VERSION;

  const pinned = readFileSync(file, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line !== '' && !line.startsWith('#'));
  return pinned ?? DEFAULT_PYTHON_VERSION;
}

/** Version number from `Python 3.11.13` style output, or '' */
export function parsePythonVersion(output: string): string {
  const [, version = ''] = output.trim().split(/\s+/);
  return version;
}

/**
 * `3.11.13` must match exactly; `3.11` matches any `3.11.x`.
 */
export function versionMatches(current: string, target: string): boolean {
  if (!current) return false;
  if (target.split('.').length >= 3) {
    return current === target;
  }
  return current.startsWith(`${target}.`);
}

/** Install the project's Python version with uv and pin it */
export class LockPythonVersionStep extends SetupStep {
  readonly kind = 'lock-python-version' as const;
  readonly name = 'Lock Python version';
  readonly description = `Install and pin Python version from ${PYTHON_VERSION_FILE} file`;

  targetVersion(): string {
    return readTargetVersion(this.host.cwd);
  }

  /** Version of the interpreter uv currently selects for the project, or '' */
  currentVersion(): string {
    const found = this.host.run(['uv', 'python', 'find']);
    if (!found.succeeded || !found.stdout) return '';

    const { succeeded, stdout } = this.host.run([found.stdout, '--version']);
    return succeeded ? parsePythonVersion(stdout) : '';
  }

  override isCompleted(): boolean {
    return versionMatches(this.currentVersion(), this.targetVersion());
  }

  async execute(): Promise<boolean> {
    if (!this.requireCommand('uv')) return false;

    const target = this.targetVersion();

    const install = await this.host.runInteractive(['uv', 'python', 'install', target], { showCommand: false });
    if (!install.succeeded && !install.stderr.toLowerCase().includes('already installed')) {
      this.console.print(`[red]Failed to install Python ${target}: ${install.stderr}[/red]`);
      return false;
    }

    const pin = await this.host.runInteractive(['uv', 'python', 'pin', target], { showCommand: false });
    if (pin.succeeded) {
      if (this.verbose) {
        this.console.print(`  Pinned Python version to ${target}`);
      }
      return true;
    }

    this.console.print(`[red]Failed to pin Python version: ${pin.stderr}[/red]`);
    return false;
  }
}
