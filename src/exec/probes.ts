import { spawnSync } from 'node:child_process';
import os from 'node:os';
import type { ExecutionResult, RunOptions } from './process.js';

/** Minimal capabilities the probes need; satisfied by the system host and by test fakes */
export interface ProbeHost {
  commandExists(name: string): boolean;
  run(command: readonly string[], options?: RunOptions): ExecutionResult;
}

export interface SystemInfo {
  /** Platform family: Darwin, Linux, Windows, or the OS type name */
  platform: string;
  architecture: string;
  runtimeVersion: string;
}

/** Interpreter names tried in order when resolving Python */
export const PYTHON_CANDIDATES = ['python3.11', 'python3', 'python'] as const;

/** True if `name` resolves on the search path */
export function commandExists(name: string): boolean {
  const lookup = process.platform === 'win32' ? 'where' : 'which';
  const result = spawnSync(lookup, [name], { stdio: 'ignore' });
  return !result.error && result.status === 0;
}

/** Installed Node.js version (e.g. `v20.11.1`), or undefined when node is missing */
export function getNodeVersion(host: ProbeHost): string | undefined {
  if (!host.commandExists('node')) return undefined;
  const { succeeded, stdout } = host.run(['node', '--version']);
  return succeeded ? stdout : undefined;
}

/**
 * Name of the first Python 3.1x interpreter on the path.
 * Returns the command name, not a path; callers invoke it by name.
 */
export function getPythonExecutable(host: ProbeHost): string | undefined {
  for (const candidate of PYTHON_CANDIDATES) {
    if (!host.commandExists(candidate)) continue;
    const { succeeded, stdout } = host.run([candidate, '--version']);
    if (succeeded && stdout.includes('Python 3.1')) {
      return candidate;
    }
  }
  return undefined;
}

function platformFamily(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'darwin': return 'Darwin';
    case 'linux': return 'Linux';
    case 'win32': return 'Windows';
    default: return os.type();
  }
}

export function getSystemInfo(): SystemInfo {
  return {
    platform: platformFamily(process.platform),
    architecture: process.arch,
    runtimeVersion: process.versions.node,
  };
}
