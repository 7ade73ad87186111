import os from 'node:os';
import { promptSecret, promptText } from '../lib/utils/prompt-utils.js';
import {
  runCommand,
  runCommandInteractive,
  type ExecutionResult,
  type InteractiveOptions,
  type RunOptions,
} from './process.js';
import { commandExists, getSystemInfo, type ProbeHost, type SystemInfo } from './probes.js';

/**
 * Everything a setup step may observe or change on the machine.
 * Steps only talk to the host through this interface.
 */
export interface Host extends ProbeHost {
  /** Directory project files (.python-version, uv.lock, ...) are resolved against */
  readonly cwd: string;
  readonly homeDir: string;
  runInteractive(command: readonly string[], options?: InteractiveOptions): Promise<ExecutionResult>;
  systemInfo(): SystemInfo;
  promptSecret(message: string): Promise<string>;
  promptText(message: string): Promise<string>;
}

export interface SystemHostOptions {
  cwd?: string;
  homeDir?: string;
}

/** Host backed by the real machine */
export function createSystemHost(options: SystemHostOptions = {}): Host {
  const cwd = options.cwd ?? process.cwd();

  return {
    cwd,
    homeDir: options.homeDir ?? os.homedir(),
    commandExists,
    run: (command, runOptions) => runCommand(command, { cwd, ...runOptions }),
    runInteractive: (command, runOptions) => runCommandInteractive(command, { cwd, ...runOptions }),
    systemInfo: getSystemInfo,
    promptSecret,
    promptText,
  };
}
