import { spawn, spawnSync, type ChildProcess } from 'node:child_process';
import { errorMessage } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import { INTERRUPT_EXIT_CODE, signalInterrupt } from '../lib/utils/shutdown.js';

// ── Result ──

/** Outcome of one external command. Missing output is always '' */
export interface ExecutionResult {
  readonly succeeded: boolean;
  readonly stdout: string;
  readonly stderr: string;
}

export interface RunOptions {
  cwd?: string;
  /** Stream output to the terminal instead of capturing it */
  interactive?: boolean;
}

export interface InteractiveOptions {
  cwd?: string;
  /** Echo `$ <command>` before running (default true) */
  showCommand?: boolean;
}

const MAX_BUFFER = 16 * 1024 * 1024;

function failure(stderr: string): ExecutionResult {
  return { succeeded: false, stdout: '', stderr };
}

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

// ── Quoting ──

const BARE_WORD = /^[A-Za-z0-9_\/.,:=@%+-]+$/;

/** Quote a single argument for display in a POSIX shell */
export function shellQuote(value: string): string {
  if (BARE_WORD.test(value)) return value;
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/** Render an argument vector as a copy-pasteable shell line */
export function formatCommand(command: readonly string[]): string {
  return command.map(shellQuote).join(' ');
}

// ── Captured execution ──

/**
 * Run a command without touching the terminal and collect its output.
 *
 * A missing executable is reported as `Command not found: <name>` rather than
 * the process's own text, so callers can tell it apart from a non-zero exit.
 * With `interactive: true` output is streamed instead and both text fields are empty.
 */
export function runCommand(command: readonly string[], options: RunOptions = {}): ExecutionResult {
  const [file, ...args] = command;
  if (file === undefined) return failure('No command given');

  const interactive = options.interactive ?? false;
  debug('exec', interactive ? 'stream' : 'capture', formatCommand(command));

  const result = spawnSync(file, args, {
    cwd: options.cwd,
    encoding: 'utf-8',
    maxBuffer: MAX_BUFFER,
    stdio: interactive ? 'inherit' : ['pipe', 'pipe', 'pipe'],
  });

  if (result.error) {
    if (errorCode(result.error) === 'ENOENT') {
      return failure(`Command not found: ${file}`);
    }
    return failure(result.error.message);
  }

  const succeeded = result.status === 0;
  debug('exec', `exit ${result.status ?? result.signal ?? '?'}`, file);

  if (interactive) {
    return { succeeded, stdout: '', stderr: '' };
  }

  return {
    succeeded,
    stdout: (result.stdout ?? '').trim(),
    stderr: (result.stderr ?? '').trim(),
  };
}

// ── Interactive execution ──

/**
 * Run a command attached to the terminal so it can prompt and show progress.
 * Never captures text and never rejects: launch problems come back in `stderr`.
 *
 * The child is awaited rather than run synchronously so a Ctrl+C can reach the
 * interrupt handler while it runs. A child that ends by SIGINT (or with exit
 * code 130) is reported as an interruption as well.
 */
export function runCommandInteractive(
  command: readonly string[],
  options: InteractiveOptions = {},
): Promise<ExecutionResult> {
  if (options.showCommand ?? true) {
    console.log(`$ ${formatCommand(command)}`);
  }

  const [file, ...args] = command;
  if (file === undefined) return Promise.resolve(failure('Error running command: no command given'));

  debug('exec', 'interactive', formatCommand(command));

  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(file, args, { cwd: options.cwd, stdio: 'inherit' });
    } catch (err) {
      resolve(failure(`Error running command: ${errorMessage(err)}`));
      return;
    }

    child.once('error', (err) => {
      resolve(failure(`Error running command: ${err.message}`));
    });
    child.once('close', (code, signal) => {
      debug('exec', `exit ${code ?? signal ?? '?'}`, file);
      if (signal === 'SIGINT' || code === INTERRUPT_EXIT_CODE) {
        signalInterrupt();
      }
      resolve({ succeeded: code === 0, stdout: '', stderr: '' });
    });
  });
}
