/**
 * Interrupt handling for long-running commands.
 *
 * Ctrl+C reaches both this process and the child attached to the terminal.
 * Either path ends up here: the SIGINT listener fires while a child is being
 * awaited, or the executor reports a child that died of SIGINT. The first one
 * notifies and exits with code 130; the runner checks `isInterrupted()`
 * between steps.
 */

export const INTERRUPT_EXIT_CODE = 130;

export interface InterruptOptions {
  /** Called with the exit code after notifying (default `process.exit`) */
  exit?: (code: number) => void;
}

let _listener: (() => void) | undefined;
let _interrupted = false;

/** Install the SIGINT handler. Safe to call multiple times (idempotent). */
export function installInterruptHandler(onInterrupt: () => void, options: InterruptOptions = {}): void {
  if (_listener) return;

  const exit = options.exit ?? ((code: number) => process.exit(code));
  _listener = () => {
    if (_interrupted) return;
    _interrupted = true;
    onInterrupt();
    exit(INTERRUPT_EXIT_CODE);
  };
  process.on('SIGINT', _listener);
}

/**
 * Report that a child process was stopped by Ctrl+C.
 * Does nothing unless a handler is installed; without one Node's default
 * SIGINT behaviour already ends the process.
 */
export function signalInterrupt(): void {
  _listener?.();
}

export function isInterrupted(): boolean {
  return _interrupted;
}

/** Remove the handler and clear interrupt state (for testing) */
export function resetInterruptState(): void {
  if (_listener) {
    process.off('SIGINT', _listener);
  }
  _listener = undefined;
  _interrupted = false;
}
