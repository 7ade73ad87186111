import type { Host } from '../exec/host.js';
import { errorMessage } from '../lib/errors.js';
import type { Output } from '../lib/ui/console.js';

/** The closed set of setup step variants */
export const STEP_KINDS = [
  'check-node',
  'check-python',
  'install-uv',
  'install-ghstack',
  'setup-ghstack',
  'lock-python-version',
  'sync-dependencies',
  'install-local-packages',
] as const;

export type StepKind = (typeof STEP_KINDS)[number];

export interface StepOptions {
  console: Output;
  host: Host;
  verbose?: boolean;
}

/**
 * One idempotent unit of environment setup.
 *
 * Subclasses provide `execute()` and usually `isCompleted()`. Completion is
 * re-derived from the host on every call; a step without its own check is
 * never considered complete.
 */
export abstract class SetupStep {
  abstract readonly kind: StepKind;
  abstract readonly name: string;
  abstract readonly description: string;

  protected readonly console: Output;
  protected readonly host: Host;
  protected readonly verbose: boolean;

  constructor(options: StepOptions) {
    this.console = options.console;
    this.host = options.host;
    this.verbose = options.verbose ?? false;
  }

  isCompleted(): boolean {
    return false;
  }

  abstract execute(): Promise<boolean>;

  /**
   * Skip when already complete (unless forced), otherwise execute and report.
   * Errors thrown by the step are printed and turned into `false`; they never escape.
   */
  async run(force = false): Promise<boolean> {
    try {
      if (!force && this.isCompleted()) {
        this.console.print(`[green]✓ ${this.name}[/green] (already completed)`);
        return true;
      }

      this.console.print(`[blue]→ ${this.name}[/blue] - ${this.description}`);

      const success = await this.execute();
      if (success) {
        this.console.print(`[green]✓ ${this.name}[/green] completed`);
      } else {
        this.console.print(`[red]✗ ${this.name}[/red] failed`);
      }
      return success;
    } catch (err) {
      this.console.print(`[red]✗ ${this.name}[/red] failed: ${errorMessage(err)}`);
      if (this.verbose) {
        const trace = err instanceof Error ? err.stack ?? err.message : String(err);
        this.console.print(`[red]${trace}[/red]`);
      }
      return false;
    }
  }

  /** Lower-cased platform family: darwin, linux, windows, ... */
  protected platform(): string {
    return this.host.systemInfo().platform.toLowerCase();
  }

  /** Require a command on the path, printing `<name> not installed<suffix>` when absent */
  protected requireCommand(name: string, suffix = ''): boolean {
    if (this.host.commandExists(name)) return true;
    this.console.print(`[red]${name} not installed${suffix}[/red]`);
    return false;
  }
}
