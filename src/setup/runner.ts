import { createSystemHost, type Host } from '../exec/host.js';
import type { Output } from '../lib/ui/console.js';
import { debug } from '../lib/utils/debug.js';
import { isInterrupted } from '../lib/utils/shutdown.js';
import { buildSteps } from './profiles.js';
import type { SetupStep, StepKind } from './step.js';

export const DEFAULT_PROJECT_NAME = 'unknown-project';

export interface SetupRunnerOptions {
  console: Output;
  verbose?: boolean;
  /** Run every step even if its completion check passes */
  force?: boolean;
  projectName?: string;
  host?: Host;
  /** Package directories for the local-packages step */
  localPackages?: string[];
  /** Replace the profile's steps with a custom pipeline; names must be unique */
  steps?: readonly SetupStep[];
}

export interface StepDescription {
  kind: StepKind;
  name: string;
  description: string;
}

/**
 * Runs the setup steps of a project profile in order.
 *
 * Every step runs even after a failure; the names of failed steps are
 * reported together at the end. An interrupt stops the run before the next step.
 */
export class SetupRunner {
  readonly projectName: string;
  readonly verbose: boolean;
  readonly force: boolean;
  readonly steps: readonly SetupStep[];

  private readonly console: Output;

  constructor(options: SetupRunnerOptions) {
    this.console = options.console;
    this.verbose = options.verbose ?? false;
    this.force = options.force ?? false;
    this.projectName = options.projectName ?? DEFAULT_PROJECT_NAME;
    this.steps = options.steps ?? buildSteps(this.projectName, {
      console: options.console,
      host: options.host ?? createSystemHost(),
      verbose: this.verbose,
      packages: options.localPackages,
    });

    const seen = new Set<string>();
    for (const step of this.steps) {
      if (seen.has(step.name)) {
        throw new Error(`Duplicate setup step name: ${step.name}`);
      }
      seen.add(step.name);
    }
  }

  /** The selected pipeline, without touching the host */
  describeSetup(): StepDescription[] {
    return this.steps.map((step) => ({
      kind: step.kind,
      name: step.name,
      description: step.description,
    }));
  }

  /** Run all steps. Resolves true only if every step succeeded and nothing interrupted the run. */
  async runSetup(): Promise<boolean> {
    const total = this.steps.length;
    this.console.print(`[blue]Running ${total} setup steps...[/blue]`);
    this.console.print();

    const failedSteps: string[] = [];

    for (const [index, step] of this.steps.entries()) {
      this.console.print(`[dim](${index + 1}/${total})[/dim] `, { newline: false });

      const success = await step.run(this.force);
      debug('setup', `${step.kind}: ${success ? 'ok' : 'failed'}`);
      if (isInterrupted()) {
        debug('setup', `interrupted during ${step.kind}`);
        return false;
      }
      if (!success) {
        failedSteps.push(step.name);
      }
    }

    this.console.print();
    if (failedSteps.length > 0) {
      this.console.print(`[red]Failed steps: ${failedSteps.join(', ')}[/red]`);
      return false;
    }

    this.console.print('[green]All setup steps completed successfully![/green]');
    return true;
  }
}
