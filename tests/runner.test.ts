import { describe, it, expect, afterEach } from 'vitest';
import { SetupRunner, SetupStep, type StepOptions } from '../src/setup/index.js';
import { createSystemHost } from '../src/exec/index.js';
import { installInterruptHandler, resetInterruptState } from '../src/lib/utils/shutdown.js';
import { testContext } from './helpers/test-context.js';
import { FakeHost, ok } from './helpers/fake-host.js';
import { MemoryOutput } from './helpers/memory-output.js';

const ctx = testContext();

class RecordingStep extends SetupStep {
  readonly kind = 'check-node' as const;
  readonly description = 'recording';
  readonly forceSeen: boolean[] = [];

  constructor(
    options: StepOptions,
    readonly name: string,
    private readonly outcome: boolean,
  ) {
    super(options);
  }

  override async run(force = false): Promise<boolean> {
    this.forceSeen.push(force);
    this.console.print(`ran ${this.name}`);
    return this.outcome;
  }

  async execute(): Promise<boolean> {
    return this.outcome;
  }
}

/** Runs a node script attached to the terminal and records when it starts */
class ScriptStep extends SetupStep {
  readonly kind = 'install-uv' as const;
  readonly description = 'runs a script';

  constructor(
    options: StepOptions,
    readonly name: string,
    private readonly script: string,
    private readonly events: string[],
  ) {
    super(options);
  }

  async execute(): Promise<boolean> {
    this.events.push(`start ${this.name}`);
    const { succeeded } = await this.host.runInteractive([process.execPath, '-e', this.script], {
      showCommand: false,
    });
    return succeeded;
  }
}

function makeSteps(output: MemoryOutput, outcomes: boolean[]): RecordingStep[] {
  const options = { console: output, host: new FakeHost('/work') };
  return outcomes.map((outcome, i) => new RecordingStep(options, `step-${i + 1}`, outcome));
}

describe('SetupRunner.runSetup', () => {
  it('runs every step once and lists failures in order', async () => {
    const output = new MemoryOutput();
    const steps = makeSteps(output, [false, true, false, true]);
    const runner = new SetupRunner({ console: output, steps });

    expect(await runner.runSetup()).toBe(false);
    expect(steps.map((s) => s.forceSeen.length)).toEqual([1, 1, 1, 1]);
    expect(output.lines).toEqual([
      '[blue]Running 4 setup steps...[/blue]',
      '',
      '[dim](1/4)[/dim] ran step-1',
      '[dim](2/4)[/dim] ran step-2',
      '[dim](3/4)[/dim] ran step-3',
      '[dim](4/4)[/dim] ran step-4',
      '',
      '[red]Failed steps: step-1, step-3[/red]',
    ]);
  });

  it('reports success when every step passes', async () => {
    const output = new MemoryOutput();
    const runner = new SetupRunner({ console: output, steps: makeSteps(output, [true, true]) });

    expect(await runner.runSetup()).toBe(true);
    expect(output.lines.at(-1)).toBe('[green]All setup steps completed successfully![/green]');
  });

  it('passes the force flag to each step', async () => {
    const output = new MemoryOutput();
    const steps = makeSteps(output, [true, true]);
    await new SetupRunner({ console: output, force: true, steps }).runSetup();

    expect(steps.flatMap((s) => s.forceSeen)).toEqual([true, true]);
  });
});

describe('SetupRunner construction', () => {
  it('defaults the project name and selects the default profile', () => {
    const runner = new SetupRunner({ console: new MemoryOutput(), host: new FakeHost('/work') });
    expect(runner.projectName).toBe('unknown-project');
    expect(runner.describeSetup()).toEqual([
      { kind: 'check-node', name: 'Check Node.js', description: 'Verify Node.js is installed' },
      { kind: 'check-python', name: 'Check Python', description: 'Verify Python 3.11+ is installed' },
      { kind: 'install-uv', name: 'Install uv', description: 'Install uv package manager' },
      {
        kind: 'lock-python-version',
        name: 'Lock Python version',
        description: 'Install and pin Python version from .python-version file',
      },
    ]);
  });

  it('builds the profile named by the project', () => {
    const runner = new SetupRunner({
      console: new MemoryOutput(),
      host: new FakeHost('/work'),
      projectName: 'wr-cli',
    });
    expect(runner.steps.map((s) => s.kind)).toEqual([
      'check-node',
      'check-python',
      'install-uv',
      'install-ghstack',
      'setup-ghstack',
      'lock-python-version',
    ]);
  });
});

describe('SetupRunner end to end', () => {
  it('skips every default step on a machine that is already set up', async () => {
    const host = new FakeHost(ctx.createTempDir())
      .install('node', 'python3', 'uv')
      .respond('python3 --version', ok('Python 3.11.9'))
      .respond('uv python find', ok('/opt/python/bin/python3'))
      .respond('/opt/python/bin/python3 --version', ok('Python 3.11.9'));
    const output = new MemoryOutput();
    const runner = new SetupRunner({ console: output, host, projectName: 'unknown-project' });

    expect(await runner.runSetup()).toBe(true);
    expect(host.interactiveCalls).toEqual([]);
    expect(output.lines).toEqual([
      '[blue]Running 4 setup steps...[/blue]',
      '',
      '[dim](1/4)[/dim] [green]✓ Check Node.js[/green] (already completed)',
      '[dim](2/4)[/dim] [green]✓ Check Python[/green] (already completed)',
      '[dim](3/4)[/dim] [green]✓ Install uv[/green] (already completed)',
      '[dim](4/4)[/dim] [green]✓ Lock Python version[/green] (already completed)',
      '',
      '[green]All setup steps completed successfully![/green]',
    ]);
  });

  it('keeps going after a failed step on a bare machine', async () => {
    const host = new FakeHost(ctx.createTempDir());
    const output = new MemoryOutput();
    const runner = new SetupRunner({ console: output, host });

    expect(await runner.runSetup()).toBe(false);
    expect(output.lines.at(-1)).toBe(
      '[red]Failed steps: Check Node.js, Check Python, Install uv, Lock Python version[/red]',
    );
    expect(host.interactiveCalls.map((c) => c.command)).toEqual([
      ['sh', '-c', 'curl -LsSf https://astral.sh/uv/install.sh | sh'],
    ]);
  });
});

describe('SetupRunner interrupts', () => {
  afterEach(() => {
    resetInterruptState();
  });

  function interruptibleRun(scripts: string[]) {
    const events: string[] = [];
    installInterruptHandler(() => events.push('interrupted'), {
      exit: (code) => events.push(`exit ${code}`),
    });
    const output = new MemoryOutput();
    const options = { console: output, host: createSystemHost({ cwd: ctx.createTempDir() }) };
    const names = ['uv', 'sync', 'pin'];
    const steps = scripts.map((script, i) => new ScriptStep(options, names[i] ?? `step-${i}`, script, events));
    return { events, output, runner: new SetupRunner({ console: output, steps }) };
  }

  it.skipIf(process.platform === 'win32')('starts no step after a child is stopped by Ctrl+C', async () => {
    const { events, output, runner } = interruptibleRun([
      "process.kill(process.pid, 'SIGINT')",
      'process.exit(0)',
      'process.exit(0)',
    ]);

    events.push(`resolved ${await runner.runSetup()}`);

    expect(events).toEqual(['start uv', 'interrupted', 'exit 130', 'resolved false']);
    expect(output.lines).toEqual([
      '[blue]Running 3 setup steps...[/blue]',
      '',
      '[dim](1/3)[/dim] [blue]→ uv[/blue] - runs a script',
      '[red]✗ uv[/red] failed',
    ]);
  });

  it('handles SIGINT while a child is still running', async () => {
    const { events, runner } = interruptibleRun([
      'setTimeout(() => process.exit(0), 500)',
      'process.exit(0)',
      'process.exit(0)',
    ]);
    const listener = process.listeners('SIGINT').at(-1);
    setTimeout(() => listener?.('SIGINT'), 50);

    events.push(`resolved ${await runner.runSetup()}`);

    expect(events).toEqual(['start uv', 'interrupted', 'exit 130', 'resolved false']);
  });

  it('treats exit code 130 from a child as an interrupt', async () => {
    const { events, runner } = interruptibleRun(['process.exit(130)', 'process.exit(0)', 'process.exit(0)']);

    events.push(`resolved ${await runner.runSetup()}`);

    expect(events).toEqual(['start uv', 'interrupted', 'exit 130', 'resolved false']);
  });
});

describe('SetupRunner step names', () => {
  it('rejects a pipeline with duplicate step names', () => {
    const output = new MemoryOutput();
    const options = { console: output, host: new FakeHost('/work') };
    const steps = [new RecordingStep(options, 'twin', true), new RecordingStep(options, 'twin', false)];

    expect(() => new SetupRunner({ console: output, steps })).toThrow('Duplicate setup step name: twin');
  });
});
