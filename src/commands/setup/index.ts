import { Command } from 'commander';
import { resolve } from 'node:path';
import { loadConfig, DEFAULT_CONFIG_FILE } from '../../config/index.js';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { createConsole, type Output } from '../../lib/ui/console.js';
import { installInterruptHandler } from '../../lib/utils/shutdown.js';
import { SetupRunner, DEFAULT_PROJECT_NAME } from '../../setup/index.js';

interface SetupCommandOptions {
  force?: boolean;
  verbose?: boolean;
  config: string;
  dryRun?: boolean;
}

function printPlan(runner: SetupRunner, output: Output): void {
  const steps = runner.describeSetup();
  output.print(`Setup plan for [bold]${runner.projectName}[/bold] (${steps.length} steps)`);
  for (const [index, step] of steps.entries()) {
    output.print(`  ${index + 1}. ${step.name.padEnd(24)} [dim]${step.description}[/dim]`);
  }
}

export const setupCommand = new Command('setup')
  .description('Set up the development environment')
  .option('-f, --force', 'Force re-run setup steps even if already completed')
  .option('-v, --verbose', 'Enable verbose output')
  .option('-c, --config <path>', 'Path to wr.yml config file', DEFAULT_CONFIG_FILE)
  .option('--dry-run', 'List the steps for this project without running them')
  .action(
    withErrorHandler(async (options: SetupCommandOptions) => {
      const config = loadConfig(resolve(options.config));
      const projectName = config.project_name ?? DEFAULT_PROJECT_NAME;
      const output = createConsole();

      const runner = new SetupRunner({
        console: output,
        verbose: options.verbose,
        force: options.force,
        projectName,
        localPackages: config.local_packages,
      });

      if (options.dryRun) {
        printPlan(runner, output);
        return;
      }

      output.print('[bold blue]WR CLI Setup[/bold blue]');
      output.print(`Setting up ${projectName} development environment...`);
      output.print();

      installInterruptHandler(() => {
        output.print();
        output.print('[yellow]Setup interrupted by user.[/yellow]');
      });

      const success = await runner.runSetup();
      output.print();
      if (success) {
        output.print('[bold green]✓ Setup completed successfully![/bold green]');
        return;
      }

      output.print('[bold red]✗ Setup failed![/bold red]');
      output.print('Check the output above for details.');
      process.exit(1);
    }),
  );
