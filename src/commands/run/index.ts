import { Command } from 'commander';
import { resolve } from 'node:path';
import { loadConfig, DEFAULT_CONFIG_FILE } from '../../config/index.js';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { createConsole } from '../../lib/ui/console.js';
import { runConfiguredCommand } from './run-configured.js';

export const runCommand = new Command('run')
  .description('Run a command defined in wr.yml')
  .argument('<command-name>', 'Name of the command under `commands:`')
  .option('-c, --config <path>', 'Path to wr.yml config file', DEFAULT_CONFIG_FILE)
  .action(
    withErrorHandler(async (commandName: string, options: { config: string }) => {
      const config = loadConfig(resolve(options.config));
      const exitCode = runConfiguredCommand(commandName, config, createConsole());
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    }),
  );
