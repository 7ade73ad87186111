import { Command } from 'commander';
import { setupCommand } from './commands/setup/index.js';
import { runCommand } from './commands/run/index.js';

const program = new Command();

program
  .name('wr')
  .description('Bootstrap project development environments from wr.yml')
  .version('0.1.0');

program.addCommand(setupCommand);
program.addCommand(runCommand);

await program.parseAsync();
