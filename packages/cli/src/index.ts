/**
 * @appship/cli
 *
 * CLI entry point for appship commands.
 */

import { Command } from 'commander';
import {
  // Infrastructure commands
  deployCommand,
  validateCommand,
  statusCommand,
  destroyCommand,
  doctorCommand,
  // Identity commands
  oidcCommand,
} from './commands';

const program = new Command();

program
  .name('appship')
  .description('Deploy and manage an Azure App Service for a .NET application')
  .version('0.1.0');

// Infrastructure commands
program.addCommand(deployCommand);
program.addCommand(validateCommand);
program.addCommand(statusCommand);
program.addCommand(destroyCommand);
program.addCommand(doctorCommand);

// Identity commands
program.addCommand(oidcCommand);

await program.parseAsync();
