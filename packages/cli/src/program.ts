/**
 * Command tree: `clawharbor` runs setup, `clawharbor reset` wipes runtime
 * data. Anything else is a usage error.
 */

import { Command, type OutputConfiguration } from 'commander';
import type { CliDependencies } from './dependencies.js';
import { runSetupCommand } from './commands/setup.js';
import { runResetCommand } from './commands/reset.js';

export const CLI_VERSION = '0.1.0';

export interface ProgramOptions {
  /** Receives the exit code of the command that ran */
  onExit: (code: number) => void;
  /** Throw CommanderError instead of exiting (tests) */
  exitOverride?: boolean;
  output?: OutputConfiguration;
}

export function createProgram(deps: CliDependencies, options: ProgramOptions): Command {
  const program = new Command();

  program
    .name('clawharbor')
    .description('Set up and supervise the OpenClaw gateway with Docker Compose')
    .version(CLI_VERSION)
    .allowExcessArguments(false);

  // Set before subcommands are created so they inherit it
  if (options.exitOverride) program.exitOverride();
  if (options.output) program.configureOutput(options.output);

  program.action(async () => {
    options.onExit(await runSetupCommand(deps));
  });

  program
    .command('reset')
    .description('Stop the gateway and delete all runtime data (asks for confirmation)')
    .allowExcessArguments(false)
    .action(async () => {
      options.onExit(await runResetCommand(deps));
    });

  return program;
}
