/**
 * @clawharbor/cli
 *
 * Main entry point for the CLI is in ./cli.ts
 * This file exports the commands for programmatic use.
 */

export { CLI_VERSION, createProgram, type ProgramOptions } from './program.js';
export { runSetupCommand } from './commands/setup.js';
export { runResetCommand } from './commands/reset.js';
export { createDefaultDependencies, type CliDependencies } from './dependencies.js';
export { askQuestion } from './prompt.js';
