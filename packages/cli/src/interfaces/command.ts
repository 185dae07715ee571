/**
 * Command contracts shared by every taskdeck subcommand.
 */

import type { Command } from 'commander';

/**
 * Output options every command accepts. They are declared once on the
 * program and reach each action through `optsWithGlobals()`.
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  register(program: Command): void;
}
