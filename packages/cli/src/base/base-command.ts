/**
 * Base Command Class for the taskdeck CLI
 *
 * Every command prints through the same success and error paths, so
 * `--json`, `--quiet` and `--verbose` behave the same everywhere.
 */

import type { Command } from 'commander';
import { isTaskdeckError } from '@taskdeck/core';
import type { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/** Turns command data into the lines printed in human mode. */
export type Renderer<T> = (data: T) => string[];

export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  constructor(protected readonly dependencyService: DependencyInjectionService) { }

  abstract register(program: Command): void;

  /**
   * Runs `action`, routing a thrown error through handleError.
   */
  protected async run(options: TOptions, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.handleError(error, options);
    }
  }

  /**
   * Prints the error and sets a failing exit code. The process is left to
   * exit on its own so queued writes still get published.
   */
  protected handleError(error: unknown, options: TOptions, exitCode: number = 1): void {
    const message = error instanceof Error ? error.message : String(error);
    const code = isTaskdeckError(error) ? error.code : 'INTERNAL_ERROR';

    if (options.json) {
      console.log(JSON.stringify({ success: false, error: message, code, exitCode }, null, 2));
    } else {
      console.error(message.startsWith('❌') ? message : `❌ ${message}`);
      if (options.verbose && error instanceof Error && error.stack) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exitCode = exitCode;
  }

  /**
   * Prints `data` as JSON, or as the lines `render` produces. Quiet mode
   * prints `quietLine` alone when given, and nothing otherwise.
   */
  protected handleSuccess<T>(
    data: T,
    options: TOptions,
    render: Renderer<T>,
    quietLine?: string,
  ): void {
    if (options.json) {
      console.log(JSON.stringify({ success: true, data }, null, 2));
      return;
    }
    if (options.quiet) {
      if (quietLine !== undefined) console.log(quietLine);
      return;
    }
    for (const line of render(data)) {
      console.log(line);
    }
  }
}
