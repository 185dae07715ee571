import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { formatSyncOutcome, formatSyncState } from '../../utils/format';
import type { SyncOutcome, SyncState } from '@taskdeck/core';

export interface SyncOptions extends BaseCommandOptions {
  now?: boolean;
}

export interface SyncReport {
  /** Present only when a cycle was run. */
  outcome?: SyncOutcome;
  state: SyncState;
}

/**
 * SyncCommand - shows the sync state, or runs a cycle with `--now`.
 * Running a cycle is also how a blocked or pending state is retried.
 */
export class SyncCommand extends BaseCommand<SyncOptions> {

  register(program: Command): void {
    program
      .command('sync')
      .description('Show sync state; --now pulls, commits and pushes')
      .option('--now', 'Run a sync cycle now')
      .action(async (_options: SyncOptions, command: Command) => {
        await this.execute(command.optsWithGlobals<SyncOptions>());
      });
  }

  async execute(options: SyncOptions): Promise<void> {
    await this.run(options, async () => {
      const adapter = await this.dependencyService.getRecordAdapter();
      const report: SyncReport = options.now
        ? { outcome: await adapter.syncNow(), state: adapter.syncStatus() }
        : { state: adapter.syncStatus() };

      this.handleSuccess(report, options, renderReport, report.state.phase);
    });
  }
}

function renderReport(report: SyncReport): string[] {
  const lines: string[] = [];
  if (report.outcome) {
    lines.push(report.outcome.status === 'synced' ? '✅ Synced' : `Sync finished: ${report.outcome.status}`);
    lines.push(...formatSyncOutcome(report.outcome));
  }
  lines.push(...formatSyncState(report.state));
  return lines;
}
