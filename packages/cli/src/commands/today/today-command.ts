import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { formatHeaderLine } from '../../utils/format';
import { ValidationError, isCalendarDate } from '@taskdeck/core';
import type { DailySummary, RecordHeader } from '@taskdeck/core';

export interface TodayOptions extends BaseCommandOptions {
  date?: string;
}

/**
 * TodayCommand - the daily summary: high priority, due today and overdue.
 */
export class TodayCommand extends BaseCommand<TodayOptions> {

  register(program: Command): void {
    program
      .command('today')
      .description('Show high-priority, due and overdue records')
      .option('--date <date>', 'Summarize another day, YYYY-MM-DD')
      .action(async (_options: TodayOptions, command: Command) => {
        await this.execute(command.optsWithGlobals<TodayOptions>());
      });
  }

  async execute(options: TodayOptions): Promise<void> {
    await this.run(options, async () => {
      if (options.date !== undefined && !isCalendarDate(options.date)) {
        throw ValidationError.forField('date', 'must be a calendar date (YYYY-MM-DD)', options.date);
      }
      const adapter = await this.dependencyService.getRecordAdapter();
      const summary = adapter.dailySummary(options.date);
      this.handleSuccess(summary, options, renderSummary);
    });
  }
}

function section(title: string, headers: RecordHeader[]): string[] {
  if (headers.length === 0) return [];
  return ['', `${title} (${headers.length})`, ...headers.map((header) => `  ${formatHeaderLine(header)}`)];
}

export function renderSummary(summary: DailySummary): string[] {
  const lines = [`📅 ${summary.date}: ${summary.totalActive} active`];
  lines.push(...section('🔥 High priority', summary.highPriority));
  lines.push(...section('📌 Due today', summary.dueToday));
  lines.push(...section('⏰ Overdue', summary.overdue));
  if (lines.length === 1) {
    lines.push('Nothing urgent today.');
  }
  return lines;
}
