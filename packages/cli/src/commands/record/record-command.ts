import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { formatHeaderLine, formatSyncOutcome, parseList } from '../../utils/format';
import {
  ValidationError,
  isRecordKind,
  isRecordStatus,
  Query,
} from '@taskdeck/core';
import type {
  ListQuery,
  MutationResult,
  RecordDetail,
  RecordDraft,
  RecordHeader,
} from '@taskdeck/core';

export interface RecordNewOptions extends BaseCommandOptions {
  body?: string;
  priority?: string;
  tags?: string;
  due?: string;
  kind?: string;
  status?: string;
  goal?: string;
}

export interface RecordListOptions extends BaseCommandOptions {
  status?: string;
  tag?: string;
  priority?: string;
  kind?: string;
  sort?: string;
  desc?: boolean;
  limit?: string;
  all?: boolean;
}

export interface RecordUpdateOptions extends BaseCommandOptions {
  clear?: boolean;
}

export interface RecordDoneOptions extends BaseCommandOptions {
  archive?: boolean;
}

/**
 * RecordCommand - the scriptable record operations: new, list, show,
 * update, done and archive.
 */
export class RecordCommand extends BaseCommand {

  register(program: Command): void {
    program
      .command('new <title>')
      .description('Create a task, goal or note')
      .option('-b, --body <text>', 'Markdown body')
      .option('-p, --priority <priority>', 'high, medium or low')
      .option('-t, --tags <tags>', 'Comma-separated tags')
      .option('--due <date>', 'Due date, YYYY-MM-DD')
      .option('-k, --kind <kind>', 'task, goal or note')
      .option('-s, --status <status>', 'Initial status')
      .option('--goal <id>', 'Parent goal id')
      .action(async (title: string, _options: RecordNewOptions, command: Command) => {
        await this.executeNew(title, command.optsWithGlobals<RecordNewOptions>());
      });

    program
      .command('list')
      .alias('ls')
      .description('List record headers')
      .option('-s, --status <status>', 'Filter by status')
      .option('-t, --tag <tag>', 'Filter by tag')
      .option('-p, --priority <priority>', 'Filter by priority')
      .option('-k, --kind <kind>', 'Filter by kind')
      .option('--sort <key>', 'due_date, priority or created_at')
      .option('--desc', 'Sort descending')
      .option('-l, --limit <n>', 'Return at most n records')
      .option('-a, --all', 'Include archived records')
      .action(async (_options: RecordListOptions, command: Command) => {
        await this.executeList(command.optsWithGlobals<RecordListOptions>());
      });

    program
      .command('show <id>')
      .description('Show a record with its body')
      .action(async (id: string, _options: BaseCommandOptions, command: Command) => {
        await this.executeShow(id, command.optsWithGlobals<BaseCommandOptions>());
      });

    program
      .command('update <id> <field> [value...]')
      .description('Set one field: title, status, priority, tags, due_date, parent_goal_id, body or notes')
      .option('--clear', 'Clear an optional field')
      .action(async (id: string, field: string, value: string[], _options: RecordUpdateOptions, command: Command) => {
        await this.executeUpdate(id, field, value, command.optsWithGlobals<RecordUpdateOptions>());
      });

    program
      .command('done <id>')
      .description('Mark a record done')
      .option('--archive', 'Also move it to the archive')
      .action(async (id: string, _options: RecordDoneOptions, command: Command) => {
        await this.executeDone(id, command.optsWithGlobals<RecordDoneOptions>());
      });

    program
      .command('archive <id>')
      .description('Archive a record')
      .action(async (id: string, _options: BaseCommandOptions, command: Command) => {
        await this.executeArchive(id, command.optsWithGlobals<BaseCommandOptions>());
      });
  }

  async executeNew(title: string, options: RecordNewOptions): Promise<void> {
    await this.run(options, async () => {
      const draft: RecordDraft = { title };
      if (options.body !== undefined) draft.body = options.body;
      if (options.priority !== undefined) draft.priority = options.priority;
      if (options.tags !== undefined) draft.tags = parseList(options.tags);
      if (options.due !== undefined) draft.dueDate = options.due;
      if (options.goal !== undefined) draft.parentGoalId = options.goal;
      if (options.kind !== undefined) {
        if (!isRecordKind(options.kind)) {
          throw ValidationError.forField('kind', 'must be one of task, goal, note', options.kind);
        }
        draft.kind = options.kind;
      }
      if (options.status !== undefined) {
        if (!isRecordStatus(options.status)) {
          throw ValidationError.forField('status', 'must be one of active, next, waiting, done, archived', options.status);
        }
        draft.status = options.status;
      }

      const adapter = await this.dependencyService.getRecordAdapter();
      const result = await adapter.create(draft);
      this.handleSuccess(result, options, (data) => [
        `✅ Created ${data.record.kind} ${data.record.id}`,
        formatHeaderLine(data.record),
        ...formatSyncOutcome(data.sync),
      ], result.record.id);
    });
  }

  async executeList(options: RecordListOptions): Promise<void> {
    await this.run(options, async () => {
      const query = this.toListQuery(options);
      const adapter = await this.dependencyService.getRecordAdapter();
      const records = adapter.list(query);

      this.handleSuccess(records, options, (data: RecordHeader[]) =>
        data.length === 0 ? ['No records found.'] : data.map(formatHeaderLine),
      );
    });
  }

  async executeShow(id: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const adapter = await this.dependencyService.getRecordAdapter();
      const detail = await adapter.readDetail(id);
      this.handleSuccess(detail, options, renderDetail);
    });
  }

  async executeUpdate(id: string, field: string, value: string[], options: RecordUpdateOptions): Promise<void> {
    await this.run(options, async () => {
      if (!options.clear && value.length === 0) {
        throw ValidationError.forField('value', 'is required unless --clear is given', null);
      }
      const adapter = await this.dependencyService.getRecordAdapter();
      const result = await adapter.patch(id, field, options.clear ? null : value.join(' '));
      this.handleSuccess(result, options, (data) => renderMutation(`✅ Updated ${data.record.id} ${field}`, data));
    });
  }

  async executeDone(id: string, options: RecordDoneOptions): Promise<void> {
    await this.run(options, async () => {
      const adapter = await this.dependencyService.getRecordAdapter();
      const result = await adapter.complete(id, { archive: options.archive === true });
      const verb = options.archive ? 'Completed and archived' : 'Completed';
      this.handleSuccess(result, options, (data) => renderMutation(`✅ ${verb} ${data.record.id}`, data));
    });
  }

  async executeArchive(id: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const adapter = await this.dependencyService.getRecordAdapter();
      const result = await adapter.archive(id);
      this.handleSuccess(result, options, (data) => renderMutation(`✅ Archived ${data.record.id}`, data));
    });
  }

  private toListQuery(options: RecordListOptions): ListQuery {
    const query: ListQuery = {};
    if (options.status !== undefined) {
      if (!isRecordStatus(options.status)) {
        throw ValidationError.forField('status', 'must be one of active, next, waiting, done, archived', options.status);
      }
      query.status = options.status;
    }
    if (options.kind !== undefined) {
      if (!isRecordKind(options.kind)) {
        throw ValidationError.forField('kind', 'must be one of task, goal, note', options.kind);
      }
      query.kind = options.kind;
    }
    if (options.sort !== undefined) {
      if (!Query.isSortKey(options.sort)) {
        throw ValidationError.forField('sort', 'must be one of due_date, priority, created_at', options.sort);
      }
      query.sort = options.sort;
    }
    if (options.limit !== undefined) {
      const limit = Number(options.limit);
      if (!Number.isInteger(limit) || limit < 0) {
        throw ValidationError.forField('limit', 'must be a non-negative integer', options.limit);
      }
      query.limit = limit;
    }
    if (options.tag !== undefined) query.tag = options.tag;
    if (options.priority !== undefined) query.priority = options.priority;
    if (options.desc) query.direction = 'desc';
    if (options.all) query.includeArchived = true;
    return query;
  }
}

function renderMutation(headline: string, data: MutationResult): string[] {
  return [headline, formatHeaderLine(data.record), ...formatSyncOutcome(data.sync)];
}

function renderDetail(detail: RecordDetail): string[] {
  const lines = [
    formatHeaderLine(detail),
    `Status: ${detail.status}${detail.location === 'archive' ? ' (archive)' : ''}`,
    `Created: ${detail.createdAt}`,
  ];
  if (detail.parentGoalId) lines.push(`Goal: ${detail.parentGoalId}`);
  for (const [key, value] of Object.entries(detail.extra)) {
    lines.push(`${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
  }
  if (detail.body.length > 0) {
    lines.push('', detail.body);
  }
  return lines;
}
