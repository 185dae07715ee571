import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { ConfigError } from '@taskdeck/core';
import type { Workstream } from '@taskdeck/core';

export interface WorkstreamAddOptions extends BaseCommandOptions {
  tag?: string;
}

function formatWorkstream(workstream: Workstream): string {
  return `[${workstream.key}] ${workstream.name}  #${workstream.tag}`;
}

/**
 * WorkstreamCommand - manages the board's tag shortcuts kept in the
 * data directory's configuration.
 */
export class WorkstreamCommand extends BaseCommand {

  register(program: Command): void {
    const workstream = program
      .command('workstream')
      .alias('ws')
      .description('Manage workstreams (tag shortcuts on the board)');

    workstream
      .command('list')
      .description('List workstreams and their keys')
      .action(async (_options: BaseCommandOptions, command: Command) => {
        await this.executeList(command.optsWithGlobals<BaseCommandOptions>());
      });

    workstream
      .command('add <name>')
      .description('Add a workstream on the next free key')
      .option('--tag <tag>', 'Tag to filter by (derived from the name by default)')
      .action(async (name: string, _options: WorkstreamAddOptions, command: Command) => {
        await this.executeAdd(name, command.optsWithGlobals<WorkstreamAddOptions>());
      });

    workstream
      .command('rename <old> <new>')
      .description('Rename a workstream, keeping its key and tag')
      .action(async (oldName: string, newName: string, _options: BaseCommandOptions, command: Command) => {
        await this.executeRename(oldName, newName, command.optsWithGlobals<BaseCommandOptions>());
      });

    workstream
      .command('remove <name>')
      .alias('rm')
      .description('Remove a workstream')
      .action(async (name: string, _options: BaseCommandOptions, command: Command) => {
        await this.executeRemove(name, command.optsWithGlobals<BaseCommandOptions>());
      });
  }

  async executeList(options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const configManager = await this.dependencyService.getConfigManager();
      const workstreams = await configManager.getWorkstreams();
      this.handleSuccess(workstreams, options, (data) =>
        data.length === 0 ? ['No workstreams configured.'] : data.map(formatWorkstream),
      );
    });
  }

  async executeAdd(name: string, options: WorkstreamAddOptions): Promise<void> {
    await this.run(options, async () => {
      const configManager = await this.dependencyService.getConfigManager();
      const workstream = await configManager.addWorkstream(name, options.tag);
      this.handleSuccess(workstream, options, (data) => [`✅ Added ${formatWorkstream(data)}`], workstream.key);
    });
  }

  async executeRename(oldName: string, newName: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const configManager = await this.dependencyService.getConfigManager();
      const workstream = await configManager.renameWorkstream(oldName, newName);
      this.handleSuccess(workstream, options, (data) => [`✅ Renamed to ${formatWorkstream(data)}`]);
    });
  }

  async executeRemove(name: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const configManager = await this.dependencyService.getConfigManager();
      if (!(await configManager.removeWorkstream(name))) {
        throw new ConfigError(`Workstream "${name}" not found`);
      }
      this.handleSuccess({ removed: name }, options, (data) => [`✅ Removed workstream ${data.removed}`]);
    });
  }
}
