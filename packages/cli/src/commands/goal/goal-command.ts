import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { ConfigError, ValidationError } from '@taskdeck/core';
import type { Goal } from '@taskdeck/core';
import { formatGoal } from '../../utils/format';

export interface GoalAddOptions extends BaseCommandOptions {
  area?: string;
}

export interface GoalUpdateOptions extends BaseCommandOptions {
  description?: string;
  area?: string;
}

/** Goals are numbered from 1 on the command line, in the order `goal list` prints them. */
function parseGoalNumber(value: string): number {
  const number = Number(value);
  if (!Number.isInteger(number) || number < 1) {
    throw ValidationError.forField('number', 'must be a positive integer', value);
  }
  return number - 1;
}

function formatGoalLine(goal: Goal, index: number): string {
  return `${index + 1}. ${formatGoal(goal)}${goal.active ? '' : '  (inactive)'}`;
}

/**
 * GoalCommand - standing goals shown above the board, kept in the data
 * directory's configuration next to the workstreams.
 */
export class GoalCommand extends BaseCommand {

  register(program: Command): void {
    const goal = program
      .command('goal')
      .description('Manage the goals shown above the board');

    goal
      .command('list')
      .description('List goals with their numbers')
      .action(async (_options: BaseCommandOptions, command: Command) => {
        await this.executeList(command.optsWithGlobals<BaseCommandOptions>());
      });

    goal
      .command('add <description>')
      .description('Add an active goal at priority 3')
      .option('--area <area>', 'Area the goal belongs to, usually a workstream tag', '')
      .action(async (description: string, _options: GoalAddOptions, command: Command) => {
        await this.executeAdd(description, command.optsWithGlobals<GoalAddOptions>());
      });

    goal
      .command('update <number>')
      .description('Change the description or area of a goal')
      .option('--description <text>', 'New description')
      .option('--area <area>', 'New area')
      .action(async (number: string, _options: GoalUpdateOptions, command: Command) => {
        await this.executeUpdate(number, command.optsWithGlobals<GoalUpdateOptions>());
      });

    goal
      .command('cycle <number>')
      .description('Step the priority 1 → 5, wrapping back to 1')
      .action(async (number: string, _options: BaseCommandOptions, command: Command) => {
        await this.executeCycle(number, command.optsWithGlobals<BaseCommandOptions>());
      });

    goal
      .command('toggle <number>')
      .description('Switch a goal between active and inactive')
      .action(async (number: string, _options: BaseCommandOptions, command: Command) => {
        await this.executeToggle(number, command.optsWithGlobals<BaseCommandOptions>());
      });

    goal
      .command('remove <number>')
      .alias('rm')
      .description('Delete a goal')
      .action(async (number: string, _options: BaseCommandOptions, command: Command) => {
        await this.executeRemove(number, command.optsWithGlobals<BaseCommandOptions>());
      });
  }

  async executeList(options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const configManager = await this.dependencyService.getConfigManager();
      const goals = await configManager.getGoals();
      this.handleSuccess(goals, options, (data) =>
        data.length === 0 ? ['No goals yet.'] : data.map(formatGoalLine),
      );
    });
  }

  async executeAdd(description: string, options: GoalAddOptions): Promise<void> {
    await this.run(options, async () => {
      const configManager = await this.dependencyService.getConfigManager();
      const goal = await configManager.addGoal(description, options.area ?? '');
      const number = (await configManager.getGoals()).length;
      this.handleSuccess(goal, options, (data) => [`✅ Added ${formatGoalLine(data, number - 1)}`], String(number));
    });
  }

  async executeUpdate(number: string, options: GoalUpdateOptions): Promise<void> {
    await this.run(options, async () => {
      const index = parseGoalNumber(number);
      if (options.description === undefined && options.area === undefined) {
        throw ValidationError.forField('update', 'give --description or --area', undefined);
      }
      const configManager = await this.dependencyService.getConfigManager();
      const goal = await configManager.updateGoal(index, {
        ...(options.description !== undefined ? { description: options.description } : {}),
        ...(options.area !== undefined ? { area: options.area } : {}),
      });
      this.handleSuccess(goal, options, (data) => [`✅ Updated ${formatGoalLine(data, index)}`]);
    });
  }

  async executeCycle(number: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const index = parseGoalNumber(number);
      const configManager = await this.dependencyService.getConfigManager();
      const goal = await configManager.cycleGoalPriority(index);
      this.handleSuccess(goal, options, (data) => [`✅ Priority ${data.priority}: ${formatGoalLine(data, index)}`]);
    });
  }

  async executeToggle(number: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const index = parseGoalNumber(number);
      const configManager = await this.dependencyService.getConfigManager();
      const goal = await configManager.toggleGoal(index);
      this.handleSuccess(goal, options, (data) => [
        `✅ ${data.active ? 'Activated' : 'Deactivated'} ${formatGoalLine(data, index)}`,
      ]);
    });
  }

  async executeRemove(number: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, async () => {
      const index = parseGoalNumber(number);
      const configManager = await this.dependencyService.getConfigManager();
      if (!(await configManager.removeGoal(index))) {
        throw new ConfigError(`Goal ${number} not found`);
      }
      this.handleSuccess({ removed: index + 1 }, options, (data) => [`✅ Removed goal ${data.removed}`]);
    });
  }
}
