import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import type { BoardProps } from '../../components/board/BoardTUI';

/** Draws the board and resolves when it closes. */
export type BoardRenderer = (props: BoardProps) => Promise<void>;

/**
 * BoardCommand - the interactive board, run when `taskdeck` is called
 * without a subcommand. Watches the data directory while it is open.
 */
export class BoardCommand extends BaseCommand {

  register(program: Command): void {
    program
      .command('board', { isDefault: true })
      .description('Open the interactive board (default)')
      .action(async (_options: BaseCommandOptions, command: Command) => {
        await this.execute(command.optsWithGlobals<BaseCommandOptions>());
      });
  }

  async execute(options: BaseCommandOptions, renderer?: BoardRenderer): Promise<void> {
    await this.run(options, async () => {
      const context = await this.dependencyService.getContext(true);
      const workstreams = await context.configManager.getWorkstreams();
      const goals = await context.configManager.getActiveGoals();

      // ink and react load only when the board opens
      const draw = renderer ?? (await import('../../components/board/BoardTUI')).renderBoard;
      await draw({ adapter: context.adapter, eventBus: context.eventBus, workstreams, goals });
    });
  }
}
