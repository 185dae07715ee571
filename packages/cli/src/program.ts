import { Command } from 'commander';
import { registerBoardCommands } from './commands/board/board';
import { registerRecordCommands } from './commands/record/record';
import { registerTodayCommands } from './commands/today/today';
import { registerSyncCommands } from './commands/sync/sync';
import { registerWorkstreamCommands } from './commands/workstream/workstream';
import { registerGoalCommands } from './commands/goal/goal';
import { registerServerCommands } from './commands/server/server';
import { DependencyInjectionService } from './services/dependency-injection';

export interface GlobalOptions {
  dataDir?: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * Builds the program around one DI service. Exported so tests can run
 * commands in process against a temporary data directory.
 */
export function createProgram(di: DependencyInjectionService = new DependencyInjectionService()): Command {
  const program = new Command();

  program
    .name('taskdeck')
    .description('Local-first tasks, goals and notes, synced through git')
    .version('0.1.0')
    .option('-d, --data-dir <path>', 'Data directory (default: $TASKDECK_DATA_DIR or ./tasks)')
    .option('--json', 'Print JSON')
    .option('--quiet', 'Print only ids and errors')
    .option('--verbose', 'Debug logging and error details')
    .hook('preAction', (_program, actionCommand) => {
      const options = actionCommand.optsWithGlobals<GlobalOptions>();
      if (options.verbose) {
        process.env['LOG_LEVEL'] = 'debug';
      }
      if (options.dataDir !== undefined) {
        di.configure({ dataDir: options.dataDir });
      }
    });

  registerBoardCommands(program, di);
  registerRecordCommands(program, di);
  registerTodayCommands(program, di);
  registerSyncCommands(program, di);
  registerWorkstreamCommands(program, di);
  registerGoalCommands(program, di);
  registerServerCommands(program, di);

  return program;
}

/** Parses `argv`, runs the command and publishes queued writes before returning. */
export async function runCli(argv: string[], di: DependencyInjectionService = new DependencyInjectionService()): Promise<void> {
  const program = createProgram(di);
  try {
    await program.parseAsync(argv);
  } finally {
    await di.close();
  }
}
