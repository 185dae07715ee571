import type { Command } from 'commander';
import { startStdioServer } from '@taskdeck/mcp-server';
import type { StdioServerHandle } from '@taskdeck/mcp-server';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import type { DependencyInjectionService } from '../../services/dependency-injection';

export interface ServerOptions extends BaseCommandOptions {
  dataDir?: string;
}

/** Starts the server; injectable so tests can run without stdio. */
export type ServerStarter = (config: { dataDir?: string }) => Promise<Pick<StdioServerHandle, 'shutdown'>>;

/**
 * ServerCommand - serves the data directory to AI agents over MCP on
 * stdin/stdout until the input closes or a signal arrives. Nothing is
 * printed to stdout from here: it belongs to the protocol.
 */
export class ServerCommand extends BaseCommand<ServerOptions> {
  constructor(
    dependencyService: DependencyInjectionService,
    private readonly start: ServerStarter = startStdioServer,
  ) {
    super(dependencyService);
  }

  register(program: Command): void {
    program
      .command('server')
      .description('Serve records to AI agents over MCP (stdio)')
      .action(async (_options: ServerOptions, command: Command) => {
        await this.execute(command.optsWithGlobals<ServerOptions>());
      });
  }

  async execute(options: ServerOptions): Promise<void> {
    let handle: Pick<StdioServerHandle, 'shutdown'>;
    try {
      handle = await this.start(options.dataDir !== undefined ? { dataDir: options.dataDir } : {});
    } catch (error) {
      // JSON on stderr so a supervising agent can read the reason
      process.stderr.write(
        JSON.stringify({ error: error instanceof Error ? error.message : String(error) }) + '\n',
      );
      process.exitCode = 1;
      return;
    }

    await waitForStop();
    await handle.shutdown();
  }
}

function waitForStop(): Promise<void> {
  return new Promise((resolve) => {
    const stop = () => {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      process.stdin.off('end', stop);
      resolve();
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
    process.stdin.on('end', stop);
  });
}
