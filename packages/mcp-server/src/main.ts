#!/usr/bin/env node

import { Command } from 'commander';
import { startStdioServer } from './index.js';
import type { StdioServerHandle } from './index.js';

async function main(): Promise<void> {
  const program = new Command()
    .name('taskdeck-mcp')
    .description('Serve taskdeck records to AI agents over MCP (stdio).')
    .option('-d, --data-dir <path>', 'data directory (default: $TASKDECK_DATA_DIR or ./tasks)')
    .parse(process.argv);

  const { dataDir } = program.opts<{ dataDir?: string }>();

  let handle: StdioServerHandle;
  try {
    handle = await startStdioServer(dataDir !== undefined ? { dataDir } : {});
  } catch (error) {
    process.stderr.write(
      JSON.stringify({ error: error instanceof Error ? error.message : String(error) }) + '\n',
    );
    process.exit(1);
  }

  const stop = () => {
    handle.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        process.stderr.write(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
  process.stdin.on('end', stop);
}

main().catch((error: unknown) => {
  process.stderr.write(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
