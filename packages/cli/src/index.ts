#!/usr/bin/env node

import { runCli } from './program';

runCli(process.argv).catch((error: unknown) => {
  console.error(`❌ Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
