import type { Git, TaskdeckContext } from '@taskdeck/core';

/**
 * DI configuration for the MCP server
 */
export interface McpDiConfig {
  /** Data directory; falls back to TASKDECK_DATA_DIR, then ./tasks */
  dataDir?: string;
  /** Replaces the git CLI (tests pass a MemoryGitModule) */
  git?: Git.IGitModule;
  /** Watch the data directory for writes made by other processes */
  watch?: boolean;
  now?: () => Date;
}

/**
 * Everything a tool handler can reach.
 */
export type McpDiContainer = TaskdeckContext;
