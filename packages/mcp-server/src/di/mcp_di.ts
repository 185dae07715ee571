import { createFsContext } from '@taskdeck/core/fs';
import type { FsContextOptions } from '@taskdeck/core';
import type { McpDiConfig, McpDiContainer } from './mcp_di.types.js';

/**
 * McpDependencyInjectionService - lazy DI container for the MCP server.
 *
 * Builds the store, lock, sync engine and record adapter for one data
 * directory on first use and hands out the same instance afterwards.
 */
export class McpDependencyInjectionService {
  private config: McpDiConfig;
  private container: McpDiContainer | null = null;
  private initializing: Promise<McpDiContainer> | null = null;

  constructor(config: McpDiConfig = {}) {
    this.config = config;
  }

  /**
   * Returns the same instance on every call. Concurrent first calls share
   * one initialization.
   */
  async getContainer(): Promise<McpDiContainer> {
    if (this.container) return this.container;

    if (!this.initializing) {
      this.initializing = this.initialize();
    }

    try {
      this.container = await this.initializing;
    } catch (error) {
      // Let the next call retry, e.g. once the directory is mounted.
      this.initializing = null;
      throw error;
    }
    return this.container;
  }

  isInitialized(): boolean {
    return this.container !== null;
  }

  /** Flushes queued writes and stops the watcher. */
  async close(): Promise<void> {
    const container = this.container;
    this.container = null;
    this.initializing = null;
    if (container) {
      await container.close();
    }
  }

  private initialize(): Promise<McpDiContainer> {
    const options: FsContextOptions = { watch: this.config.watch ?? false };
    if (this.config.dataDir !== undefined) options.dataDir = this.config.dataDir;
    if (this.config.git) options.git = this.config.git;
    if (this.config.now) options.now = this.config.now;
    return createFsContext(options);
  }
}
