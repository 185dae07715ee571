import { createFsContext } from '@taskdeck/core/fs';
import type { FsContextOptions, Git, IRecordAdapter, TaskdeckContext } from '@taskdeck/core';

export interface DependencyInjectionConfig {
  /** Falls back to TASKDECK_DATA_DIR, then ./tasks */
  dataDir?: string;
  /** Replaces the git CLI (tests pass a MemoryGitModule) */
  git?: Git.IGitModule;
  now?: () => Date;
}

/**
 * DependencyInjectionService - builds the context for one data directory
 * on first use. One instance per CLI invocation; nothing is shared
 * process-wide.
 */
export class DependencyInjectionService {
  private config: DependencyInjectionConfig;
  private context: TaskdeckContext | null = null;
  private initializing: Promise<TaskdeckContext> | null = null;

  constructor(config: DependencyInjectionConfig = {}) {
    this.config = config;
  }

  /**
   * Merges options parsed from the command line. Has no effect once the
   * context exists.
   */
  configure(config: DependencyInjectionConfig): void {
    if (this.context || this.initializing) return;
    this.config = { ...this.config, ...config };
  }

  getDataDir(): string | undefined {
    return this.config.dataDir;
  }

  /**
   * @param watch start the store watcher, for long-running views
   */
  async getContext(watch = false): Promise<TaskdeckContext> {
    if (this.context) {
      if (watch && !this.context.watcher.isRunning()) {
        await this.context.watcher.start();
      }
      return this.context;
    }

    if (!this.initializing) {
      const options: FsContextOptions = { watch };
      if (this.config.dataDir !== undefined) options.dataDir = this.config.dataDir;
      if (this.config.git) options.git = this.config.git;
      if (this.config.now) options.now = this.config.now;
      this.initializing = createFsContext(options);
    }

    try {
      this.context = await this.initializing;
    } finally {
      this.initializing = null;
    }
    return this.context;
  }

  async getRecordAdapter(): Promise<IRecordAdapter> {
    return (await this.getContext()).adapter;
  }

  async getConfigManager(): Promise<TaskdeckContext['configManager']> {
    return (await this.getContext()).configManager;
  }

  /** Waits for queued writes to be published, then stops the watcher. */
  async close(): Promise<void> {
    const context = this.context;
    this.context = null;
    if (context) {
      await context.close();
    }
  }
}
