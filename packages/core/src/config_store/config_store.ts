/**
 * ConfigStore Interface
 *
 * Persistence of the data directory configuration, kept apart from its
 * interpretation (ConfigManager) so tests can run without a file system.
 *
 * Implementations:
 * - FsConfigStore: `<dataDir>/.taskdeck.yaml`
 * - MemoryConfigStore: in-memory for tests
 */

import type { TaskdeckConfig } from '../config_manager';

export interface ConfigStore {
  /**
   * Parsed configuration document, or null when there is none.
   * The document is not validated here.
   * @throws when the file exists but cannot be read or parsed
   */
  loadDocument(): Promise<unknown>;

  saveConfig(config: TaskdeckConfig): Promise<void>;
}
