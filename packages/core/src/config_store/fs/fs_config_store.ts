/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { ConfigStore } from '../config_store';
import type { TaskdeckConfig } from '../../config_manager';
import { hasErrorCode } from '../../utils/fs_errors';
import { writeFileAtomic, nodeFileSystem } from '../../record_store/fs/store_file_system';

export const CONFIG_FILE_NAME = '.taskdeck.yaml';

/**
 * Stores configuration in `<dataDir>/.taskdeck.yaml`.
 * A missing file reads as null; a malformed one throws.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/home/me/tasks');
 * const document = await store.loadDocument();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(dataDir: string) {
    this.configPath = path.join(dataDir, CONFIG_FILE_NAME);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async loadDocument(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return null;
      throw error;
    }

    return yaml.load(content, { schema: yaml.CORE_SCHEMA }) ?? null;
  }

  async saveConfig(config: TaskdeckConfig): Promise<void> {
    const content = yaml.dump(config, { schema: yaml.CORE_SCHEMA, lineWidth: -1, noRefs: true });
    await writeFileAtomic(nodeFileSystem, this.configPath, content);
  }
}
