/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { TaskdeckConfig } from '../../config_manager';

/**
 * In-memory ConfigStore for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setDocument({ lock: { timeoutMs: 100 } });
 * const manager = new ConfigManager(configStore);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private document: unknown = null;
  private saves = 0;

  async loadDocument(): Promise<unknown> {
    return structuredClone(this.document);
  }

  async saveConfig(config: TaskdeckConfig): Promise<void> {
    this.document = structuredClone(config);
    this.saves += 1;
  }

  // ==================== Test Helper Methods ====================

  /** Sets the raw document, valid or not. */
  setDocument(document: unknown): void {
    this.document = document;
  }

  getDocument(): unknown {
    return this.document;
  }

  getSaveCount(): number {
    return this.saves;
  }

  clear(): void {
    this.document = null;
    this.saves = 0;
  }
}
