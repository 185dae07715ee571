/**
 * In-memory implementations (no filesystem or git required).
 * Used by tests and by embedders that supply their own persistence.
 */

export { MemoryGitModule } from './git';
export type { InjectedFailure, MemoryCommit } from './git';

export { MemoryConfigStore } from './config_store/memory/memory_config_store';
