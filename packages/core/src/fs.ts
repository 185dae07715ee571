/**
 * Filesystem and git bound implementations.
 *
 * Use @taskdeck/core/memory for the in-memory stand-ins.
 */

// Store
export { FsRecordStore, RECORD_EXTENSION, ARCHIVE_DIR } from './record_store/fs/fs_record_store';
export type { FsRecordStoreOptions } from './record_store/fs/fs_record_store';

// Lock
export { FsLockManager, defaultLockPath } from './lock/fs/fs_lock_manager';
export type { FsLockManagerOptions } from './lock/fs/fs_lock_manager';

// Git (CLI-based, uses execCommand for git operations)
export { LocalGitModule, createExecCommand } from './git';

// Config
export { FsConfigStore, CONFIG_FILE_NAME } from './config_store/fs/fs_config_store';

// Watcher
export { FsStoreWatcher } from './store_watcher/fs/fs_store_watcher';

// Data directory resolution and the wired-up context
export { ensureDataDir } from './utils/data_dir';
export { createFsContext } from './context';
