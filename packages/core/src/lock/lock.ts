/** Contents of the lock side-file. */
export interface LockInfo {
  holder: string;
  pid: number;
  hostname: string;
  acquiredAt: string;
}

/** Proof of ownership returned by acquire; pass it back to release. */
export interface LockHandle {
  holder: string;
  lockPath: string;
  acquiredAt: string;
}

/**
 * ILockManager - advisory lock shared by every process that writes to
 * one data directory.
 */
export interface ILockManager {
  /**
   * Creates the lock exclusively, reclaiming it when the current one is
   * older than the staleness threshold. Polls until `timeoutMs`, then
   * throws LockContentionError.
   */
  acquire(timeoutMs?: number): Promise<LockHandle>;

  /** Removes the lock if `handle` still owns it. Returns whether it did. */
  release(handle: LockHandle): Promise<boolean>;

  /** Runs `fn` holding the lock and releases it on every exit path. */
  withLock<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T>;

  /** Current lock contents, or null when unlocked. */
  inspect(): Promise<LockInfo | null>;
}
