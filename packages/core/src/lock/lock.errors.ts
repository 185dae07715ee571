import { TaskdeckError } from "../validation/errors";

/**
 * The lock was held by someone else for the whole timeout.
 * The operation did not run; callers may retry.
 */
export class LockContentionError extends TaskdeckError {
  public readonly lockPath: string;
  public readonly holder: string;
  public readonly timeoutMs: number;

  constructor(lockPath: string, holder: string, timeoutMs: number) {
    super(`Lock ${lockPath} is held by ${holder}; gave up after ${timeoutMs}ms`, "LOCK_CONTENTION");
    this.name = "LockContentionError";
    this.lockPath = lockPath;
    this.holder = holder;
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, LockContentionError.prototype);
  }
}
