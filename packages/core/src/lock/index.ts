export type { ILockManager, LockHandle, LockInfo } from "./lock";
export { LockContentionError } from "./lock.errors";
