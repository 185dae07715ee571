import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { randomUUID } from "crypto";
import { LockContentionError } from "../lock.errors";
import { hasErrorCode, errorMessage } from "../../utils/fs_errors";
import { sleep } from "../../utils/sleep";
import { createLogger } from "../../logger";
import type { Logger } from "../../logger";
import type { ILockManager, LockHandle, LockInfo } from "../lock";

export const DEFAULT_LOCK_TIMEOUT_MS = 5_000;
export const DEFAULT_LOCK_STALE_MS = 60_000;
export const DEFAULT_LOCK_POLL_MS = 50;

export interface FsLockManagerOptions {
  lockPath: string;
  /** Default wait for acquire(). */
  timeoutMs?: number;
  /** Age after which a lock is treated as abandoned. */
  staleMs?: number;
  pollIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Side-file next to the data directory: `<dataDir>.lock`. Outside the
 * directory so version control never stages it.
 */
export function defaultLockPath(dataDir: string): string {
  return `${path.resolve(dataDir)}.lock`;
}

function isLockInfo(value: unknown): value is LockInfo {
  if (typeof value !== "object" || value === null) return false;
  return (
    "holder" in value && typeof value.holder === "string" &&
    "pid" in value && typeof value.pid === "number" &&
    "hostname" in value && typeof value.hostname === "string" &&
    "acquiredAt" in value && typeof value.acquiredAt === "string"
  );
}

/**
 * FsLockManager - exclusive-create lock file with staleness reclaim.
 *
 * Every acquire gets its own holder id, so two callers in the same
 * process exclude each other just like two processes do.
 */
export class FsLockManager implements ILockManager {
  private readonly lockPath: string;
  private readonly timeoutMs: number;
  private readonly staleMs: number;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: FsLockManagerOptions) {
    this.lockPath = options.lockPath;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.staleMs = options.staleMs ?? DEFAULT_LOCK_STALE_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_LOCK_POLL_MS;
    this.logger = options.logger ?? createLogger("[Lock] ");
    this.now = options.now ?? Date.now;
  }

  getLockPath(): string {
    return this.lockPath;
  }

  async acquire(timeoutMs: number = this.timeoutMs): Promise<LockHandle> {
    const deadline = this.now() + timeoutMs;
    const info: LockInfo = {
      holder: `${os.hostname()}:${process.pid}:${randomUUID()}`,
      pid: process.pid,
      hostname: os.hostname(),
      acquiredAt: new Date(this.now()).toISOString(),
    };

    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

    for (;;) {
      if (await this.tryCreate(info)) {
        this.logger.debug(`Acquired ${this.lockPath}`);
        return { holder: info.holder, lockPath: this.lockPath, acquiredAt: info.acquiredAt };
      }

      if (await this.reclaimIfStale()) continue;

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        const current = await this.inspect();
        throw new LockContentionError(this.lockPath, current?.holder ?? "unknown", timeoutMs);
      }
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }
  }

  async release(handle: LockHandle): Promise<boolean> {
    const current = await this.inspect();
    if (!current) {
      this.logger.warn(`Release of ${this.lockPath}: lock already gone`);
      return false;
    }
    if (current.holder !== handle.holder) {
      this.logger.warn(`Release of ${this.lockPath}: now held by ${current.holder}, leaving it`);
      return false;
    }
    try {
      await fs.unlink(this.lockPath);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return false;
      throw error;
    }
    this.logger.debug(`Released ${this.lockPath}`);
    return true;
  }

  async withLock<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const handle = await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      await this.release(handle);
    }
  }

  async inspect(): Promise<LockInfo | null> {
    let content: string;
    try {
      content = await fs.readFile(this.lockPath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return null;
      throw error;
    }
    return parseLockInfo(content);
  }

  private async tryCreate(info: LockInfo): Promise<boolean> {
    try {
      await fs.writeFile(this.lockPath, JSON.stringify(info), { encoding: "utf-8", flag: "wx" });
      return true;
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) return false;
      throw error;
    }
  }

  /**
   * Moves an abandoned lock aside. Returns true when the caller should
   * retry the create right away (lock reclaimed, or already gone).
   */
  private async reclaimIfStale(): Promise<boolean> {
    let content: string;
    let mtimeMs: number;
    try {
      content = await fs.readFile(this.lockPath, "utf-8");
      mtimeMs = (await fs.stat(this.lockPath)).mtimeMs;
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return true;
      throw error;
    }

    const info = parseLockInfo(content);
    const acquiredAt = info ? Date.parse(info.acquiredAt) : mtimeMs;
    const age = this.now() - (Number.isNaN(acquiredAt) ? mtimeMs : acquiredAt);
    if (age < this.staleMs) return false;

    const aside = `${this.lockPath}.stale.${randomUUID()}`;
    try {
      await fs.rename(this.lockPath, aside);
    } catch (error) {
      // Another process reclaimed it first.
      if (hasErrorCode(error, "ENOENT")) return true;
      throw error;
    }

    // Between our read and the rename the file may have been replaced by a fresh lock.
    const moved = parseLockInfo(await fs.readFile(aside, "utf-8"));
    if (info && moved && moved.holder !== info.holder) {
      await this.restore(aside);
      return false;
    }

    await fs.unlink(aside);
    this.logger.warn(
      `Reclaimed stale lock ${this.lockPath} held by ${info?.holder ?? "unknown"} (age ${Math.round(age / 1000)}s)`,
    );
    return true;
  }

  private async restore(aside: string): Promise<void> {
    try {
      await fs.link(aside, this.lockPath);
    } catch (error) {
      this.logger.warn(`Could not restore lock moved aside by mistake: ${errorMessage(error)}`);
    }
    await fs.unlink(aside);
  }
}

function parseLockInfo(content: string): LockInfo | null {
  try {
    const parsed: unknown = JSON.parse(content);
    return isLockInfo(parsed) ? parsed : null;
  } catch (error) {
    if (error instanceof SyntaxError) return null;
    throw error;
  }
}
