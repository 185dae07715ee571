import { promises as fs, constants } from "fs";
import * as path from "path";
import { DataDirNotFoundError } from "../store_watcher/store_watcher.errors";

export const DEFAULT_DATA_DIR = "./tasks";
export const DATA_DIR_ENV = "TASKDECK_DATA_DIR";

/**
 * Absolute data directory: explicit option, then TASKDECK_DATA_DIR, then ./tasks.
 */
export function resolveDataDir(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const chosen = explicit?.trim() || env[DATA_DIR_ENV]?.trim() || DEFAULT_DATA_DIR;
  return path.resolve(cwd, chosen);
}

/**
 * Creates the directory when missing and checks it is readable and
 * writable. @throws DataDirNotFoundError otherwise
 */
export async function ensureDataDir(dataDir: string): Promise<string> {
  try {
    await fs.mkdir(dataDir, { recursive: true });
    const stats = await fs.stat(dataDir);
    if (!stats.isDirectory()) {
      throw new DataDirNotFoundError(dataDir);
    }
    await fs.access(dataDir, constants.R_OK | constants.W_OK);
  } catch (error) {
    if (error instanceof DataDirNotFoundError) throw error;
    throw new DataDirNotFoundError(dataDir);
  }
  return dataDir;
}
