import * as fs from "fs/promises";
import * as path from "path";
import { randomBytes } from "crypto";
import { StoreIOError } from "../record_store.errors";
import { hasErrorCode, errorMessage } from "../../utils/fs_errors";
import type { Logger } from "../../logger";

export interface FileStats {
  mtimeMs: number;
  size: number;
  isFile(): boolean;
}

/**
 * The file-system calls the store makes. Injected so tests can make a
 * single call fail.
 */
export interface StoreFileSystem {
  readFile(filePath: string, encoding: "utf-8"): Promise<string>;
  writeFile(filePath: string, data: string, encoding: "utf-8"): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(filePath: string): Promise<void>;
  mkdir(dirPath: string, options: { recursive: true }): Promise<string | undefined>;
  readdir(dirPath: string): Promise<string[]>;
  stat(filePath: string): Promise<FileStats>;
}

export const nodeFileSystem: StoreFileSystem = {
  readFile: (filePath, encoding) => fs.readFile(filePath, encoding),
  writeFile: (filePath, data, encoding) => fs.writeFile(filePath, data, encoding),
  rename: (from, to) => fs.rename(from, to),
  unlink: (filePath) => fs.unlink(filePath),
  mkdir: (dirPath, options) => fs.mkdir(dirPath, options),
  readdir: (dirPath) => fs.readdir(dirPath),
  stat: (filePath) => fs.stat(filePath),
};

export const TEMP_FILE_SUFFIX = ".tmp";

export function isTempFileName(fileName: string): boolean {
  return fileName.startsWith(".") && fileName.endsWith(TEMP_FILE_SUFFIX);
}

/**
 * Writes `content` to a hidden temporary file in the target directory,
 * then renames it over `filePath`. Readers see the old file or the new
 * one, never a partial write. On failure the temporary file is removed
 * and a StoreIOError is thrown.
 */
export async function writeFileAtomic(
  fileSystem: StoreFileSystem,
  filePath: string,
  content: string,
  logger?: Logger,
): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(4).toString("hex")}${TEMP_FILE_SUFFIX}`,
  );

  try {
    await fileSystem.mkdir(dir, { recursive: true });
    await fileSystem.writeFile(tempPath, content, "utf-8");
    await fileSystem.rename(tempPath, filePath);
  } catch (error) {
    await removeIfPresent(fileSystem, tempPath, logger);
    throw new StoreIOError(filePath, error);
  }
}

async function removeIfPresent(
  fileSystem: StoreFileSystem,
  filePath: string,
  logger?: Logger,
): Promise<void> {
  try {
    await fileSystem.unlink(filePath);
  } catch (error) {
    if (!hasErrorCode(error, "ENOENT")) {
      logger?.warn(`Could not remove temporary file ${filePath}: ${errorMessage(error)}`);
    }
  }
}
