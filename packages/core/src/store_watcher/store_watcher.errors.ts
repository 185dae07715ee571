import { TaskdeckError } from "../validation/errors";

/**
 * Thrown by start() when the data directory does not exist.
 */
export class DataDirNotFoundError extends TaskdeckError {
  public readonly dataDir: string;

  constructor(dataDir: string) {
    super(`Data directory not found: ${dataDir}`, "IO_ERROR");
    this.name = "DataDirNotFoundError";
    this.dataDir = dataDir;
    Object.setPrototypeOf(this, DataDirNotFoundError.prototype);
  }
}
