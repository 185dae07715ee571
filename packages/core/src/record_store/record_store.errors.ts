import { TaskdeckError } from "../validation/errors";

/**
 * A file-system failure while writing a record. The write is abandoned
 * and the previous version of the file is left in place.
 */
export class StoreIOError extends TaskdeckError {
  public readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${filePath}: ${reason}`, "IO_ERROR");
    this.name = "StoreIOError";
    this.filePath = filePath;
    this.cause = cause;
    Object.setPrototypeOf(this, StoreIOError.prototype);
  }
}
