/**
 * True when `error` is a Node.js system error with the given code
 * (ENOENT, EEXIST, ...).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
