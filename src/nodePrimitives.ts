/**
 * Lightweight representation of an errno-flavoured error. Only the properties
 * inspected across the summarizer are listed.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown thrown value to an {@link ErrnoException}. */
export function isErrnoException(error: unknown): error is ErrnoException {
  return error instanceof Error && "code" in error;
}

/** Returns true when the thrown value is an errno error carrying `code`. */
export function hasErrnoCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}
