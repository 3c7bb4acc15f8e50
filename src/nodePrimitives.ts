/**
 * Errno-flavoured error raised by the Node.js filesystem and network APIs.
 * Only the properties inspected by the service are declared.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown failure to an {@link ErrnoException} carrying a `code`. */
export function isErrnoException(error: unknown): error is ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/** True when {@link error} reports a missing file or directory. */
export function isMissingPath(error: unknown): boolean {
  return isErrnoException(error) && error.code === "ENOENT";
}
