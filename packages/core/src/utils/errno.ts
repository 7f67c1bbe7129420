/**
 * Get the `code` of a Node.js system error (ENOENT, EEXIST, ...)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
