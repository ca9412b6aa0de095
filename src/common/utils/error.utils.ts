/**
 * Error Utilities
 */

/**
 * Structural check: errors raised by Node internals may come from another realm
 * (e.g. under Jest), so `instanceof Error` is not reliable for them.
 */
export function isErrorLike(error: unknown): error is Error {
  return (
    error instanceof Error ||
    (typeof error === "object" &&
      error !== null &&
      "message" in error &&
      typeof error.message === "string" &&
      "name" in error &&
      typeof error.name === "string")
  );
}

export function errorMessage(error: unknown): string {
  if (isErrorLike(error)) {
    return error.message;
  }
  return typeof error === "string" ? error : JSON.stringify(error);
}

export function isNodeErrorWithCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

export function toError(error: unknown): Error {
  return isErrorLike(error) ? error : new Error(errorMessage(error));
}
