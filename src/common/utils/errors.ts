/**
 * Extract a string message from an unknown error value
 * Handles Error objects and other thrown values consistently
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Collect every `code` found on an error, its `cause` chain and any
 * AggregateError members. Node's fetch wraps socket failures
 * (`TypeError: fetch failed` → cause `ECONNREFUSED`), and dual-stack connects
 * report one error per attempted address.
 */
export function collectErrorCodes(error: unknown, depth = 0): string[] {
  if (depth > 5 || !error || typeof error !== "object") {
    return [];
  }

  const codes: string[] = [];
  if ("code" in error && typeof error.code === "string") {
    codes.push(error.code);
  }
  if ("cause" in error) {
    codes.push(...collectErrorCodes(error.cause, depth + 1));
  }
  if (error instanceof AggregateError) {
    for (const inner of error.errors) {
      codes.push(...collectErrorCodes(inner, depth + 1));
    }
  }
  return codes;
}
