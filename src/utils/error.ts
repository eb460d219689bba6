/**
 * Extract error message from unknown error type.
 * Common pattern for catch blocks.
 */
export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);

/** Type guard for NodeJS.ErrnoException */
export function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/** Numeric `status` / `statusCode` carried by HTTP-ish errors from fetch wrappers and SDKs. */
export function errorStatus(e: unknown): number | undefined {
  if (typeof e !== "object" || e === null) return undefined;
  const status = "status" in e ? e.status : "statusCode" in e ? e.statusCode : undefined;
  return typeof status === "number" ? status : undefined;
}
