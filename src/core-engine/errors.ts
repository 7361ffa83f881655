/**
 * Message of a caught value, whether or not it is an Error.
 */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
