/**
 * Runs a synchronous decode and maps a thrown error to `undefined`.
 * Used for optional query-content parameters.
 */
export function attempt<T>(operation: () => T): T | undefined {
  try {
    return operation();
  } catch {
    return undefined;
  }
}
