/**
 * Result type for operations that can succeed or fail
 * Shared across modules and returned by every public operation
 */
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };
