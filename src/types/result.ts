/**
 * Result Type for Functional Error Handling
 *
 * Expected failures (a missing entity, an unavailable source) travel as values
 * instead of exceptions.
 *
 * @module
 */

// =============================================================================
// Result Type Definition
// =============================================================================

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing a value
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// =============================================================================
// Unwrapping
// =============================================================================

/**
 * Extracts the value from a Result, returning a default if it's an error
 */
export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.ok ? result.value : defaultValue;
}

// =============================================================================
// Promise Utilities
// =============================================================================

/**
 * Converts a settled promise into a Result
 */
export function fromSettled<T>(settled: PromiseSettledResult<T>): Result<T, Error> {
  if (settled.status === "fulfilled") {
    return ok(settled.value);
  }
  const reason: unknown = settled.reason;
  return err(reason instanceof Error ? reason : new Error(String(reason)));
}
