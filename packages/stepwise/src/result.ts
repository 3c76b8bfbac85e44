/**
 * stepwise/result (internal)
 *
 * Settled-outcome primitives. A future stores its outcome as a Result so the
 * awaiter can inspect it without touching a native promise.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful outcome.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed outcome.
 * Use `err(error)` to create instances.
 */
export type Err<E> = { ok: false; error: E };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown> = Ok<T> | Err<E>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

// =============================================================================
// Type Guards
// =============================================================================

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;

export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

/**
 * Returns the value of an Ok result, or throws the error of an Err result
 * exactly as it was stored.
 */
export function unwrap<T, E>(r: Result<T, E>): T {
  if (r.ok) {
    return r.value;
  }
  throw r.error;
}
