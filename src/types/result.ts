/**
 * Result type for panic-free error handling
 * Represents either a successful value (ok) or an error
 */
export type Result<T, E = Error> = { ok: true; data: T } | { ok: false; error: E };

/**
 * Creates a successful Result
 * @param data - The success value
 * @returns Result with ok: true
 */
export function ok<T>(data: T): Result<T, never> {
  return { ok: true, data };
}

/**
 * Creates an error Result
 * @param error - The error value (string, Error, or custom type)
 * @returns Result with ok: false
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
