/**
 * QKD Telemetry - Result Type
 *
 * A discriminated union type for representing success or failure,
 * used where a missing or malformed input is expected and reportable.
 */

// ============================================
// RESULT TYPE
// ============================================

/** Successful result */
export interface Ok<T> {
  ok: true;
  value: T;
}

/** Failed result */
export interface Err<E> {
  ok: false;
  error: E;
}

/** Discriminated union of success or failure */
export type Result<T, E> = Ok<T> | Err<E>;

// ============================================
// CONSTRUCTORS
// ============================================

/** Create a successful result */
export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/** Create a failed result */
export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================
// UTILITY FUNCTIONS
// ============================================

/** Try to execute a function, mapping any thrown error */
export function tryCatch<T, E>(
  fn: () => T,
  errorMapper: (e: unknown) => E
): Result<T, E> {
  try {
    return ok(fn());
  } catch (e) {
    return err(errorMapper(e));
  }
}

/** Message of an unknown thrown value */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
