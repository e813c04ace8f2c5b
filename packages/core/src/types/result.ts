/**
 * Result Type
 *
 * Discriminated union representing either success (Ok) or failure (Err).
 * Used where a failure is an expected outcome that the caller must handle,
 * such as an audit record that cannot be parsed.
 *
 * @example
 * ```ts
 * const result = parseAuditLogEntry(entry, options);
 * if (result.isOk) {
 *   yield result.value;
 * } else {
 *   report.reportRecordFailure(result.error.sourceId, result.error.message);
 * }
 * ```
 *
 * @module types/result
 */

// ============================================================================
// RESULT TYPE DEFINITION
// ============================================================================

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Success variant of Result
 */
export interface Ok<T> {
  readonly _tag: 'Ok';
  readonly isOk: true;
  readonly isErr: false;
  readonly value: T;
}

/**
 * Failure variant of Result
 */
export interface Err<E> {
  readonly _tag: 'Err';
  readonly isOk: false;
  readonly isErr: true;
  readonly error: E;
}

// ============================================================================
// CONSTRUCTOR FUNCTIONS
// ============================================================================

/**
 * Create a success Result
 */
export function Ok<T>(value: T): Ok<T> {
  return { _tag: 'Ok', isOk: true, isErr: false, value };
}

/**
 * Create a failure Result
 */
export function Err<E>(error: E): Err<E> {
  return { _tag: 'Err', isOk: false, isErr: true, error };
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === 'Err';
}
