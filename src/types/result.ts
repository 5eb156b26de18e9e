/**
 * Result Type for Functional Error Handling
 *
 * Used where a failure is an expected outcome of untrusted input
 * (completion payloads, unreadable source files) rather than a fault.
 *
 * @module
 */

// =============================================================================
// Result Type Definition
// =============================================================================

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// =============================================================================
// Constructors
// =============================================================================

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// =============================================================================
// Combinators
// =============================================================================

/**
 * Wraps a promise so a rejection becomes an Err carrying the mapped error
 */
export async function fromPromiseWith<T, E>(
  promise: Promise<T>,
  mapError: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return ok(await promise);
  } catch (error) {
    return err(mapError(error));
  }
}

/**
 * Partitions an array of Results into Ok values and Err values
 */
export function partition<T, E>(results: Result<T, E>[]): { oks: T[]; errs: E[] } {
  const oks: T[] = [];
  const errs: E[] = [];
  for (const result of results) {
    if (result.ok) {
      oks.push(result.value);
    } else {
      errs.push(result.error);
    }
  }
  return { oks, errs };
}
