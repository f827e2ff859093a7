/**
 * Result type: either success (ok) or failure, without throwing.
 * Used where a failure must be remembered (memoized scans) rather than rethrown.
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Settle a promise into a Result
 */
export async function settle<T, E>(promise: Promise<T>, mapError: (error: unknown) => E): Promise<Result<T, E>> {
  try {
    return Ok(await promise);
  } catch (error) {
    return Err(mapError(error));
  }
}
