/**
 * Result type for explicit error handling.
 * Backends and decoders return failures as values; nothing throws across
 * module boundaries.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Create a success result.
 */
export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

/**
 * Create an error result.
 */
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Normalize anything thrown into an Error.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}

/**
 * Run a function and capture a thrown exception as an Err.
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return ok(fn());
  } catch (e) {
    return err(toError(e));
  }
}

/**
 * Async variant of {@link tryCatch}: a rejected promise becomes an Err.
 */
export async function tryCatchAsync<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return ok(await fn());
  } catch (e) {
    return err(toError(e));
  }
}
