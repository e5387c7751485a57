/**
 * Result type for composable error handling.
 *
 * Represents either success (Ok) or failure (Err). CLI commands return a
 * Result so the entry point decides how failures are printed and which exit
 * code they map to.
 *
 * @example
 * ```typescript
 * const result = await runAuditLogCommand(deps)
 *
 * if (!result.ok) {
 *   process.exitCode = result.error.exitCode
 *   return
 * }
 *
 * console.log(result.value.lines.join("\n"))
 * ```
 */

/**
 * Result type - represents either success or failure.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Create a success result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
})

/**
 * Create a failure result.
 */
export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
})

/**
 * Transform the success value.
 * Error passes through unchanged.
 */
export function map<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> {
  return result.ok ? Ok(fn(result.value)) : result
}

/**
 * Wrap an async operation that might throw, mapping the thrown value.
 */
export async function tryCatchWith<T, E>(
  fn: () => Promise<T>,
  mapError: (e: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await fn())
  } catch (e) {
    return Err(mapError(e))
  }
}
