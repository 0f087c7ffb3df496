/**
 * Result type for composable error handling.
 *
 * Represents either success (Ok) or failure (Err).
 * Used where a failure should be recorded and skipped rather than thrown,
 * such as per-candidate checklist filtering and checklist source loading.
 *
 * @example
 * ```typescript
 * const result = await tryCatch(() => fetchBinary(url))
 *
 * if (!result.ok) {
 *   console.warn("[Checklist] Skipping source", { url, error: result.error.message })
 *   return
 * }
 *
 * use(result.value)
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
 * Wrap an async operation that might throw.
 */
export async function tryCatch<T>(
  fn: () => Promise<T>
): Promise<Result<T, Error>> {
  try {
    return Ok(await fn())
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)))
  }
}
