/**
 * Result tuples for fallible calls, used in place of try/catch
 */

export type Safe<T, E extends Error | string = Error> =
  | SafeError<E>
  | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error | string> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

export function isSafeResult<T, E extends Error | string>(
  safe: Safe<T, E>,
): safe is SafeResult<T> {
  return safe[0] === undefined
}

/**
 * Unwrap a Safe tuple, throwing its error
 */
export function assertSafe<T, E extends Error | string>(safe: Safe<T, E>): T {
  if (isSafeResult(safe)) {
    return safe[1]
  }
  const error = safe[0]
  throw typeof error === 'string' ? new Error(error) : error
}
