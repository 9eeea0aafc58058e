/**
 * Internal result type for safeTry
 */
export type SafeResult<T, E = unknown> =
  | { isOk: true; value: T; isErr: false; error: null }
  | { isOk: false; value: null; isErr: true; error: E };

/**
 * Runs a sync or async function and captures its outcome as a result object,
 * so the client layer reports failures without throwing.
 *
 * @example
 * const { isErr, value, error } = await safeTry(() => builder.finish());
 */
export async function safeTry<T>(
  fn: () => T | Promise<T>
): Promise<SafeResult<T>> {
  try {
    const value = await fn();
    return { isOk: true, value, isErr: false, error: null };
  } catch (error) {
    return { isOk: false, value: null, isErr: true, error };
  }
}
