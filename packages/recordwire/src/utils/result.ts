/**
 * Result type for error handling without exceptions.
 * Use where one failure should not abort a batch.
 */
export type Result<T, E = Error> =
  | Readonly<{ success: true; data: T }>
  | Readonly<{ success: false; error: E }>;

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Type guard to check if result is successful.
 */
export function isOk<T, E>(
  result: Result<T, E>,
): result is Readonly<{ success: true; data: T }> {
  return result.success;
}
