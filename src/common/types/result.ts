// Result type for operations that report failure as a value instead of throwing
export type Result<T, E = string> = { success: true; data: T } | { success: false; error: E };

export function Ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function Err<E>(error: E): Result<never, E> {
  return { success: false, error };
}
