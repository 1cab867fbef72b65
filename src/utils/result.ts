/**
 * Outcome of a single item in a pipeline stage. Failures carry a reason
 * instead of being thrown so that callers can count them.
 */
export type Result<T, R> =
  | { success: true; value: T }
  | { success: false; reason: R };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function fail<R>(reason: R): { success: false; reason: R } {
  return { success: false, reason };
}
