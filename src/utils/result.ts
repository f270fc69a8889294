/**
 * Outcome of an operation whose failure is an expected business result
 * rather than a fault. `error` is always safe to show to the caller.
 */
export type Ok<T> = { success: true; value: T };
export type Fail = { success: false; error: string };
export type Result<T = void> = Ok<T> | Fail;

export function ok(): Ok<void>;
export function ok<T>(value: T): Ok<T>;
export function ok<T>(value?: T): Ok<T | undefined> {
  return { success: true, value };
}

export const fail = (error: string): Fail => ({ success: false, error });
