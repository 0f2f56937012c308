/**
 * @module types/result
 * @description Discriminated success/failure value returned by every
 * native-tier operation. Expected failures never throw.
 */

import type { SecurityError } from "./errors.js";
import { SecurityServiceError } from "./errors.js";

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = SecurityError> = Ok<T> | Err<E>;

/** Promise of a Result; the return type of every remote operation. */
export type AsyncResult<T> = Promise<Result<T>>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/** Transform the success value, passing failures through untouched. */
export function mapResult<T, U, E>(
  result: Result<T, E>,
  transform: (value: T) => U
): Result<U, E> {
  return result.ok ? ok(transform(result.value)) : result;
}

/** Chain a dependent operation onto a success value. */
export async function andThen<T, U, E>(
  result: Result<T, E>,
  next: (value: T) => Promise<Result<U, E>>
): Promise<Result<U, E>> {
  return result.ok ? next(result.value) : result;
}

/**
 * Return the success value or throw a SecurityServiceError.
 *
 * @throws {SecurityServiceError} when the result is a failure.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new SecurityServiceError(result.error);
  }
  return result.value;
}
