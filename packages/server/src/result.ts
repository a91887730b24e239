import type { AuthFailure } from './errors/auth-failure.js';

/**
 * Outcome of a session operation
 *
 * Expected failures (wrong password, expired token, locked challenge)
 * travel as values. Only infrastructure faults throw.
 */
export type Result<T, E = AuthFailure> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}
