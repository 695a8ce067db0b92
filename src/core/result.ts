/**
 * result.ts: A minimal success/failure union for recoverable outcomes.
 *
 * Fatal conditions still throw.  Outcomes a caller is expected to branch on
 * (element not rendered yet, a card missing a field, a rejected login) come
 * back as a `Result` so the branch is visible in the types.
 */

export type Result<T, E> = Ok<T> | Err<E>;

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
