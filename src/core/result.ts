// Minimal Result runtime with helpers.
// Parse and runtime failures travel up the call chain as Err values; each
// tier checks for them at exactly one boundary.

export type Ok<T> = { t: "ok"; v: T };
export type Err<E> = { t: "err"; e: E };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(v: T): Ok<T> => ({ t: "ok", v });
export const err = <E>(e: E): Err<E> => ({ t: "err", e });

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.t === "ok";
export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => r.t === "err";

export const map = <A, B, E>(r: Result<A, E>, f: (a: A) => B): Result<B, E> =>
  isOk(r) ? ok(f(r.v)) : r;

export const andThen = <A, B, E>(r: Result<A, E>, f: (a: A) => Result<B, E>): Result<B, E> =>
  isOk(r) ? f(r.v) : r;
