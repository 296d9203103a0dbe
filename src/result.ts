// Tagged success/failure values, for code paths where a failure is an
// expected outcome rather than a bug.

export type Ok<T> = { readonly type: "ok"; readonly value: T };
export type Err<E> = { readonly type: "err"; readonly error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ type: "ok", value });
export const err = <E>(error: E): Err<E> => ({ type: "err", error });

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.type === "ok";
export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => r.type === "err";

export const map = <A, B, E>(r: Result<A, E>, f: (a: A) => B): Result<B, E> =>
  isOk(r) ? ok(f(r.value)) : r;

export const andThen = <A, B, E>(
  r: Result<A, E>,
  f: (a: A) => Result<B, E>
): Result<B, E> => (isOk(r) ? f(r.value) : r);
