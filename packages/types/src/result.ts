// Response and optional shapes, mirroring Clarity's (ok …)/(err …)
// and (some …)/none.

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export interface Some<T> {
  readonly kind: "some";
  readonly value: T;
}

export interface None {
  readonly kind: "none";
}

export type Optional<T> = Some<T> | None;
