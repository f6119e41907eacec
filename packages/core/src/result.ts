import type { Ok, Err, Some, None } from "@stakeline/types";

export function ok(): Ok<void>;
export function ok<T>(value: T): Ok<T>;
export function ok<T>(value?: T): Ok<T | undefined> {
  return { ok: true, value };
}

export function err<E extends string>(error: E): Err<E> {
  return { ok: false, error };
}

export function some<T>(value: T): Some<T> {
  return { kind: "some", value };
}

export const none: None = { kind: "none" };
