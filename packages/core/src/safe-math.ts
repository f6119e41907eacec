/**
 * Overflow-checked u64 arithmetic.
 *
 * Values are bigints constrained to 0..=U64_MAX. Overflow is reported,
 * never wrapped. Division is plain bigint division, which truncates
 * toward zero; yield math relies on that rounding.
 */

import type { Result } from "@stakeline/types";
import { U64_MAX } from "./constants";
import { ok, err } from "./result";

export type Overflow = "Overflow";

/** True when `value` fits in an unsigned 64-bit integer. */
export function isU64(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

export function checkedAdd(a: bigint, b: bigint): Result<bigint, Overflow> {
  const sum = a + b;
  return isU64(sum) ? ok(sum) : err("Overflow");
}

export function checkedMultiply(a: bigint, b: bigint): Result<bigint, Overflow> {
  const product = a * b;
  return isU64(product) ? ok(product) : err("Overflow");
}
