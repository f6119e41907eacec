/**
 * insurance-ledger.ts
 *
 * Per-account coverage that tracks staked amounts while insurance is
 * enabled. While disabled, coverage is frozen in both directions, and
 * toggling the flag never rewrites existing entries.
 */

import type { PoolState, Principal, Result } from "@stakeline/types";
import { checkedAdd } from "./safe-math";
import type { Overflow } from "./safe-math";
import { ok } from "./result";
import { readUint } from "./store";
import type { KeyValueMap } from "./store";

export type CoverageMap = KeyValueMap<Principal, bigint>;

export function coverageOf(coverage: CoverageMap, account: Principal): bigint {
  return readUint(coverage, account);
}

/** Returns the account's coverage after the stake. */
export function provisionOnStake(
  coverage: CoverageMap,
  enabled: boolean,
  account: Principal,
  amount: bigint
): Result<bigint, Overflow> {
  const current = coverageOf(coverage, account);
  if (!enabled) return ok(current);

  const next = checkedAdd(current, amount);
  if (next.ok) coverage.set(account, next.value);
  return next;
}

/** Reduces coverage by the unstaked amount, floored at zero. */
export function reduceOnUnstake(
  coverage: CoverageMap,
  enabled: boolean,
  account: Principal,
  amount: bigint
): bigint {
  const current = coverageOf(coverage, account);
  if (!enabled) return current;

  const next = current > amount ? current - amount : 0n;
  coverage.set(account, next);
  return next;
}

/** Add to the insurance fund register. */
export function fundInsurance(pool: PoolState, amount: bigint): Result<bigint, Overflow> {
  const balance = checkedAdd(pool.insuranceFundBalance, amount);
  if (balance.ok) pool.insuranceFundBalance = balance.value;
  return balance;
}
