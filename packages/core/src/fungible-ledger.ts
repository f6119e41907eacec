/**
 * fungible-ledger.ts
 *
 * The receipt token: total supply and per-account balances.
 * Mint and burn move both sides together; transfer moves value between
 * two balances. Either way totalSupply == sum(balances).
 */

import type { Principal, Result } from "@stakeline/types";
import { checkedAdd } from "./safe-math";
import { ok, err } from "./result";
import { readUint } from "./store";
import type { LedgerState } from "./store";

export type LedgerError = "Overflow" | "InsufficientBalance";

export function balanceOf(ledger: LedgerState, account: Principal): bigint {
  return readUint(ledger.balances, account);
}

export function totalSupply(ledger: LedgerState): bigint {
  return ledger.totalSupply;
}

export function mint(
  ledger: LedgerState,
  account: Principal,
  amount: bigint
): Result<void, LedgerError> {
  const balance = checkedAdd(balanceOf(ledger, account), amount);
  if (!balance.ok) return balance;
  const supply = checkedAdd(ledger.totalSupply, amount);
  if (!supply.ok) return supply;

  ledger.balances.set(account, balance.value);
  ledger.totalSupply = supply.value;
  return ok();
}

export function burn(
  ledger: LedgerState,
  account: Principal,
  amount: bigint
): Result<void, LedgerError> {
  const balance = balanceOf(ledger, account);
  if (balance < amount) return err("InsufficientBalance");

  ledger.balances.set(account, balance - amount);
  ledger.totalSupply -= amount;
  return ok();
}

/** Self-transfers are rejected by the caller; here they leave balances as they are. */
export function transfer(
  ledger: LedgerState,
  from: Principal,
  to: Principal,
  amount: bigint
): Result<void, LedgerError> {
  const fromBalance = balanceOf(ledger, from);
  if (fromBalance < amount) return err("InsufficientBalance");
  if (from === to) return ok();

  const toBalance = checkedAdd(balanceOf(ledger, to), amount);
  if (!toBalance.ok) return toBalance;

  ledger.balances.set(from, fromBalance - amount);
  ledger.balances.set(to, toBalance.value);
  return ok();
}
