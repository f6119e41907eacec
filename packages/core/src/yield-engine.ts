/**
 * yield-engine.ts
 *
 * Time-based yield at an owner-set rate.
 *
 *   timeFactor = elapsedBlocks / 144            (whole days only)
 *   yield      = principal * rate * timeFactor / 10000
 *
 * Every division truncates, so rounding always favours the pool.
 *
 * Distributions advance the pool's yield clock (`lastDistributionHeight`),
 * append to the history, and add the distributed amount per staked unit
 * to `yieldIndex`. A staker earns its balance times the index growth since
 * its snapshot. Before any balance change the account is settled: yield
 * earned so far moves into `pendingRewards` and the snapshot moves to the
 * current index, so a balance only earns from distributions it was held for.
 */

import type { DistributionRecord, PoolState, Principal, Result } from "@stakeline/types";
import { BLOCKS_PER_DAY, BPS_DENOMINATOR, YIELD_INDEX_PRECISION } from "./constants";
import { checkedAdd, checkedMultiply, isU64 } from "./safe-math";
import type { Overflow } from "./safe-math";
import { ok, err } from "./result";
import { readUint } from "./store";
import type { KeyValueMap, LedgerState, RewardBook } from "./store";
import { balanceOf, mint } from "./fungible-ledger";
import { logger as defaultLogger } from "./logger";
import type { Logger } from "./logger";

// -----------------------------------------------------------------------
// Yield formula
// -----------------------------------------------------------------------

/**
 * Yield on `principal` over `elapsedBlocks` at `rateBasisPoints`.
 * Overflow degrades to 0 instead of failing the caller.
 */
export function computeYield(
  principal: bigint,
  elapsedBlocks: bigint,
  rateBasisPoints: bigint,
  log: Logger = defaultLogger
): bigint {
  const timeFactor = elapsedBlocks / BLOCKS_PER_DAY;
  if (timeFactor <= 0n) return 0n;

  const baseYield = checkedMultiply(principal, rateBasisPoints);
  if (!baseYield.ok) {
    log.debug(`computeYield: ${principal} * ${rateBasisPoints} overflows u64, yielding 0`);
    return 0n;
  }

  const result = (baseYield.value * timeFactor) / BPS_DENOMINATOR;
  if (!isU64(result)) {
    log.debug(`computeYield: result over ${timeFactor} days overflows u64, yielding 0`);
    return 0n;
  }
  return result;
}

// -----------------------------------------------------------------------
// Distribution
// -----------------------------------------------------------------------

export type DistributeError = "YieldNotYetAvailable" | Overflow;

/**
 * Record one distribution at `height` over the pool's total stake and
 * grow the yield index by the amount per staked unit.
 * Authorization and lifecycle checks belong to the caller.
 */
export function distribute(
  pool: PoolState,
  history: KeyValueMap<bigint, DistributionRecord>,
  height: bigint,
  log: Logger = defaultLogger
): Result<bigint, DistributeError> {
  const elapsed = height - pool.lastDistributionHeight;
  if (elapsed < BLOCKS_PER_DAY) return err("YieldNotYetAvailable");

  const amount = computeYield(pool.totalStaked, elapsed, pool.yieldRateBasisPoints, log);
  const accrued = checkedAdd(pool.totalYieldAccrued, amount);
  if (!accrued.ok) return accrued;

  pool.totalYieldAccrued = accrued.value;
  if (pool.totalStaked > 0n) {
    pool.yieldIndex += (amount * YIELD_INDEX_PRECISION) / pool.totalStaked;
  }
  history.set(height, { block: height, amount, apy: pool.yieldRateBasisPoints });
  pool.lastDistributionHeight = height;
  return ok(amount);
}

// -----------------------------------------------------------------------
// Staker rewards
// -----------------------------------------------------------------------

/**
 * Yield the account has earned since its last settlement: its balance
 * times the growth of the pool's yield index since its snapshot.
 */
export function unsettledYield(
  pool: PoolState,
  ledger: LedgerState,
  rewards: RewardBook,
  account: Principal
): bigint {
  const snapshot = rewards.indexSnapshots.get(account) ?? pool.yieldIndex;
  if (pool.yieldIndex <= snapshot) return 0n;
  return (balanceOf(ledger, account) * (pool.yieldIndex - snapshot)) / YIELD_INDEX_PRECISION;
}

/** Pending plus unsettled: what a claim at this point would pay. */
export function claimableRewards(
  pool: PoolState,
  ledger: LedgerState,
  rewards: RewardBook,
  account: Principal
): Result<bigint, Overflow> {
  return checkedAdd(
    readUint(rewards.pending, account),
    unsettledYield(pool, ledger, rewards, account)
  );
}

/**
 * Move the account's unsettled yield into pending and snapshot the
 * current index. Call before changing the account's balance.
 */
export function settle(
  pool: PoolState,
  ledger: LedgerState,
  rewards: RewardBook,
  account: Principal
): Result<bigint, Overflow> {
  const pending = claimableRewards(pool, ledger, rewards, account);
  if (!pending.ok) return pending;

  rewards.pending.set(account, pending.value);
  rewards.indexSnapshots.set(account, pool.yieldIndex);
  return pending;
}

export type ClaimError = "NoYieldAvailable" | "MintFailed" | Overflow;

/**
 * Pay out everything the account has earned: mint it as receipt tokens,
 * add it to the pool's stake, clear pending. Returns the amount paid.
 */
export function claim(
  pool: PoolState,
  ledger: LedgerState,
  rewards: RewardBook,
  account: Principal
): Result<bigint, ClaimError> {
  const total = claimableRewards(pool, ledger, rewards, account);
  if (!total.ok) return total;
  if (total.value === 0n) return err("NoYieldAvailable");

  const minted = mint(ledger, account, total.value);
  if (!minted.ok) return err("MintFailed");

  const staked = checkedAdd(pool.totalStaked, total.value);
  if (!staked.ok) return staked;
  pool.totalStaked = staked.value;

  rewards.pending.set(account, 0n);
  rewards.indexSnapshots.set(account, pool.yieldIndex);
  return total;
}
