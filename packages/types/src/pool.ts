// Types for the staking pool: global registers, read-only views,
// and the yield distribution history.

import type { Optional } from "./result";

/** A Stacks principal (standard or contract). Opaque to the pool. */
export type Principal = string;

/**
 * Global state of the staking pool.
 * One instance per deployment; created inactive and initialized once.
 */
export interface PoolState {
  totalStaked: bigint;            // sum of all receipt-token balances (base units)
  totalYieldAccrued: bigint;      // cumulative yield recorded by distributions
  yieldRateBasisPoints: bigint;   // 0..=10000, 500 = 5%
  active: boolean;                // flips to true once, on initialize
  paused: boolean;
  insuranceEnabled: boolean;
  insuranceFundBalance: bigint;
  lastDistributionHeight: bigint; // block height of the last distribution (or initialize)
  yieldIndex: bigint;             // distributed yield per staked unit, scaled by 1e12
  tokenUri: Optional<string>;
}

/** SIP-010 token metadata fixed at deploy time. */
export interface TokenInfo {
  name: string;
  symbol: string;
  decimals: number;
}

/**
 * Snapshot returned by get-pool-stats.
 */
export interface PoolStats {
  totalStaked: bigint;
  totalSupply: bigint;
  totalYield: bigint;
  currentRate: bigint;
  active: boolean;
  paused: boolean;
  insuranceActive: boolean;
  insuranceBalance: bigint;
}

/**
 * One entry of the distribution history, keyed by the block it ran in.
 */
export interface DistributionRecord {
  block: bigint;
  amount: bigint;  // yield computed over totalStaked for the elapsed window
  apy: bigint;     // rate in basis points at distribution time
}
