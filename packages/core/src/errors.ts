import type { PoolErrorKind } from "@stakeline/types";

/**
 * Clarity error codes returned as `(err uN)` at the contract boundary.
 */
export const POOL_ERROR_CODES: Record<PoolErrorKind, bigint> = {
  Unauthorized:         100n,
  AlreadyInitialized:   101n,
  NotInitialized:       102n,
  PoolInactive:         103n,
  Paused:               104n,
  InvalidAmount:        105n,
  InsufficientBalance:  106n,
  NoYieldAvailable:     107n,
  MinimumStakeNotMet:   108n,
  Overflow:             109n,
  MintFailed:           110n,
  BurnFailed:           111n,
  YieldNotYetAvailable: 112n,
  NotPaused:            113n,
};

/** Raised at load or deploy time when configuration is unusable. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Raised when a call cannot be dispatched at all: unknown contract or
 * function, wrong arity, or an argument of the wrong Clarity type.
 * A chain would reject such a transaction before it executes.
 */
export class ContractCallError extends Error {
  constructor(
    readonly contractName: string,
    readonly functionName: string,
    message: string
  ) {
    super(`${contractName}::${functionName}: ${message}`);
    this.name = "ContractCallError";
  }
}
