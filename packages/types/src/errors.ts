/**
 * Every way a pool call can fail. A failed call has no side effects.
 */
export type PoolErrorKind =
  | "Unauthorized"
  | "AlreadyInitialized"
  | "NotInitialized"
  | "PoolInactive"
  | "Paused"
  | "InvalidAmount"
  | "InsufficientBalance"
  | "NoYieldAvailable"
  | "MinimumStakeNotMet"
  | "Overflow"
  | "MintFailed"
  | "BurnFailed"
  | "YieldNotYetAvailable"
  | "NotPaused";
