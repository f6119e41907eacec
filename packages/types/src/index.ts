export type { Principal, PoolState, TokenInfo, PoolStats, DistributionRecord } from "./pool";
export type { Ok, Err, Result, Some, None, Optional } from "./result";
export type { PoolErrorKind } from "./errors";
export type { PoolEvent } from "./events";
