export * from "./constants";
export { ok, err, some, none } from "./result";
export { checkedAdd, checkedMultiply, isU64 } from "./safe-math";
export type { Overflow } from "./safe-math";
export { POOL_ERROR_CODES, ConfigError, ContractCallError } from "./errors";
export { createLogger, logger, isLogLevel, LOG_LEVELS } from "./logger";
export type { Logger, LogLevel, LogSink } from "./logger";
export { loadConfig, getNetwork, assertOwner } from "./config";
export type { PoolConfig, NetworkName } from "./config";
export { createPoolContext, openTransaction, readUint, WriteOverlay } from "./store";
export type { KeyValueMap, LedgerState, RewardBook, PoolStorage, PoolContext, Transaction } from "./store";
export * as FungibleLedger from "./fungible-ledger";
export * as RiskScorer from "./risk-scorer";
export * as InsuranceLedger from "./insurance-ledger";
export * as YieldEngine from "./yield-engine";
export { StakingPool } from "./staking-pool";
export type { CallContext, PoolResult, PoolEventListener, StakingPoolOptions } from "./staking-pool";
export { PoolContract, errorResponse } from "./contract";
export { LocalChain, POOL_CONTRACT_NAME, devnetAccounts } from "./chain";
export type { LocalChainOptions, PublicCallReceipt, ReadOnlyCallReceipt } from "./chain";
