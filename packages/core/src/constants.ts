// -----------------------------------------------------------------------
// Pool constants. Amounts are in base units (1 token = 1e8).
// -----------------------------------------------------------------------

export const U64_MAX = 18_446_744_073_709_551_615n; // 2^64 - 1

export const MIN_STAKE          = 1_000_000n;   // 0.01 token
export const BLOCKS_PER_DAY     = 144n;         // ~10 min blocks
export const BPS_DENOMINATOR    = 10_000n;      // 10000 bps = 100%
export const MAX_RATE_BPS       = 10_000n;
export const RISK_SCORE_DIVISOR = 100_000_000n; // one point per whole token staked
export const YIELD_INDEX_PRECISION = 1_000_000_000_000n; // 1e12

export const TOKEN_DECIMALS       = 8;
export const MAX_TOKEN_URI_LENGTH = 256;
export const MAX_MEMO_LENGTH      = 34;
