/**
 * store.ts
 *
 * The pool's logical storage: scalar registers plus key-value maps, and
 * the per-call transaction that stages writes until the call succeeds.
 *
 * The core only needs `get` and `set`; a `Map` satisfies the interface,
 * and so does the write overlay used inside a transaction.
 */

import type { DistributionRecord, Optional, PoolState, Principal, TokenInfo } from "@stakeline/types";
import { none } from "./result";

export interface KeyValueMap<K, V> {
  get(key: K): V | undefined;
  set(key: K, value: V): unknown;
}

/** Read a u64 map entry; absent keys read as zero. */
export function readUint<K>(map: KeyValueMap<K, bigint>, key: K): bigint {
  return map.get(key) ?? 0n;
}

/**
 * Buffers writes over a base map. Reads see buffered writes first.
 * Nothing reaches the base map until `flush()`.
 */
export class WriteOverlay<K, V> implements KeyValueMap<K, V> {
  private readonly writes = new Map<K, V>();

  constructor(private readonly base: KeyValueMap<K, V>) {}

  get(key: K): V | undefined {
    return this.writes.has(key) ? this.writes.get(key) : this.base.get(key);
  }

  set(key: K, value: V): this {
    this.writes.set(key, value);
    return this;
  }

  flush(): void {
    for (const [key, value] of this.writes) this.base.set(key, value);
    this.writes.clear();
  }
}

// -----------------------------------------------------------------------
// Pool storage
// -----------------------------------------------------------------------

export interface LedgerState {
  totalSupply: bigint;
  readonly balances: KeyValueMap<Principal, bigint>;
}

export interface RewardBook {
  readonly pending: KeyValueMap<Principal, bigint>;
  readonly indexSnapshots: KeyValueMap<Principal, bigint>; // pool yieldIndex at the account's last settlement
}

export interface PoolStorage {
  pool: PoolState;
  ledger: LedgerState;
  rewards: RewardBook;
  riskScores: KeyValueMap<Principal, bigint>;
  coverage: KeyValueMap<Principal, bigint>;
  history: KeyValueMap<bigint, DistributionRecord>;
}

/**
 * Everything a deployment owns. Built once and passed to every call.
 */
export interface PoolContext extends PoolStorage {
  readonly owner: Principal;
  readonly token: TokenInfo;
}

export function createPoolContext(
  owner: Principal,
  token: TokenInfo,
  tokenUri: Optional<string> = none
): PoolContext {
  return {
    owner,
    token,
    pool: {
      totalStaked: 0n,
      totalYieldAccrued: 0n,
      yieldRateBasisPoints: 0n,
      active: false,
      paused: false,
      insuranceEnabled: false,
      insuranceFundBalance: 0n,
      lastDistributionHeight: 0n,
      yieldIndex: 0n,
      tokenUri,
    },
    ledger: { totalSupply: 0n, balances: new Map() },
    rewards: { pending: new Map(), indexSnapshots: new Map() },
    riskScores: new Map(),
    coverage: new Map(),
    history: new Map(),
  };
}

// -----------------------------------------------------------------------
// Transactions
// -----------------------------------------------------------------------

export interface Transaction {
  /** Staged view of the storage. Mutate freely; nothing is visible outside yet. */
  readonly draft: PoolStorage;
  /** Write every staged change into the context. */
  commit(): void;
}

/**
 * Stage a call against `ctx`. Scalars are copied, maps are overlaid.
 * Dropping the transaction without `commit()` discards every write.
 */
export function openTransaction(ctx: PoolContext): Transaction {
  const overlays = {
    balances:    new WriteOverlay(ctx.ledger.balances),
    pending:     new WriteOverlay(ctx.rewards.pending),
    indexSnapshots: new WriteOverlay(ctx.rewards.indexSnapshots),
    riskScores:  new WriteOverlay(ctx.riskScores),
    coverage:    new WriteOverlay(ctx.coverage),
    history:     new WriteOverlay(ctx.history),
  };

  const draft: PoolStorage = {
    pool: { ...ctx.pool },
    ledger: { totalSupply: ctx.ledger.totalSupply, balances: overlays.balances },
    rewards: { pending: overlays.pending, indexSnapshots: overlays.indexSnapshots },
    riskScores: overlays.riskScores,
    coverage: overlays.coverage,
    history: overlays.history,
  };

  return {
    draft,
    commit() {
      ctx.pool = draft.pool;
      ctx.ledger.totalSupply = draft.ledger.totalSupply;
      for (const overlay of Object.values(overlays)) overlay.flush();
    },
  };
}
