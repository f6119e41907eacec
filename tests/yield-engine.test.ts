import { describe, it, expect, beforeEach } from "vitest";
import { createLogger, none, U64_MAX, YieldEngine } from "@stakeline/core";
import type { LedgerState, RewardBook } from "@stakeline/core";
import type { DistributionRecord, PoolState } from "@stakeline/types";

const quiet = createLogger("test", "silent");

const DAY       = 144n;
const RATE_5PCT = 500n;
const STAKE     = 1_000_000n;
const PRECISION = 1_000_000_000_000n; // 1e12, yield index scale

const ALICE = "alice";

function freshPool(overrides: Partial<PoolState> = {}): PoolState {
  return {
    totalStaked: 0n,
    totalYieldAccrued: 0n,
    yieldRateBasisPoints: RATE_5PCT,
    active: true,
    paused: false,
    insuranceEnabled: false,
    insuranceFundBalance: 0n,
    lastDistributionHeight: 0n,
    yieldIndex: 0n,
    tokenUri: none,
    ...overrides,
  };
}

/** Expected yield-index increment for a distribution over a given stake. */
function expectedIndexDelta(amount: bigint, staked: bigint): bigint {
  return (amount * PRECISION) / staked;
}

/** Exact yield as a rational, floored: p * r * b / (144 * 10000). */
function exactYieldFloor(p: bigint, b: bigint, r: bigint): bigint {
  return (p * r * b) / (DAY * 10_000n);
}

// =====================================================================
// computeYield
// =====================================================================

describe("computeYield", () => {
  it("one day at 5% on 1_000_000 is 50_000", () => {
    expect(YieldEngine.computeYield(STAKE, DAY, RATE_5PCT, quiet)).toBe(50_000n);
  });

  it("counts whole days only", () => {
    expect(YieldEngine.computeYield(STAKE, DAY * 2n - 1n, RATE_5PCT, quiet)).toBe(50_000n);
    expect(YieldEngine.computeYield(STAKE, DAY * 2n, RATE_5PCT, quiet)).toBe(100_000n);
  });

  it("is zero for any window under 144 blocks", () => {
    const principals = [1n, STAKE, 10n ** 15n, U64_MAX];
    const rates = [0n, 1n, RATE_5PCT, 10_000n];
    for (const p of principals) {
      for (const r of rates) {
        for (const b of [0n, 1n, 72n, 143n]) {
          expect(YieldEngine.computeYield(p, b, r, quiet)).toBe(0n);
        }
      }
    }
  });

  it("never exceeds the exact yield", () => {
    const cases: [bigint, bigint, bigint][] = [
      [333n, DAY, 1n],
      [12_345_678n, 300n, 777n],
      [STAKE, 1_000n, RATE_5PCT],
      [987_654_321n, 145n, 10_000n],
    ];
    for (const [p, b, r] of cases) {
      expect(YieldEngine.computeYield(p, b, r, quiet)).toBeLessThanOrEqual(exactYieldFloor(p, b, r));
    }
  });

  it("truncates at every division", () => {
    // 12_345_678 * 777 = 9_592_591_806; two whole days; / 10_000 drops .3612
    expect(YieldEngine.computeYield(12_345_678n, 300n, 777n, quiet)).toBe(1_918_518n);
  });

  it("degrades to zero when principal * rate overflows", () => {
    expect(YieldEngine.computeYield(U64_MAX, DAY, 2n, quiet)).toBe(0n);
  });

  it("degrades to zero when the result overflows u64", () => {
    expect(YieldEngine.computeYield(U64_MAX / 2n, DAY * 30_000n, 1n, quiet)).toBe(0n);
  });
});

// =====================================================================
// distribute
// =====================================================================

describe("distribute", () => {
  let history: Map<bigint, DistributionRecord>;

  beforeEach(() => {
    history = new Map();
  });

  it("rejects before 144 blocks have elapsed", () => {
    const pool = freshPool({ totalStaked: STAKE, lastDistributionHeight: 10n });
    expect(YieldEngine.distribute(pool, history, 153n, quiet)).toEqual({ ok: false, error: "YieldNotYetAvailable" });
    expect(pool.lastDistributionHeight).toBe(10n);
    expect(history.size).toBe(0);
  });

  it("records yield over the total stake and advances the clock", () => {
    const pool = freshPool({ totalStaked: STAKE, lastDistributionHeight: 10n });
    expect(YieldEngine.distribute(pool, history, 154n, quiet)).toEqual({ ok: true, value: 50_000n });

    expect(pool.totalYieldAccrued).toBe(50_000n);
    expect(pool.lastDistributionHeight).toBe(154n);
    expect(pool.yieldIndex).toBe(expectedIndexDelta(50_000n, STAKE));
    expect(history.get(154n)).toEqual({ block: 154n, amount: 50_000n, apy: RATE_5PCT });
  });

  it("a pool with nothing staked still advances the clock", () => {
    const pool = freshPool();
    expect(YieldEngine.distribute(pool, history, DAY, quiet)).toEqual({ ok: true, value: 0n });
    expect(pool.lastDistributionHeight).toBe(DAY);
    expect(pool.yieldIndex).toBe(0n);
  });

  it("fails with Overflow when accrued yield would wrap", () => {
    const pool = freshPool({ totalStaked: STAKE, totalYieldAccrued: U64_MAX });
    expect(YieldEngine.distribute(pool, history, DAY, quiet)).toEqual({ ok: false, error: "Overflow" });
    expect(pool.lastDistributionHeight).toBe(0n);
  });
});

// =====================================================================
// settle / claim
// =====================================================================

describe("staker rewards", () => {
  const ONE_DAY_INDEX = expectedIndexDelta(50_000n, STAKE); // 5e10

  let ledger: LedgerState;
  let rewards: RewardBook;

  beforeEach(() => {
    ledger = { totalSupply: STAKE, balances: new Map([[ALICE, STAKE]]) };
    rewards = { pending: new Map(), indexSnapshots: new Map([[ALICE, 0n]]) };
  });

  it("nothing is claimable until the index grows past the snapshot", () => {
    const pool = freshPool({ totalStaked: STAKE });
    expect(YieldEngine.claimableRewards(pool, ledger, rewards, ALICE)).toEqual({ ok: true, value: 0n });
    expect(YieldEngine.claim(pool, ledger, rewards, ALICE)).toEqual({ ok: false, error: "NoYieldAvailable" });
  });

  it("claim pays balance times index growth, mints it and grows the stake", () => {
    const pool = freshPool({ totalStaked: STAKE, yieldIndex: ONE_DAY_INDEX });

    expect(YieldEngine.claim(pool, ledger, rewards, ALICE)).toEqual({ ok: true, value: 50_000n });
    expect(ledger.balances.get(ALICE)).toBe(1_050_000n);
    expect(ledger.totalSupply).toBe(1_050_000n);
    expect(pool.totalStaked).toBe(1_050_000n);
    expect(rewards.pending.get(ALICE)).toBe(0n);
    expect(rewards.indexSnapshots.get(ALICE)).toBe(ONE_DAY_INDEX);
  });

  it("settle moves earned yield into pending and snapshots the index", () => {
    const pool = freshPool({ totalStaked: STAKE, yieldIndex: ONE_DAY_INDEX * 2n });

    expect(YieldEngine.settle(pool, ledger, rewards, ALICE)).toEqual({ ok: true, value: 100_000n });
    expect(rewards.pending.get(ALICE)).toBe(100_000n);
    expect(rewards.indexSnapshots.get(ALICE)).toBe(ONE_DAY_INDEX * 2n);
    expect(YieldEngine.unsettledYield(pool, ledger, rewards, ALICE)).toBe(0n);
  });

  it("a claim between distributions keeps the next one whole", () => {
    const history = new Map<bigint, DistributionRecord>();
    const pool = freshPool({ totalStaked: STAKE });

    expect(YieldEngine.distribute(pool, history, DAY, quiet)).toEqual({ ok: true, value: 50_000n });
    expect(YieldEngine.claim(pool, ledger, rewards, ALICE)).toEqual({ ok: true, value: 50_000n });

    // 1_050_000 staked for the second day
    expect(YieldEngine.distribute(pool, history, DAY * 2n, quiet)).toEqual({ ok: true, value: 52_500n });
    expect(pool.yieldIndex).toBe(ONE_DAY_INDEX * 2n);
    expect(YieldEngine.claim(pool, ledger, rewards, ALICE)).toEqual({ ok: true, value: 52_500n });
  });

  it("claim pays pending even with a zero balance", () => {
    const pool = freshPool({ yieldIndex: ONE_DAY_INDEX });
    ledger = { totalSupply: 0n, balances: new Map() };
    rewards.pending.set(ALICE, 25_000n);

    expect(YieldEngine.claim(pool, ledger, rewards, ALICE)).toEqual({ ok: true, value: 25_000n });
    expect(ledger.balances.get(ALICE)).toBe(25_000n);
  });

  it("claim reports MintFailed when the ledger cannot mint", () => {
    const pool = freshPool({ totalStaked: STAKE, yieldIndex: ONE_DAY_INDEX });
    ledger.totalSupply = U64_MAX;

    expect(YieldEngine.claim(pool, ledger, rewards, ALICE)).toEqual({ ok: false, error: "MintFailed" });
  });
});
