/**
 * staking-pool.ts
 *
 * The public state machine:
 *
 *   Uninitialized ──initialize──▶ Active ◀──pause/unpause──▶ Active+Paused
 *
 * Every mutating call runs inside a transaction. Checks and sub-ledger
 * updates work on the staged draft; the draft and the call's events are
 * committed together only when the call returns ok. A failed call leaves
 * no trace apart from a debug log line.
 */

import type {
  DistributionRecord,
  Optional,
  PoolErrorKind,
  PoolEvent,
  PoolStats,
  Principal,
  Result,
} from "@stakeline/types";
import { MAX_MEMO_LENGTH, MAX_RATE_BPS, MAX_TOKEN_URI_LENGTH, MIN_STAKE } from "./constants";
import { checkedAdd, isU64 } from "./safe-math";
import { ok, err, none, some } from "./result";
import { openTransaction, readUint } from "./store";
import type { PoolContext, PoolStorage } from "./store";
import * as ledger from "./fungible-ledger";
import * as risk from "./risk-scorer";
import * as insurance from "./insurance-ledger";
import * as yieldEngine from "./yield-engine";
import { logger as defaultLogger } from "./logger";
import type { Logger } from "./logger";

/** Facts the host supplies with every call. */
export interface CallContext {
  readonly caller: Principal;
  readonly height: bigint;
}

export type PoolResult<T> = Result<T, PoolErrorKind>;

export type PoolEventListener = (event: PoolEvent) => void;

export interface StakingPoolOptions {
  logger?: Logger;
  onEvent?: PoolEventListener;
}

/** A staged call: the draft to mutate and a buffer for its events. */
interface CallScope {
  readonly s: PoolStorage;
  readonly call: CallContext;
  emit(event: PoolEvent): void;
}

export class StakingPool {
  private readonly log: Logger;
  private readonly listeners: PoolEventListener[] = [];

  constructor(private readonly ctx: PoolContext, options: StakingPoolOptions = {}) {
    this.log = options.logger ?? defaultLogger;
    if (options.onEvent) this.listeners.push(options.onEvent);
  }

  /** Subscribe to committed events. Returns an unsubscribe function. */
  subscribe(listener: PoolEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  initialize(call: CallContext, rate: bigint): PoolResult<void> {
    return this.execute("initialize", call, ({ s, emit }) => {
      if (!this.isOwner(call)) return err("Unauthorized");
      if (s.pool.active) return err("AlreadyInitialized");
      if (!isValidRate(rate)) return err("InvalidAmount");

      s.pool.active = true;
      s.pool.yieldRateBasisPoints = rate;
      s.pool.lastDistributionHeight = call.height;
      emit({ type: "poolInitialized", rate, height: call.height });
      return ok();
    });
  }

  pause(call: CallContext): PoolResult<void> {
    return this.execute("pause", call, ({ s, emit }) => {
      if (!this.isOwner(call)) return err("Unauthorized");
      if (!s.pool.active) return err("NotInitialized");
      if (s.pool.paused) return err("Paused");

      s.pool.paused = true;
      emit({ type: "poolPaused", height: call.height });
      return ok();
    });
  }

  unpause(call: CallContext): PoolResult<void> {
    return this.execute("unpause", call, ({ s, emit }) => {
      if (!this.isOwner(call)) return err("Unauthorized");
      if (!s.pool.active) return err("NotInitialized");
      if (!s.pool.paused) return err("NotPaused");

      s.pool.paused = false;
      emit({ type: "poolUnpaused", height: call.height });
      return ok();
    });
  }

  // -----------------------------------------------------------------------
  // Staking
  // -----------------------------------------------------------------------

  stake(call: CallContext, amount: bigint): PoolResult<void> {
    return this.execute("stake", call, ({ s, emit }) => {
      if (!s.pool.active) return err("PoolInactive");
      if (s.pool.paused) return err("Paused");
      if (!isU64(amount)) return err("InvalidAmount");
      if (amount < MIN_STAKE) return err("MinimumStakeNotMet");

      const account = call.caller;
      const settled = yieldEngine.settle(s.pool, s.ledger, s.rewards, account);
      if (!settled.ok) return settled;

      if (!ledger.mint(s.ledger, account, amount).ok) return err("MintFailed");

      const staked = checkedAdd(s.pool.totalStaked, amount);
      if (!staked.ok) return staked;
      s.pool.totalStaked = staked.value;

      const score = risk.recordStake(s.riskScores, account, amount);
      if (!score.ok) return score;

      const covered = insurance.provisionOnStake(s.coverage, s.pool.insuranceEnabled, account, amount);
      if (!covered.ok) return covered;

      emit({ type: "stake", account, amount, height: call.height });
      return ok();
    });
  }

  /** Burns receipt tokens. Pending rewards are left for a later claim. */
  unstake(call: CallContext, amount: bigint): PoolResult<void> {
    return this.execute("unstake", call, ({ s, emit }) => {
      if (!s.pool.active) return err("PoolInactive");
      if (s.pool.paused) return err("Paused");

      const account = call.caller;
      if (ledger.balanceOf(s.ledger, account) < amount) return err("InsufficientBalance");
      if (amount <= 0n) return err("InvalidAmount");

      const settled = yieldEngine.settle(s.pool, s.ledger, s.rewards, account);
      if (!settled.ok) return settled;

      if (!ledger.burn(s.ledger, account, amount).ok) return err("BurnFailed");
      s.pool.totalStaked -= amount;

      insurance.reduceOnUnstake(s.coverage, s.pool.insuranceEnabled, account, amount);

      emit({ type: "unstake", account, amount, height: call.height });
      return ok();
    });
  }

  transfer(
    call: CallContext,
    amount: bigint,
    sender: Principal,
    recipient: Principal,
    memo: Optional<Uint8Array> = none
  ): PoolResult<void> {
    return this.execute("transfer", call, ({ s, emit }) => {
      if (call.caller !== sender) return err("Unauthorized");
      if (amount <= 0n || !isU64(amount)) return err("InvalidAmount");
      if (sender === recipient) return err("InvalidAmount");
      if (memo.kind === "some" && memo.value.length > MAX_MEMO_LENGTH) return err("InvalidAmount");

      if (ledger.balanceOf(s.ledger, sender) < amount) return err("InsufficientBalance");

      for (const account of [sender, recipient]) {
        const settled = yieldEngine.settle(s.pool, s.ledger, s.rewards, account);
        if (!settled.ok) return settled;
      }

      const moved = ledger.transfer(s.ledger, sender, recipient, amount);
      if (!moved.ok) return moved;

      emit({ type: "transfer", amount, sender, recipient, memo, height: call.height });
      return ok();
    });
  }

  // -----------------------------------------------------------------------
  // Yield
  // -----------------------------------------------------------------------

  distributeYield(call: CallContext): PoolResult<bigint> {
    return this.execute("distributeYield", call, ({ s, emit }) => {
      if (!this.isOwner(call)) return err("Unauthorized");
      if (!s.pool.active) return err("PoolInactive");

      const distributed = yieldEngine.distribute(s.pool, s.history, call.height, this.log);
      if (distributed.ok) {
        emit({ type: "distributeYield", amount: distributed.value, height: call.height });
      }
      return distributed;
    });
  }

  claimRewards(call: CallContext): PoolResult<bigint> {
    return this.execute("claimRewards", call, ({ s, emit }) => {
      if (!s.pool.active) return err("PoolInactive");
      if (s.pool.paused) return err("Paused");

      const claimed = yieldEngine.claim(s.pool, s.ledger, s.rewards, call.caller);
      if (claimed.ok) {
        emit({ type: "claimRewards", account: call.caller, amount: claimed.value, height: call.height });
      }
      return claimed;
    });
  }

  // -----------------------------------------------------------------------
  // Admin
  // -----------------------------------------------------------------------

  updateYieldRate(call: CallContext, rate: bigint): PoolResult<void> {
    return this.execute("updateYieldRate", call, ({ s, emit }) => {
      if (!this.isOwner(call)) return err("Unauthorized");
      if (!isValidRate(rate)) return err("InvalidAmount");

      s.pool.yieldRateBasisPoints = rate;
      emit({ type: "yieldRateUpdated", rate, height: call.height });
      return ok();
    });
  }

  toggleInsurance(call: CallContext, enabled: boolean): PoolResult<void> {
    return this.execute("toggleInsurance", call, ({ s, emit }) => {
      if (!this.isOwner(call)) return err("Unauthorized");

      s.pool.insuranceEnabled = enabled;
      emit({ type: "insuranceToggled", enabled, height: call.height });
      return ok();
    });
  }

  fundInsurance(call: CallContext, amount: bigint): PoolResult<bigint> {
    return this.execute("fundInsurance", call, ({ s, emit }) => {
      if (!this.isOwner(call)) return err("Unauthorized");
      if (amount <= 0n || !isU64(amount)) return err("InvalidAmount");

      const funded = insurance.fundInsurance(s.pool, amount);
      if (funded.ok) emit({ type: "insuranceFunded", amount, height: call.height });
      return funded;
    });
  }

  setTokenUri(call: CallContext, uri: Optional<string>): PoolResult<void> {
    return this.execute("setTokenUri", call, ({ s, emit }) => {
      if (!this.isOwner(call)) return err("Unauthorized");
      switch (uri.kind) {
        case "some":
          if (uri.value.length > MAX_TOKEN_URI_LENGTH) return err("InvalidAmount");
          s.pool.tokenUri = some(uri.value);
          break;
        case "none":
          s.pool.tokenUri = none;
          break;
      }
      emit({ type: "tokenUriUpdated", uri, height: call.height });
      return ok();
    });
  }

  // -----------------------------------------------------------------------
  // Read-only
  // -----------------------------------------------------------------------

  getName(): string {
    return this.ctx.token.name;
  }

  getSymbol(): string {
    return this.ctx.token.symbol;
  }

  getDecimals(): number {
    return this.ctx.token.decimals;
  }

  getTokenUri(): Optional<string> {
    return this.ctx.pool.tokenUri;
  }

  getContractOwner(): Principal {
    return this.ctx.owner;
  }

  getBalance(account: Principal): bigint {
    return ledger.balanceOf(this.ctx.ledger, account);
  }

  getTotalSupply(): bigint {
    return ledger.totalSupply(this.ctx.ledger);
  }

  /** Staked balance. The receipt token is the stake record, so this equals the balance. */
  getStakerBalance(account: Principal): bigint {
    return ledger.balanceOf(this.ctx.ledger, account);
  }

  /** Settled but unclaimed rewards. */
  getStakerRewards(account: Principal): bigint {
    return readUint(this.ctx.rewards.pending, account);
  }

  getClaimableRewards(account: Principal): PoolResult<bigint> {
    const { pool, ledger: book, rewards } = this.ctx;
    return yieldEngine.claimableRewards(pool, book, rewards, account);
  }

  getRiskScore(account: Principal): bigint {
    return risk.riskScoreOf(this.ctx.riskScores, account);
  }

  getInsuranceCoverage(account: Principal): bigint {
    return insurance.coverageOf(this.ctx.coverage, account);
  }

  getYieldDistribution(height: bigint): Optional<DistributionRecord> {
    const record = this.ctx.history.get(height);
    return record ? some(record) : none;
  }

  getLastDistributionHeight(): bigint {
    return this.ctx.pool.lastDistributionHeight;
  }

  getPoolStats(): PoolStats {
    const { pool } = this.ctx;
    return {
      totalStaked: pool.totalStaked,
      totalSupply: this.ctx.ledger.totalSupply,
      totalYield: pool.totalYieldAccrued,
      currentRate: pool.yieldRateBasisPoints,
      active: pool.active,
      paused: pool.paused,
      insuranceActive: pool.insuranceEnabled,
      insuranceBalance: pool.insuranceFundBalance,
    };
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private isOwner(call: CallContext): boolean {
    return call.caller === this.ctx.owner;
  }

  private execute<T>(
    operation: string,
    call: CallContext,
    body: (scope: CallScope) => PoolResult<T>
  ): PoolResult<T> {
    const tx = openTransaction(this.ctx);
    const events: PoolEvent[] = [];
    const result = body({ s: tx.draft, call, emit: (event) => events.push(event) });

    if (!result.ok) {
      this.log.debug(`${operation} rejected at ${call.height} for ${call.caller}: ${result.error}`);
      return result;
    }

    tx.commit();
    this.log.info(`${operation} ok at ${call.height} for ${call.caller}`);
    for (const event of events) this.publish(event);
    return result;
  }

  /** The call is already committed; a failing listener is logged and skipped. */
  private publish(event: PoolEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.log.error(`listener failed on ${event.type} at ${event.height}: ${reason}`);
      }
    }
  }
}

function isValidRate(rate: bigint): boolean {
  return rate >= 0n && rate <= MAX_RATE_BPS;
}
