/**
 * contract.ts
 *
 * The pool's call surface in Clarity values: kebab-case function names,
 * `ClarityValue` arguments, and `(ok …)` / `(err uN)` responses, the way a
 * Stacks contract exposes itself to wallets and indexers.
 *
 * Domain failures come back as `(err uN)` with the codes in errors.ts.
 * A call that cannot be dispatched (unknown function, wrong arity, wrong
 * argument type) throws ContractCallError.
 */

import { Cl, ClarityType, principalToString } from "@stacks/transactions";
import type { ClarityValue } from "@stacks/transactions";
import type { DistributionRecord, Optional, PoolErrorKind, Result } from "@stakeline/types";
import { ContractCallError, POOL_ERROR_CODES } from "./errors";
import { isU64 } from "./safe-math";
import { ok, err, none, some } from "./result";
import type { CallContext, StakingPool } from "./staking-pool";

type Args = readonly ClarityValue[];

interface PublicFunction {
  arity: number;
  run(args: Args, call: CallContext): ClarityValue;
}

interface ReadOnlyFunction {
  arity: number;
  run(args: Args): ClarityValue;
}

// -----------------------------------------------------------------------
// Response encoding
// -----------------------------------------------------------------------

export function errorResponse(kind: PoolErrorKind): ClarityValue {
  return Cl.error(Cl.uint(POOL_ERROR_CODES[kind]));
}

function respond<T>(result: Result<T, PoolErrorKind>, encode: (value: T) => ClarityValue): ClarityValue {
  return result.ok ? Cl.ok(encode(result.value)) : errorResponse(result.error);
}

const okTrue = () => Cl.bool(true);

function optionalCV<T>(value: Optional<T>, encode: (inner: T) => ClarityValue): ClarityValue {
  switch (value.kind) {
    case "some":
      return Cl.some(encode(value.value));
    case "none":
      return Cl.none();
  }
}

function distributionCV(record: DistributionRecord): ClarityValue {
  return Cl.tuple({
    block:  Cl.uint(record.block),
    amount: Cl.uint(record.amount),
    apy:    Cl.uint(record.apy),
  });
}

// -----------------------------------------------------------------------
// PoolContract
// -----------------------------------------------------------------------

export class PoolContract {
  private readonly publicFns: Map<string, PublicFunction>;
  private readonly readOnlyFns: Map<string, ReadOnlyFunction>;

  constructor(readonly name: string, private readonly pool: StakingPool) {
    this.publicFns = new Map(Object.entries(this.buildPublicFunctions()));
    this.readOnlyFns = new Map(Object.entries(this.buildReadOnlyFunctions()));
  }

  get publicFunctionNames(): string[] {
    return [...this.publicFns.keys()];
  }

  get readOnlyFunctionNames(): string[] {
    return [...this.readOnlyFns.keys()];
  }

  callPublic(functionName: string, args: Args, call: CallContext): ClarityValue {
    const fn = this.publicFns.get(functionName);
    if (!fn) throw new ContractCallError(this.name, functionName, "no such public function");
    this.checkArity(functionName, fn.arity, args);
    return fn.run(args, call);
  }

  callReadOnly(functionName: string, args: Args): ClarityValue {
    const fn = this.readOnlyFns.get(functionName);
    if (!fn) throw new ContractCallError(this.name, functionName, "no such read-only function");
    this.checkArity(functionName, fn.arity, args);
    return fn.run(args);
  }

  // -----------------------------------------------------------------------
  // Public functions
  // -----------------------------------------------------------------------

  private buildPublicFunctions(): Record<string, PublicFunction> {
    const pool = this.pool;
    const withAmount = (
      fn: string,
      body: (amount: bigint, call: CallContext) => ClarityValue
    ): PublicFunction => ({
      arity: 1,
      run: (args, call) => {
        const amount = this.u64(fn, args, 0);
        return amount.ok ? body(amount.value, call) : errorResponse(amount.error);
      },
    });

    return {
      "initialize-pool": withAmount("initialize-pool", (rate, call) =>
        respond(pool.initialize(call, rate), okTrue)),

      "stake": withAmount("stake", (amount, call) =>
        respond(pool.stake(call, amount), okTrue)),

      "unstake": withAmount("unstake", (amount, call) =>
        respond(pool.unstake(call, amount), okTrue)),

      "distribute-yield": {
        arity: 0,
        run: (_args, call) => respond(pool.distributeYield(call), Cl.uint),
      },

      "claim-rewards": {
        arity: 0,
        run: (_args, call) => respond(pool.claimRewards(call), Cl.uint),
      },

      // (transfer (amount uint) (sender principal) (recipient principal) (memo (optional (buff 34))))
      "transfer": {
        arity: 4,
        run: (args, call) => {
          const amount = this.u64("transfer", args, 0);
          if (!amount.ok) return errorResponse(amount.error);
          const sender = this.principal("transfer", args, 1);
          const recipient = this.principal("transfer", args, 2);
          const memo = this.optionalBuffer("transfer", args, 3);
          return respond(pool.transfer(call, amount.value, sender, recipient, memo), okTrue);
        },
      },

      "set-token-uri": {
        arity: 1,
        run: (args, call) =>
          respond(pool.setTokenUri(call, this.optionalString("set-token-uri", args, 0)), okTrue),
      },

      "pause-pool": {
        arity: 0,
        run: (_args, call) => respond(pool.pause(call), okTrue),
      },

      "unpause-pool": {
        arity: 0,
        run: (_args, call) => respond(pool.unpause(call), okTrue),
      },

      "update-yield-rate": withAmount("update-yield-rate", (rate, call) =>
        respond(pool.updateYieldRate(call, rate), okTrue)),

      "toggle-insurance": {
        arity: 1,
        run: (args, call) =>
          respond(pool.toggleInsurance(call, this.bool("toggle-insurance", args, 0)), okTrue),
      },

      "fund-insurance": withAmount("fund-insurance", (amount, call) =>
        respond(pool.fundInsurance(call, amount), Cl.uint)),
    };
  }

  // -----------------------------------------------------------------------
  // Read-only functions
  // -----------------------------------------------------------------------

  private buildReadOnlyFunctions(): Record<string, ReadOnlyFunction> {
    const pool = this.pool;
    const noArgs = (run: () => ClarityValue): ReadOnlyFunction => ({ arity: 0, run });
    const byAccount = (fn: string, read: (account: string) => bigint): ReadOnlyFunction => ({
      arity: 1,
      run: (args) => Cl.ok(Cl.uint(read(this.principal(fn, args, 0)))),
    });

    return {
      // SIP-010
      "get-name":         noArgs(() => Cl.ok(Cl.stringAscii(pool.getName()))),
      "get-symbol":       noArgs(() => Cl.ok(Cl.stringAscii(pool.getSymbol()))),
      "get-decimals":     noArgs(() => Cl.ok(Cl.uint(pool.getDecimals()))),
      "get-total-supply": noArgs(() => Cl.ok(Cl.uint(pool.getTotalSupply()))),
      "get-token-uri":    noArgs(() => Cl.ok(optionalCV(pool.getTokenUri(), Cl.stringUtf8))),
      "get-balance":      byAccount("get-balance", (a) => pool.getBalance(a)),

      // Pool
      "get-staker-balance":     byAccount("get-staker-balance", (a) => pool.getStakerBalance(a)),
      "get-staker-rewards":     byAccount("get-staker-rewards", (a) => pool.getStakerRewards(a)),
      "get-risk-score":         byAccount("get-risk-score", (a) => pool.getRiskScore(a)),
      "get-insurance-coverage": byAccount("get-insurance-coverage", (a) => pool.getInsuranceCoverage(a)),

      "get-claimable-rewards": {
        arity: 1,
        run: (args) =>
          respond(pool.getClaimableRewards(this.principal("get-claimable-rewards", args, 0)), Cl.uint),
      },

      "get-contract-owner": noArgs(() => Cl.ok(Cl.principal(pool.getContractOwner()))),
      "get-last-distribution-height": noArgs(() => Cl.ok(Cl.uint(pool.getLastDistributionHeight()))),

      "get-pool-stats": noArgs(() => {
        const stats = pool.getPoolStats();
        return Cl.ok(Cl.tuple({
          "total-staked":      Cl.uint(stats.totalStaked),
          "total-supply":      Cl.uint(stats.totalSupply),
          "total-yield":       Cl.uint(stats.totalYield),
          "current-rate":      Cl.uint(stats.currentRate),
          "active":            Cl.bool(stats.active),
          "paused":            Cl.bool(stats.paused),
          "insurance-active":  Cl.bool(stats.insuranceActive),
          "insurance-balance": Cl.uint(stats.insuranceBalance),
        }));
      }),

      "get-yield-distribution": {
        arity: 1,
        run: (args) =>
          optionalCV(pool.getYieldDistribution(this.uint("get-yield-distribution", args, 0)), distributionCV),
      },
    };
  }

  // -----------------------------------------------------------------------
  // Argument decoding
  // -----------------------------------------------------------------------

  private checkArity(functionName: string, arity: number, args: Args): void {
    if (args.length !== arity) {
      throw new ContractCallError(this.name, functionName, `expected ${arity} argument(s), got ${args.length}`);
    }
  }

  private fail(functionName: string, index: number, expected: string): never {
    throw new ContractCallError(this.name, functionName, `argument ${index} must be ${expected}`);
  }

  private uint(fn: string, args: Args, index: number): bigint {
    const cv = args[index];
    if (cv.type !== ClarityType.UInt) return this.fail(fn, index, "a uint");
    return cv.value;
  }

  /** A uint the pool can hold. Larger values are rejected as (err u105). */
  private u64(fn: string, args: Args, index: number): Result<bigint, "InvalidAmount"> {
    const value = this.uint(fn, args, index);
    return isU64(value) ? ok(value) : err("InvalidAmount");
  }

  private principal(fn: string, args: Args, index: number): string {
    const cv = args[index];
    switch (cv.type) {
      case ClarityType.PrincipalStandard:
      case ClarityType.PrincipalContract:
        return principalToString(cv);
      default:
        return this.fail(fn, index, "a principal");
    }
  }

  private bool(fn: string, args: Args, index: number): boolean {
    const cv = args[index];
    switch (cv.type) {
      case ClarityType.BoolTrue:
        return true;
      case ClarityType.BoolFalse:
        return false;
      default:
        return this.fail(fn, index, "a bool");
    }
  }

  private optionalString(fn: string, args: Args, index: number): Optional<string> {
    const cv = args[index];
    switch (cv.type) {
      case ClarityType.OptionalNone:
        return none;
      case ClarityType.OptionalSome: {
        const inner = cv.value;
        if (inner.type === ClarityType.StringUTF8 || inner.type === ClarityType.StringASCII) {
          return some(inner.data);
        }
        return this.fail(fn, index, "an optional string");
      }
      default:
        return this.fail(fn, index, "an optional string");
    }
  }

  private optionalBuffer(fn: string, args: Args, index: number): Optional<Uint8Array> {
    const cv = args[index];
    switch (cv.type) {
      case ClarityType.OptionalNone:
        return none;
      case ClarityType.OptionalSome: {
        const inner = cv.value;
        if (inner.type === ClarityType.Buffer) return some(inner.buffer);
        return this.fail(fn, index, "an optional buffer");
      }
      default:
        return this.fail(fn, index, "an optional buffer");
    }
  }
}
