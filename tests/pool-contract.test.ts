import { describe, it, expect, beforeEach } from "vitest";
import { Cl } from "@stacks/transactions";
import {
  ContractCallError,
  LocalChain,
  PoolContract,
  StakingPool,
  U64_MAX,
  createLogger,
  createPoolContext,
  errorResponse,
  none,
  some,
} from "@stakeline/core";

const CONTRACT = "staking-pool";

// -----------------------------------------------------------------------
// PoolContract dispatch
// -----------------------------------------------------------------------

describe("pool-contract dispatch", () => {
  const OWNER = "ST1OWNER";
  let contract: PoolContract;

  beforeEach(() => {
    const ctx = createPoolContext(
      OWNER,
      { name: "Staked Token", symbol: "stTKN", decimals: 8 },
      some("https://example.com/sttkn.json")
    );
    const pool = new StakingPool(ctx, { logger: createLogger("test", "silent") });
    contract = new PoolContract(CONTRACT, pool);
  });

  it("lists the public surface", () => {
    expect(contract.publicFunctionNames.sort()).toEqual([
      "claim-rewards",
      "distribute-yield",
      "fund-insurance",
      "initialize-pool",
      "pause-pool",
      "set-token-uri",
      "stake",
      "toggle-insurance",
      "transfer",
      "unpause-pool",
      "unstake",
      "update-yield-rate",
    ]);
  });

  it("throws on an unknown function", () => {
    expect(() => contract.callPublic("mint", [], { caller: OWNER, height: 1n })).toThrow(ContractCallError);
    expect(() => contract.callReadOnly("get-owner", [])).toThrow("staking-pool::get-owner: no such read-only function");
  });

  it("throws on wrong arity", () => {
    expect(() => contract.callPublic("stake", [], { caller: OWNER, height: 1n }))
      .toThrow("staking-pool::stake: expected 1 argument(s), got 0");
  });

  it("throws on a wrongly typed argument", () => {
    expect(() => contract.callPublic("stake", [Cl.int(5)], { caller: OWNER, height: 1n }))
      .toThrow("staking-pool::stake: argument 0 must be a uint");
    expect(() => contract.callPublic("toggle-insurance", [Cl.uint(1)], { caller: OWNER, height: 1n }))
      .toThrow("argument 0 must be a bool");
    expect(() => contract.callReadOnly("get-balance", [Cl.uint(1)]))
      .toThrow("argument 0 must be a principal");
  });

  it("maps a uint beyond u64 to (err u105)", () => {
    const result = contract.callPublic("initialize-pool", [Cl.uint(U64_MAX + 1n)], { caller: OWNER, height: 1n });
    expect(result).toEqual(Cl.error(Cl.uint(105)));
    expect(result).toEqual(errorResponse("InvalidAmount"));
  });

  it("maps domain errors to their codes", () => {
    expect(errorResponse("Unauthorized")).toEqual(Cl.error(Cl.uint(100)));
    expect(errorResponse("Overflow")).toEqual(Cl.error(Cl.uint(109)));
    expect(errorResponse("NotPaused")).toEqual(Cl.error(Cl.uint(113)));
  });

  it("serves token metadata", () => {
    expect(contract.callReadOnly("get-name", [])).toEqual(Cl.ok(Cl.stringAscii("Staked Token")));
    expect(contract.callReadOnly("get-symbol", [])).toEqual(Cl.ok(Cl.stringAscii("stTKN")));
    expect(contract.callReadOnly("get-decimals", [])).toEqual(Cl.ok(Cl.uint(8)));
    expect(contract.callReadOnly("get-token-uri", []))
      .toEqual(Cl.ok(Cl.some(Cl.stringUtf8("https://example.com/sttkn.json"))));
  });
});

// -----------------------------------------------------------------------
// LocalChain host
// -----------------------------------------------------------------------

describe("local-chain", () => {
  let chain: LocalChain;
  let deployer: string;

  beforeEach(() => {
    chain = new LocalChain({
      config: { token: { name: "Pool Share", symbol: "PSH", uri: none } },
    });
    deployer = chain.getAccounts().get("deployer")!;
  });

  it("exposes five devnet accounts with testnet addresses", () => {
    const accounts = chain.getAccounts();
    expect([...accounts.keys()]).toEqual(["deployer", "wallet_1", "wallet_2", "wallet_3", "wallet_4"]);
    for (const address of accounts.values()) {
      expect(address.startsWith("ST")).toBe(true);
    }
    expect(new Set(accounts.values()).size).toBe(5);
  });

  it("deploys with the deployer as owner and the configured token", () => {
    expect(chain.callReadOnlyFn(CONTRACT, "get-contract-owner", [], deployer).result)
      .toEqual(Cl.ok(Cl.principal(deployer)));
    expect(chain.callReadOnlyFn(CONTRACT, "get-name", [], deployer).result)
      .toEqual(Cl.ok(Cl.stringAscii("Pool Share")));
    expect(chain.callReadOnlyFn(CONTRACT, "get-token-uri", [], deployer).result)
      .toEqual(Cl.ok(Cl.none()));
  });

  it("mines one block per executed call, failed responses included", () => {
    expect(chain.blockHeight).toBe(1n);
    chain.callPublicFn(CONTRACT, "pause-pool", [], deployer); // (err u102)
    expect(chain.blockHeight).toBe(2n);
    chain.callPublicFn(CONTRACT, "initialize-pool", [Cl.uint(500)], deployer);
    expect(chain.blockHeight).toBe(3n);
    expect(chain.mineEmptyBlocks(10)).toBe(13n);
  });

  it("does not mine a call rejected at dispatch", () => {
    expect(() => chain.callPublicFn(CONTRACT, "stake", [], deployer)).toThrow(ContractCallError);
    expect(() => chain.callPublicFn("other-pool", "stake", [Cl.uint(1)], deployer))
      .toThrow("other-pool::stake: no such contract");
    expect(chain.blockHeight).toBe(1n);
  });

  it("read-only calls leave the height alone", () => {
    chain.callReadOnlyFn(CONTRACT, "get-pool-stats", [], deployer);
    expect(chain.blockHeight).toBe(1n);
  });

  it("a failing pool subscriber does not break the call receipt", () => {
    chain.pool.subscribe(() => {
      throw new Error("indexer down");
    });

    const { result, events } = chain.callPublicFn(CONTRACT, "initialize-pool", [Cl.uint(500)], deployer);

    expect(result).toEqual(Cl.ok(Cl.bool(true)));
    expect(events).toEqual([{ type: "poolInitialized", rate: 500n, height: 1n }]);
    expect(chain.getEvents()).toEqual(events);
    expect(chain.blockHeight).toBe(2n);
  });

  it("rejects a negative or fractional block count", () => {
    expect(() => chain.mineEmptyBlocks(-1)).toThrow(RangeError);
    expect(() => chain.mineEmptyBlocks(1.5)).toThrow(RangeError);
  });
});
