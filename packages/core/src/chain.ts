/**
 * chain.ts
 *
 * An in-process host for the pool, shaped like Clarinet's simnet:
 *
 *   const chain = new LocalChain();
 *   const deployer = chain.getAccounts().get("deployer")!;
 *   chain.callPublicFn("staking-pool", "initialize-pool", [Cl.uint(500)], deployer);
 *   chain.mineEmptyBlocks(144);
 *
 * It owns the block height and the caller identity, runs one call at a
 * time, and mines one block per executed public call (failed responses
 * included; calls rejected at dispatch are not mined). Nothing here
 * touches the network.
 */

import { getAddressFromPrivateKey, TransactionVersion } from "@stacks/transactions";
import type { ClarityValue } from "@stacks/transactions";
import type { PoolEvent, Principal } from "@stakeline/types";
import { TOKEN_DECIMALS } from "./constants";
import { PoolContract } from "./contract";
import { ContractCallError } from "./errors";
import { assertOwner, loadConfig } from "./config";
import type { PoolConfig } from "./config";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import { StakingPool } from "./staking-pool";
import { createPoolContext } from "./store";

export const POOL_CONTRACT_NAME = "staking-pool";

// Placeholder devnet keys: 0x…01 through 0x…05, compressed.
const DEVNET_ACCOUNT_NAMES = ["deployer", "wallet_1", "wallet_2", "wallet_3", "wallet_4"];

function devnetKey(index: number): string {
  return (index + 1).toString(16).padStart(64, "0") + "01";
}

/** Testnet addresses for the devnet account names, derived from placeholder keys. */
export function devnetAccounts(): Map<string, Principal> {
  const accounts = new Map<string, Principal>();
  DEVNET_ACCOUNT_NAMES.forEach((name, index) => {
    accounts.set(name, getAddressFromPrivateKey(devnetKey(index), TransactionVersion.Testnet));
  });
  return accounts;
}

export interface PublicCallReceipt {
  result: ClarityValue;
  events: PoolEvent[];
}

export interface ReadOnlyCallReceipt {
  result: ClarityValue;
}

export interface LocalChainOptions {
  /** Overrides on top of the environment config. Owner defaults to the devnet deployer. */
  config?: Partial<PoolConfig>;
  logger?: Logger;
}

export class LocalChain {
  private height = 1n;
  private readonly accounts = devnetAccounts();
  private readonly contract: PoolContract;
  private readonly eventLog: PoolEvent[] = [];

  readonly pool: StakingPool;

  constructor(options: LocalChainOptions = {}) {
    const config: PoolConfig = {
      ...loadConfig(),
      network: "devnet",
      owner: this.accounts.get("deployer") ?? "",
      ...options.config,
    };
    const owner = assertOwner(config);
    const logger = options.logger ?? createLogger(POOL_CONTRACT_NAME, config.logLevel);

    const ctx = createPoolContext(
      owner,
      { name: config.token.name, symbol: config.token.symbol, decimals: TOKEN_DECIMALS },
      config.token.uri
    );
    this.pool = new StakingPool(ctx, { logger });
    this.contract = new PoolContract(POOL_CONTRACT_NAME, this.pool);
  }

  get blockHeight(): bigint {
    return this.height;
  }

  getAccounts(): Map<string, Principal> {
    return new Map(this.accounts);
  }

  /** Every event committed since deploy, in order. */
  getEvents(): readonly PoolEvent[] {
    return this.eventLog;
  }

  mineEmptyBlocks(count: number): bigint {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`block count must be a non-negative integer (got ${count})`);
    }
    this.height += BigInt(count);
    return this.height;
  }

  /**
   * Run a public function at the current height as `sender`, then mine the
   * block that contains it. Returns the response and the committed events.
   */
  callPublicFn(contract: string, functionName: string, args: ClarityValue[], sender: Principal): PublicCallReceipt {
    this.assertContract(contract, functionName);

    const events: PoolEvent[] = [];
    const unsubscribe = this.pool.subscribe((event) => events.push(event));
    try {
      const result = this.contract.callPublic(functionName, args, { caller: sender, height: this.height });
      this.eventLog.push(...events);
      this.height += 1n;
      return { result, events };
    } finally {
      unsubscribe();
    }
  }

  callReadOnlyFn(contract: string, functionName: string, args: ClarityValue[], _sender: Principal): ReadOnlyCallReceipt {
    this.assertContract(contract, functionName);
    return { result: this.contract.callReadOnly(functionName, args) };
  }

  private assertContract(contract: string, functionName: string): void {
    if (contract !== POOL_CONTRACT_NAME) {
      throw new ContractCallError(contract, functionName, "no such contract");
    }
  }
}
