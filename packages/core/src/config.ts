import "dotenv/config";
import { StacksMainnet, StacksTestnet, StacksDevnet, StacksNetwork } from "@stacks/network";
import { validateStacksAddress } from "@stacks/transactions";
import type { Optional } from "@stakeline/types";
import { ConfigError } from "./errors";
import { isLogLevel } from "./logger";
import type { LogLevel } from "./logger";
import { none, some } from "./result";
import { MAX_TOKEN_URI_LENGTH } from "./constants";

export type NetworkName = "mainnet" | "testnet" | "devnet";

export interface PoolConfig {
  network: NetworkName;

  // Deploy-time owner. Every owner-gated call compares the caller to this
  // principal; it cannot be reassigned after deploy.
  owner: string;

  token: {
    name: string;
    symbol: string;
    uri: Optional<string>;
  };

  logLevel: LogLevel;
}

function parseNetwork(raw: string): NetworkName {
  if (raw === "mainnet" || raw === "testnet" || raw === "devnet") return raw;
  throw new ConfigError(`STACKS_NETWORK must be mainnet, testnet or devnet (got "${raw}")`);
}

/** Read the pool configuration from the environment (and `.env`). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const logLevel = env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL "${logLevel}" is not a known level`);
  }

  const uri = env.TOKEN_URI;
  if (uri !== undefined && uri.length > MAX_TOKEN_URI_LENGTH) {
    throw new ConfigError(`TOKEN_URI exceeds ${MAX_TOKEN_URI_LENGTH} characters`);
  }

  return {
    network: parseNetwork(env.STACKS_NETWORK ?? "devnet"),
    owner: env.POOL_OWNER ?? "",
    token: {
      name:   env.TOKEN_NAME   ?? "Staked Token",
      symbol: env.TOKEN_SYMBOL ?? "stTKN",
      uri:    uri ? some(uri) : none,
    },
    logLevel,
  };
}

// -----------------------------------------------------------------------
// Network
// -----------------------------------------------------------------------

export function getNetwork(name: NetworkName): StacksNetwork {
  switch (name) {
    case "mainnet":
      return new StacksMainnet();
    case "testnet":
      return new StacksTestnet();
    case "devnet":
      return new StacksDevnet();
  }
}

/**
 * Check that `owner` is a standard principal for the configured network:
 * SP/SM on mainnet, ST/SN on testnet and devnet.
 */
export function assertOwner(config: PoolConfig): string {
  const { owner } = config;
  if (!owner) throw new ConfigError("POOL_OWNER is not set");
  if (!validateStacksAddress(owner)) {
    throw new ConfigError(`POOL_OWNER "${owner}" is not a valid Stacks address`);
  }

  const mainnetAddress = owner.startsWith("SP") || owner.startsWith("SM");
  if (getNetwork(config.network).isMainnet() !== mainnetAddress) {
    throw new ConfigError(`POOL_OWNER "${owner}" does not belong to ${config.network}`);
  }
  return owner;
}
