// Print events emitted by the pool for off-chain indexers.
// Only calls that commit produce events.

import type { Principal } from "./pool";
import type { Optional } from "./result";

export type PoolEvent =
  | { type: "poolInitialized"; rate: bigint; height: bigint }
  | { type: "stake"; account: Principal; amount: bigint; height: bigint }
  | { type: "unstake"; account: Principal; amount: bigint; height: bigint }
  | { type: "distributeYield"; amount: bigint; height: bigint }
  | { type: "claimRewards"; account: Principal; amount: bigint; height: bigint }
  | {
      type: "transfer";
      amount: bigint;
      sender: Principal;
      recipient: Principal;
      memo: Optional<Uint8Array>; // opaque, never interpreted
      height: bigint;
    }
  | { type: "poolPaused"; height: bigint }
  | { type: "poolUnpaused"; height: bigint }
  | { type: "yieldRateUpdated"; rate: bigint; height: bigint }
  | { type: "insuranceToggled"; enabled: boolean; height: bigint }
  | { type: "insuranceFunded"; amount: bigint; height: bigint }
  | { type: "tokenUriUpdated"; uri: Optional<string>; height: bigint };
