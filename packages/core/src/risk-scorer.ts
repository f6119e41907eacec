// Risk score: a cumulative participation counter. One point per whole
// token ever staked; unstaking and transfers leave it untouched.

import type { Principal, Result } from "@stakeline/types";
import { RISK_SCORE_DIVISOR } from "./constants";
import { checkedAdd } from "./safe-math";
import type { Overflow } from "./safe-math";
import { readUint } from "./store";
import type { KeyValueMap } from "./store";

export function riskScoreOf(scores: KeyValueMap<Principal, bigint>, account: Principal): bigint {
  return readUint(scores, account);
}

/** Stakes under one whole token (1e8 base units) add nothing. */
export function scoreDelta(amount: bigint): bigint {
  return amount / RISK_SCORE_DIVISOR;
}

/** Add a stake to the account's score and return the new score. */
export function recordStake(
  scores: KeyValueMap<Principal, bigint>,
  account: Principal,
  amount: bigint
): Result<bigint, Overflow> {
  const score = checkedAdd(riskScoreOf(scores, account), scoreDelta(amount));
  if (score.ok) scores.set(account, score.value);
  return score;
}
