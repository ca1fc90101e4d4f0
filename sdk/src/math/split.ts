import { add, bpsMul } from './uint256.js';

export const TREASURY_BPS = 1_500n;
export const COMMUNITY_BPS = 1_500n;
export const POOL_BPS = 3_000n;
// Pre-minted allocation; never emitted by the engine.
export const RESERVED_BPS = 4_000n;

export type RewardSplit = {
  treasury: bigint;
  community: bigint;
  pool: bigint;
  /** Pool share folded into `community` because the pool had no stake. */
  redirected: bigint;
};

// Each share truncates on its own, so the parts may sum to slightly less than 60%.
export function splitReward(totalReward: bigint, lpSupply: bigint): RewardSplit {
  const treasury = bpsMul(totalReward, TREASURY_BPS);
  const community = bpsMul(totalReward, COMMUNITY_BPS);
  const pool = bpsMul(totalReward, POOL_BPS);

  if (lpSupply > 0n) return { treasury, community, pool, redirected: 0n };
  return { treasury, community: add(community, pool), pool: 0n, redirected: pool };
}
