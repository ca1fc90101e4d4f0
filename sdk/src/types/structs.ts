import type { Address } from 'viem';

export interface PoolInfo {
  lpToken: Address;
  weight: bigint;
  lastRewardBlock: bigint;
  // Scaled by ACC_PRECISION; never decreases.
  accRewardPerShare: bigint;
}

export interface UserPosition {
  amount: bigint;
  rewardDebt: bigint;
}

export interface SettlementRecord {
  poolId: number;
  lastRewardBlock: bigint;
  totalReward: bigint;
  lpSupply: bigint;
  treasuryMint: bigint;
  communityMint: bigint;
  poolMint: bigint;
  redirected: bigint;
}

export interface FarmWallets {
  treasury: Address;
  community: Address;
}
