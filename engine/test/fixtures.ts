import type { Address } from 'viem';
import { maxUint256 } from 'viem';

import type { ScheduleConfig } from '@accrue/sdk';
import { LocalChain } from '../src/chain/local-chain.js';
import type { TokenLedger } from '../src/chain/token-ledger.js';
import { FarmEngine } from '../src/farm/engine.js';
import { Metrics } from '../src/telemetry/metrics.js';

export const ADMIN: Address = '0x0000000000000000000000000000000000000100';
export const TREASURY: Address = '0x0000000000000000000000000000000000000200';
export const COMMUNITY: Address = '0x0000000000000000000000000000000000000300';
export const ALICE: Address = '0x0000000000000000000000000000000000001000';
export const BOB: Address = '0x0000000000000000000000000000000000002000';
export const ENGINE: Address = '0x0000000000000000000000000000000000009000';
export const REWARD: Address = '0x0000000000000000000000000000000000009100';
export const LP_A: Address = '0x0000000000000000000000000000000000009200';
export const LP_B: Address = '0x0000000000000000000000000000000000009300';

// Rates 10000, 5000, 2500 per block over [100, 130).
export const SMALL_SCHEDULE: ScheduleConfig = {
  startBlock: 100n,
  periodLength: 10n,
  periods: 3n,
  baseRate: 10_000n,
  decayNumerator: 5_000n,
  decayDenominator: 10_000n,
};

export type Farm = {
  chain: LocalChain;
  engine: FarmEngine;
  reward: TokenLedger;
  lpA: TokenLedger;
  lpB: TokenLedger;
  metrics: Metrics;
};

/** Chain at block 90 with the engine deployed and one pool per entry in `weights` (LP_A, LP_B). */
export function setupFarm(weights: bigint[] = [1n]): Farm {
  const chain = new LocalChain({ initialBlock: 90n });
  chain.registerContract(ENGINE);

  const reward = chain.deployToken({ address: REWARD, name: 'Reward', symbol: 'RWD', decimals: 18, owner: ENGINE });
  const lpA = chain.deployToken({ address: LP_A, name: 'LP A', symbol: 'LPA', decimals: 18, owner: ADMIN });
  const lpB = chain.deployToken({ address: LP_B, name: 'LP B', symbol: 'LPB', decimals: 18, owner: ADMIN });

  const metrics = new Metrics();
  const engine = FarmEngine.deploy({
    host: chain,
    self: ENGINE,
    admin: ADMIN,
    rewardToken: REWARD,
    wallets: { treasury: TREASURY, community: COMMUNITY },
    schedule: SMALL_SCHEDULE,
    opts: { metrics },
  });

  const lps = [LP_A, LP_B];
  weights.forEach((w, i) => engine.addPool(ADMIN, w, lps[i]));

  return { chain, engine, reward, lpA, lpB, metrics };
}

/** Mint LP to `user` and approve the engine for all of it. */
export function fund(chain: LocalChain, lp: Address, user: Address, amount: bigint, approve = true): void {
  chain.invoke(() => {
    chain.token(lp, ADMIN).mint(user, amount);
    if (approve) chain.token(lp, user).approve(ENGINE, maxUint256);
  });
}

export function mineTo(chain: LocalChain, block: bigint): void {
  chain.mine(block - chain.blockNumber());
}
