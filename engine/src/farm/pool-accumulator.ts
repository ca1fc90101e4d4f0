import type { Logger } from 'pino';

import type { PoolInfo, RangeMultiplier, SettlementRecord } from '@accrue/sdk';
import { ACC_PRECISION, add, mulDiv, splitReward } from '@accrue/sdk';
import type { Metrics } from '../telemetry/metrics.js';
import type { FarmHost } from './collaborators.js';
import type { EventJournal } from './events.js';
import type { FarmState } from './state.js';

/**
 * Lazily advances each pool's reward-per-share accumulator up to the current
 * block, minting the treasury, community and pool shares as it goes.
 */
export class PoolAccumulator {
  private readonly state: FarmState;
  private readonly host: FarmHost;
  private readonly rangeMultiplier: RangeMultiplier;
  private readonly journal: EventJournal;
  private readonly logger?: Logger;
  private readonly metrics?: Metrics;

  constructor(opts: {
    state: FarmState;
    host: FarmHost;
    multiplier: RangeMultiplier;
    journal: EventJournal;
    logger?: Logger;
    metrics?: Metrics;
  }) {
    this.state = opts.state;
    this.host = opts.host;
    this.rangeMultiplier = opts.multiplier;
    this.journal = opts.journal;
    this.logger = opts.logger;
    this.metrics = opts.metrics;
  }

  // Truncates: pools collectively receive slightly less than the multiplier.
  poolReward(pool: PoolInfo, currentBlock: bigint): bigint {
    if (this.state.totalWeight === 0n) return 0n;
    const m = this.rangeMultiplier.multiplier(pool.lastRewardBlock, currentBlock);
    return mulDiv(m, pool.weight, this.state.totalWeight);
  }

  lpSupply(pool: PoolInfo): bigint {
    return this.host.token(pool.lpToken, this.state.self).balanceOf(this.state.self);
  }

  /** No-op (returns undefined) when the pool is already settled through `currentBlock`. */
  settle(poolId: number, currentBlock: bigint): SettlementRecord | undefined {
    const pool = this.state.pool(poolId);
    if (currentBlock <= pool.lastRewardBlock) return undefined;

    const totalReward = this.poolReward(pool, currentBlock);
    const lpSupply = this.lpSupply(pool);
    const split = splitReward(totalReward, lpSupply);

    const reward = this.host.token(this.state.rewardToken, this.state.self);
    reward.mint(this.state.wallets.treasury, split.treasury);
    reward.mint(this.state.wallets.community, split.community);
    if (lpSupply > 0n) {
      reward.mint(this.state.self, split.pool);
      pool.accRewardPerShare = add(pool.accRewardPerShare, mulDiv(split.pool, ACC_PRECISION, lpSupply));
    }
    pool.lastRewardBlock = currentBlock;

    const record: SettlementRecord = {
      poolId,
      lastRewardBlock: currentBlock,
      totalReward,
      lpSupply,
      treasuryMint: split.treasury,
      communityMint: split.community,
      poolMint: split.pool,
      redirected: split.redirected,
    };

    this.journal.emit({
      type: 'PoolSettled',
      block: currentBlock,
      poolId,
      lastRewardBlock: currentBlock,
      totalReward,
      treasuryMint: split.treasury,
      communityMint: split.community,
      poolMint: split.pool,
      redirected: split.redirected,
    });
    this.metrics?.inc('settlements');
    this.logger?.debug(
      { poolId, block: currentBlock.toString(), totalReward: totalReward.toString(), lpSupply: lpSupply.toString() },
      'Pool settled',
    );

    return record;
  }

  // Cost grows with pool count; large deployments may prefer settling pools individually.
  massSettle(currentBlock: bigint): SettlementRecord[] {
    const records: SettlementRecord[] = [];
    for (let poolId = 0; poolId < this.state.poolLength; poolId++) {
      const r = this.settle(poolId, currentBlock);
      if (r) records.push(r);
    }
    return records;
  }

  /** The accumulator `settle` would produce at `currentBlock`, without minting or writing. */
  projectAccumulator(poolId: number, currentBlock: bigint): bigint {
    const pool = this.state.pool(poolId);
    if (currentBlock <= pool.lastRewardBlock) return pool.accRewardPerShare;

    const lpSupply = this.lpSupply(pool);
    if (lpSupply === 0n) return pool.accRewardPerShare;

    const split = splitReward(this.poolReward(pool, currentBlock), lpSupply);
    return add(pool.accRewardPerShare, mulDiv(split.pool, ACC_PRECISION, lpSupply));
  }
}
