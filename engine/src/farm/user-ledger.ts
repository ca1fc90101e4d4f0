import type { Address } from 'viem';
import type { Logger } from 'pino';

import type { UserPosition } from '@accrue/sdk';
import { ACC_PRECISION, min, mulDiv } from '@accrue/sdk';
import type { Metrics } from '../telemetry/metrics.js';
import type { FarmHost } from './collaborators.js';
import { LedgerInvariantViolation } from './errors.js';
import type { EventJournal } from './events.js';
import type { PoolAccumulator } from './pool-accumulator.js';
import type { FarmState } from './state.js';

export function accruedReward(position: UserPosition, accRewardPerShare: bigint): bigint {
  return mulDiv(position.amount, accRewardPerShare, ACC_PRECISION);
}

export function pendingAgainst(position: UserPosition, accRewardPerShare: bigint): bigint {
  const accrued = accruedReward(position, accRewardPerShare);
  if (accrued < position.rewardDebt) {
    throw new LedgerInvariantViolation(`Pending reward is negative (accrued ${accrued}, debt ${position.rewardDebt})`);
  }
  return accrued - position.rewardDebt;
}

export class UserLedger {
  private readonly state: FarmState;
  private readonly host: FarmHost;
  private readonly accumulator: PoolAccumulator;
  private readonly journal: EventJournal;
  private readonly logger?: Logger;
  private readonly metrics?: Metrics;

  constructor(opts: {
    state: FarmState;
    host: FarmHost;
    accumulator: PoolAccumulator;
    journal: EventJournal;
    logger?: Logger;
    metrics?: Metrics;
  }) {
    this.state = opts.state;
    this.host = opts.host;
    this.accumulator = opts.accumulator;
    this.journal = opts.journal;
    this.logger = opts.logger;
    this.metrics = opts.metrics;
  }

  /** Pending reward as if the pool were settled at `currentBlock`; writes nothing. */
  pendingReward(poolId: number, user: Address, currentBlock: bigint): bigint {
    const acc = this.accumulator.projectAccumulator(poolId, currentBlock);
    return pendingAgainst(this.state.position(poolId, user), acc);
  }

  /**
   * Pay out what `user` has accrued in an already-settled pool. Returns the
   * amount actually transferred, which may be capped by the engine's balance.
   */
  settleUserAndClaim(poolId: number, user: Address, block: bigint): bigint {
    const acc = this.state.pool(poolId).accRewardPerShare;
    const pending = pendingAgainst(this.state.position(poolId, user), acc);
    // Debt catches up before the transfer so a re-entrant claim finds nothing.
    if (pending > 0n) this.syncDebt(poolId, user);
    const paid = this.safeRewardTransfer(user, pending);

    this.journal.emit({ type: 'RewardPaid', block, poolId, user, pending, paid });
    this.metrics?.inc('reward_payouts');
    if (paid < pending) {
      this.metrics?.inc('capped_payouts');
      this.logger?.warn({ poolId, user, pending: pending.toString(), paid: paid.toString() }, 'Reward payout capped');
    }
    return paid;
  }

  // Under-pays rather than fails when rounding leaves custody short.
  safeRewardTransfer(to: Address, amount: bigint): bigint {
    const reward = this.host.token(this.state.rewardToken, this.state.self);
    const paid = min(amount, reward.balanceOf(this.state.self));
    reward.transfer(to, paid);
    return paid;
  }

  syncDebt(poolId: number, user: Address): void {
    const acc = this.state.pool(poolId).accRewardPerShare;
    const position = this.state.positionForWrite(poolId, user);
    position.rewardDebt = accruedReward(position, acc);
  }
}
