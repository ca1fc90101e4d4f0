import type { Address } from 'viem';
import type { Logger } from 'pino';

import { add, sub } from '@accrue/sdk';
import type { Metrics } from '../telemetry/metrics.js';
import type { FarmHost } from './collaborators.js';
import { InsufficientStake } from './errors.js';
import type { EventJournal } from './events.js';
import type { PoolAccumulator } from './pool-accumulator.js';
import type { FarmState } from './state.js';
import type { UserLedger } from './user-ledger.js';

export type StakeReceipt = {
  poolId: number;
  user: Address;
  amount: bigint;
  rewardPaid: bigint;
  stake: bigint;
};

/**
 * Stake entry points. Each one settles the pool before reading the
 * accumulator, and closes off the user's position before any external call
 * that could re-enter it.
 */
export class StakingFacade {
  private readonly state: FarmState;
  private readonly host: FarmHost;
  private readonly accumulator: PoolAccumulator;
  private readonly ledger: UserLedger;
  private readonly journal: EventJournal;
  private readonly logger?: Logger;
  private readonly metrics?: Metrics;

  constructor(opts: {
    state: FarmState;
    host: FarmHost;
    accumulator: PoolAccumulator;
    ledger: UserLedger;
    journal: EventJournal;
    logger?: Logger;
    metrics?: Metrics;
  }) {
    this.state = opts.state;
    this.host = opts.host;
    this.accumulator = opts.accumulator;
    this.ledger = opts.ledger;
    this.journal = opts.journal;
    this.logger = opts.logger;
    this.metrics = opts.metrics;
  }

  /** `amount = 0` only claims. */
  deposit(user: Address, poolId: number, amount: bigint, block: bigint): StakeReceipt {
    if (amount < 0n) throw new RangeError('deposit: amount must be >= 0');

    this.accumulator.settle(poolId, block);
    const pool = this.state.pool(poolId);

    let rewardPaid = 0n;
    if (this.state.position(poolId, user).amount > 0n) {
      rewardPaid = this.ledger.settleUserAndClaim(poolId, user, block);
    }

    if (amount > 0n) {
      this.host.token(pool.lpToken, this.state.self).transferFrom(user, this.state.self, amount);
      // Re-read: the pull may have re-entered and moved this position.
      const position = this.state.positionForWrite(poolId, user);
      position.amount = add(position.amount, amount);
      this.ledger.syncDebt(poolId, user);
    }

    const stake = this.state.position(poolId, user).amount;
    this.journal.emit({ type: 'Deposit', block, poolId, user, amount });
    this.metrics?.inc('deposits');
    this.logger?.info({ poolId, user, amount: amount.toString(), rewardPaid: rewardPaid.toString() }, 'Deposit');

    return { poolId, user, amount, rewardPaid, stake };
  }

  withdraw(user: Address, poolId: number, amount: bigint, block: bigint): StakeReceipt {
    if (amount < 0n) throw new RangeError('withdraw: amount must be >= 0');

    const pool = this.state.pool(poolId);
    const staked = this.state.position(poolId, user).amount;
    if (amount > staked) throw new InsufficientStake(poolId, amount, staked);

    this.accumulator.settle(poolId, block);
    const rewardPaid = this.ledger.settleUserAndClaim(poolId, user, block);

    // Stake and debt are final before the asset leaves custody. With amount = 0
    // the claim above already left the debt in sync.
    if (amount > 0n) {
      const position = this.state.positionForWrite(poolId, user);
      position.amount = sub(position.amount, amount);
      this.ledger.syncDebt(poolId, user);
      this.host.token(pool.lpToken, this.state.self).transfer(user, amount);
    }

    const stake = this.state.position(poolId, user).amount;
    this.journal.emit({ type: 'Withdraw', block, poolId, user, amount });
    this.metrics?.inc('withdrawals');
    this.logger?.info({ poolId, user, amount: amount.toString(), rewardPaid: rewardPaid.toString() }, 'Withdraw');

    return { poolId, user, amount, rewardPaid, stake };
  }

  /** Returns the full stake and forfeits anything pending. No settlement runs. */
  emergencyWithdraw(user: Address, poolId: number, block: bigint): StakeReceipt {
    const pool = this.state.pool(poolId);

    const position = this.state.positionForWrite(poolId, user);
    const amount = position.amount;
    position.amount = 0n;
    position.rewardDebt = 0n;

    this.host.token(pool.lpToken, this.state.self).transfer(user, amount);

    this.journal.emit({ type: 'EmergencyWithdraw', block, poolId, user, amount });
    this.metrics?.inc('emergency_withdrawals');
    this.logger?.warn({ poolId, user, amount: amount.toString() }, 'Emergency withdraw');

    return { poolId, user, amount, rewardPaid: 0n, stake: 0n };
  }
}
