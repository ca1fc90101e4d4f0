import type { Address } from 'viem';
import { getAddress, zeroAddress } from 'viem';
import type { Logger } from 'pino';

import type { PeriodClock } from '@accrue/sdk';
import { add, max, sub } from '@accrue/sdk';
import type { FarmHost } from './collaborators.js';
import { ConfigurationError, Unauthorized } from './errors.js';
import type { EventJournal } from './events.js';
import type { PoolAccumulator } from './pool-accumulator.js';
import type { FarmState } from './state.js';

export type WithUpdate = { withUpdate?: boolean };

// Treasury and community wallets must be externally owned accounts.
export function requireExternallyOwned(host: Pick<FarmHost, 'isContract'>, address: Address): Address {
  const a = getAddress(address);
  if (a === zeroAddress) throw new ConfigurationError('zero_address', 'Wallet may not be the zero address');
  if (host.isContract(a)) throw new ConfigurationError('wallet_is_contract', `Wallet ${a} is a contract`);
  return a;
}

export class AdminSurface {
  private readonly state: FarmState;
  private readonly host: FarmHost;
  private readonly clock: PeriodClock;
  private readonly accumulator: PoolAccumulator;
  private readonly journal: EventJournal;
  private readonly logger?: Logger;

  constructor(opts: {
    state: FarmState;
    host: FarmHost;
    clock: PeriodClock;
    accumulator: PoolAccumulator;
    journal: EventJournal;
    logger?: Logger;
  }) {
    this.state = opts.state;
    this.host = opts.host;
    this.clock = opts.clock;
    this.accumulator = opts.accumulator;
    this.journal = opts.journal;
    this.logger = opts.logger;
  }

  requireAdmin(caller: Address, action: string): void {
    if (getAddress(caller) !== this.state.admin) throw new Unauthorized(caller, action);
  }

  requireWallet(address: Address): Address {
    return requireExternallyOwned(this.host, address);
  }

  setWallet(caller: Address, wallet: 'treasury' | 'community', address: Address, block: bigint): void {
    this.requireAdmin(caller, `set the ${wallet} wallet`);
    const next = this.requireWallet(address);
    const previous = this.state.wallets[wallet];
    this.state.wallets = { ...this.state.wallets, [wallet]: next };

    this.journal.emit({ type: 'WalletUpdated', block, wallet, previous, next });
    this.logger?.info({ wallet, previous, next }, 'Wallet updated');
  }

  setRewardToken(caller: Address, token: Address, block: bigint): void {
    this.requireAdmin(caller, 'set the reward token');
    const next = getAddress(token);
    if (!this.host.isToken(next)) {
      throw new ConfigurationError('reward_token_not_contract', `Reward token ${next} is not a token contract`);
    }
    if (this.state.listPools().some((p) => p.lpToken === next)) {
      throw new ConfigurationError('reward_token_is_lp', `Reward token ${next} is staked in a pool`);
    }
    const previous = this.state.rewardToken;
    this.state.rewardToken = next;

    this.journal.emit({ type: 'RewardTokenUpdated', block, previous, next });
    this.logger?.info({ previous, next }, 'Reward token updated');
  }

  /** Irrevocable: the engine can no longer mint once this succeeds. */
  transferRewardTokenOwnership(caller: Address, newOwner: Address, block: bigint): void {
    this.requireAdmin(caller, 'transfer reward token ownership');
    const owner = getAddress(newOwner);
    if (owner === zeroAddress) throw new ConfigurationError('zero_address', 'New owner may not be the zero address');

    this.host.token(this.state.rewardToken, this.state.self).transferOwnership(owner);

    this.journal.emit({ type: 'RewardTokenOwnershipTransferred', block, token: this.state.rewardToken, newOwner: owner });
    this.logger?.warn({ token: this.state.rewardToken, newOwner: owner }, 'Reward token ownership transferred');
  }

  transferAdmin(caller: Address, next: Address, block: bigint): void {
    this.requireAdmin(caller, 'transfer admin');
    const admin = getAddress(next);
    if (admin === zeroAddress) throw new ConfigurationError('zero_address', 'Admin may not be the zero address');
    const previous = this.state.admin;
    this.state.admin = admin;

    this.journal.emit({ type: 'AdminTransferred', block, previous, next: admin });
    this.logger?.warn({ previous, next: admin }, 'Admin transferred');
  }

  addPool(caller: Address, weight: bigint, lpToken: Address, block: bigint, opts: WithUpdate = {}): number {
    this.requireAdmin(caller, 'add a pool');
    if (weight < 0n) throw new RangeError('addPool: weight must be >= 0');
    if (block >= this.clock.endBlock) {
      throw new ConfigurationError('emission_ended', `Emission window ended at block ${this.clock.endBlock}`);
    }

    const lp = getAddress(lpToken);
    if (!this.host.isContract(lp)) throw new ConfigurationError('lp_not_contract', `LP token ${lp} is not a contract`);
    if (lp === this.state.self || !this.host.isToken(lp)) {
      throw new ConfigurationError('lp_not_token', `LP token ${lp} is not a token contract`);
    }
    // Engine's LP balance must not include reward custody.
    if (lp === this.state.rewardToken) {
      throw new ConfigurationError('lp_is_reward_token', `LP token ${lp} is the reward token`);
    }
    if (this.state.listPools().some((p) => p.lpToken === lp)) {
      throw new ConfigurationError('lp_duplicate', `LP token ${lp} already has a pool`);
    }

    if (opts.withUpdate) this.accumulator.massSettle(block);

    const lastRewardBlock = max(block, this.clock.startBlock);
    this.state.totalWeight = add(this.state.totalWeight, weight);
    const poolId = this.state.appendPool({ lpToken: lp, weight, lastRewardBlock, accRewardPerShare: 0n });

    this.journal.emit({ type: 'PoolAdded', block, poolId, lpToken: lp, weight, lastRewardBlock });
    this.logger?.info({ poolId, lpToken: lp, weight: weight.toString() }, 'Pool added');
    return poolId;
  }

  setPoolWeight(caller: Address, poolId: number, weight: bigint, block: bigint, opts: WithUpdate = {}): void {
    this.requireAdmin(caller, 'set a pool weight');
    if (weight < 0n) throw new RangeError('setPoolWeight: weight must be >= 0');
    const pool = this.state.pool(poolId);

    if (opts.withUpdate) this.accumulator.massSettle(block);

    const previous = pool.weight;
    this.state.totalWeight = add(sub(this.state.totalWeight, previous), weight);
    pool.weight = weight;

    this.journal.emit({ type: 'PoolWeightSet', block, poolId, previous, weight, totalWeight: this.state.totalWeight });
    this.logger?.info({ poolId, previous: previous.toString(), weight: weight.toString() }, 'Pool weight set');
  }
}
