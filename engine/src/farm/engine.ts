import type { Address } from 'viem';
import { getAddress } from 'viem';
import type { Logger } from 'pino';

import type { FarmWallets, PoolInfo, ScheduleConfig, SettlementRecord, UserPosition } from '@accrue/sdk';
import { EmissionSchedule, PeriodClock, RangeMultiplier } from '@accrue/sdk';
import type { Metrics } from '../telemetry/metrics.js';
import type { WithUpdate } from './admin.js';
import { AdminSurface, requireExternallyOwned } from './admin.js';
import type { FarmHost } from './collaborators.js';
import { ConfigurationError } from './errors.js';
import type { FarmEvent } from './events.js';
import { EventJournal } from './events.js';
import { PoolAccumulator } from './pool-accumulator.js';
import type { StakeReceipt } from './staking.js';
import { StakingFacade } from './staking.js';
import type { FarmStateRecord } from './state.js';
import { FarmState } from './state.js';
import { UserLedger } from './user-ledger.js';

export type FarmEngineOptions = {
  logger?: Logger;
  metrics?: Metrics;
};

export type FarmEngineRecord = {
  schedule: ScheduleConfig;
  rates: bigint[];
  state: FarmStateRecord;
  events: FarmEvent[];
};

/**
 * Public surface of the reward engine. Every mutating call runs as one
 * atomic host invocation at the host's current block.
 */
export class FarmEngine {
  public readonly host: FarmHost;
  public readonly schedule: EmissionSchedule;
  public readonly clock: PeriodClock;
  public readonly rangeMultiplier: RangeMultiplier;

  private readonly scheduleConfig: ScheduleConfig;
  private readonly state: FarmState;
  private readonly journal: EventJournal;
  private readonly accumulator: PoolAccumulator;
  private readonly ledger: UserLedger;
  private readonly staking: StakingFacade;
  private readonly admin: AdminSurface;
  private readonly logger?: Logger;
  private readonly metrics?: Metrics;

  private constructor(args: {
    host: FarmHost;
    schedule: EmissionSchedule;
    scheduleConfig: ScheduleConfig;
    state: FarmState;
    journal: EventJournal;
    opts: FarmEngineOptions;
  }) {
    this.host = args.host;
    this.schedule = args.schedule;
    this.scheduleConfig = args.scheduleConfig;
    this.clock = new PeriodClock(args.scheduleConfig.startBlock, args.scheduleConfig.periodLength, args.scheduleConfig.periods);
    this.rangeMultiplier = new RangeMultiplier(this.schedule, this.clock);
    this.state = args.state;
    this.journal = args.journal;
    this.logger = args.opts.logger;
    this.metrics = args.opts.metrics;

    const common = { state: this.state, host: this.host, journal: this.journal, logger: this.logger };
    this.accumulator = new PoolAccumulator({ ...common, multiplier: this.rangeMultiplier, metrics: this.metrics });
    this.ledger = new UserLedger({ ...common, accumulator: this.accumulator, metrics: this.metrics });
    this.staking = new StakingFacade({ ...common, accumulator: this.accumulator, ledger: this.ledger, metrics: this.metrics });
    this.admin = new AdminSurface({ ...common, clock: this.clock, accumulator: this.accumulator });

    this.host.register(this.state);
    this.host.register(this.journal);
  }

  /**
   * Stand up a new engine at `self`. The reward token must already exist and
   * both wallets must be externally owned accounts.
   */
  static deploy(args: {
    host: FarmHost;
    self: Address;
    admin: Address;
    rewardToken: Address;
    wallets: FarmWallets;
    schedule: ScheduleConfig;
    opts?: FarmEngineOptions;
  }): FarmEngine {
    if (!args.host.isToken(args.rewardToken)) {
      throw new ConfigurationError('reward_token_not_contract', `Reward token ${getAddress(args.rewardToken)} is not a token contract`);
    }
    if (!args.host.isContract(args.self)) {
      throw new Error(`FarmEngine: ${getAddress(args.self)} must be registered as a contract before deploy`);
    }

    requireExternallyOwned(args.host, args.wallets.treasury);
    requireExternallyOwned(args.host, args.wallets.community);

    return new FarmEngine({
      host: args.host,
      schedule: new EmissionSchedule(args.schedule),
      scheduleConfig: args.schedule,
      state: new FarmState(args),
      journal: new EventJournal(),
      opts: args.opts ?? {},
    });
  }

  static restore(host: FarmHost, record: FarmEngineRecord, opts: FarmEngineOptions = {}): FarmEngine {
    const schedule = EmissionSchedule.fromRates(record.rates, record.schedule.decayNumerator, record.schedule.decayDenominator);
    if (schedule.baseRate !== record.schedule.baseRate || schedule.periods !== record.schedule.periods) {
      throw new Error('FarmEngine: persisted rate table does not match schedule');
    }
    return new FarmEngine({
      host,
      schedule,
      scheduleConfig: record.schedule,
      state: FarmState.fromRecord(record.state),
      journal: new EventJournal(record.events),
      opts,
    });
  }

  toRecord(): FarmEngineRecord {
    return {
      schedule: { ...this.scheduleConfig },
      rates: this.schedule.rates(),
      state: this.state.toRecord(),
      events: [...this.journal.list()],
    };
  }

  // ─── Views ──────────────────────────────────────────────────────────────

  get address(): Address {
    return this.state.self;
  }

  get adminAddress(): Address {
    return this.state.admin;
  }

  get rewardToken(): Address {
    return this.state.rewardToken;
  }

  get wallets(): FarmWallets {
    return { ...this.state.wallets };
  }

  get totalWeight(): bigint {
    return this.state.totalWeight;
  }

  get poolLength(): number {
    return this.state.poolLength;
  }

  get scheduleParams(): ScheduleConfig {
    return { ...this.scheduleConfig };
  }

  get events(): EventJournal {
    return this.journal;
  }

  pool(poolId: number): PoolInfo {
    return { ...this.state.pool(poolId) };
  }

  pools(): PoolInfo[] {
    return this.state.listPools().map((p) => ({ ...p }));
  }

  position(poolId: number, user: Address): UserPosition {
    this.state.pool(poolId);
    return this.state.position(poolId, user);
  }

  rateOf(period: bigint): bigint {
    return this.schedule.rateOf(period);
  }

  multiplier(from: bigint, to: bigint): bigint {
    return this.rangeMultiplier.multiplier(from, to);
  }

  pendingReward(poolId: number, user: Address): bigint {
    return this.ledger.pendingReward(poolId, user, this.host.blockNumber());
  }

  lpSupply(poolId: number): bigint {
    return this.accumulator.lpSupply(this.state.pool(poolId));
  }

  // ─── Stake entry points ─────────────────────────────────────────────────

  deposit(caller: Address, poolId: number, amount: bigint): StakeReceipt {
    return this.run((block) => this.staking.deposit(getAddress(caller), poolId, amount, block));
  }

  withdraw(caller: Address, poolId: number, amount: bigint): StakeReceipt {
    return this.run((block) => this.staking.withdraw(getAddress(caller), poolId, amount, block));
  }

  emergencyWithdraw(caller: Address, poolId: number): StakeReceipt {
    return this.run((block) => this.staking.emergencyWithdraw(getAddress(caller), poolId, block));
  }

  /** Settle one pool; anyone may call it. */
  settle(poolId: number): SettlementRecord | undefined {
    return this.run((block) => this.accumulator.settle(poolId, block));
  }

  // ─── Admin entry points ─────────────────────────────────────────────────

  massSettle(caller: Address): SettlementRecord[] {
    return this.run((block) => {
      this.admin.requireAdmin(caller, 'trigger bulk settlement');
      return this.accumulator.massSettle(block);
    });
  }

  addPool(caller: Address, weight: bigint, lpToken: Address, opts?: WithUpdate): number {
    return this.run((block) => this.admin.addPool(caller, weight, lpToken, block, opts));
  }

  setPoolWeight(caller: Address, poolId: number, weight: bigint, opts?: WithUpdate): void {
    this.run((block) => this.admin.setPoolWeight(caller, poolId, weight, block, opts));
  }

  setTreasuryWallet(caller: Address, wallet: Address): void {
    this.run((block) => this.admin.setWallet(caller, 'treasury', wallet, block));
  }

  setCommunityWallet(caller: Address, wallet: Address): void {
    this.run((block) => this.admin.setWallet(caller, 'community', wallet, block));
  }

  setRewardToken(caller: Address, token: Address): void {
    this.run((block) => this.admin.setRewardToken(caller, token, block));
  }

  transferRewardTokenOwnership(caller: Address, newOwner: Address): void {
    this.run((block) => this.admin.transferRewardTokenOwnership(caller, newOwner, block));
  }

  transferAdmin(caller: Address, next: Address): void {
    this.run((block) => this.admin.transferAdmin(caller, next, block));
  }

  private run<T>(fn: (block: bigint) => T): T {
    try {
      return this.host.invoke(() => fn(this.host.blockNumber()));
    } catch (err) {
      this.metrics?.inc('failed_invocations');
      this.logger?.debug({ err }, 'Invocation reverted');
      throw err;
    }
  }
}
