import type { Address } from 'viem';
import { getAddress } from 'viem';

import type { FarmWallets, PoolInfo, UserPosition } from '@accrue/sdk';
import type { Revertible } from '../chain/revertible.js';
import { UnknownPool } from './errors.js';

export type FarmStateRecord = {
  self: Address;
  admin: Address;
  rewardToken: Address;
  wallets: FarmWallets;
  totalWeight: bigint;
  pools: PoolInfo[];
  positions: Array<{ poolId: number; user: Address } & UserPosition>;
};

/**
 * Everything the engine persists besides the rate table. Pools are addressed
 * by their index in `pools`; positions are keyed by pool id then user.
 */
export class FarmState implements Revertible {
  public readonly self: Address;
  public admin: Address;
  public rewardToken: Address;
  public wallets: FarmWallets;
  public totalWeight = 0n;

  private pools: PoolInfo[] = [];
  private positions = new Map<number, Map<Address, UserPosition>>();

  constructor(args: { self: Address; admin: Address; rewardToken: Address; wallets: FarmWallets }) {
    this.self = getAddress(args.self);
    this.admin = getAddress(args.admin);
    this.rewardToken = getAddress(args.rewardToken);
    this.wallets = { treasury: getAddress(args.wallets.treasury), community: getAddress(args.wallets.community) };
  }

  static fromRecord(r: FarmStateRecord): FarmState {
    const s = new FarmState(r);
    s.totalWeight = r.totalWeight;
    s.pools = r.pools.map((p) => ({ ...p, lpToken: getAddress(p.lpToken) }));
    for (const p of r.positions) {
      s.positionForWrite(p.poolId, p.user).amount = p.amount;
      s.positionForWrite(p.poolId, p.user).rewardDebt = p.rewardDebt;
    }
    return s;
  }

  get poolLength(): number {
    return this.pools.length;
  }

  pool(poolId: number): PoolInfo {
    const p = Number.isInteger(poolId) ? this.pools[poolId] : undefined;
    if (!p) throw new UnknownPool(poolId);
    return p;
  }

  listPools(): readonly PoolInfo[] {
    return this.pools;
  }

  appendPool(pool: PoolInfo): number {
    this.pools.push(pool);
    return this.pools.length - 1;
  }

  /** Read a position without creating it; absent users read as zero. */
  position(poolId: number, user: Address): UserPosition {
    const p = this.positions.get(poolId)?.get(getAddress(user));
    return p ? { ...p } : { amount: 0n, rewardDebt: 0n };
  }

  positionForWrite(poolId: number, user: Address): UserPosition {
    let byUser = this.positions.get(poolId);
    if (!byUser) {
      byUser = new Map<Address, UserPosition>();
      this.positions.set(poolId, byUser);
    }
    const key = getAddress(user);
    let p = byUser.get(key);
    if (!p) {
      p = { amount: 0n, rewardDebt: 0n };
      byUser.set(key, p);
    }
    return p;
  }

  // Restores in place so references held by an outer invocation stay live
  // when a nested one rolls back.
  checkpoint(): () => void {
    const admin = this.admin;
    const rewardToken = this.rewardToken;
    const wallets = { ...this.wallets };
    const totalWeight = this.totalWeight;
    const pools = this.pools.map((ref) => ({ ref, saved: { ...ref } }));
    const positions = [...this.positions].flatMap(([poolId, byUser]) =>
      [...byUser].map(([user, ref]) => ({ poolId, user, ref, saved: { ...ref } })),
    );

    return () => {
      this.admin = admin;
      this.rewardToken = rewardToken;
      this.wallets = wallets;
      this.totalWeight = totalWeight;
      this.pools = pools.map(({ ref, saved }) => Object.assign(ref, saved));

      this.positions = new Map<number, Map<Address, UserPosition>>();
      for (const { poolId, user, ref, saved } of positions) {
        let byUser = this.positions.get(poolId);
        if (!byUser) {
          byUser = new Map<Address, UserPosition>();
          this.positions.set(poolId, byUser);
        }
        byUser.set(user, Object.assign(ref, saved));
      }
    };
  }

  toRecord(): FarmStateRecord {
    return {
      self: this.self,
      admin: this.admin,
      rewardToken: this.rewardToken,
      wallets: { ...this.wallets },
      totalWeight: this.totalWeight,
      pools: this.pools.map((p) => ({ ...p })),
      positions: [...this.positions].flatMap(([poolId, byUser]) =>
        [...byUser].map(([user, p]) => ({ poolId, user, amount: p.amount, rewardDebt: p.rewardDebt })),
      ),
    };
  }
}
