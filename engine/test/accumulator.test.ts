import { describe, expect, it } from 'vitest';

import { ADMIN, ALICE, BOB, COMMUNITY, ENGINE, LP_A, LP_B, TREASURY, fund, mineTo, setupFarm } from './fixtures.js';

describe('Pool settlement', () => {
  it('is a no-op before the emission start and on repeat calls in one block', () => {
    const { chain, engine, reward } = setupFarm();
    expect(engine.pool(0).lastRewardBlock).toBe(100n);

    mineTo(chain, 95n);
    expect(engine.settle(0)).toBeUndefined();

    fund(chain, LP_A, ALICE, 1_000n);
    mineTo(chain, 100n);
    engine.deposit(ALICE, 0, 1_000n);
    mineTo(chain, 110n);

    const first = engine.settle(0);
    expect(first?.totalReward).toBe(100_000n);
    expect(engine.settle(0)).toBeUndefined();
    expect(reward.totalSupply).toBe(60_000n);
    expect(engine.events.ofType('PoolSettled')).toHaveLength(1);
  });

  it('splits emissions between pools by weight', () => {
    const { chain, engine, reward } = setupFarm([1n, 3n]);
    fund(chain, LP_A, ALICE, 100n);
    fund(chain, LP_B, BOB, 100n);

    mineTo(chain, 100n);
    engine.deposit(ALICE, 0, 100n);
    engine.deposit(BOB, 1, 100n);
    mineTo(chain, 110n);

    const a = engine.settle(0);
    const b = engine.settle(1);

    expect(a).toEqual({
      poolId: 0,
      lastRewardBlock: 110n,
      totalReward: 25_000n,
      lpSupply: 100n,
      treasuryMint: 3_750n,
      communityMint: 3_750n,
      poolMint: 7_500n,
      redirected: 0n,
    });
    expect(b?.totalReward).toBe(75_000n);

    expect(reward.balanceOf(TREASURY)).toBe(15_000n);
    expect(reward.balanceOf(COMMUNITY)).toBe(15_000n);
    expect(reward.balanceOf(ENGINE)).toBe(30_000n);
    expect(engine.pendingReward(0, ALICE)).toBe(7_500n);
    expect(engine.pendingReward(1, BOB)).toBe(22_500n);
  });

  it('redirects the pool share to the community wallet when nothing is staked', () => {
    const { chain, engine, reward } = setupFarm([1n, 3n]);
    mineTo(chain, 110n);

    const r = engine.settle(0);

    expect(r?.treasuryMint).toBe(3_750n);
    expect(r?.communityMint).toBe(11_250n);
    expect(r?.poolMint).toBe(0n);
    expect(r?.redirected).toBe(7_500n);
    expect(engine.pool(0).accRewardPerShare).toBe(0n);
    expect(engine.pool(0).lastRewardBlock).toBe(110n);
    expect(reward.balanceOf(ENGINE)).toBe(0n);
  });

  it('mints 60% of a multi-period emission and keeps truncation dust in custody', () => {
    const { chain, engine, reward } = setupFarm();
    fund(chain, LP_A, ALICE, 7n);
    mineTo(chain, 100n);
    engine.deposit(ALICE, 0, 7n);
    mineTo(chain, 125n);

    // 10 * 10000 + 10 * 5000 + 5 * 2500
    const r = engine.settle(0);
    expect(r?.totalReward).toBe(162_500n);
    expect(reward.totalSupply).toBe(97_500n);
    expect(engine.pool(0).accRewardPerShare).toBe(6_964_285_714_285_714_285_714n);

    const w = engine.withdraw(ALICE, 0, 7n);
    expect(w.rewardPaid).toBe(48_749n);
    expect(reward.balanceOf(ENGINE)).toBe(1n);
    expect(engine.pendingReward(0, ALICE)).toBe(0n);
  });

  it('stops at the end of the emission window', () => {
    const { chain, engine } = setupFarm();
    fund(chain, LP_A, ALICE, 1_000n);
    mineTo(chain, 100n);
    engine.deposit(ALICE, 0, 1_000n);

    mineTo(chain, 140n);
    expect(engine.settle(0)?.totalReward).toBe(175_000n);

    mineTo(chain, 150n);
    expect(engine.settle(0)?.totalReward).toBe(0n);
    expect(engine.pool(0).lastRewardBlock).toBe(150n);
  });

  it('emits nothing while the total weight is zero', () => {
    const { chain, engine, reward } = setupFarm([0n]);
    fund(chain, LP_A, ALICE, 1_000n);
    mineTo(chain, 100n);
    engine.deposit(ALICE, 0, 1_000n);
    mineTo(chain, 110n);

    const r = engine.settle(0);
    expect(r?.totalReward).toBe(0n);
    expect(r?.lastRewardBlock).toBe(110n);
    expect(reward.totalSupply).toBe(0n);
  });

  it('mints sixty percent across staked and unstaked pools in one mass settlement', () => {
    const { chain, engine, reward } = setupFarm([1n, 3n]);
    fund(chain, LP_A, ALICE, 1_000n);
    mineTo(chain, 100n);
    engine.deposit(ALICE, 0, 1_000n);
    mineTo(chain, 110n);

    const records = engine.massSettle(ADMIN);

    expect(records.map((r) => [r.poolId, r.totalReward, r.poolMint, r.redirected])).toEqual([
      [0, 25_000n, 7_500n, 0n],
      [1, 75_000n, 0n, 22_500n],
    ]);
    for (const r of records) {
      expect(r.treasuryMint + r.communityMint + r.poolMint).toBe((r.totalReward * 6_000n) / 10_000n);
    }
    expect(reward.totalSupply).toBe(60_000n);
    expect(reward.balanceOf(TREASURY)).toBe(15_000n);
    expect(reward.balanceOf(COMMUNITY)).toBe(37_500n);
    expect(reward.balanceOf(ENGINE)).toBe(7_500n);
  });

  it('projects pending reward without writing', () => {
    const { chain, engine, reward } = setupFarm();
    fund(chain, LP_A, ALICE, 1_000n);
    mineTo(chain, 100n);
    engine.deposit(ALICE, 0, 1_000n);
    mineTo(chain, 110n);

    expect(engine.pendingReward(0, ALICE)).toBe(30_000n);
    expect(engine.pool(0).lastRewardBlock).toBe(100n);
    expect(reward.totalSupply).toBe(0n);
    expect(engine.pendingReward(0, BOB)).toBe(0n);
  });
});
