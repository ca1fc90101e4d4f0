import { describe, expect, it } from 'vitest';

import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import { LocalChain } from '../src/chain/local-chain.js';
import { FarmEngine } from '../src/farm/engine.js';
import { decodeEvent, encodeEvent } from '../src/farm/events.js';
import { FarmDB } from '../src/storage/db.js';
import { ALICE, ENGINE, LP_A, REWARD, TREASURY, fund, mineTo, setupFarm } from './fixtures.js';

async function tempDb(): Promise<FarmDB> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'accrue-farm-db-'));
  return FarmDB.open(dir);
}

describe('Event encoding', () => {
  it('carries bigints through JSON', () => {
    const json = encodeEvent({ type: 'Deposit', block: 7n, poolId: 2, user: ALICE, amount: 12n });
    expect(json).toBe(`{"type":"Deposit","block":"7n","poolId":2,"user":"${ALICE}","amount":"12n"}`);
    expect(decodeEvent(json)).toEqual({ type: 'Deposit', block: 7n, poolId: 2, user: ALICE, amount: 12n });
  });

  it('rejects payloads that are not farm events', () => {
    expect(() => decodeEvent('{"type":"Nope","block":"1n"}')).toThrow();
  });
});

describe('SQLite storage', () => {
  it('creates schema, enables WAL and keeps meta', async () => {
    const db = await tempDb();

    expect(db.getJournalMode().toLowerCase()).toContain('wal');
    expect(db.hasSnapshot()).toBe(false);
    expect(db.loadSnapshot()).toBeUndefined();

    db.setMeta('note', 'x');
    expect(db.getMeta('note')).toBe('x');
    db.close();
  });

  it('restores an engine that behaves like the one saved', async () => {
    const { chain, engine } = setupFarm();
    fund(chain, LP_A, ALICE, 1_000n);
    mineTo(chain, 100n);
    engine.deposit(ALICE, 0, 1_000n);
    mineTo(chain, 105n);
    engine.settle(0);

    const db = await tempDb();
    db.saveSnapshot({ chain: chain.toRecord(), engine: engine.toRecord() });
    expect(db.hasSnapshot()).toBe(true);
    expect(db.countEvents()).toBe(engine.events.length);
    expect(db.countEvents('Deposit')).toBe(1);

    const snapshot = db.loadSnapshot();
    if (!snapshot) throw new Error('expected a snapshot');
    const chain2 = LocalChain.fromRecord(snapshot.chain);
    const engine2 = FarmEngine.restore(chain2, snapshot.engine);

    expect(chain2.blockNumber()).toBe(105n);
    expect(chain2.isContract(ENGINE)).toBe(true);
    expect(engine2.pools()).toEqual(engine.pools());
    expect(engine2.position(0, ALICE)).toEqual(engine.position(0, ALICE));
    expect(engine2.wallets).toEqual(engine.wallets);
    expect(engine2.schedule.rates()).toEqual(engine.schedule.rates());
    expect(engine2.events.list()).toEqual(engine.events.list());
    expect(chain2.ledger(REWARD).balanceOf(TREASURY)).toBe(7_500n);
    expect(chain2.ledger(LP_A).allowance(ALICE, ENGINE)).toBe(chain.ledger(LP_A).allowance(ALICE, ENGINE));

    // Both continue identically.
    mineTo(chain, 110n);
    mineTo(chain2, 110n);
    expect(engine2.withdraw(ALICE, 0, 1_000n).rewardPaid).toBe(engine.withdraw(ALICE, 0, 1_000n).rewardPaid);

    db.close();
  });

  it('appends only new events on later saves', async () => {
    const { chain, engine } = setupFarm();
    const db = await tempDb();
    db.saveSnapshot({ chain: chain.toRecord(), engine: engine.toRecord() });
    expect(db.countEvents()).toBe(1);

    mineTo(chain, 110n);
    engine.settle(0);
    db.saveSnapshot({ chain: chain.toRecord(), engine: engine.toRecord() });

    expect(db.countEvents()).toBe(2);
    expect(db.countEvents('PoolSettled')).toBe(1);
    db.close();
  });
});
