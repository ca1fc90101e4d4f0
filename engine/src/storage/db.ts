import path from 'node:path';
import { promises as fs } from 'node:fs';

import Database from 'better-sqlite3';
import type { Address } from 'viem';
import { getAddress } from 'viem';

import type { ScheduleConfig } from '@accrue/sdk';
import type { ChainRecord } from '../chain/local-chain.js';
import type { TokenRecord } from '../chain/token-ledger.js';
import type { FarmEngineRecord } from '../farm/engine.js';
import { decodeEvent, encodeEvent } from '../farm/events.js';

export type FarmSnapshot = {
  chain: ChainRecord;
  engine: FarmEngineRecord;
};

type MetaRow = { key: string; value: string };
type TokenRow = { address: string; name: string; symbol: string; decimals: number; owner: string; total_supply: string };
type BalanceRow = { token: string; holder: string; amount: string };
type AllowanceRow = { token: string; owner: string; spender: string; amount: string };
type PoolRow = { pool_id: number; lp_token: string; weight: string; last_reward_block: string; acc_reward_per_share: string };
type PositionRow = { pool_id: number; user: string; amount: string; reward_debt: string };

const META_KEYS = [
  'block_number',
  'engine_address',
  'admin',
  'reward_token',
  'treasury_wallet',
  'community_wallet',
  'total_weight',
  'start_block',
  'period_length',
  'periods',
  'base_rate',
  'decay_numerator',
  'decay_denominator',
] as const;

type MetaKey = (typeof META_KEYS)[number];

export class FarmDB {
  public readonly filePath: string;
  private readonly db: Database.Database;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.db = new Database(filePath);

    this.applyPragmas();
    this.migrate();
  }

  static async open(dataDir: string): Promise<FarmDB> {
    await fs.mkdir(dataDir, { recursive: true });
    return new FarmDB(path.join(dataDir, 'farm.db'));
  }

  close(): void {
    this.db.close();
  }

  getJournalMode(): string {
    const mode: unknown = this.db.pragma('journal_mode', { simple: true });
    return String(mode);
  }

  private applyPragmas(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('busy_timeout = 5000');
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS farm_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS contracts (
        address TEXT PRIMARY KEY
      );

      CREATE TABLE IF NOT EXISTS tokens (
        address TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        symbol TEXT NOT NULL,
        decimals INT NOT NULL,
        owner TEXT NOT NULL,
        total_supply TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS balances (
        token TEXT NOT NULL REFERENCES tokens(address) ON DELETE CASCADE,
        holder TEXT NOT NULL,
        amount TEXT NOT NULL,
        PRIMARY KEY (token, holder)
      );

      CREATE TABLE IF NOT EXISTS allowances (
        token TEXT NOT NULL REFERENCES tokens(address) ON DELETE CASCADE,
        owner TEXT NOT NULL,
        spender TEXT NOT NULL,
        amount TEXT NOT NULL,
        PRIMARY KEY (token, owner, spender)
      );

      CREATE TABLE IF NOT EXISTS rates (
        period INT PRIMARY KEY,
        rate TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS pools (
        pool_id INT PRIMARY KEY,
        lp_token TEXT NOT NULL UNIQUE,
        weight TEXT NOT NULL,
        last_reward_block TEXT NOT NULL,
        acc_reward_per_share TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS positions (
        pool_id INT NOT NULL REFERENCES pools(pool_id),
        user TEXT NOT NULL,
        amount TEXT NOT NULL,
        reward_debt TEXT NOT NULL,
        PRIMARY KEY (pool_id, user)
      );

      CREATE TABLE IF NOT EXISTS events (
        seq INTEGER PRIMARY KEY,
        block TEXT NOT NULL,
        type TEXT NOT NULL,
        payload_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_events_type ON events(type);
    `);
  }

  // ─── farm_meta ──────────────────────────────────────────────────────────

  getMeta(key: string): string | undefined {
    const row = this.db.prepare('SELECT value FROM farm_meta WHERE key = ?').get(key) as MetaRow | undefined;
    return row?.value;
  }

  setMeta(key: string, value: string): void {
    this.db
      .prepare('INSERT INTO farm_meta(key, value) VALUES(?, ?) ON CONFLICT(key) DO UPDATE SET value=excluded.value')
      .run(key, value);
  }

  hasSnapshot(): boolean {
    return this.getMeta('engine_address') != null;
  }

  // ─── events ─────────────────────────────────────────────────────────────

  countEvents(type?: string): number {
    const row = (
      type == null
        ? this.db.prepare('SELECT COUNT(*) AS n FROM events').get()
        : this.db.prepare('SELECT COUNT(*) AS n FROM events WHERE type = ?').get(type)
    ) as { n: number };
    return row.n;
  }

  // ─── snapshot ───────────────────────────────────────────────────────────

  /** Replace everything on disk with `snapshot`, in one transaction. */
  saveSnapshot(snapshot: FarmSnapshot): void {
    const { chain, engine } = snapshot;
    const { state, schedule } = engine;

    const write = this.db.transaction(() => {
      this.db.exec(`
        DELETE FROM positions;
        DELETE FROM pools;
        DELETE FROM rates;
        DELETE FROM allowances;
        DELETE FROM balances;
        DELETE FROM tokens;
        DELETE FROM contracts;
      `);

      const meta: Record<MetaKey, string> = {
        block_number: chain.blockNumber.toString(),
        engine_address: state.self,
        admin: state.admin,
        reward_token: state.rewardToken,
        treasury_wallet: state.wallets.treasury,
        community_wallet: state.wallets.community,
        total_weight: state.totalWeight.toString(),
        start_block: schedule.startBlock.toString(),
        period_length: schedule.periodLength.toString(),
        periods: schedule.periods.toString(),
        base_rate: schedule.baseRate.toString(),
        decay_numerator: schedule.decayNumerator.toString(),
        decay_denominator: schedule.decayDenominator.toString(),
      };
      for (const key of META_KEYS) this.setMeta(key, meta[key]);

      const insertContract = this.db.prepare('INSERT INTO contracts(address) VALUES(?)');
      for (const c of chain.contracts) insertContract.run(c);

      const insertToken = this.db.prepare(
        'INSERT INTO tokens(address, name, symbol, decimals, owner, total_supply) VALUES(?, ?, ?, ?, ?, ?)',
      );
      const insertBalance = this.db.prepare('INSERT INTO balances(token, holder, amount) VALUES(?, ?, ?)');
      const insertAllowance = this.db.prepare('INSERT INTO allowances(token, owner, spender, amount) VALUES(?, ?, ?, ?)');
      for (const t of chain.tokens) {
        insertToken.run(t.address, t.name, t.symbol, t.decimals, t.owner, t.totalSupply.toString());
        for (const b of t.balances) insertBalance.run(t.address, b.holder, b.amount.toString());
        for (const a of t.allowances) insertAllowance.run(t.address, a.owner, a.spender, a.amount.toString());
      }

      const insertRate = this.db.prepare('INSERT INTO rates(period, rate) VALUES(?, ?)');
      engine.rates.forEach((rate, i) => insertRate.run(i + 1, rate.toString()));

      const insertPool = this.db.prepare(
        'INSERT INTO pools(pool_id, lp_token, weight, last_reward_block, acc_reward_per_share) VALUES(?, ?, ?, ?, ?)',
      );
      state.pools.forEach((p, poolId) =>
        insertPool.run(poolId, p.lpToken, p.weight.toString(), p.lastRewardBlock.toString(), p.accRewardPerShare.toString()),
      );

      const insertPosition = this.db.prepare('INSERT INTO positions(pool_id, user, amount, reward_debt) VALUES(?, ?, ?, ?)');
      for (const p of state.positions) insertPosition.run(p.poolId, p.user, p.amount.toString(), p.rewardDebt.toString());

      // The journal is append-only; only rows past what is stored are new.
      const stored = this.countEvents();
      const insertEvent = this.db.prepare('INSERT INTO events(seq, block, type, payload_json) VALUES(?, ?, ?, ?)');
      engine.events.slice(stored).forEach((e, i) => insertEvent.run(stored + i, e.block.toString(), e.type, encodeEvent(e)));
    });

    write();
  }

  loadSnapshot(): FarmSnapshot | undefined {
    if (!this.hasSnapshot()) return undefined;

    const meta = (key: MetaKey): string => {
      const v = this.getMeta(key);
      if (v == null) throw new Error(`FarmDB: snapshot is missing ${key}`);
      return v;
    };
    const addr = (key: MetaKey): Address => getAddress(meta(key));
    const big = (key: MetaKey): bigint => BigInt(meta(key));

    const balances = this.db.prepare('SELECT * FROM balances ORDER BY token, holder').all() as BalanceRow[];
    const allowances = this.db.prepare('SELECT * FROM allowances ORDER BY token, owner, spender').all() as AllowanceRow[];
    const tokens = (this.db.prepare('SELECT * FROM tokens ORDER BY address').all() as TokenRow[]).map(
      (t): TokenRecord => ({
        address: getAddress(t.address),
        name: t.name,
        symbol: t.symbol,
        decimals: t.decimals,
        owner: getAddress(t.owner),
        totalSupply: BigInt(t.total_supply),
        balances: balances
          .filter((b) => b.token === t.address)
          .map((b) => ({ holder: getAddress(b.holder), amount: BigInt(b.amount) })),
        allowances: allowances
          .filter((a) => a.token === t.address)
          .map((a) => ({ owner: getAddress(a.owner), spender: getAddress(a.spender), amount: BigInt(a.amount) })),
      }),
    );
    const contracts = (this.db.prepare('SELECT address FROM contracts').all() as Array<{ address: string }>).map((c) =>
      getAddress(c.address),
    );

    const schedule: ScheduleConfig = {
      startBlock: big('start_block'),
      periodLength: big('period_length'),
      periods: big('periods'),
      baseRate: big('base_rate'),
      decayNumerator: big('decay_numerator'),
      decayDenominator: big('decay_denominator'),
    };
    const rates = (this.db.prepare('SELECT rate FROM rates ORDER BY period ASC').all() as Array<{ rate: string }>).map((r) =>
      BigInt(r.rate),
    );

    const pools = (this.db.prepare('SELECT * FROM pools ORDER BY pool_id ASC').all() as PoolRow[]).map((p) => ({
      lpToken: getAddress(p.lp_token),
      weight: BigInt(p.weight),
      lastRewardBlock: BigInt(p.last_reward_block),
      accRewardPerShare: BigInt(p.acc_reward_per_share),
    }));
    const positions = (this.db.prepare('SELECT * FROM positions').all() as PositionRow[]).map((p) => ({
      poolId: p.pool_id,
      user: getAddress(p.user),
      amount: BigInt(p.amount),
      rewardDebt: BigInt(p.reward_debt),
    }));
    const events = (this.db.prepare('SELECT payload_json FROM events ORDER BY seq ASC').all() as Array<{ payload_json: string }>).map(
      (r) => decodeEvent(r.payload_json),
    );

    return {
      chain: { blockNumber: big('block_number'), contracts, tokens },
      engine: {
        schedule,
        rates,
        state: {
          self: addr('engine_address'),
          admin: addr('admin'),
          rewardToken: addr('reward_token'),
          wallets: { treasury: addr('treasury_wallet'), community: addr('community_wallet') },
          totalWeight: big('total_weight'),
          pools,
          positions,
        },
        events,
      },
    };
  }
}
