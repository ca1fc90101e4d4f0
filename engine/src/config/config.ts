import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import type { Address } from 'viem';
import { getAddress, isAddress } from 'viem';
import * as smolToml from 'smol-toml';

import type { ScheduleConfig } from '@accrue/sdk';
import { defaultSchedule } from '@accrue/sdk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type PoolPreset = {
  lpToken: Address;
  name: string;
  symbol: string;
  decimals: number;
  weight: bigint;
};

export type RewardTokenConfig = {
  address: Address;
  name: string;
  symbol: string;
  decimals: number;
};

export type FarmConfig = {
  dataDir: string;

  // Accounts
  engineAddress: Address;
  admin: Address;
  treasuryWallet: Address;
  communityWallet: Address;

  rewardToken: RewardTokenConfig;
  schedule: ScheduleConfig;
  pools: PoolPreset[];

  chain: {
    initialBlock: bigint;
    // 0 disables the block timer; blocks are mined on demand.
    blockTimeMs: number;
  };

  keeper: {
    enabled: boolean;
    settleEveryBlocks: bigint;
  };

  telemetry: {
    logLevel: LogLevel;
    healthPort?: number;
  };
};

type RawTable = Record<string, unknown>;

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.accrue', 'farm.toml');

export function expandHome(p: string): string {
  if (!p) return p;
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(os.homedir(), p.slice(2));
  return p;
}

function asTable(v: unknown, field: string): RawTable {
  if (v == null) return {};
  if (typeof v !== 'object' || Array.isArray(v)) throw new Error(`Config: invalid ${field} (expected table)`);
  return Object.fromEntries(Object.entries(v));
}

function pick(raw: RawTable, camel: string, snake: string): unknown {
  return raw[camel] ?? raw[snake];
}

function asString(v: unknown, field: string, defaultValue?: string): string {
  if (v == null && defaultValue != null) return defaultValue;
  if (typeof v !== 'string' || !v) throw new Error(`Config: missing/invalid ${field}`);
  return v;
}

function asBoolean(v: unknown, field: string, defaultValue: boolean): boolean {
  if (v == null) return defaultValue;
  if (typeof v !== 'boolean') throw new Error(`Config: invalid ${field} (expected boolean)`);
  return v;
}

function asNumber(v: unknown, field: string, defaultValue?: number): number {
  if (v == null) {
    if (defaultValue == null) throw new Error(`Config: missing ${field}`);
    return defaultValue;
  }
  if (typeof v !== 'number' || !Number.isFinite(v)) throw new Error(`Config: invalid ${field} (expected number)`);
  return v;
}

function asBigInt(v: unknown, field: string, defaultValue?: bigint): bigint {
  if (v == null) {
    if (defaultValue == null) throw new Error(`Config: missing ${field}`);
    return defaultValue;
  }
  if (typeof v === 'bigint') return v;
  if (typeof v === 'number') {
    if (!Number.isInteger(v)) throw new Error(`Config: invalid ${field} (expected integer)`);
    return BigInt(v);
  }
  if (typeof v === 'string') {
    if (!/^\d+$/.test(v)) throw new Error(`Config: invalid ${field} (expected integer string)`);
    return BigInt(v);
  }
  throw new Error(`Config: invalid ${field} (expected bigint-compatible)`);
}

function asAddress(v: unknown, field: string): Address {
  const s = asString(v, field);
  if (!isAddress(s, { strict: false })) throw new Error(`Config: invalid ${field} (not an address)`);
  return getAddress(s);
}

function asLogLevel(v: unknown): LogLevel {
  if (v == null) return 'info';
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  throw new Error('Config: invalid telemetry.logLevel');
}

function asArray(v: unknown, field: string): unknown[] {
  if (v == null) return [];
  if (!Array.isArray(v)) throw new Error(`Config: invalid ${field} (expected array)`);
  return v;
}

function normalizeSchedule(v: unknown): ScheduleConfig {
  const raw = asTable(v, 'schedule');
  const d = defaultSchedule();

  const schedule: ScheduleConfig = {
    startBlock: asBigInt(pick(raw, 'startBlock', 'start_block'), 'schedule.startBlock', d.startBlock),
    periodLength: asBigInt(pick(raw, 'periodLength', 'period_length'), 'schedule.periodLength', d.periodLength),
    periods: asBigInt(raw.periods, 'schedule.periods', d.periods),
    baseRate: asBigInt(pick(raw, 'baseRate', 'base_rate'), 'schedule.baseRate', d.baseRate),
    decayNumerator: asBigInt(pick(raw, 'decayNumerator', 'decay_numerator'), 'schedule.decayNumerator', d.decayNumerator),
    decayDenominator: asBigInt(
      pick(raw, 'decayDenominator', 'decay_denominator'),
      'schedule.decayDenominator',
      d.decayDenominator,
    ),
  };

  if (schedule.periodLength <= 0n) throw new Error('Config: schedule.periodLength must be > 0');
  if (schedule.periods <= 0n) throw new Error('Config: schedule.periods must be > 0');
  if (schedule.decayDenominator <= 0n || schedule.decayNumerator > schedule.decayDenominator) {
    throw new Error('Config: schedule decay must be a fraction <= 1');
  }
  return schedule;
}

function normalizePool(v: unknown, i: number): PoolPreset {
  const raw = asTable(v, `pools[${i}]`);
  const symbol = asString(raw.symbol, `pools[${i}].symbol`, `LP-${i}`);
  return {
    lpToken: asAddress(pick(raw, 'lpToken', 'lp_token'), `pools[${i}].lpToken`),
    name: asString(raw.name, `pools[${i}].name`, symbol),
    symbol,
    decimals: asNumber(raw.decimals, `pools[${i}].decimals`, 18),
    weight: asBigInt(raw.weight, `pools[${i}].weight`),
  };
}

function normalizeConfig(input: unknown): FarmConfig {
  const raw = asTable(input, 'root');
  const dataDir = expandHome(asString(pick(raw, 'dataDir', 'data_dir'), 'dataDir', path.join(os.homedir(), '.accrue', 'farm')));

  const rewardRaw = asTable(pick(raw, 'rewardToken', 'reward_token'), 'rewardToken');
  const rewardToken: RewardTokenConfig = {
    address: asAddress(rewardRaw.address, 'rewardToken.address'),
    name: asString(rewardRaw.name, 'rewardToken.name', 'Reward'),
    symbol: asString(rewardRaw.symbol, 'rewardToken.symbol', 'RWD'),
    decimals: asNumber(rewardRaw.decimals, 'rewardToken.decimals', 18),
  };

  const pools = asArray(raw.pools, 'pools').map(normalizePool);
  const lpSeen = new Set<Address>();
  for (const p of pools) {
    if (lpSeen.has(p.lpToken)) throw new Error(`Config: duplicate pool lpToken ${p.lpToken}`);
    lpSeen.add(p.lpToken);
  }

  const chainRaw = asTable(raw.chain, 'chain');
  const blockTimeMs = asNumber(pick(chainRaw, 'blockTimeMs', 'block_time_ms'), 'chain.blockTimeMs', 0);
  if (blockTimeMs < 0) throw new Error('Config: chain.blockTimeMs must be >= 0');

  const keeperRaw = asTable(raw.keeper, 'keeper');
  const settleEveryBlocks = asBigInt(
    pick(keeperRaw, 'settleEveryBlocks', 'settle_every_blocks'),
    'keeper.settleEveryBlocks',
    100n,
  );
  if (settleEveryBlocks <= 0n) throw new Error('Config: keeper.settleEveryBlocks must be > 0');

  const telemetryRaw = asTable(raw.telemetry, 'telemetry');
  const healthPort = pick(telemetryRaw, 'healthPort', 'health_port');

  return {
    dataDir,
    engineAddress: asAddress(pick(raw, 'engineAddress', 'engine_address'), 'engineAddress'),
    admin: asAddress(raw.admin, 'admin'),
    treasuryWallet: asAddress(pick(raw, 'treasuryWallet', 'treasury_wallet'), 'treasuryWallet'),
    communityWallet: asAddress(pick(raw, 'communityWallet', 'community_wallet'), 'communityWallet'),
    rewardToken,
    schedule: normalizeSchedule(raw.schedule),
    pools,
    chain: {
      initialBlock: asBigInt(pick(chainRaw, 'initialBlock', 'initial_block'), 'chain.initialBlock', 0n),
      blockTimeMs,
    },
    keeper: {
      enabled: asBoolean(keeperRaw.enabled, 'keeper.enabled', true),
      settleEveryBlocks,
    },
    telemetry: {
      logLevel: asLogLevel(pick(telemetryRaw, 'logLevel', 'log_level')),
      healthPort: healthPort != null ? asNumber(healthPort, 'telemetry.healthPort') : undefined,
    },
  };
}

export function parseFarmConfig(text: string, format: 'toml' | 'json' = 'toml'): FarmConfig {
  if (format === 'json') return normalizeConfig(JSON.parse(text));

  let raw: unknown;
  try {
    raw = smolToml.parse(text);
  } catch (errToml) {
    // Fall back to JSON for .conf-style files that hold JSON.
    try {
      raw = JSON.parse(text);
    } catch {
      const msg = errToml instanceof Error ? errToml.message : String(errToml);
      throw new Error(`Config: failed to parse TOML (and JSON fallback failed): ${msg}`);
    }
  }
  return normalizeConfig(raw);
}

export async function loadFarmConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<FarmConfig> {
  const p = expandHome(configPath);
  const rawText = await fs.readFile(p, 'utf8');
  return parseFarmConfig(rawText, path.extname(p).toLowerCase() === '.json' ? 'json' : 'toml');
}
