import { describe, expect, it } from 'vitest';

import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import { getAddress } from 'viem';

import { expandHome, loadFarmConfig, parseFarmConfig } from '../src/config/config.js';

const BASE = `
engineAddress = "0x0000000000000000000000000000000000009000"
admin = "0x0000000000000000000000000000000000000100"
treasuryWallet = "0x0000000000000000000000000000000000000200"
communityWallet = "0x0000000000000000000000000000000000000300"

[rewardToken]
address = "0x0000000000000000000000000000000000009100"
`;

describe('Config loading', () => {
  it('parses a valid TOML config and applies defaults', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'accrue-farm-config-'));
    const p = path.join(dir, 'farm.toml');

    await fs.writeFile(
      p,
      `${BASE}
dataDir = "${dir}"

[[pools]]
lp_token = "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd"
symbol = "LPX"
weight = 3
`,
      'utf8',
    );

    const cfg = await loadFarmConfig(p);

    expect(cfg.dataDir).toBe(dir);
    expect(cfg.admin).toBe('0x0000000000000000000000000000000000000100');
    expect(cfg.rewardToken).toEqual({
      address: '0x0000000000000000000000000000000000009100',
      name: 'Reward',
      symbol: 'RWD',
      decimals: 18,
    });
    expect(cfg.pools).toEqual([
      { lpToken: getAddress('0xabcdefabcdefabcdefabcdefabcdefabcdefabcd'), name: 'LPX', symbol: 'LPX', decimals: 18, weight: 3n },
    ]);

    // Defaults.
    expect(cfg.schedule).toEqual({
      startBlock: 0n,
      periodLength: 172_800n,
      periods: 24n,
      baseRate: 4_320_000n,
      decayNumerator: 9_900n,
      decayDenominator: 10_000n,
    });
    expect(cfg.chain).toEqual({ initialBlock: 0n, blockTimeMs: 0 });
    expect(cfg.keeper).toEqual({ enabled: true, settleEveryBlocks: 100n });
    expect(cfg.telemetry).toEqual({ logLevel: 'info', healthPort: undefined });
  });

  it('reads schedule overrides in either key style', () => {
    const cfg = parseFarmConfig(`${BASE}
[schedule]
start_block = 100
periodLength = 10
periods = 3
base_rate = "10000"

[keeper]
settle_every_blocks = 5

[telemetry]
logLevel = "debug"
healthPort = 0
`);

    expect(cfg.schedule.startBlock).toBe(100n);
    expect(cfg.schedule.periodLength).toBe(10n);
    expect(cfg.schedule.periods).toBe(3n);
    expect(cfg.schedule.baseRate).toBe(10_000n);
    expect(cfg.keeper.settleEveryBlocks).toBe(5n);
    expect(cfg.telemetry).toEqual({ logLevel: 'debug', healthPort: 0 });
  });

  it('throws on missing or invalid fields', () => {
    expect(() => parseFarmConfig('admin = "0x0000000000000000000000000000000000000100"')).toThrow(/Config:/);
    expect(() => parseFarmConfig(BASE.replace('0x0000000000000000000000000000000000000100', 'nope'))).toThrow(
      'Config: invalid admin (not an address)',
    );
    expect(() => parseFarmConfig(`${BASE}\n[schedule]\nperiods = 0\n`)).toThrow('Config: schedule.periods must be > 0');
    expect(() => parseFarmConfig(`${BASE}\n[telemetry]\nlogLevel = "loud"\n`)).toThrow('Config: invalid telemetry.logLevel');
  });

  it('rejects two pools on one LP token', () => {
    const pool = `
[[pools]]
lpToken = "0x0000000000000000000000000000000000009200"
weight = 1
`;
    expect(() => parseFarmConfig(`${BASE}${pool}${pool}`)).toThrow(/duplicate pool lpToken/);
  });

  it('accepts JSON', () => {
    const cfg = parseFarmConfig(
      JSON.stringify({
        engineAddress: '0x0000000000000000000000000000000000009000',
        admin: '0x0000000000000000000000000000000000000100',
        treasuryWallet: '0x0000000000000000000000000000000000000200',
        communityWallet: '0x0000000000000000000000000000000000000300',
        rewardToken: { address: '0x0000000000000000000000000000000000009100' },
        chain: { initialBlock: '42', blockTimeMs: 250 },
      }),
      'json',
    );
    expect(cfg.chain).toEqual({ initialBlock: 42n, blockTimeMs: 250 });
  });

  it('expands the home directory', () => {
    expect(expandHome('~/x')).toBe(path.join(os.homedir(), 'x'));
    expect(expandHome('/abs')).toBe('/abs');
  });
});
