import { describe, expect, it } from 'vitest';

import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import pino from 'pino';

import type { FarmConfig } from '../src/config/config.js';
import { FarmDaemon } from '../src/daemon.js';
import type { HealthStatus } from '../src/telemetry/health.js';
import type { MetricsSnapshot } from '../src/telemetry/metrics.js';
import { ADMIN, COMMUNITY, ENGINE, LP_A, REWARD, SMALL_SCHEDULE, TREASURY } from './fixtures.js';

async function testConfig(): Promise<FarmConfig> {
  const dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'accrue-farm-daemon-'));
  return {
    dataDir,
    engineAddress: ENGINE,
    admin: ADMIN,
    treasuryWallet: TREASURY,
    communityWallet: COMMUNITY,
    rewardToken: { address: REWARD, name: 'Reward', symbol: 'RWD', decimals: 18 },
    schedule: SMALL_SCHEDULE,
    pools: [{ lpToken: LP_A, name: 'LP A', symbol: 'LPA', decimals: 18, weight: 1n }],
    chain: { initialBlock: 98n, blockTimeMs: 0 },
    keeper: { enabled: true, settleEveryBlocks: 5n },
    telemetry: { logLevel: 'error', healthPort: 0 },
  };
}

function newDaemon(config: FarmConfig): FarmDaemon {
  return new FarmDaemon({
    configPath: path.join(config.dataDir, 'farm.toml'),
    logger: pino({ level: 'silent' }),
    deps: { loadConfig: async () => config },
  });
}

describe('Daemon lifecycle', () => {
  it('bootstraps, mines on demand, runs modules and serves health', async () => {
    const config = await testConfig();
    const calls: string[] = [];

    const daemon = newDaemon(config);
    daemon.registerModule('recorder', {
      onStart: () => {
        calls.push('start');
      },
      onBlock: (_ctx, block) => {
        calls.push(`block ${block}`);
      },
      onStop: () => {
        calls.push('stop');
      },
    });

    await daemon.start();
    expect(daemon.status()).toMatchObject({ ok: true, ready: true, block: '98', pools: 1, period: undefined });

    await daemon.mineBlock();
    await daemon.mineBlock();
    expect(daemon.metrics.counter('blocks_mined')).toBe(2);
    expect(daemon.metrics.counter('keeper_runs')).toBe(1);

    const res = await fetch(`http://127.0.0.1:${daemon.healthPort}/health`);
    expect(res.status).toBe(200);
    const body = (await res.json()) as HealthStatus;
    expect(body.block).toBe('100');
    expect(body.period).toBe('1');
    expect(body.modules).toEqual({
      recorder: { started: true, lastBlock: '100' },
      keeper: { started: true, lastBlock: '100' },
    });

    const metricsRes = await fetch(`http://127.0.0.1:${daemon.healthPort}/metrics`);
    const metrics = (await metricsRes.json()) as MetricsSnapshot;
    expect(metrics.counters.blocks_mined).toBe(2);
    expect(metrics.gauges.block).toBe(100);

    await daemon.stop();
    expect(calls).toEqual(['start', 'block 99', 'block 100', 'stop']);

    // A second start picks up the saved chain instead of bootstrapping again.
    const again = newDaemon(config);
    await again.start();
    expect(again.status().block).toBe('100');
    expect(again.status().pools).toBe(1);
    await again.stop();
  });

  it('records a failing module without stopping block production', async () => {
    const config = await testConfig();
    config.keeper.enabled = false;
    config.telemetry.healthPort = undefined;

    const daemon = newDaemon(config);
    daemon.registerModule('flaky', {
      onBlock: () => {
        throw new Error('nope');
      },
    });

    await daemon.start();
    expect(await daemon.mineBlock()).toBe(99n);
    expect(daemon.status().warnings).toEqual(['flaky failed at block 99: nope']);
    expect(daemon.status().modules).toEqual({ flaky: { started: true, lastBlock: undefined } });
    await daemon.stop();
  });
});
