#!/usr/bin/env node
import { Command } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import pino from 'pino';
import type { Address } from 'viem';
import { getAddress, isAddress, maxUint256 } from 'viem';

import { formatAmount, parseAmount } from '@accrue/sdk';
import { DEFAULT_CONFIG_PATH, expandHome, loadFarmConfig } from './config/config.js';
import { FarmDaemon } from './daemon.js';
import type { FarmRuntime } from './runtime.js';
import { addLocalPool, openRuntime, persist } from './runtime.js';

type PidFile = { pid: number; started_at: number; engine: Address };

function parseAddress(v: string, field: string): Address {
  if (!isAddress(v, { strict: false })) throw new Error(`${field}: not an address: ${v}`);
  return getAddress(v);
}

function parsePoolId(v: string): number {
  if (!/^\d+$/.test(v)) throw new Error(`invalid pool id: ${v}`);
  return Number(v);
}

function parseBlocks(v: string): bigint {
  if (!/^\d+$/.test(v)) throw new Error(`invalid block count: ${v}`);
  return BigInt(v);
}

/** Open the snapshot, run one operation, save, close. */
async function withRuntime<T>(configPath: string, fn: (rt: FarmRuntime) => T): Promise<T> {
  const config = await loadFarmConfig(configPath);
  // Logs go to stderr so command output stays parseable.
  const logger = pino({ level: config.telemetry.logLevel }, pino.destination(2));
  const rt = await openRuntime(config, { logger });
  try {
    const result = fn(rt);
    persist(rt);
    return result;
  } finally {
    rt.db.close();
  }
}

function lpDecimals(rt: FarmRuntime, poolId: number): number {
  return rt.chain.ledger(rt.engine.pool(poolId).lpToken).decimals;
}

function rewardDecimals(rt: FarmRuntime): number {
  return rt.chain.ledger(rt.engine.rewardToken).decimals;
}

async function readPidFile(dataDir: string): Promise<PidFile | undefined> {
  try {
    const txt = await fs.readFile(path.join(dataDir, 'farm.pid'), 'utf8');
    return JSON.parse(txt) as PidFile;
  } catch {
    return undefined;
  }
}

const program = new Command();
program.name('accrue-farm').description('Liquidity-mining reward engine on a local ledger').version('0.1.0');

program
  .command('init')
  .description('Create a starter farm.toml config')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts) => {
    const configPath = expandHome(opts.config as string);

    const example = `# ~/.accrue/farm.toml
# Local farm. Addresses are placeholders; replace with your own.

dataDir = "~/.accrue/farm"

engineAddress = "0x00000000000000000000000000000000000f4a00"
admin = "0x000000000000000000000000000000000000ad00"
treasuryWallet = "0x0000000000000000000000000000000000007e00"
communityWallet = "0x000000000000000000000000000000000000c000"

[rewardToken]
address = "0x00000000000000000000000000000000000e0a00"
name = "Reward"
symbol = "RWD"
decimals = 18

[schedule]
startBlock = 0
# periodLength = 172800
# periods = 24
# baseRate = 4320000
# decayNumerator = 9900
# decayDenominator = 10000

[[pools]]
lpToken = "0x0000000000000000000000000000000000001b01"
symbol = "LP-A"
weight = 1

[chain]
initialBlock = 0
# 0 mines blocks only on demand (accrue-farm mine).
blockTimeMs = 0

[keeper]
enabled = true
settleEveryBlocks = 100

[telemetry]
logLevel = "info"
# healthPort = 8788
`;

    await fs.mkdir(path.dirname(configPath), { recursive: true });
    try {
      await fs.writeFile(configPath, example, { flag: 'wx' });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`init: failed to write ${configPath}: ${msg}`);
    }

    process.stdout.write(`Wrote starter config: ${configPath}\n`);
  });

program
  .command('start')
  .description('Start the farm daemon (foreground)')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts) => {
    const daemon = new FarmDaemon({ configPath: opts.config as string });
    await daemon.start();

    const cfg = await loadFarmConfig(opts.config as string);
    await fs.mkdir(cfg.dataDir, { recursive: true });
    const pidFile: PidFile = { pid: process.pid, started_at: Date.now(), engine: cfg.engineAddress };
    await fs.writeFile(path.join(cfg.dataDir, 'farm.pid'), JSON.stringify(pidFile), 'utf8');

    const shutdown = async (signal: string) => {
      process.stdout.write(`\nReceived ${signal}, shutting down...\n`);
      try {
        await daemon.stop();
      } finally {
        process.exit(0);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    // Keep process alive.
    await new Promise(() => undefined);
  });

program
  .command('stop')
  .description('Stop a running farm daemon (via PID file)')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts) => {
    const cfg = await loadFarmConfig(opts.config as string);
    const pidFile = await readPidFile(cfg.dataDir);
    if (!pidFile) throw new Error('stop: PID file not found; daemon may not be running');

    try {
      process.kill(pidFile.pid, 'SIGTERM');
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`stop: failed to signal pid ${pidFile.pid}: ${msg}`);
    }

    process.stdout.write(`Sent SIGTERM to pid ${pidFile.pid}\n`);
  });

program
  .command('status')
  .description('Show engine status')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts) => {
    await withRuntime(opts.config as string, (rt) => {
      const block = rt.chain.blockNumber();
      const { clock, wallets } = rt.engine;
      process.stdout.write(`engine:       ${rt.engine.address}\n`);
      process.stdout.write(`admin:        ${rt.engine.adminAddress}\n`);
      process.stdout.write(`reward token: ${rt.engine.rewardToken}\n`);
      process.stdout.write(`treasury:     ${wallets.treasury}\n`);
      process.stdout.write(`community:    ${wallets.community}\n`);
      process.stdout.write(`block:        ${block}\n`);
      process.stdout.write(`period:       ${clock.isActive(block) ? clock.periodOf(block) : 'ended'}\n`);
      process.stdout.write(`pools:        ${rt.engine.poolLength} (total weight ${rt.engine.totalWeight})\n`);
      process.stdout.write(`events:       ${rt.engine.events.length}\n`);
    });
  });

program
  .command('schedule')
  .description('Print the emission schedule')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts) => {
    await withRuntime(opts.config as string, (rt) => {
      const decimals = rewardDecimals(rt);
      const { clock } = rt.engine;
      rt.engine.schedule.rates().forEach((rate, i) => {
        const p = BigInt(i + 1);
        process.stdout.write(
          `${p}\t[${clock.periodStart(p)}, ${clock.periodEnd(p)})\t${formatAmount(rate, decimals)} per block\n`,
        );
      });
    });
  });

program
  .command('pools')
  .description('List pools')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts) => {
    await withRuntime(opts.config as string, (rt) => {
      rt.engine.pools().forEach((p, id) => {
        const supply = formatAmount(rt.engine.lpSupply(id), lpDecimals(rt, id));
        process.stdout.write(
          `${id}\t${p.lpToken}\tweight=${p.weight}\tstaked=${supply}\tlastRewardBlock=${p.lastRewardBlock}\tacc=${p.accRewardPerShare}\n`,
        );
      });
    });
  });

program
  .command('pending')
  .description('Show a staker position and pending reward')
  .argument('<poolId>', 'Pool id')
  .argument('<user>', 'Staker address')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (poolIdArg: string, userArg: string, opts) => {
    const poolId = parsePoolId(poolIdArg);
    const user = parseAddress(userArg, 'user');
    await withRuntime(opts.config as string, (rt) => {
      const pos = rt.engine.position(poolId, user);
      process.stdout.write(`staked:  ${formatAmount(pos.amount, lpDecimals(rt, poolId))}\n`);
      process.stdout.write(`pending: ${formatAmount(rt.engine.pendingReward(poolId, user), rewardDecimals(rt))}\n`);
    });
  });

program
  .command('faucet')
  .description('Mint LP tokens to an address (admin owns the local LP tokens)')
  .argument('<poolId>', 'Pool id')
  .argument('<to>', 'Recipient')
  .argument('<amount>', 'Amount in whole tokens')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (poolIdArg: string, toArg: string, amountArg: string, opts) => {
    const poolId = parsePoolId(poolIdArg);
    const to = parseAddress(toArg, 'to');
    await withRuntime(opts.config as string, (rt) => {
      const lp = rt.engine.pool(poolId).lpToken;
      const amount = parseAmount(amountArg, lpDecimals(rt, poolId));
      rt.chain.invoke(() => rt.chain.token(lp, rt.config.admin).mint(to, amount));
      process.stdout.write(`Minted ${amountArg} to ${to}\n`);
    });
  });

program
  .command('approve')
  .description('Approve the engine to pull LP tokens')
  .argument('<poolId>', 'Pool id')
  .requiredOption('--from <address>', 'Staker address')
  .option('--amount <amount>', 'Allowance in whole tokens (default: unlimited)')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (poolIdArg: string, opts) => {
    const poolId = parsePoolId(poolIdArg);
    const from = parseAddress(String(opts.from), '--from');
    await withRuntime(opts.config as string, (rt) => {
      const lp = rt.engine.pool(poolId).lpToken;
      const amount = opts.amount != null ? parseAmount(String(opts.amount), lpDecimals(rt, poolId)) : maxUint256;
      rt.chain.invoke(() => rt.chain.token(lp, from).approve(rt.engine.address, amount));
      process.stdout.write(`Approved ${rt.engine.address} on ${lp}\n`);
    });
  });

program
  .command('deposit')
  .description('Stake LP tokens (0 claims pending reward)')
  .argument('<poolId>', 'Pool id')
  .argument('<amount>', 'Amount in whole tokens')
  .requiredOption('--from <address>', 'Staker address')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (poolIdArg: string, amountArg: string, opts) => {
    const poolId = parsePoolId(poolIdArg);
    const from = parseAddress(String(opts.from), '--from');
    await withRuntime(opts.config as string, (rt) => {
      const r = rt.engine.deposit(from, poolId, parseAmount(amountArg, lpDecimals(rt, poolId)));
      process.stdout.write(`Deposited; reward paid ${formatAmount(r.rewardPaid, rewardDecimals(rt))}\n`);
    });
  });

program
  .command('withdraw')
  .description('Unstake LP tokens and claim reward')
  .argument('<poolId>', 'Pool id')
  .argument('<amount>', 'Amount in whole tokens')
  .requiredOption('--from <address>', 'Staker address')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (poolIdArg: string, amountArg: string, opts) => {
    const poolId = parsePoolId(poolIdArg);
    const from = parseAddress(String(opts.from), '--from');
    await withRuntime(opts.config as string, (rt) => {
      const r = rt.engine.withdraw(from, poolId, parseAmount(amountArg, lpDecimals(rt, poolId)));
      process.stdout.write(`Withdrew; reward paid ${formatAmount(r.rewardPaid, rewardDecimals(rt))}\n`);
    });
  });

program
  .command('emergency-withdraw')
  .description('Return the whole stake and forfeit pending reward')
  .argument('<poolId>', 'Pool id')
  .requiredOption('--from <address>', 'Staker address')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (poolIdArg: string, opts) => {
    const poolId = parsePoolId(poolIdArg);
    const from = parseAddress(String(opts.from), '--from');
    await withRuntime(opts.config as string, (rt) => {
      const r = rt.engine.emergencyWithdraw(from, poolId);
      process.stdout.write(`Returned ${formatAmount(r.amount, lpDecimals(rt, poolId))} LP\n`);
    });
  });

program
  .command('add-pool')
  .description('Register an LP token (admin); deploys a local LP ledger owned by the admin if none exists')
  .argument('<lpToken>', 'LP token address')
  .argument('<weight>', 'Allocation weight')
  .option('--name <name>', 'Name for a newly deployed LP token', 'LP Token')
  .option('--symbol <symbol>', 'Symbol for a newly deployed LP token', 'LP')
  .option('--decimals <n>', 'Decimals for a newly deployed LP token', '18')
  .option('--no-update', 'Skip settling existing pools first')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (lpArg: string, weightArg: string, opts) => {
    const lp = parseAddress(lpArg, 'lpToken');
    const weight = parseBlocks(weightArg);
    const decimals = Number(opts.decimals);
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) throw new Error(`Invalid decimals: ${String(opts.decimals)}`);
    await withRuntime(opts.config as string, (rt) => {
      const preset = { lpToken: lp, name: String(opts.name), symbol: String(opts.symbol), decimals, weight };
      const id = addLocalPool(rt.chain, rt.engine, rt.config.admin, preset, { withUpdate: opts.update !== false });
      process.stdout.write(`Added pool ${id}\n`);
    });
  });

program
  .command('set-weight')
  .description('Change a pool weight (admin)')
  .argument('<poolId>', 'Pool id')
  .argument('<weight>', 'Allocation weight')
  .option('--no-update', 'Skip settling existing pools first')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (poolIdArg: string, weightArg: string, opts) => {
    const poolId = parsePoolId(poolIdArg);
    const weight = parseBlocks(weightArg);
    await withRuntime(opts.config as string, (rt) => {
      rt.engine.setPoolWeight(rt.config.admin, poolId, weight, { withUpdate: opts.update !== false });
      process.stdout.write(`Pool ${poolId} weight set to ${weight}\n`);
    });
  });

program
  .command('set-wallet')
  .description('Replace the treasury or community wallet (admin)')
  .argument('<kind>', 'treasury | community')
  .argument('<address>', 'New wallet')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (kind: string, addressArg: string, opts) => {
    const wallet = parseAddress(addressArg, 'address');
    await withRuntime(opts.config as string, (rt) => {
      if (kind === 'treasury') rt.engine.setTreasuryWallet(rt.config.admin, wallet);
      else if (kind === 'community') rt.engine.setCommunityWallet(rt.config.admin, wallet);
      else throw new Error(`set-wallet: unknown wallet kind ${kind}`);
      process.stdout.write(`${kind} wallet set to ${wallet}\n`);
    });
  });

program
  .command('mass-settle')
  .description('Settle every pool at the current block (admin)')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts) => {
    await withRuntime(opts.config as string, (rt) => {
      const records = rt.engine.massSettle(rt.config.admin);
      process.stdout.write(`Settled ${records.length} pool(s)\n`);
    });
  });

program
  .command('mine')
  .description('Advance the local chain')
  .argument('[blocks]', 'Number of blocks', '1')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (blocksArg: string, opts) => {
    const blocks = parseBlocks(blocksArg);
    await withRuntime(opts.config as string, (rt) => {
      process.stdout.write(`block ${rt.chain.mine(blocks)}\n`);
    });
  });

await program.parseAsync(process.argv);
