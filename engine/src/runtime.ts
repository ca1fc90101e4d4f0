import type { Logger } from 'pino';
import type { Address } from 'viem';

import { LocalChain } from './chain/local-chain.js';
import type { FarmConfig, PoolPreset } from './config/config.js';
import type { WithUpdate } from './farm/admin.js';
import { FarmEngine } from './farm/engine.js';
import { FarmDB } from './storage/db.js';
import type { Metrics } from './telemetry/metrics.js';

export type FarmRuntime = {
  config: FarmConfig;
  db: FarmDB;
  chain: LocalChain;
  engine: FarmEngine;
};

export type RuntimeOptions = {
  logger?: Logger;
  metrics?: Metrics;
  openDb?: (dataDir: string) => Promise<FarmDB>;
};

/**
 * Fresh chain from config: the reward token (owned by the engine), one LP
 * token per configured pool (owned by the admin, who can mint test balances),
 * and those pools added at the initial block.
 */
export function bootstrap(config: FarmConfig, opts: Omit<RuntimeOptions, 'openDb'> = {}): { chain: LocalChain; engine: FarmEngine } {
  const chain = new LocalChain({ initialBlock: config.chain.initialBlock });
  chain.registerContract(config.engineAddress);

  chain.deployToken({ ...config.rewardToken, owner: config.engineAddress });

  const engine = FarmEngine.deploy({
    host: chain,
    self: config.engineAddress,
    admin: config.admin,
    rewardToken: config.rewardToken.address,
    wallets: { treasury: config.treasuryWallet, community: config.communityWallet },
    schedule: config.schedule,
    opts,
  });

  for (const p of config.pools) addLocalPool(chain, engine, config.admin, p);

  opts.logger?.info({ engine: engine.address, pools: engine.poolLength }, 'Bootstrapped farm');
  return { chain, engine };
}

/**
 * Add a pool for `preset.lpToken`, first deploying a local LP ledger owned by
 * `admin` when nothing lives at that address. Both happen or neither does.
 */
export function addLocalPool(
  chain: LocalChain,
  engine: FarmEngine,
  admin: Address,
  preset: PoolPreset,
  opts?: WithUpdate,
): number {
  return chain.invoke(() => {
    if (!chain.isContract(preset.lpToken)) {
      chain.deployToken({
        address: preset.lpToken,
        name: preset.name,
        symbol: preset.symbol,
        decimals: preset.decimals,
        owner: admin,
      });
    }
    return engine.addPool(admin, preset.weight, preset.lpToken, opts);
  });
}

export async function openRuntime(config: FarmConfig, opts: RuntimeOptions = {}): Promise<FarmRuntime> {
  const db = await (opts.openDb ?? FarmDB.open)(config.dataDir);

  try {
    const snapshot = db.loadSnapshot();
    if (!snapshot) {
      const fresh = bootstrap(config, opts);
      const runtime = { config, db, ...fresh };
      persist(runtime);
      return runtime;
    }

    if (snapshot.engine.state.self !== config.engineAddress) {
      throw new Error(`Runtime: stored engine ${snapshot.engine.state.self} does not match config ${config.engineAddress}`);
    }

    const chain = LocalChain.fromRecord(snapshot.chain);
    const engine = FarmEngine.restore(chain, snapshot.engine, opts);
    opts.logger?.debug({ block: chain.blockNumber().toString() }, 'Restored farm snapshot');
    return { config, db, chain, engine };
  } catch (err) {
    db.close();
    throw err;
  }
}

export function persist(runtime: Pick<FarmRuntime, 'db' | 'chain' | 'engine'>): void {
  runtime.db.saveSnapshot({ chain: runtime.chain.toRecord(), engine: runtime.engine.toRecord() });
}
