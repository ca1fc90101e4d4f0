import pino from 'pino';
import type { Logger } from 'pino';

import type { FarmConfig } from './config/config.js';
import { DEFAULT_CONFIG_PATH, loadFarmConfig } from './config/config.js';
import type { FarmRuntime, RuntimeOptions } from './runtime.js';
import { openRuntime, persist } from './runtime.js';
import type { FarmDB } from './storage/db.js';
import type { HealthStatus } from './telemetry/health.js';
import { HealthServer } from './telemetry/health.js';
import type { MetricsSnapshot } from './telemetry/metrics.js';
import { Metrics } from './telemetry/metrics.js';

export type FarmDaemonDeps = {
  loadConfig?: (configPath: string) => Promise<FarmConfig>;
  openDb?: (dataDir: string) => Promise<FarmDB>;
  createHealthServer?: (args: {
    port: number;
    getStatus: () => HealthStatus;
    getMetrics: () => MetricsSnapshot;
  }) => HealthServer;
};

export type DaemonContext = FarmRuntime & {
  logger: Logger;
  metrics: Metrics;
};

export type DaemonModuleHooks = {
  onStart?: (ctx: DaemonContext) => void | Promise<void>;
  onStop?: (ctx: DaemonContext) => void | Promise<void>;
  onBlock?: (ctx: DaemonContext, block: bigint) => void | Promise<void>;
};

type ModuleState = {
  name: string;
  hooks: DaemonModuleHooks;
  started: boolean;
  lastBlock?: bigint;
};

/** Mass-settles every pool each `everyBlocks` blocks, acting as the admin. */
export function keeperModule(everyBlocks: bigint): DaemonModuleHooks {
  if (everyBlocks <= 0n) throw new Error('keeperModule: everyBlocks must be > 0');
  return {
    onBlock: (ctx, block) => {
      if (block % everyBlocks !== 0n) return;
      const records = ctx.engine.massSettle(ctx.config.admin);
      ctx.metrics.inc('keeper_runs');
      ctx.logger.info({ block: block.toString(), settled: records.length }, 'Keeper settled pools');
    },
  };
}

export class FarmDaemon {
  private modules: ModuleState[] = [];
  private readonly deps: FarmDaemonDeps;

  private readonly configPath: string;
  private logger?: Logger;
  readonly metrics = new Metrics();

  private runtime?: FarmRuntime;
  private blockTimer?: NodeJS.Timeout;
  private healthServer?: HealthServer;

  private ready = false;
  private warnings: string[] = [];

  constructor(args?: { configPath?: string; logger?: Logger; deps?: FarmDaemonDeps }) {
    this.configPath = args?.configPath ?? DEFAULT_CONFIG_PATH;
    this.logger = args?.logger;
    this.deps = args?.deps ?? {};
  }

  registerModule(name: string, hooks: DaemonModuleHooks): void {
    if (this.modules.find((m) => m.name === name)) throw new Error(`FarmDaemon: module already registered: ${name}`);
    this.modules.push({ name, hooks, started: false });
  }

  get healthPort(): number | undefined {
    return this.healthServer?.boundPort;
  }

  async start(): Promise<void> {
    if (this.ready) return;

    const config = await (this.deps.loadConfig ?? loadFarmConfig)(this.configPath);
    const logger = this.logger ?? pino({ level: config.telemetry.logLevel });
    this.logger = logger;
    logger.info({ configPath: this.configPath }, 'Loading farm config');

    const runtimeOpts: RuntimeOptions = { logger, metrics: this.metrics, openDb: this.deps.openDb };
    this.runtime = await openRuntime(config, runtimeOpts);

    if (config.keeper.enabled && !this.modules.some((m) => m.name === 'keeper')) {
      this.registerModule('keeper', keeperModule(config.keeper.settleEveryBlocks));
    }

    const ctx = this.getContext();
    for (const m of this.modules) {
      if (m.hooks.onStart) await m.hooks.onStart(ctx);
      m.started = true;
    }

    if (config.telemetry.healthPort != null) {
      this.healthServer = (this.deps.createHealthServer ?? ((a) => new HealthServer(a)))({
        port: config.telemetry.healthPort,
        getStatus: () => this.status(),
        getMetrics: () => this.metrics.snapshot(),
      });
      await this.healthServer.start();
    }

    this.ready = true;
    this.updateGauges();
    logger.info(
      { engine: this.runtime.engine.address, block: this.runtime.chain.blockNumber().toString() },
      'Farm daemon ready',
    );

    this.scheduleNextBlock();
  }

  async stop(): Promise<void> {
    if (!this.ready) return;

    if (this.blockTimer) clearTimeout(this.blockTimer);
    this.blockTimer = undefined;

    const ctx = this.getContext();

    // Stop modules in reverse registration order.
    for (const m of [...this.modules].reverse()) {
      try {
        if (m.started && m.hooks.onStop) await m.hooks.onStop(ctx);
      } finally {
        m.started = false;
      }
    }

    if (this.healthServer) await this.healthServer.stop();
    persist(ctx);
    ctx.db.close();

    this.ready = false;
  }

  /** Mine one block, run module hooks, persist. */
  async mineBlock(): Promise<bigint> {
    const ctx = this.getContext();
    const block = ctx.chain.mine();
    this.metrics.inc('blocks_mined');

    for (const m of this.modules) {
      if (!m.started || !m.hooks.onBlock) continue;
      try {
        await m.hooks.onBlock(ctx, block);
        m.lastBlock = block;
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        this.warnings.push(`${m.name} failed at block ${block}: ${msg}`);
        ctx.logger.error({ err, module: m.name, block: block.toString() }, 'Module block hook failed');
      }
    }

    persist(ctx);
    this.updateGauges();
    return block;
  }

  status(): HealthStatus {
    const modules: HealthStatus['modules'] = {};
    for (const m of this.modules) {
      modules[m.name] = {
        started: m.started,
        lastBlock: m.lastBlock != null ? m.lastBlock.toString() : undefined,
      };
    }

    const rt = this.runtime;
    const block = rt?.chain.blockNumber();
    return {
      ok: true,
      ready: this.ready,
      block: block?.toString(),
      period: rt && block != null && rt.engine.clock.isActive(block) ? rt.engine.clock.periodOf(block).toString() : undefined,
      pools: rt?.engine.poolLength,
      warnings: [...this.warnings],
      modules,
    };
  }

  private getContext(): DaemonContext {
    if (!this.runtime || !this.logger) throw new Error('FarmDaemon: not initialized');
    return { ...this.runtime, logger: this.logger, metrics: this.metrics };
  }

  private updateGauges(): void {
    if (!this.runtime) return;
    const block = this.runtime.chain.blockNumber();
    this.metrics.setGauge('block', block);
    this.metrics.setGauge('pools', this.runtime.engine.poolLength);
    if (this.runtime.engine.clock.isActive(block)) this.metrics.setGauge('period', this.runtime.engine.clock.periodOf(block));
  }

  private scheduleNextBlock(): void {
    const blockTimeMs = this.runtime?.config.chain.blockTimeMs ?? 0;
    if (!this.ready || blockTimeMs <= 0) return;
    this.blockTimer = setTimeout(() => void this.handleBlockTick(), blockTimeMs);
  }

  private async handleBlockTick(): Promise<void> {
    if (!this.ready) return;
    try {
      await this.mineBlock();
    } catch (err) {
      this.logger?.error({ err }, 'Block production failed');
    } finally {
      this.scheduleNextBlock();
    }
  }
}
