export * from './daemon.js';
export * from './runtime.js';

export * from './config/config.js';

export * from './chain/revertible.js';
export * from './chain/token-ledger.js';
export * from './chain/local-chain.js';

export * from './farm/collaborators.js';
export * from './farm/errors.js';
export * from './farm/events.js';
export * from './farm/state.js';
export * from './farm/pool-accumulator.js';
export * from './farm/user-ledger.js';
export * from './farm/staking.js';
export * from './farm/admin.js';
export * from './farm/engine.js';

export * from './storage/db.js';

export * from './telemetry/metrics.js';
export * from './telemetry/health.js';
