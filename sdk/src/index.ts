export * from './math/uint256.js';
export * from './math/period.js';
export * from './math/emission.js';
export * from './math/multiplier.js';
export * from './math/split.js';

export * from './types/config.js';
export * from './types/structs.js';

export * from './units.js';
