import type { EmissionParams } from '../math/emission.js';

export interface ScheduleConfig extends EmissionParams {
  startBlock: bigint;
  periodLength: bigint;
}

// Reference deployment: 24 periods of 172800 blocks, 1% decay per period.
export const DEFAULT_BASE_RATE = 4_320_000n;
export const DEFAULT_PERIOD_LENGTH = 172_800n;
export const DEFAULT_PERIODS = 24n;
export const DEFAULT_DECAY_NUMERATOR = 9_900n;
export const DEFAULT_DECAY_DENOMINATOR = 10_000n;

export function defaultSchedule(startBlock: bigint = 0n): ScheduleConfig {
  return {
    startBlock,
    periodLength: DEFAULT_PERIOD_LENGTH,
    periods: DEFAULT_PERIODS,
    baseRate: DEFAULT_BASE_RATE,
    decayNumerator: DEFAULT_DECAY_NUMERATOR,
    decayDenominator: DEFAULT_DECAY_DENOMINATOR,
  };
}
