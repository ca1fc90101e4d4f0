import { mulDiv } from './uint256.js';

export type EmissionParams = {
  baseRate: bigint;
  periods: bigint;
  decayNumerator: bigint;
  decayDenominator: bigint;
};

export class PeriodOutOfRange extends Error {
  readonly period: bigint;

  constructor(period: bigint, periods: bigint) {
    super(`EmissionSchedule: period ${period} outside [1, ${periods}]`);
    this.period = period;
  }
}

/**
 * Per-block reward rate for each period, decaying geometrically from `baseRate`.
 * The table is computed once and never changes.
 */
export class EmissionSchedule {
  public readonly baseRate: bigint;
  public readonly periods: bigint;
  public readonly decayNumerator: bigint;
  public readonly decayDenominator: bigint;

  private readonly table: readonly bigint[];

  constructor(params: EmissionParams) {
    if (params.baseRate < 0n) throw new Error('EmissionSchedule: baseRate must be >= 0');
    if (params.periods <= 0n) throw new Error('EmissionSchedule: periods must be > 0');
    if (params.decayDenominator <= 0n) throw new Error('EmissionSchedule: decayDenominator must be > 0');
    if (params.decayNumerator < 0n || params.decayNumerator > params.decayDenominator) {
      throw new Error('EmissionSchedule: decayNumerator must be in [0, decayDenominator]');
    }

    this.baseRate = params.baseRate;
    this.periods = params.periods;
    this.decayNumerator = params.decayNumerator;
    this.decayDenominator = params.decayDenominator;

    const table: bigint[] = [params.baseRate];
    for (let i = 1n; i < params.periods; i++) {
      const prev = table[table.length - 1];
      table.push(mulDiv(prev, params.decayNumerator, params.decayDenominator));
    }
    this.table = Object.freeze(table);
  }

  /** Rebuild from a persisted table, checking it against the decay rule. */
  static fromRates(rates: readonly bigint[], decayNumerator: bigint, decayDenominator: bigint): EmissionSchedule {
    if (rates.length === 0) throw new Error('EmissionSchedule: empty rate table');
    const schedule = new EmissionSchedule({
      baseRate: rates[0],
      periods: BigInt(rates.length),
      decayNumerator,
      decayDenominator,
    });
    rates.forEach((r, i) => {
      if (schedule.table[i] !== r) throw new Error(`EmissionSchedule: persisted rate for period ${i + 1} does not match decay`);
    });
    return schedule;
  }

  rateOf(period: bigint): bigint {
    if (period < 1n || period > this.periods) throw new PeriodOutOfRange(period, this.periods);
    return this.table[Number(period - 1n)];
  }

  rates(): bigint[] {
    return [...this.table];
  }
}
