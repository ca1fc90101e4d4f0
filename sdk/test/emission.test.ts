import { describe, expect, it } from 'vitest';

import { EmissionSchedule, PeriodOutOfRange } from '../src/math/emission.js';
import { RangeMultiplier } from '../src/math/multiplier.js';
import { PeriodClock } from '../src/math/period.js';
import { defaultSchedule } from '../src/types/config.js';

const L = 172_800n;

function small(): RangeMultiplier {
  // Rates 100, 50, 25 over [100, 130).
  const schedule = new EmissionSchedule({ baseRate: 100n, periods: 3n, decayNumerator: 5_000n, decayDenominator: 10_000n });
  return new RangeMultiplier(schedule, new PeriodClock(100n, 10n, 3n));
}

describe('EmissionSchedule', () => {
  it('decays the reference base rate by 1% per period', () => {
    const cfg = defaultSchedule();
    const s = new EmissionSchedule(cfg);

    expect(s.rateOf(1n)).toBe(4_320_000n);
    expect(s.rateOf(2n)).toBe((4_320_000n * 9_900n) / 10_000n);
    expect(s.rateOf(2n)).toBe(4_276_800n);
    expect(s.rateOf(3n)).toBe(4_234_032n);
    expect(s.rates()).toHaveLength(24);
  });

  it('rejects periods outside the table', () => {
    const s = new EmissionSchedule(defaultSchedule());
    expect(() => s.rateOf(0n)).toThrow(PeriodOutOfRange);
    expect(() => s.rateOf(25n)).toThrow(PeriodOutOfRange);
  });

  it('rebuilds from a persisted table and refuses a tampered one', () => {
    const s = new EmissionSchedule(defaultSchedule());
    const again = EmissionSchedule.fromRates(s.rates(), 9_900n, 10_000n);
    expect(again.rateOf(24n)).toBe(s.rateOf(24n));

    const tampered = s.rates();
    tampered[5] = tampered[5] + 1n;
    expect(() => EmissionSchedule.fromRates(tampered, 9_900n, 10_000n)).toThrow('period 6');
  });

  it('rejects a decay above 1', () => {
    expect(() => new EmissionSchedule({ baseRate: 1n, periods: 2n, decayNumerator: 11n, decayDenominator: 10n })).toThrow(
      'decayNumerator',
    );
  });
});

describe('RangeMultiplier', () => {
  it('charges a single rate inside one period', () => {
    const m = small();
    expect(m.multiplier(101n, 105n)).toBe(400n);
    expect(m.multiplier(110n, 120n)).toBe(500n);
  });

  it('splits ranges that straddle periods', () => {
    const m = small();
    expect(m.multiplier(105n, 115n)).toBe(5n * 100n + 5n * 50n);
    expect(m.multiplier(105n, 125n)).toBe(5n * 100n + 10n * 50n + 5n * 25n);
  });

  it('clamps to the emission window', () => {
    const m = small();
    expect(m.multiplier(0n, 1_000n)).toBe(1_000n + 500n + 250n);
    expect(m.multiplier(125n, 130n)).toBe(125n);
    expect(m.multiplier(0n, 100n)).toBe(0n);
    expect(m.multiplier(130n, 200n)).toBe(0n);
    expect(m.multiplier(120n, 110n)).toBe(0n);
  });

  it('is additive over adjacent ranges', () => {
    const m = small();
    for (const b of [100n, 104n, 110n, 117n, 120n, 129n, 130n]) {
      expect(m.multiplier(100n, b) + m.multiplier(b, 130n)).toBe(m.multiplier(100n, 130n));
    }
    expect(m.multiplier(103n, 112n) + m.multiplier(112n, 127n)).toBe(m.multiplier(103n, 127n));
  });

  it('sums the first two reference periods', () => {
    const cfg = defaultSchedule(1_000n);
    const m = new RangeMultiplier(new EmissionSchedule(cfg), new PeriodClock(cfg.startBlock, cfg.periodLength, cfg.periods));

    expect(m.multiplier(1_000n, 1_000n + 2n * L)).toBe(L * 4_320_000n + L * 4_276_800n);
  });

  it('refuses a clock with a different period count', () => {
    const schedule = new EmissionSchedule({ baseRate: 1n, periods: 2n, decayNumerator: 1n, decayDenominator: 1n });
    expect(() => new RangeMultiplier(schedule, new PeriodClock(0n, 1n, 3n))).toThrow('disagree');
  });
});
