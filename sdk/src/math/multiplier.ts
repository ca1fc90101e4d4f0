import type { EmissionSchedule } from './emission.js';
import type { PeriodClock } from './period.js';
import { add, max, min, mul, sub } from './uint256.js';

/**
 * Total reward units a full-weight pool earns over blocks in `[from, to)`.
 *
 * The range is clamped to the emission window, then split into the tail of the
 * first period, any whole periods in between, and the head of the last period.
 * The last period is taken from `to - 1` so a range ending exactly on
 * `endBlock` never reads past the final period.
 */
export class RangeMultiplier {
  public readonly schedule: EmissionSchedule;
  public readonly clock: PeriodClock;

  constructor(schedule: EmissionSchedule, clock: PeriodClock) {
    if (schedule.periods !== clock.periods) {
      throw new Error('RangeMultiplier: schedule and clock disagree on period count');
    }
    this.schedule = schedule;
    this.clock = clock;
  }

  multiplier(from: bigint, to: bigint): bigint {
    const lo = max(from, this.clock.startBlock);
    const hi = min(to, this.clock.endBlock);
    if (lo >= hi) return 0n;

    const first = this.clock.periodOf(lo);
    const last = this.clock.periodOf(hi - 1n);

    if (first === last) return mul(sub(hi, lo), this.schedule.rateOf(first));

    const head = mul(sub(this.clock.periodEnd(first), lo), this.schedule.rateOf(first));
    const tail = mul(sub(hi, this.clock.periodStart(last)), this.schedule.rateOf(last));

    let total = add(head, tail);
    for (let p = first + 1n; p < last; p++) {
      total = add(total, mul(this.clock.periodLength, this.schedule.rateOf(p)));
    }
    return total;
  }
}
