// Block clock for the emission window. Periods are 1-based; period k covers
// [startBlock + (k-1)*periodLength, startBlock + k*periodLength).
export class PeriodClock {
  public readonly startBlock: bigint;
  public readonly periodLength: bigint;
  public readonly periods: bigint;

  constructor(startBlock: bigint, periodLength: bigint, periods: bigint) {
    if (startBlock < 0n) throw new Error('PeriodClock: startBlock must be >= 0');
    if (periodLength <= 0n) throw new Error('PeriodClock: periodLength must be > 0');
    if (periods <= 0n) throw new Error('PeriodClock: periods must be > 0');
    this.startBlock = startBlock;
    this.periodLength = periodLength;
    this.periods = periods;
  }

  get endBlock(): bigint {
    return this.startBlock + this.periods * this.periodLength;
  }

  // Callers clamp into the window first; blocks before start map to period 1.
  periodOf(block: bigint): bigint {
    if (block <= this.startBlock) return 1n;
    return (block - this.startBlock) / this.periodLength + 1n;
  }

  periodStart(period: bigint): bigint {
    if (period < 1n) throw new Error('PeriodClock: period must be >= 1');
    return this.startBlock + (period - 1n) * this.periodLength;
  }

  periodEnd(period: bigint): bigint {
    return this.periodStart(period + 1n);
  }

  isActive(block: bigint): boolean {
    return block >= this.startBlock && block < this.endBlock;
  }

  blocksRemaining(block: bigint): bigint {
    if (block >= this.endBlock) return 0n;
    if (block < this.startBlock) return this.endBlock - this.startBlock;
    return this.endBlock - block;
  }
}
